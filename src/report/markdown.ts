/**
 * Markdown calibration report. Pure: returns the document, writes nothing.
 */

import type { FitReport, ProjectionDefinition } from "../core/types.js";
import { roundScalar } from "../core/math/vec.js";

export interface ReportOptions {
  /** Timestamp printed in the header; defaults to now. */
  generatedAt?: string;
}

/** Metres to millimetres, one decimal. */
export function formatMm(valueM: number): string {
  return roundScalar(valueM * 1000, 1).toFixed(1);
}

function formatFixed(value: number, decimals: number): string {
  return roundScalar(value, decimals).toFixed(decimals);
}

const LINE_BREAK = /\r\n|\r|\n/g;

function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(LINE_BREAK, "<br>");
}

/** Inline code span whose fence is longer than any backtick run in the value. */
function codeSpan(value: string): string {
  const text = value.replace(LINE_BREAK, " ");
  const longestRun = Math.max(0, ...(text.match(/`+/g) ?? []).map((run) => run.length));
  const fence = "`".repeat(longestRun + 1);
  const pad = text.startsWith("`") || text.endsWith("`") ? " " : "";
  return `${fence}${pad}${text}${pad}${fence}`;
}

function projectionLines(definition: ProjectionDefinition, matchedCount: number): string[] {
  const lines = [
    `- **Central Meridian:** ${definition.central_meridian_deg}°`,
    `- **Latitude of Origin:** ${definition.latitude_of_origin_deg}°`,
    `- **False Easting:** ${definition.false_easting_m} m`,
    `- **False Northing:** ${definition.false_northing_m} m`,
    `- **Scale Factor:** ${definition.scale_factor}`
  ];
  if (definition.utm_zone !== undefined && definition.hemisphere !== undefined) {
    lines.push(`- **UTM Zone:** ${definition.utm_zone}${definition.hemisphere === "south" ? "S" : "N"}`);
  }
  lines.push(`- **Matched Points:** ${matchedCount}`);
  return lines;
}

export function generateCalibrationReport(report: FitReport, options: ReportOptions = {}): string {
  const { parameters, derived, residuals, rms, statistics, definition } = report;
  const { horizontal, vertical } = parameters;
  const lines: string[] = [];

  lines.push("# Site Calibration Report");
  lines.push("");
  lines.push(`**Generated:** ${options.generatedAt ?? new Date().toISOString()}`);
  lines.push("");
  lines.push(`## Calibration Method: ${report.projection.method.toUpperCase()}`);
  lines.push("");

  lines.push("### Projection");
  lines.push("");
  lines.push(...projectionLines(definition, report.matched_count));
  lines.push("");

  lines.push("### Horizontal Parameters");
  lines.push("");
  lines.push(`- **a:** \`${formatFixed(horizontal.a, 9)}\``);
  lines.push(`- **b:** \`${formatFixed(horizontal.b, 9)}\``);
  lines.push(`- **Translation East:** ${formatFixed(horizontal.translation_easting_m, 4)} m`);
  lines.push(`- **Translation North:** ${formatFixed(horizontal.translation_northing_m, 4)} m`);
  lines.push(`- **Rotation:** ${formatFixed(derived.rotation_deg, 6)}°`);
  lines.push(
    `- **Scale Factor:** ${formatFixed(derived.scale_factor, 9)} (${formatFixed(derived.scale_ppm, 2)} ppm)`
  );
  lines.push("");

  lines.push("### Vertical Parameters");
  lines.push("");
  lines.push(`- **Constant Shift:** ${formatFixed(vertical.constant_m, 4)} m`);
  lines.push(`- **Slope North:** ${formatFixed(vertical.slope_north * 1e6, 3)} ppm`);
  lines.push(`- **Slope East:** ${formatFixed(vertical.slope_east * 1e6, 3)} ppm`);
  lines.push(
    `- **Plane Origin:** E ${formatFixed(vertical.centroid_easting_m, 4)}, N ${formatFixed(vertical.centroid_northing_m, 4)}`
  );
  lines.push("");

  lines.push("### Residuals (mm)");
  lines.push("");
  lines.push("| Point | dE (mm) | dN (mm) | dH (mm) | Horizontal (mm) |");
  lines.push("|---|---:|---:|---:|---:|");
  for (const r of residuals) {
    lines.push(
      `| ${escapeCell(r.point_id)} | ${formatMm(r.delta_easting_m)} | ${formatMm(r.delta_northing_m)} | ` +
        `${formatMm(r.delta_elevation_m)} | ${formatMm(r.horizontal_m)} |`
    );
  }
  lines.push("");

  lines.push("### Fit Quality");
  lines.push("");
  lines.push(`- **RMS Horizontal:** ${formatMm(rms.horizontal_m)} mm`);
  lines.push(`- **RMS Vertical:** ${formatMm(rms.vertical_m)} mm`);
  lines.push(`- **Collinearity Ratio:** ${report.collinearity_ratio.toExponential(3)}`);
  lines.push("");

  lines.push("### Statistics");
  lines.push("");
  lines.push(`- **Worst Point:** ${codeSpan(statistics.worst.point_id)} (Error: ${formatMm(statistics.worst.horizontal_m)} mm)`);
  lines.push(`- **Best Point:** ${codeSpan(statistics.best.point_id)} (Error: ${formatMm(statistics.best.horizontal_m)} mm)`);
  lines.push("- **Standard Deviations (mm):**");
  lines.push(`  - \`dE\`: ${formatMm(statistics.std_dev_m.easting)} mm`);
  lines.push(`  - \`dN\`: ${formatMm(statistics.std_dev_m.northing)} mm`);
  lines.push(`  - \`dH\`: ${formatMm(statistics.std_dev_m.elevation)} mm`);
  lines.push(`- **99th Percentile of Horizontal Errors:** ${formatMm(statistics.p99_horizontal_m)} mm`);
  lines.push("");

  return lines.join("\n");
}
