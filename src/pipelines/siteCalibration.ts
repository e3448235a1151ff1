/**
 * File-to-file site calibration run:
 * 1. Reads the global and local control point CSVs
 * 2. Calibrates (match, project, gate, fit, residuals)
 * 3. Renders the Markdown report and, optionally, the transformed CSV
 * 4. Writes outputs only once every step has succeeded
 */

import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import type { FitReport, ProjectionConfig, TransformedPoint } from "../core/types.js";
import { calibrate, type CalibrationOptions } from "../core/calibrate.js";
import { transformPoints } from "../core/transform.js";
import { formatTransformedCsv, readGlobalCsv, readLocalCsv } from "../io/csv.js";
import { generateCalibrationReport } from "../report/markdown.js";

export interface SiteCalibrationRun {
  globalCsvPath: string;
  localCsvPath: string;
  projection: ProjectionConfig;
  outputReportPath: string;
  outputCsvPath?: string;
  options?: Partial<CalibrationOptions>;
  generatedAt?: string;
}

export interface SiteCalibrationOutcome {
  report: FitReport;
  transformed: TransformedPoint[];
  written: string[];
}

/**
 * Stage every output in a temporary file beside its target, then move them
 * into place. A failure removes the staged files and any output already moved.
 */
async function writeOutputs(outputs: Array<[string, string]>): Promise<void> {
  const staged: Array<[string, string]> = [];
  const committed: string[] = [];
  try {
    for (const [filePath, content] of outputs) {
      await mkdir(path.dirname(filePath), { recursive: true });
      const tempPath = `${filePath}.tmp-${process.pid}`;
      staged.push([tempPath, filePath]);
      await writeFile(tempPath, content, "utf8");
    }
    for (const [tempPath, filePath] of staged) {
      await rename(tempPath, filePath);
      committed.push(filePath);
    }
  } catch (err) {
    const leftovers = [...staged.map(([tempPath]) => tempPath), ...committed];
    await Promise.all(leftovers.map((filePath) => rm(filePath, { force: true })));
    throw err;
  }
}

export async function runSiteCalibration(run: SiteCalibrationRun): Promise<SiteCalibrationOutcome> {
  const [globalPoints, localPoints] = await Promise.all([
    readGlobalCsv(run.globalCsvPath),
    readLocalCsv(run.localCsvPath)
  ]);

  const { report, projected } = calibrate({
    globalPoints,
    localPoints,
    projection: run.projection,
    options: run.options
  });
  const transformed = transformPoints(projected, report.parameters);

  const outputs: Array<[string, string]> = [
    [run.outputReportPath, generateCalibrationReport(report, { generatedAt: run.generatedAt })]
  ];
  if (run.outputCsvPath) {
    outputs.push([run.outputCsvPath, formatTransformedCsv(transformed)]);
  }

  await writeOutputs(outputs);

  return { report, transformed, written: outputs.map(([filePath]) => filePath) };
}
