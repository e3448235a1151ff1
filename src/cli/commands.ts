import { readFile } from "node:fs/promises";

import { InputError, SiteCalError } from "../core/errors.js";
import { formatMm } from "../report/markdown.js";
import { runSiteCalibration } from "../pipelines/siteCalibration.js";
import { parseArgs, parseLocal2GlobalArgs } from "./args.js";

export const USAGE = [
  "Usage:",
  "  sitecal local2global --global-csv <path> --local-csv <path> [options]",
  "  sitecal version",
  "",
  "Options:",
  "  --method <default|utm|ltm>   projection method (default: default)",
  "  --utm-zone <1-60>            force the UTM zone (utm only)",
  "  --hemisphere <north|south>   force the UTM hemisphere (utm only)",
  "  --central-meridian <deg>     LTM central meridian",
  "  --latitude-of-origin <deg>   LTM latitude of origin",
  "  --false-easting <m>          LTM false easting",
  "  --false-northing <m>         LTM false northing",
  "  --scale-factor <k>           LTM scale factor",
  "  --output-report <path>       Markdown report (default: calibration_report.md)",
  "  --output-csv <path>          transformed coordinates CSV"
].join("\n");

export async function readPackageVersion(): Promise<string> {
  const pkg: unknown = JSON.parse(await readFile(new URL("../../package.json", import.meta.url), "utf8"));
  if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "unknown";
}

/**
 * Lines to print for a failed run. InputError lists every problem.
 */
export function describeError(err: unknown): string[] {
  if (err instanceof InputError) {
    return [`${err.name}:`, ...err.errors.map((e) => `  - ${e}`)];
  }
  if (err instanceof SiteCalError) {
    return [`${err.name}: ${err.message}`];
  }
  if (err instanceof Error) {
    return [`Error: ${err.message}`];
  }
  return [`Error: ${String(err)}`];
}

async function local2global(flags: Record<string, string>): Promise<void> {
  const args = parseLocal2GlobalArgs(flags);
  const outcome = await runSiteCalibration(args);
  const { report } = outcome;

  console.log(`Calibration (${report.projection.method}) completed with ${report.matched_count} matched points.`);
  console.log(`  RMS horizontal: ${formatMm(report.rms.horizontal_m)} mm`);
  console.log(`  RMS vertical:   ${formatMm(report.rms.vertical_m)} mm`);
  console.log(`Calibration report generated at: ${args.outputReportPath}`);
  if (args.outputCsvPath) {
    console.log(`Transformed coordinates saved to: ${args.outputCsvPath}`);
  }
}

/**
 * Run the command line and resolve to the process exit code.
 */
export async function runCli(argv: string[]): Promise<number> {
  const { command, flags } = parseArgs(argv);

  if (flags["help"] !== undefined || command === "help") {
    console.log(USAGE);
    return 0;
  }

  try {
    switch (command) {
      case "local2global":
        await local2global(flags);
        return 0;
      case "version":
        console.log(`sitecal ${await readPackageVersion()}`);
        return 0;
      default:
        console.error(command === undefined ? "Missing command." : `Unknown command: ${command}`);
        console.error(USAGE);
        return 1;
    }
  } catch (err) {
    for (const line of describeError(err)) {
      console.error(line);
    }
    return 1;
  }
}
