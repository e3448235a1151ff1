import type { ProjectionConfig, ProjectionMethod, UtmProjectionConfig } from "../core/types.js";
import { InputError, ProjectionError } from "../core/errors.js";
import { isProjectionMethod, PROJECTION_METHODS } from "../core/validate.js";

export interface ParsedArgs {
  command?: string;
  flags: Record<string, string>;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, string> = {};
  let command: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith("--")) {
      command ??= a;
      continue;
    }
    const key = a.slice(2);
    const val = argv[i + 1];
    if (val === undefined || val.startsWith("--")) {
      flags[key] = "true";
    } else {
      flags[key] = val;
      i++;
    }
  }
  return { command, flags };
}

export const LTM_FLAGS = [
  "central-meridian",
  "latitude-of-origin",
  "false-easting",
  "false-northing",
  "scale-factor"
] as const;

function parseNumberFlag(flags: Record<string, string>, name: string, errors: string[]): number {
  const value = Number(flags[name]);
  if (!Number.isFinite(value)) {
    errors.push(`--${name} must be a number, got "${flags[name]}"`);
  }
  return value;
}

/**
 * Build the projection config from `--method` and its companion flags.
 *
 * @throws ProjectionError for an unknown method or bad projection flags
 */
export function buildProjectionConfig(flags: Record<string, string>): ProjectionConfig {
  const method = flags["method"] ?? "default";
  if (!isProjectionMethod(method)) {
    throw new ProjectionError(
      `Unknown projection method "${method}" (expected one of: ${PROJECTION_METHODS.join(", ")})`,
      method
    );
  }

  const errors: string[] = [];
  const config = projectionFromFlags(method, flags, errors);
  if (errors.length > 0) {
    throw new ProjectionError(`Invalid projection flags: ${errors.join("; ")}`, method);
  }
  return config;
}

function projectionFromFlags(
  method: ProjectionMethod,
  flags: Record<string, string>,
  errors: string[]
): ProjectionConfig {
  switch (method) {
    case "default":
      return { method };
    case "utm": {
      const utm: UtmProjectionConfig = { method };
      if (flags["utm-zone"] !== undefined) {
        utm.zone = parseNumberFlag(flags, "utm-zone", errors);
      }
      const hemisphere = flags["hemisphere"];
      if (hemisphere === "north" || hemisphere === "south") {
        utm.hemisphere = hemisphere;
      } else if (hemisphere !== undefined) {
        errors.push(`--hemisphere must be "north" or "south", got "${hemisphere}"`);
      }
      return utm;
    }
    case "ltm": {
      const missing = LTM_FLAGS.filter((name) => flags[name] === undefined);
      if (missing.length > 0) {
        throw new ProjectionError(
          `The LTM method requires all of its parameters; missing: ${missing.map((m) => `--${m}`).join(", ")}`,
          method
        );
      }
      return {
        method,
        central_meridian_deg: parseNumberFlag(flags, "central-meridian", errors),
        latitude_of_origin_deg: parseNumberFlag(flags, "latitude-of-origin", errors),
        false_easting_m: parseNumberFlag(flags, "false-easting", errors),
        false_northing_m: parseNumberFlag(flags, "false-northing", errors),
        scale_factor: parseNumberFlag(flags, "scale-factor", errors)
      };
    }
  }
}

export interface Local2GlobalArgs {
  globalCsvPath: string;
  localCsvPath: string;
  projection: ProjectionConfig;
  outputReportPath: string;
  outputCsvPath?: string;
}

export const DEFAULT_REPORT_PATH = "calibration_report.md";

/**
 * @throws InputError when a required file flag is missing or a path flag has no value
 */
export function parseLocal2GlobalArgs(flags: Record<string, string>): Local2GlobalArgs {
  const errors: string[] = [];
  const globalCsvPath = flags["global-csv"];
  const localCsvPath = flags["local-csv"];
  if (globalCsvPath === undefined || globalCsvPath === "true") errors.push("--global-csv <path> is required");
  if (localCsvPath === undefined || localCsvPath === "true") errors.push("--local-csv <path> is required");
  if (flags["output-report"] === "true") errors.push("--output-report requires a <path>");
  if (flags["output-csv"] === "true") errors.push("--output-csv requires a <path>");
  if (errors.length > 0 || globalCsvPath === undefined || localCsvPath === undefined) {
    throw new InputError(errors);
  }

  return {
    globalCsvPath,
    localCsvPath,
    projection: buildProjectionConfig(flags),
    outputReportPath: flags["output-report"] ?? DEFAULT_REPORT_PATH,
    outputCsvPath: flags["output-csv"]
  };
}
