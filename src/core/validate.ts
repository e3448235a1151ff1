/**
 * Runtime validation for calibration inputs.
 * Collects every problem before throwing so a caller sees them all at once.
 */

import type {
  GlobalPointRecord,
  LocalPointRecord,
  ProjectionConfig,
  ProjectionMethod
} from "./types.js";
import { InputError, ProjectionError } from "./errors.js";
import { UTM_MAX_ZONE, UTM_MIN_ZONE } from "./constants.js";

export { InputError, ProjectionError };

export const PROJECTION_METHODS: readonly ProjectionMethod[] = ["default", "utm", "ltm"];

export function isProjectionMethod(value: unknown): value is ProjectionMethod {
  return typeof value === "string" && (PROJECTION_METHODS as readonly string[]).includes(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function describeMethod(config: unknown): string {
  if (config && typeof config === "object" && "method" in config) {
    return String(config.method);
  }
  return String(config);
}

/**
 * Validate a ProjectionConfig.
 *
 * @throws ProjectionError listing every invalid parameter
 */
export function validateProjectionConfig(config: ProjectionConfig): ProjectionConfig {
  const errors: string[] = [];

  switch (config.method) {
    case "default":
      break;
    case "utm":
      if (config.zone !== undefined) {
        if (!Number.isInteger(config.zone) || config.zone < UTM_MIN_ZONE || config.zone > UTM_MAX_ZONE) {
          errors.push(`zone must be an integer between ${UTM_MIN_ZONE} and ${UTM_MAX_ZONE}`);
        }
      }
      if (config.hemisphere !== undefined && config.hemisphere !== "north" && config.hemisphere !== "south") {
        errors.push(`hemisphere must be "north" or "south"`);
      }
      break;
    case "ltm": {
      const fields = [
        "central_meridian_deg",
        "latitude_of_origin_deg",
        "false_easting_m",
        "false_northing_m",
        "scale_factor"
      ] as const;
      for (const field of fields) {
        if (!isFiniteNumber(config[field])) {
          errors.push(`${field} is required and must be a finite number`);
        }
      }
      if (isFiniteNumber(config.scale_factor) && config.scale_factor <= 0) {
        errors.push("scale_factor must be greater than 0");
      }
      if (isFiniteNumber(config.latitude_of_origin_deg) && Math.abs(config.latitude_of_origin_deg) > 90) {
        errors.push("latitude_of_origin_deg must be between -90 and 90");
      }
      if (isFiniteNumber(config.central_meridian_deg) && Math.abs(config.central_meridian_deg) > 180) {
        errors.push("central_meridian_deg must be between -180 and 180");
      }
      break;
    }
    default: {
      const unknownConfig: never = config;
      throw new ProjectionError(
        `Unknown projection method: ${describeMethod(unknownConfig)}`,
        describeMethod(unknownConfig)
      );
    }
  }

  if (errors.length > 0) {
    throw new ProjectionError(
      `Invalid ${config.method.toUpperCase()} projection: ${errors.join("; ")}`,
      config.method
    );
  }

  return config;
}

/**
 * Validate geodetic control points (identifiers and coordinate ranges).
 */
export function validateGlobalPoints(points: GlobalPointRecord[]): GlobalPointRecord[] {
  const errors: string[] = [];

  points.forEach((point, i) => {
    const prefix = `global[${i}]`;
    if (point.point_id.length === 0) {
      errors.push(`${prefix}.point_id must be a non-empty string`);
    }
    if (!isFiniteNumber(point.latitude_deg) || Math.abs(point.latitude_deg) > 90) {
      errors.push(`${prefix}.latitude_deg must be a number between -90 and 90`);
    }
    if (!isFiniteNumber(point.longitude_deg) || Math.abs(point.longitude_deg) > 180) {
      errors.push(`${prefix}.longitude_deg must be a number between -180 and 180`);
    }
    if (!isFiniteNumber(point.ellipsoidal_height_m)) {
      errors.push(`${prefix}.ellipsoidal_height_m must be a finite number`);
    }
  });

  if (errors.length > 0) {
    throw new InputError(errors);
  }
  return points;
}

/**
 * Validate local grid control points.
 */
export function validateLocalPoints(points: LocalPointRecord[]): LocalPointRecord[] {
  const errors: string[] = [];

  points.forEach((point, i) => {
    const prefix = `local[${i}]`;
    if (point.point_id.length === 0) {
      errors.push(`${prefix}.point_id must be a non-empty string`);
    }
    for (const field of ["easting_m", "northing_m", "elevation_m"] as const) {
      if (!isFiniteNumber(point[field])) {
        errors.push(`${prefix}.${field} must be a finite number`);
      }
    }
  });

  if (errors.length > 0) {
    throw new InputError(errors);
  }
  return points;
}
