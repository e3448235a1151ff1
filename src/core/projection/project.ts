import proj4 from "proj4";

import type {
  GlobalPointRecord,
  ProjectedPoint,
  ProjectionConfig,
  ProjectionDefinition
} from "../types.js";
import { ProjectionError } from "../errors.js";
import { resolveProjectionDefinition, toProj4String } from "./definition.js";

const GEODETIC_SOURCE = "WGS84";

export interface ProjectionResult {
  definition: ProjectionDefinition;
  points: ProjectedPoint[];
}

/**
 * Project geodetic points through a resolved definition.
 * proj4 takes and returns [lon, lat] / [easting, northing].
 */
export function projectWithDefinition(
  points: GlobalPointRecord[],
  definition: ProjectionDefinition
): ProjectedPoint[] {
  let forward: (coordinates: number[]) => number[];
  try {
    const converter = proj4(GEODETIC_SOURCE, toProj4String(definition));
    forward = (coordinates) => converter.forward(coordinates);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ProjectionError(`Invalid ${definition.method} projection definition: ${detail}`, definition.method);
  }

  return points.map((point) => {
    const [easting, northing] = forward([point.longitude_deg, point.latitude_deg]);
    if (!Number.isFinite(easting) || !Number.isFinite(northing)) {
      throw new ProjectionError(
        `Projection of point "${point.point_id}" produced non-finite coordinates`,
        definition.method
      );
    }
    return {
      point_id: point.point_id,
      easting_m: easting,
      northing_m: northing,
      ellipsoidal_height_m: point.ellipsoidal_height_m
    };
  });
}

/**
 * Project geodetic points to the calibration plane.
 *
 * Deterministic for fixed input; the default method depends on the order
 * of `points` because its origin is the first entry.
 *
 * @throws ProjectionError when the config is invalid or a point cannot be projected
 */
export function projectPoints(points: GlobalPointRecord[], config: ProjectionConfig): ProjectionResult {
  const definition = resolveProjectionDefinition(points, config);
  return { definition, points: projectWithDefinition(points, definition) };
}
