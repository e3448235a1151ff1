import type { LocalPointRecord, ProjectedPoint, Vec2 } from "../types.js";
import { InputError } from "../errors.js";
import { MIN_MATCHED_POINTS } from "../constants.js";
import { center } from "../math/vec.js";

/**
 * Projected and local coordinates of the matched set, both reduced to their
 * own centroid. Index i of every array refers to the same control point.
 */
export interface CenteredPairs {
  point_ids: string[];
  projected_centroid: Vec2;
  local_centroid: Vec2;
  projected: Vec2[];
  local: Vec2[];
}

export function centerPairs(projected: ProjectedPoint[], local: LocalPointRecord[]): CenteredPairs {
  if (projected.length !== local.length) {
    throw new Error("Projected and local point lists must have the same length.");
  }
  if (projected.length < MIN_MATCHED_POINTS) {
    throw new InputError([
      `A fit needs at least ${MIN_MATCHED_POINTS} matched points, got ${projected.length}`
    ]);
  }
  for (let i = 0; i < projected.length; i++) {
    if (projected[i].point_id !== local[i].point_id) {
      throw new Error(
        `Point order mismatch at index ${i}: "${projected[i].point_id}" vs "${local[i].point_id}"`
      );
    }
  }

  const projectedCentered = center(projected.map((p): Vec2 => [p.easting_m, p.northing_m]));
  const localCentered = center(local.map((p): Vec2 => [p.easting_m, p.northing_m]));

  return {
    point_ids: projected.map((p) => p.point_id),
    projected_centroid: projectedCentered.centroid,
    local_centroid: localCentered.centroid,
    projected: projectedCentered.centered,
    local: localCentered.centered
  };
}
