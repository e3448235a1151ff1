/**
 * Inclined-plane vertical correction.
 *
 *   Zerr = h_local − h_global = C + Sn·N' + Se·E'
 *
 * with (E', N') the projected coordinates reduced to the projected centroid
 * of the matched set.
 */

import type { LocalPointRecord, ProjectedPoint, VerticalParameters } from "../types.js";
import { solveLeastSquares } from "../math/linalg.js";
import { centerPairs, type CenteredPairs } from "./pairs.js";

export function heightDiscrepancy(local: LocalPointRecord, projected: ProjectedPoint): number {
  return local.elevation_m - projected.ellipsoidal_height_m;
}

export function fitVerticalCentered(pairs: CenteredPairs, discrepancies: number[]): VerticalParameters {
  const design = pairs.projected.map(([E, N]) => [1, N, E]);
  const [constant_m, slope_north, slope_east] = solveLeastSquares(design, discrepancies);

  return {
    constant_m,
    slope_north,
    slope_east,
    centroid_easting_m: pairs.projected_centroid[0],
    centroid_northing_m: pairs.projected_centroid[1]
  };
}

/**
 * Fit the vertical plane over the same matched set as the horizontal fit.
 *
 * @throws NumericError when the design matrix is singular
 */
export function fitVertical(projected: ProjectedPoint[], local: LocalPointRecord[]): VerticalParameters {
  const pairs = centerPairs(projected, local);
  const discrepancies = local.map((point, i) => heightDiscrepancy(point, projected[i]));
  return fitVerticalCentered(pairs, discrepancies);
}

/**
 * Predicted height discrepancy at a projected coordinate.
 */
export function predictDiscrepancy(params: VerticalParameters, easting: number, northing: number): number {
  return (
    params.constant_m +
    params.slope_north * (northing - params.centroid_northing_m) +
    params.slope_east * (easting - params.centroid_easting_m)
  );
}
