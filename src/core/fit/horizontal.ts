/**
 * 4-parameter 2D similarity fit (rotation, uniform scale, two translations).
 *
 *   e = a·E − b·N + tE
 *   n = b·E + a·N + tN
 *
 * (E, N) are projected coordinates, (e, n) local grid coordinates. Both sets
 * are centered first so the least-squares system only carries (a, b).
 */

import type { HorizontalParameters, LocalPointRecord, ProjectedPoint } from "../types.js";
import { solveLeastSquares } from "../math/linalg.js";
import { NumericError } from "../errors.js";
import { EPS_SCALE } from "../constants.js";
import { centerPairs, type CenteredPairs } from "./pairs.js";

export function fitHorizontalCentered(pairs: CenteredPairs): HorizontalParameters {
  const design: number[][] = [];
  const observations: number[] = [];

  for (let i = 0; i < pairs.projected.length; i++) {
    const [E, N] = pairs.projected[i];
    const [e, n] = pairs.local[i];
    design.push([E, -N]);
    observations.push(e);
    design.push([N, E]);
    observations.push(n);
  }

  const [a, b] = solveLeastSquares(design, observations);

  const scale = Math.hypot(a, b);
  if (!Number.isFinite(scale) || scale <= EPS_SCALE) {
    throw new NumericError(`Similarity fit collapsed to scale ${scale}`, "degenerate_scale");
  }

  const [Ec, Nc] = pairs.projected_centroid;
  const [ec, nc] = pairs.local_centroid;

  return {
    a,
    b,
    translation_easting_m: ec - a * Ec + b * Nc,
    translation_northing_m: nc - b * Ec - a * Nc
  };
}

/**
 * Fit the similarity transform mapping projected points onto local points.
 * Both lists must hold the same matched points in the same order.
 *
 * @throws InputError with fewer than three points
 * @throws NumericError when the system is singular or the scale degenerates
 */
export function fitHorizontal(projected: ProjectedPoint[], local: LocalPointRecord[]): HorizontalParameters {
  return fitHorizontalCentered(centerPairs(projected, local));
}

/**
 * Apply the similarity transform to a projected coordinate.
 */
export function applyHorizontal(params: HorizontalParameters, easting: number, northing: number): [number, number] {
  const { a, b, translation_easting_m, translation_northing_m } = params;
  return [
    a * easting - b * northing + translation_easting_m,
    b * easting + a * northing + translation_northing_m
  ];
}
