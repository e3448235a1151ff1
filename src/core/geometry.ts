/**
 * Collinearity gate for calibration geometry.
 * Points close to a line leave the similarity normal equations near-singular.
 */

import type { Vec2 } from "./types.js";
import { center } from "./math/vec.js";
import { symmetricEigenvalues2x2 } from "./math/linalg.js";
import { GeometryError } from "./errors.js";
import { COLLINEARITY_RATIO_THRESHOLD } from "./constants.js";

export interface CollinearityCheck {
  passed: boolean;
  /** min / max eigenvalue of the population covariance; 0 for coincident points */
  ratio: number;
  /** [major, minor] eigenvalues (m²) */
  eigenvalues: [number, number];
}

/**
 * Population covariance (xx, xy, yy) of a planar point cloud about its centroid.
 */
export function covariance2d(points: Vec2[]): { xx: number; xy: number; yy: number } {
  if (points.length === 0) {
    return { xx: 0, xy: 0, yy: 0 };
  }
  const { centered } = center(points);
  let xx = 0;
  let xy = 0;
  let yy = 0;
  for (const [e, n] of centered) {
    xx += e * e;
    xy += e * n;
    yy += n * n;
  }
  return { xx: xx / points.length, xy: xy / points.length, yy: yy / points.length };
}

export function checkCollinearity(
  points: Vec2[],
  threshold = COLLINEARITY_RATIO_THRESHOLD
): CollinearityCheck {
  const { xx, xy, yy } = covariance2d(points);
  const [major, rawMinor] = symmetricEigenvalues2x2(xx, xy, yy);
  // Rounding can push the minor eigenvalue of a perfect line just below zero.
  const minor = Math.max(0, rawMinor);
  const ratio = major > 0 ? minor / major : 0;
  return { passed: ratio >= threshold, ratio, eigenvalues: [major, minor] };
}

/**
 * @throws GeometryError carrying the eigenvalue ratio when the check fails
 */
export function assertNonCollinear(
  points: Vec2[],
  threshold = COLLINEARITY_RATIO_THRESHOLD
): CollinearityCheck {
  const check = checkCollinearity(points, threshold);
  if (!check.passed) {
    throw new GeometryError(check.ratio, threshold);
  }
  return check;
}
