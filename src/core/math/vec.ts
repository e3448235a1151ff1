import type { Vec2 } from "../types.js";

export function roundScalar(value: number, decimals: number): number {
  if (!Number.isFinite(value)) return value;
  const factor = 10 ** decimals;
  const rounded = Math.round((value + Math.sign(value) * Number.EPSILON) * factor) / factor;
  return Object.is(rounded, -0) ? 0 : rounded;
}

export function sub(a: Vec2, b: Vec2): Vec2 {
  return [a[0] - b[0], a[1] - b[1]];
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((acc, value) => acc + value, 0) / values.length;
}

/**
 * Compute the centroid (mean) of a set of planar points.
 */
export function centroid(points: Vec2[]): Vec2 {
  if (points.length === 0) {
    return [0, 0];
  }
  let sumE = 0;
  let sumN = 0;
  for (const [e, n] of points) {
    sumE += e;
    sumN += n;
  }
  return [sumE / points.length, sumN / points.length];
}

/**
 * Subtract the centroid from every point. Returns the centroid alongside.
 */
export function center(points: Vec2[]): { centroid: Vec2; centered: Vec2[] } {
  const c = centroid(points);
  return { centroid: c, centered: points.map((p) => sub(p, c)) };
}
