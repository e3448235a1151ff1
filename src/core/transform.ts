import type { ProjectedPoint, TransformedPoint, TransformParameters } from "./types.js";
import { applyHorizontal } from "./fit/horizontal.js";
import { predictDiscrepancy } from "./fit/vertical.js";

/**
 * Run a projected point through a fitted calibration. The local elevation is
 * the ellipsoidal height plus the predicted height discrepancy.
 */
export function transformPoint(point: ProjectedPoint, params: TransformParameters): TransformedPoint {
  const [easting_m, northing_m] = applyHorizontal(params.horizontal, point.easting_m, point.northing_m);
  return {
    point_id: point.point_id,
    projected_easting_m: point.easting_m,
    projected_northing_m: point.northing_m,
    easting_m,
    northing_m,
    elevation_m:
      point.ellipsoidal_height_m + predictDiscrepancy(params.vertical, point.easting_m, point.northing_m)
  };
}

export function transformPoints(points: ProjectedPoint[], params: TransformParameters): TransformedPoint[] {
  return points.map((p) => transformPoint(p, params));
}
