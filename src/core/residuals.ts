import type {
  DerivedQuantities,
  HorizontalParameters,
  LocalPointRecord,
  ProjectedPoint,
  Residual,
  ResidualStatistics,
  RmsSummary,
  TransformParameters
} from "./types.js";
import { applyHorizontal } from "./fit/horizontal.js";
import { heightDiscrepancy, predictDiscrepancy } from "./fit/vertical.js";

export interface ResidualAnalysis {
  residuals: Residual[];
  rms: RmsSummary;
}

/**
 * Residuals are measured minus predicted: a positive delta_easting_m means
 * the surveyed local point lies east of where the calibration puts it.
 */
export function computeResiduals(
  projected: ProjectedPoint[],
  local: LocalPointRecord[],
  params: TransformParameters
): ResidualAnalysis {
  if (projected.length !== local.length) {
    throw new Error("Projected and local point lists must have the same length.");
  }

  const residuals: Residual[] = projected.map((p, i) => {
    const measured = local[i];
    const [predictedE, predictedN] = applyHorizontal(params.horizontal, p.easting_m, p.northing_m);
    const delta_easting_m = measured.easting_m - predictedE;
    const delta_northing_m = measured.northing_m - predictedN;
    const delta_elevation_m =
      heightDiscrepancy(measured, p) - predictDiscrepancy(params.vertical, p.easting_m, p.northing_m);
    return {
      point_id: p.point_id,
      delta_easting_m,
      delta_northing_m,
      delta_elevation_m,
      horizontal_m: Math.hypot(delta_easting_m, delta_northing_m)
    };
  });

  return { residuals, rms: computeRms(residuals) };
}

export function computeRms(residuals: Residual[]): RmsSummary {
  if (residuals.length === 0) {
    return { horizontal_m: 0, vertical_m: 0 };
  }
  let sumH = 0;
  let sumV = 0;
  for (const r of residuals) {
    sumH += r.delta_easting_m * r.delta_easting_m + r.delta_northing_m * r.delta_northing_m;
    sumV += r.delta_elevation_m * r.delta_elevation_m;
  }
  return {
    horizontal_m: Math.sqrt(sumH / residuals.length),
    vertical_m: Math.sqrt(sumV / residuals.length)
  };
}

export function deriveQuantities(horizontal: HorizontalParameters): DerivedQuantities {
  const rotation_rad = Math.atan2(horizontal.b, horizontal.a);
  const scale_factor = Math.hypot(horizontal.a, horizontal.b);
  return {
    rotation_rad,
    rotation_deg: (rotation_rad * 180) / Math.PI,
    scale_factor,
    scale_ppm: (scale_factor - 1) * 1e6
  };
}

/** Sample standard deviation (n − 1). */
export function sampleStdDev(values: number[]): number {
  if (values.length < 2) return 0;
  const avg = values.reduce((acc, v) => acc + v, 0) / values.length;
  const sumSq = values.reduce((acc, v) => acc + (v - avg) * (v - avg), 0);
  return Math.sqrt(sumSq / (values.length - 1));
}

/**
 * Quantile with linear interpolation between order statistics.
 */
export function quantile(values: number[], q: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((x, y) => x - y);
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

/**
 * Worst/best point by horizontal residual (first one wins a tie), per-axis
 * spread and the 99th percentile of horizontal residuals.
 */
export function summarizeResiduals(residuals: Residual[]): ResidualStatistics {
  if (residuals.length === 0) {
    throw new Error("Cannot summarize an empty residual list.");
  }

  let worst = residuals[0];
  let best = residuals[0];
  for (const r of residuals) {
    if (r.horizontal_m > worst.horizontal_m) worst = r;
    if (r.horizontal_m < best.horizontal_m) best = r;
  }

  return {
    worst: { point_id: worst.point_id, horizontal_m: worst.horizontal_m },
    best: { point_id: best.point_id, horizontal_m: best.horizontal_m },
    std_dev_m: {
      easting: sampleStdDev(residuals.map((r) => r.delta_easting_m)),
      northing: sampleStdDev(residuals.map((r) => r.delta_northing_m)),
      elevation: sampleStdDev(residuals.map((r) => r.delta_elevation_m))
    },
    p99_horizontal_m: quantile(residuals.map((r) => r.horizontal_m), 0.99)
  };
}
