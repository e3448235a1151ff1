/**
 * Site calibration pipeline:
 * 1. Validate and match global/local control points by identifier
 * 2. Project every global point to the calibration plane
 * 3. Reject near-collinear layouts
 * 4. Fit the horizontal similarity and the vertical inclined plane
 * 5. Compute residuals, RMS and summary statistics
 */

import type {
  FitReport,
  GlobalPointRecord,
  LocalPointRecord,
  ProjectedPoint,
  ProjectionConfig,
  TransformParameters,
  Vec2
} from "./types.js";
import { validateGlobalPoints, validateLocalPoints } from "./validate.js";
import { matchPoints } from "./match.js";
import { projectPoints } from "./projection/project.js";
import { assertNonCollinear } from "./geometry.js";
import { centerPairs } from "./fit/pairs.js";
import { fitHorizontalCentered } from "./fit/horizontal.js";
import { fitVerticalCentered, heightDiscrepancy } from "./fit/vertical.js";
import { computeResiduals, deriveQuantities, summarizeResiduals } from "./residuals.js";
import { COLLINEARITY_RATIO_THRESHOLD } from "./constants.js";

export interface CalibrationOptions {
  collinearity_threshold: number;
}

export const DEFAULT_CALIBRATION_OPTIONS: CalibrationOptions = {
  collinearity_threshold: COLLINEARITY_RATIO_THRESHOLD
};

export interface CalibrateInput {
  globalPoints: GlobalPointRecord[];
  localPoints: LocalPointRecord[];
  projection: ProjectionConfig;
  options?: Partial<CalibrationOptions>;
}

export interface CalibrationResult {
  report: FitReport;
  /** Every global point in input order, projected with the run's definition. */
  projected: ProjectedPoint[];
}

export function calibrate({
  globalPoints,
  localPoints,
  projection,
  options = {}
}: CalibrateInput): CalibrationResult {
  const config: CalibrationOptions = { ...DEFAULT_CALIBRATION_OPTIONS, ...options };

  validateGlobalPoints(globalPoints);
  validateLocalPoints(localPoints);
  const matched = matchPoints(globalPoints, localPoints);

  const { definition, points: projectedAll } = projectPoints(globalPoints, projection);
  const projectedById = new Map(projectedAll.map((p) => [p.point_id, p]));

  const projectedMatched: ProjectedPoint[] = [];
  for (const m of matched) {
    const p = projectedById.get(m.point_id);
    if (!p) {
      throw new Error(`Projected point missing for matched id: ${m.point_id}`);
    }
    projectedMatched.push(p);
  }
  const localMatched = matched.map((m) => m.local);

  const collinearity = assertNonCollinear(
    projectedMatched.map((p): Vec2 => [p.easting_m, p.northing_m]),
    config.collinearity_threshold
  );

  const pairs = centerPairs(projectedMatched, localMatched);
  const parameters: TransformParameters = {
    horizontal: fitHorizontalCentered(pairs),
    vertical: fitVerticalCentered(
      pairs,
      localMatched.map((l, i) => heightDiscrepancy(l, projectedMatched[i]))
    )
  };

  const { residuals, rms } = computeResiduals(projectedMatched, localMatched, parameters);

  return {
    report: {
      projection,
      definition,
      matched_count: matched.length,
      parameters,
      derived: deriveQuantities(parameters.horizontal),
      residuals,
      rms,
      statistics: summarizeResiduals(residuals),
      collinearity_ratio: collinearity.ratio
    },
    projected: projectedAll
  };
}
