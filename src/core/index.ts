export { calibrate, DEFAULT_CALIBRATION_OPTIONS } from "./calibrate.js";
export type { CalibrateInput, CalibrationOptions, CalibrationResult } from "./calibrate.js";
export { matchPoints } from "./match.js";
export {
  projectPoints,
  projectWithDefinition,
  resolveProjectionDefinition,
  resolveUtmZone,
  toProj4String,
  utmCentralMeridian,
  utmDefinition,
  utmZoneForLongitude
} from "./projection/index.js";
export type { ProjectionResult, UtmZone } from "./projection/index.js";
export { checkCollinearity, assertNonCollinear, covariance2d } from "./geometry.js";
export type { CollinearityCheck } from "./geometry.js";
export { fitHorizontal, fitVertical, applyHorizontal, predictDiscrepancy } from "./fit/index.js";
export {
  computeResiduals,
  computeRms,
  deriveQuantities,
  quantile,
  sampleStdDev,
  summarizeResiduals
} from "./residuals.js";
export type { ResidualAnalysis } from "./residuals.js";
export { transformPoint, transformPoints } from "./transform.js";
export {
  isProjectionMethod,
  PROJECTION_METHODS,
  validateGlobalPoints,
  validateLocalPoints,
  validateProjectionConfig
} from "./validate.js";
export { SiteCalError, InputError, ProjectionError, GeometryError, NumericError } from "./errors.js";
export type {
  DefaultProjectionConfig,
  DerivedQuantities,
  FitReport,
  GlobalPointRecord,
  Hemisphere,
  HorizontalParameters,
  LocalPointRecord,
  LtmProjectionConfig,
  MatchedPoint,
  ProjectedPoint,
  ProjectionConfig,
  ProjectionDefinition,
  ProjectionMethod,
  Residual,
  ResidualStatistics,
  RmsSummary,
  TransformedPoint,
  TransformParameters,
  UtmProjectionConfig,
  VerticalParameters,
  Vec2
} from "./types.js";
