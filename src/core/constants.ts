/**
 * Centralized numerical constants for site calibration.
 */

/**
 * Fewest matched control points a calibration accepts.
 */
export const MIN_MATCHED_POINTS = 3;

/**
 * Smallest accepted ratio between the minor and major eigenvalue of the
 * point-cloud covariance. Below this the layout is treated as a line.
 */
export const COLLINEARITY_RATIO_THRESHOLD = 1e-4;

/**
 * Relative pivot tolerance for Gaussian elimination on normal equations.
 * A pivot smaller than this times the largest matrix entry is singular.
 */
export const EPS_PIVOT = 1e-12;

/**
 * Scale factors at or below this are a failed fit, not a real grid.
 */
export const EPS_SCALE = 1e-12;

// UTM
export const UTM_SCALE_FACTOR = 0.9996;
export const UTM_FALSE_EASTING_M = 500000;
export const UTM_FALSE_NORTHING_SOUTH_M = 10000000;
export const UTM_ZONE_WIDTH_DEG = 6;
export const UTM_MIN_ZONE = 1;
export const UTM_MAX_ZONE = 60;
