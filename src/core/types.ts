export type Vec2 = [number, number]; // [easting, northing]

export type ProjectionMethod = "default" | "utm" | "ltm";
export type Hemisphere = "north" | "south";

export interface GlobalPointRecord {
  point_id: string;
  latitude_deg: number;
  longitude_deg: number;
  ellipsoidal_height_m: number;
}

export interface LocalPointRecord {
  point_id: string;
  easting_m: number;
  northing_m: number;
  elevation_m: number;
}

/** A control point present in both the global and the local collection. */
export interface MatchedPoint {
  point_id: string;
  global: GlobalPointRecord;
  local: LocalPointRecord;
}

export interface ProjectedPoint {
  point_id: string;
  easting_m: number;
  northing_m: number;
  ellipsoidal_height_m: number;
}

export interface DefaultProjectionConfig {
  method: "default";
}

export interface UtmProjectionConfig {
  method: "utm";
  /** Forced zone (1..60); derived from the mean longitude when absent. */
  zone?: number;
  /** Forced hemisphere; derived from the mean latitude when absent. */
  hemisphere?: Hemisphere;
}

export interface LtmProjectionConfig {
  method: "ltm";
  central_meridian_deg: number;
  latitude_of_origin_deg: number;
  false_easting_m: number;
  false_northing_m: number;
  scale_factor: number;
}

export type ProjectionConfig = DefaultProjectionConfig | UtmProjectionConfig | LtmProjectionConfig;

/** Transverse Mercator parameters every projection method resolves to. */
export interface ProjectionDefinition {
  method: ProjectionMethod;
  central_meridian_deg: number;
  latitude_of_origin_deg: number;
  false_easting_m: number;
  false_northing_m: number;
  scale_factor: number;
  utm_zone?: number;
  hemisphere?: Hemisphere;
}

export interface HorizontalParameters {
  a: number;
  b: number;
  translation_easting_m: number;
  translation_northing_m: number;
}

export interface VerticalParameters {
  constant_m: number;
  slope_north: number;
  slope_east: number;
  /** Projected centroid the inclined plane is centered on. */
  centroid_easting_m: number;
  centroid_northing_m: number;
}

export interface TransformParameters {
  horizontal: HorizontalParameters;
  vertical: VerticalParameters;
}

export interface DerivedQuantities {
  rotation_rad: number;
  rotation_deg: number;
  scale_factor: number;
  scale_ppm: number;
}

export interface Residual {
  point_id: string;
  delta_easting_m: number;
  delta_northing_m: number;
  delta_elevation_m: number;
  horizontal_m: number;
}

export interface RmsSummary {
  horizontal_m: number;
  vertical_m: number;
}

export interface ResidualStatistics {
  worst: { point_id: string; horizontal_m: number };
  best: { point_id: string; horizontal_m: number };
  std_dev_m: { easting: number; northing: number; elevation: number };
  p99_horizontal_m: number;
}

export interface FitReport {
  projection: ProjectionConfig;
  definition: ProjectionDefinition;
  matched_count: number;
  parameters: TransformParameters;
  derived: DerivedQuantities;
  residuals: Residual[];
  rms: RmsSummary;
  statistics: ResidualStatistics;
  collinearity_ratio: number;
}

/** A global point run through projection and the fitted calibration. */
export interface TransformedPoint {
  point_id: string;
  projected_easting_m: number;
  projected_northing_m: number;
  easting_m: number;
  northing_m: number;
  elevation_m: number;
}
