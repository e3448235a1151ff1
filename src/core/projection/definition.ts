/**
 * Resolve a ProjectionConfig to concrete Transverse Mercator parameters.
 * Default and UTM derive theirs from the control points; LTM is taken as given.
 */

import type {
  GlobalPointRecord,
  Hemisphere,
  ProjectionConfig,
  ProjectionDefinition
} from "../types.js";
import { ProjectionError } from "../errors.js";
import { validateProjectionConfig } from "../validate.js";
import { mean } from "../math/vec.js";
import {
  UTM_FALSE_EASTING_M,
  UTM_FALSE_NORTHING_SOUTH_M,
  UTM_MAX_ZONE,
  UTM_MIN_ZONE,
  UTM_SCALE_FACTOR,
  UTM_ZONE_WIDTH_DEG
} from "../constants.js";

export interface UtmZone {
  zone: number;
  hemisphere: Hemisphere;
}

/**
 * UTM zone number for a longitude, clamped to 1..60.
 */
export function utmZoneForLongitude(longitudeDeg: number): number {
  const zone = Math.floor((longitudeDeg + 180) / UTM_ZONE_WIDTH_DEG) + 1;
  return Math.min(UTM_MAX_ZONE, Math.max(UTM_MIN_ZONE, zone));
}

export function utmCentralMeridian(zone: number): number {
  return -183 + UTM_ZONE_WIDTH_DEG * zone;
}

/**
 * Zone from the mean longitude, hemisphere from the mean latitude
 * (the equator counts as north).
 */
export function resolveUtmZone(points: GlobalPointRecord[]): UtmZone {
  if (points.length === 0) {
    throw new ProjectionError("Cannot derive a UTM zone without any points", "utm");
  }
  const meanLongitude = mean(points.map((p) => p.longitude_deg));
  const meanLatitude = mean(points.map((p) => p.latitude_deg));
  return {
    zone: utmZoneForLongitude(meanLongitude),
    hemisphere: meanLatitude >= 0 ? "north" : "south"
  };
}

export function utmDefinition(zone: number, hemisphere: Hemisphere): ProjectionDefinition {
  return {
    method: "utm",
    central_meridian_deg: utmCentralMeridian(zone),
    latitude_of_origin_deg: 0,
    false_easting_m: UTM_FALSE_EASTING_M,
    false_northing_m: hemisphere === "south" ? UTM_FALSE_NORTHING_SOUTH_M : 0,
    scale_factor: UTM_SCALE_FACTOR,
    utm_zone: zone,
    hemisphere
  };
}

/**
 * Resolve the projection definition used for a run.
 *
 * The default method centers a unit-scale TM on the first point as given,
 * so reordering the global points moves the origin.
 *
 * @throws ProjectionError for an invalid config or an empty point list
 */
export function resolveProjectionDefinition(
  points: GlobalPointRecord[],
  config: ProjectionConfig
): ProjectionDefinition {
  validateProjectionConfig(config);

  if (points.length === 0) {
    throw new ProjectionError("Cannot project an empty point list", config.method);
  }

  switch (config.method) {
    case "default": {
      const origin = points[0];
      return {
        method: "default",
        central_meridian_deg: origin.longitude_deg,
        latitude_of_origin_deg: origin.latitude_deg,
        false_easting_m: 0,
        false_northing_m: 0,
        scale_factor: 1
      };
    }
    case "utm": {
      const derived = resolveUtmZone(points);
      return utmDefinition(config.zone ?? derived.zone, config.hemisphere ?? derived.hemisphere);
    }
    case "ltm":
      return {
        method: "ltm",
        central_meridian_deg: config.central_meridian_deg,
        latitude_of_origin_deg: config.latitude_of_origin_deg,
        false_easting_m: config.false_easting_m,
        false_northing_m: config.false_northing_m,
        scale_factor: config.scale_factor
      };
  }
}

/**
 * proj4 definition string for a TM on the WGS84 ellipsoid.
 */
export function toProj4String(definition: ProjectionDefinition): string {
  return [
    "+proj=tmerc",
    `+lat_0=${definition.latitude_of_origin_deg}`,
    `+lon_0=${definition.central_meridian_deg}`,
    `+k=${definition.scale_factor}`,
    `+x_0=${definition.false_easting_m}`,
    `+y_0=${definition.false_northing_m}`,
    "+ellps=WGS84",
    "+datum=WGS84",
    "+units=m",
    "+no_defs"
  ].join(" ");
}
