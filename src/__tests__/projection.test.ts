import assert from "node:assert/strict";
import { describe, it } from "vitest";
import {
  ProjectionError,
  projectPoints,
  resolveProjectionDefinition,
  resolveUtmZone,
  toProj4String,
  utmDefinition,
  utmZoneForLongitude,
  type GlobalPointRecord,
  type LtmProjectionConfig
} from "../core/index.js";
import { close, SITE_GLOBAL } from "../test/synthetic.js";

function at(point_id: string, latitude_deg: number, longitude_deg: number): GlobalPointRecord {
  return { point_id, latitude_deg, longitude_deg, ellipsoidal_height_m: 0 };
}

describe("utmZoneForLongitude", () => {
  it("applies floor((lon + 180) / 6) + 1", () => {
    assert.equal(utmZoneForLongitude(-70.5), 19);
    assert.equal(utmZoneForLongitude(-75.5), 18);
    assert.equal(utmZoneForLongitude(-72), 19);
    assert.equal(utmZoneForLongitude(0), 31);
    assert.equal(utmZoneForLongitude(-180), 1);
  });

  it("clamps the antimeridian to zone 60", () => {
    assert.equal(utmZoneForLongitude(180), 60);
  });
});

describe("resolveUtmZone", () => {
  it("uses the mean longitude and the sign of the mean latitude", () => {
    const zone = resolveUtmZone([at("A", -33.0, -70.0), at("B", -33.8, -71.0)]);
    assert.deepEqual(zone, { zone: 19, hemisphere: "south" });
  });

  it("treats a mean latitude of zero as north", () => {
    const zone = resolveUtmZone([at("A", -1, 3), at("B", 1, 3)]);
    assert.deepEqual(zone, { zone: 31, hemisphere: "north" });
  });

  it("rejects an empty point list", () => {
    assert.throws(() => resolveUtmZone([]), ProjectionError);
  });
});

describe("resolveProjectionDefinition", () => {
  it("centers the default projection on the first point as given", () => {
    const forward = resolveProjectionDefinition(SITE_GLOBAL, { method: "default" });
    assert.equal(forward.central_meridian_deg, -70.6);
    assert.equal(forward.latitude_of_origin_deg, -33.4);
    assert.equal(forward.scale_factor, 1);
    assert.equal(forward.false_easting_m, 0);
    assert.equal(forward.false_northing_m, 0);

    // Order-dependent origin: the last point becomes the origin when reversed.
    const reversed = resolveProjectionDefinition([...SITE_GLOBAL].reverse(), { method: "default" });
    assert.equal(reversed.central_meridian_deg, -70.61);
    assert.equal(reversed.latitude_of_origin_deg, -33.399);
  });

  it("builds the standard UTM definition for the derived zone", () => {
    const def = resolveProjectionDefinition(SITE_GLOBAL, { method: "utm" });
    assert.deepEqual(def, utmDefinition(19, "south"));
    assert.equal(def.central_meridian_deg, -69);
    assert.equal(def.false_easting_m, 500000);
    assert.equal(def.false_northing_m, 10000000);
    assert.equal(def.scale_factor, 0.9996);
  });

  it("lets a forced zone and hemisphere override the derived ones", () => {
    const def = resolveProjectionDefinition(SITE_GLOBAL, { method: "utm", zone: 18, hemisphere: "north" });
    assert.equal(def.utm_zone, 18);
    assert.equal(def.central_meridian_deg, -75);
    assert.equal(def.false_northing_m, 0);
  });

  it("rejects a forced zone outside 1..60", () => {
    assert.throws(
      () => resolveProjectionDefinition(SITE_GLOBAL, { method: "utm", zone: 61 }),
      ProjectionError
    );
  });

  it("passes LTM parameters through unchanged", () => {
    const config: LtmProjectionConfig = {
      method: "ltm",
      central_meridian_deg: -70.5,
      latitude_of_origin_deg: -33.5,
      false_easting_m: 200000,
      false_northing_m: 7000000,
      scale_factor: 1.0001
    };
    const def = resolveProjectionDefinition(SITE_GLOBAL, config);
    assert.deepEqual(def, {
      method: "ltm",
      central_meridian_deg: -70.5,
      latitude_of_origin_deg: -33.5,
      false_easting_m: 200000,
      false_northing_m: 7000000,
      scale_factor: 1.0001
    });
  });

  it("rejects LTM parameters that are missing or invalid", () => {
    const base: LtmProjectionConfig = {
      method: "ltm",
      central_meridian_deg: -70.5,
      latitude_of_origin_deg: -33.5,
      false_easting_m: 0,
      false_northing_m: 0,
      scale_factor: 1
    };
    assert.throws(
      () => resolveProjectionDefinition(SITE_GLOBAL, { ...base, false_easting_m: Number.NaN }),
      /false_easting_m is required and must be a finite number/
    );
    assert.throws(
      () => resolveProjectionDefinition(SITE_GLOBAL, { ...base, scale_factor: 0 }),
      /scale_factor must be greater than 0/
    );
  });

  it("rejects an empty point list", () => {
    assert.throws(() => resolveProjectionDefinition([], { method: "default" }), ProjectionError);
  });
});

describe("toProj4String", () => {
  it("renders a WGS84 transverse mercator definition", () => {
    const def = resolveProjectionDefinition(SITE_GLOBAL, { method: "default" });
    assert.equal(
      toProj4String(def),
      "+proj=tmerc +lat_0=-33.4 +lon_0=-70.6 +k=1 +x_0=0 +y_0=0 +ellps=WGS84 +datum=WGS84 +units=m +no_defs"
    );
  });
});

describe("projectPoints", () => {
  it("projects the first point to the origin under the default method", () => {
    const { points } = projectPoints(SITE_GLOBAL, { method: "default" });
    assert.equal(points.length, SITE_GLOBAL.length);
    assert.equal(points[0].point_id, "CP1");
    close(points[0].easting_m, 0);
    close(points[0].northing_m, 0);
  });

  it("moves north along the origin meridian", () => {
    const { points } = projectPoints([at("O", -33.4, -70.6), at("N", -33.39, -70.6)], { method: "default" });
    close(points[1].easting_m, 0);
    assert.ok(points[1].northing_m > 1100 && points[1].northing_m < 1120, `got ${points[1].northing_m}`);
  });

  it("puts the UTM central meridian on the false easting", () => {
    const north = projectPoints([at("Q", 0, -69)], { method: "utm", zone: 19, hemisphere: "north" });
    close(north.points[0].easting_m, 500000);
    close(north.points[0].northing_m, 0);

    const south = projectPoints([at("Q", 0, -69)], { method: "utm", zone: 19, hemisphere: "south" });
    close(south.points[0].northing_m, 10000000);
  });

  it("scales LTM coordinates with the scale factor", () => {
    const ltm = (scale_factor: number): LtmProjectionConfig => ({
      method: "ltm",
      central_meridian_deg: -70.6,
      latitude_of_origin_deg: -33.4,
      false_easting_m: 0,
      false_northing_m: 0,
      scale_factor
    });
    const unit = projectPoints(SITE_GLOBAL, ltm(1)).points;
    const doubled = projectPoints(SITE_GLOBAL, ltm(2)).points;
    const asDefault = projectPoints(SITE_GLOBAL, { method: "default" }).points;

    for (let i = 0; i < unit.length; i++) {
      close(doubled[i].easting_m, 2 * unit[i].easting_m);
      close(doubled[i].northing_m, 2 * unit[i].northing_m);
      close(asDefault[i].easting_m, unit[i].easting_m);
      close(asDefault[i].northing_m, unit[i].northing_m);
    }
  });

  it("carries ellipsoidal heights through", () => {
    const { points } = projectPoints(SITE_GLOBAL, { method: "utm" });
    assert.deepEqual(
      points.map((p) => p.ellipsoidal_height_m),
      SITE_GLOBAL.map((p) => p.ellipsoidal_height_m)
    );
  });
});
