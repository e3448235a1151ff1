import assert from "node:assert/strict";
import { describe, it } from "vitest";
import { InputError } from "../core/errors.js";
import { escapeCsvField, formatTransformedCsv, parseGlobalCsv, parseLocalCsv } from "../io/csv.js";

function inputErrors(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof InputError) return err.errors;
    throw err;
  }
  assert.fail("expected an InputError");
}

describe("parseGlobalCsv", () => {
  it("reads rows after a byte order mark, padded headers and blank lines", () => {
    const text =
      "\uFEFF Point ,Latitude, Longitude,EllipsoidalHeight\n" +
      "CP1,-33.4,-70.6,600\n" +
      "\n" +
      "CP2, -33.405 ,-70.592,612.5\n";
    assert.deepEqual(parseGlobalCsv(text), [
      { point_id: "CP1", latitude_deg: -33.4, longitude_deg: -70.6, ellipsoidal_height_m: 600 },
      { point_id: "CP2", latitude_deg: -33.405, longitude_deg: -70.592, ellipsoidal_height_m: 612.5 }
    ]);
  });

  it("ignores extra columns", () => {
    const text = "Point,Code,Latitude,Longitude,EllipsoidalHeight\nCP1,GPS,-33.4,-70.6,600\n";
    assert.deepEqual(parseGlobalCsv(text), [
      { point_id: "CP1", latitude_deg: -33.4, longitude_deg: -70.6, ellipsoidal_height_m: 600 }
    ]);
  });

  it("names the missing columns", () => {
    const errors = inputErrors(() => parseGlobalCsv("Point,Latitude,Longitude\nA,1,2\n"));
    assert.deepEqual(errors, ["Global CSV is missing required column(s): EllipsoidalHeight"]);
  });

  it("treats column names as case-sensitive", () => {
    const errors = inputErrors(() => parseGlobalCsv("point,latitude,Longitude,EllipsoidalHeight\nA,1,2,3\n"));
    assert.deepEqual(errors, ["Global CSV is missing required column(s): Point, Latitude"]);
  });
});

describe("parseLocalCsv", () => {
  it("reads local grid coordinates", () => {
    const text = "Point,Easting,Northing,Elevation\nBM1,1000.5,2000.25,101.125\n";
    assert.deepEqual(parseLocalCsv(text), [
      { point_id: "BM1", easting_m: 1000.5, northing_m: 2000.25, elevation_m: 101.125 }
    ]);
  });

  it("reports every bad cell with its row", () => {
    const text = "Point,Easting,Northing,Elevation\nA,abc,2,3\n,1,2,\n";
    const errors = inputErrors(() => parseLocalCsv(text));
    assert.deepEqual(errors, [
      'Local CSV row 1: Easting "abc" is not a number',
      "Local CSV row 2: Point is empty",
      'Local CSV row 2: Elevation "" is not a number'
    ]);
  });
});

describe("escapeCsvField", () => {
  it("quotes separators and doubles quotes", () => {
    assert.equal(escapeCsvField("plain"), "plain");
    assert.equal(escapeCsvField('A,"B"'), '"A,""B"""');
    assert.equal(escapeCsvField(undefined), "");
    assert.equal(escapeCsvField("line\rbreak"), '"line\rbreak"');
  });
});

describe("formatTransformedCsv", () => {
  it("writes one row per point with four decimals", () => {
    const csv = formatTransformedCsv([
      {
        point_id: "CP1",
        projected_easting_m: 100.12341,
        projected_northing_m: 200.5,
        easting_m: 1000,
        northing_m: 2000.00004,
        elevation_m: 12.34567
      },
      {
        point_id: 'A,"B"',
        projected_easting_m: -5.25,
        projected_northing_m: 0,
        easting_m: 1,
        northing_m: 2,
        elevation_m: 3
      }
    ]);
    assert.equal(
      csv,
      "Point,ProjectedEasting,ProjectedNorthing,Easting,Northing,Elevation\n" +
        "CP1,100.1234,200.5000,1000.0000,2000.0000,12.3457\n" +
        '"A,""B""",-5.2500,0.0000,1.0000,2.0000,3.0000\n'
    );
  });

  it("writes only the header for no points", () => {
    assert.equal(formatTransformedCsv([]), "Point,ProjectedEasting,ProjectedNorthing,Easting,Northing,Elevation\n");
  });
});
