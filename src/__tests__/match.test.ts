import assert from "node:assert/strict";
import { describe, it } from "vitest";
import {
  InputError,
  matchPoints,
  validateGlobalPoints,
  validateLocalPoints,
  type GlobalPointRecord,
  type LocalPointRecord
} from "../core/index.js";

function g(point_id: string): GlobalPointRecord {
  return { point_id, latitude_deg: -33.4, longitude_deg: -70.6, ellipsoidal_height_m: 600 };
}

function l(point_id: string): LocalPointRecord {
  return { point_id, easting_m: 1000, northing_m: 2000, elevation_m: 100 };
}

describe("matchPoints", () => {
  it("keeps identifiers present in both collections, in local order", () => {
    const matched = matchPoints([g("A"), g("B"), g("C"), g("X")], [l("C"), l("A"), l("Y"), l("B")]);
    assert.deepEqual(
      matched.map((m) => m.point_id),
      ["C", "A", "B"]
    );
    assert.equal(matched[0].global.point_id, "C");
    assert.equal(matched[0].local.point_id, "C");
  });

  it("matches identifiers by exact string equality", () => {
    assert.throws(
      () => matchPoints([g("a"), g("B"), g("C")], [l("A"), l("B"), l("C")]),
      (err: unknown) =>
        err instanceof InputError &&
        err.errors[0] === "Found only 2 common points; at least 3 are required"
    );
  });

  it("rejects duplicate identifiers within a collection", () => {
    assert.throws(
      () => matchPoints([g("A"), g("A"), g("B"), g("C")], [l("A"), l("B"), l("C"), l("C")]),
      (err: unknown) =>
        err instanceof InputError &&
        err.errors.length === 2 &&
        err.errors[0] === 'Duplicate point "A" in global points' &&
        err.errors[1] === 'Duplicate point "C" in local points'
    );
  });
});

describe("validateGlobalPoints", () => {
  it("collects every out-of-range coordinate", () => {
    assert.throws(
      () =>
        validateGlobalPoints([
          { point_id: "A", latitude_deg: 91, longitude_deg: -70, ellipsoidal_height_m: 0 },
          { point_id: "", latitude_deg: 0, longitude_deg: 200, ellipsoidal_height_m: Number.NaN }
        ]),
      (err: unknown) =>
        err instanceof InputError &&
        err.errors.length === 4 &&
        err.errors[0] === "global[0].latitude_deg must be a number between -90 and 90"
    );
  });
});

describe("validateLocalPoints", () => {
  it("rejects non-finite coordinates", () => {
    assert.throws(
      () => validateLocalPoints([{ point_id: "A", easting_m: Number.POSITIVE_INFINITY, northing_m: 0, elevation_m: 0 }]),
      (err: unknown) => err instanceof InputError && err.errors[0] === "local[0].easting_m must be a finite number"
    );
  });
});
