/**
 * Temporary CSV inputs for pipeline and CLI tests.
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { GlobalPointRecord, LocalPointRecord } from "../core/types.js";

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "sitecal-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeGlobalCsv(filePath: string, points: GlobalPointRecord[]): Promise<void> {
  const rows = points.map((p) => `${p.point_id},${p.latitude_deg},${p.longitude_deg},${p.ellipsoidal_height_m}`);
  await writeFile(filePath, ["Point,Latitude,Longitude,EllipsoidalHeight", ...rows].join("\n") + "\n", "utf8");
}

export async function writeLocalCsv(filePath: string, points: LocalPointRecord[]): Promise<void> {
  const rows = points.map((p) => `${p.point_id},${p.easting_m},${p.northing_m},${p.elevation_m}`);
  await writeFile(filePath, ["Point,Easting,Northing,Elevation", ...rows].join("\n") + "\n", "utf8");
}
