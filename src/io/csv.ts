/**
 * CSV input and output for control points.
 *
 * Global files carry `Point, Latitude, Longitude, EllipsoidalHeight`,
 * local files `Point, Easting, Northing, Elevation`. Column names are exact;
 * extra columns are ignored.
 */

import { readFile } from "node:fs/promises";
import Papa from "papaparse";

import type { GlobalPointRecord, LocalPointRecord, TransformedPoint } from "../core/types.js";
import { InputError } from "../core/errors.js";

type CsvRow = Record<string, string | undefined>;

export const GLOBAL_COLUMNS = ["Point", "Latitude", "Longitude", "EllipsoidalHeight"] as const;
export const LOCAL_COLUMNS = ["Point", "Easting", "Northing", "Elevation"] as const;
export const TRANSFORMED_COLUMNS = [
  "Point",
  "ProjectedEasting",
  "ProjectedNorthing",
  "Easting",
  "Northing",
  "Elevation"
] as const;

function parseRows(text: string, label: string, required: readonly string[]): CsvRow[] {
  const content = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const result = Papa.parse<CsvRow>(content, {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.trim()
  });

  const errors: string[] = result.errors
    .filter((e) => e.type === "Quotes")
    .map((e) => `${label} CSV row ${(e.row ?? 0) + 1}: ${e.message}`);

  const fields = result.meta.fields ?? [];
  const missing = required.filter((column) => !fields.includes(column));
  if (missing.length > 0) {
    errors.push(`${label} CSV is missing required column(s): ${missing.join(", ")}`);
  }

  if (errors.length > 0) {
    throw new InputError(errors);
  }
  return result.data;
}

function readNumber(row: CsvRow, column: string, rowLabel: string, errors: string[]): number {
  const raw = (row[column] ?? "").trim();
  const value = raw === "" ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) {
    errors.push(`${rowLabel}: ${column} "${raw}" is not a number`);
  }
  return value;
}

function readPointId(row: CsvRow, rowLabel: string, errors: string[]): string {
  const id = (row.Point ?? "").trim();
  if (id === "") {
    errors.push(`${rowLabel}: Point is empty`);
  }
  return id;
}

export function parseGlobalCsv(text: string): GlobalPointRecord[] {
  const rows = parseRows(text, "Global", GLOBAL_COLUMNS);
  const errors: string[] = [];

  const points = rows.map((row, i) => {
    const rowLabel = `Global CSV row ${i + 1}`;
    return {
      point_id: readPointId(row, rowLabel, errors),
      latitude_deg: readNumber(row, "Latitude", rowLabel, errors),
      longitude_deg: readNumber(row, "Longitude", rowLabel, errors),
      ellipsoidal_height_m: readNumber(row, "EllipsoidalHeight", rowLabel, errors)
    };
  });

  if (errors.length > 0) {
    throw new InputError(errors);
  }
  return points;
}

export function parseLocalCsv(text: string): LocalPointRecord[] {
  const rows = parseRows(text, "Local", LOCAL_COLUMNS);
  const errors: string[] = [];

  const points = rows.map((row, i) => {
    const rowLabel = `Local CSV row ${i + 1}`;
    return {
      point_id: readPointId(row, rowLabel, errors),
      easting_m: readNumber(row, "Easting", rowLabel, errors),
      northing_m: readNumber(row, "Northing", rowLabel, errors),
      elevation_m: readNumber(row, "Elevation", rowLabel, errors)
    };
  });

  if (errors.length > 0) {
    throw new InputError(errors);
  }
  return points;
}

export async function readGlobalCsv(filePath: string): Promise<GlobalPointRecord[]> {
  return parseGlobalCsv(await readFile(filePath, "utf8"));
}

export async function readLocalCsv(filePath: string): Promise<LocalPointRecord[]> {
  return parseLocalCsv(await readFile(filePath, "utf8"));
}

/**
 * Escape a CSV field value
 */
export function escapeCsvField(value: string | number | null | undefined): string {
  if (value === null || value === undefined) {
    return "";
  }
  const str = String(value);
  if (str.includes(",") || str.includes('"') || str.includes("\n") || str.includes("\r")) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/**
 * Transformed coordinates CSV, one row per point, metres to 4 decimals.
 */
export function formatTransformedCsv(points: TransformedPoint[], decimals = 4): string {
  const lines = [TRANSFORMED_COLUMNS.join(",")];
  for (const p of points) {
    lines.push(
      [
        escapeCsvField(p.point_id),
        escapeCsvField(p.projected_easting_m.toFixed(decimals)),
        escapeCsvField(p.projected_northing_m.toFixed(decimals)),
        escapeCsvField(p.easting_m.toFixed(decimals)),
        escapeCsvField(p.northing_m.toFixed(decimals)),
        escapeCsvField(p.elevation_m.toFixed(decimals))
      ].join(",")
    );
  }
  return lines.join("\n") + "\n";
}
