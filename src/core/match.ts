import type { GlobalPointRecord, LocalPointRecord, MatchedPoint } from "./types.js";
import { InputError } from "./errors.js";
import { MIN_MATCHED_POINTS } from "./constants.js";

function findDuplicateIds(ids: string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) duplicates.add(id);
    seen.add(id);
  }
  return [...duplicates];
}

/**
 * Join global and local control points by exact identifier.
 *
 * Matched points keep the order of the local collection. Points present in
 * only one collection are left out.
 *
 * @throws InputError on duplicate identifiers or too few matches
 */
export function matchPoints(
  globalPoints: GlobalPointRecord[],
  localPoints: LocalPointRecord[],
  minMatched = MIN_MATCHED_POINTS
): MatchedPoint[] {
  const errors: string[] = [];

  for (const id of findDuplicateIds(globalPoints.map((p) => p.point_id))) {
    errors.push(`Duplicate point "${id}" in global points`);
  }
  for (const id of findDuplicateIds(localPoints.map((p) => p.point_id))) {
    errors.push(`Duplicate point "${id}" in local points`);
  }
  if (errors.length > 0) {
    throw new InputError(errors);
  }

  const globalById = new Map<string, GlobalPointRecord>();
  for (const point of globalPoints) {
    globalById.set(point.point_id, point);
  }

  const matched: MatchedPoint[] = [];
  for (const local of localPoints) {
    const global = globalById.get(local.point_id);
    if (global) {
      matched.push({ point_id: local.point_id, global, local });
    }
  }

  if (matched.length < minMatched) {
    throw new InputError([
      `Found only ${matched.length} common points; at least ${minMatched} are required`
    ]);
  }

  return matched;
}
