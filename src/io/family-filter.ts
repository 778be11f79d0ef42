/**
 * Family filter: which families a run processes.
 *
 * Given either as a comma-separated list ("1.A.12,2.A.1") or as the path of
 * a file with one id per line.
 */

import { existsSync, readFileSync, statSync } from "node:fs";
import { z } from "zod";
import { FamilyFilterError } from "./errors.js";

/** TC family (1.A.12) or subfamily (1.A.12.3) identifier */
export const FAMILY_ID_PATTERN = /^\d+\.\w+\.\d+(\.\d+)?$/;

export const FamilyIdSchema = z.string().regex(FAMILY_ID_PATTERN, "is not a TC family identifier");

export function isFamilyId(value: string): boolean {
  return FamilyIdSchema.safeParse(value).success;
}

/**
 * Split, trim and de-duplicate a list of ids, keeping first-seen order.
 *
 * @throws FamilyFilterError listing every invalid entry
 */
export function parseFamilyList(entries: Iterable<string>): string[] {
  const ids: string[] = [];
  const invalid: string[] = [];

  for (const raw of entries) {
    const id = raw.trim();
    if (id === "" || id.startsWith("#")) {
      continue;
    }
    if (!isFamilyId(id)) {
      invalid.push(id);
    } else if (!ids.includes(id)) {
      ids.push(id);
    }
  }

  if (invalid.length > 0) {
    throw new FamilyFilterError(invalid);
  }
  return ids;
}

/**
 * Resolve a --families argument: a file path if one exists, otherwise a
 * comma-separated list.
 */
export function parseFamilyIds(value: string): string[] {
  if (existsSync(value) && statSync(value).isFile()) {
    return parseFamilyList(readFileSync(value, "utf-8").split(/\r?\n/));
  }
  return parseFamilyList(value.split(","));
}

/**
 * Whether a family passes the filter. An empty filter passes everything.
 */
export function matchesFamilyFilter(familyId: string, filter: readonly string[]): boolean {
  return filter.length === 0 || filter.includes(familyId);
}
