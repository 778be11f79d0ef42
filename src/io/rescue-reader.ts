/**
 * Rescue directory reader.
 *
 * A rescue directory holds one TSV per family, named
 * `<family_id>_rescuedDomains.tsv`. Files are read in name order; skipped
 * records are attributed to the family named by their file.
 */

import { existsSync, readdirSync, statSync } from "node:fs";
import { basename, join } from "node:path";
import type { DomainSummary, MalformedRecordError, RawHit } from "../architecture/index.js";
import { readHitFile } from "./cdd-reader.js";
import { InputFileError } from "./errors.js";

export const RESCUE_FILE_SUFFIX = "_rescuedDomains.tsv";

export interface RescueFileResult {
  path: string;
  familyId: string;
  hits: RawHit[];
  issues: MalformedRecordError[];
  /** Empty unless the file uses the summary layout */
  domainSummaries: DomainSummary[];
}

export function isRescueFile(filename: string): boolean {
  return filename.endsWith(RESCUE_FILE_SUFFIX) && filename.length > RESCUE_FILE_SUFFIX.length;
}

export function familyIdOfRescueFile(path: string): string {
  return basename(path).slice(0, -RESCUE_FILE_SUFFIX.length);
}

/**
 * Rescue files in a directory, sorted by name.
 *
 * @throws InputFileError if the directory does not exist
 */
export function findRescueFiles(directory: string): string[] {
  if (!existsSync(directory) || !statSync(directory).isDirectory()) {
    throw new InputFileError("Rescue directory not found", directory);
  }
  return readdirSync(directory)
    .filter(isRescueFile)
    .sort()
    .map((name) => join(directory, name));
}

/**
 * Read every rescue file in a directory, optionally only those of the given
 * families.
 */
export function readRescueDirectory(
  directory: string,
  familyIds?: readonly string[]
): RescueFileResult[] {
  const wanted = familyIds && familyIds.length > 0 ? new Set(familyIds) : null;

  return findRescueFiles(directory)
    .filter((path) => wanted === null || wanted.has(familyIdOfRescueFile(path)))
    .map((path) => {
      const familyId = familyIdOfRescueFile(path);
      const { hits, issues, domainSummaries } = readHitFile(path, "rescue");
      return {
        path,
        familyId,
        hits,
        issues: issues.map((issue) => issue.locate({ familyId })),
        domainSummaries,
      };
    });
}
