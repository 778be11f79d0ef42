/**
 * FASTA sequence lengths.
 *
 * Sequences live in one file per family (`tcdb-{familyId}.faa` by default).
 * A record's id is the first whitespace-delimited token after ">".
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { InputFileError } from "./errors.js";

export const DEFAULT_SEQUENCE_FILE_PATTERN = "tcdb-{familyId}.faa";

/**
 * Sequence id → residue count. A repeated id keeps its last record.
 */
export function parseFastaLengths(text: string): Map<string, number> {
  const lengths = new Map<string, number>();
  let currentId: string | null = null;
  let currentLength = 0;

  const flush = (): void => {
    if (currentId !== null) {
      lengths.set(currentId, currentLength);
    }
  };

  for (const line of text.split(/\r?\n/)) {
    if (line.startsWith(">")) {
      flush();
      currentId = line.slice(1).trim().split(/\s+/)[0] ?? "";
      currentLength = 0;
    } else if (currentId !== null) {
      currentLength += line.replace(/\s+/g, "").length;
    }
  }
  flush();

  lengths.delete("");
  return lengths;
}

export function sequenceFilePath(
  directory: string,
  familyId: string,
  pattern: string = DEFAULT_SEQUENCE_FILE_PATTERN
): string {
  return join(directory, pattern.replace("{familyId}", familyId));
}

/**
 * @throws InputFileError if the file does not exist
 */
export function readSequenceLengths(path: string): Map<string, number> {
  if (!existsSync(path)) {
    throw new InputFileError("Sequence file not found", path);
  }
  return parseFastaLengths(readFileSync(path, "utf-8"));
}

/**
 * Lengths for one family, or null when the family has no sequence file.
 */
export function loadFamilyLengths(
  directory: string,
  familyId: string,
  pattern?: string
): Map<string, number> | null {
  const path = sequenceFilePath(directory, familyId, pattern);
  return existsSync(path) ? readSequenceLengths(path) : null;
}
