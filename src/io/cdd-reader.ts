/**
 * Hit file reader.
 *
 * Reads a whole file, then parses it line by line. A malformed line is
 * recorded as an issue (with its 1-based line number) and skipped; the rest
 * of the file is still read.
 *
 * Two CDD layouts are accepted and told apart by their content:
 *   - tab-separated records (family, system, accession, domains)
 *   - rpsblast tabular output, announced by a "# Fields:" comment
 *
 * Rescue files likewise come as one hit per row, or in the summary layout
 * (per-domain "# DOM: ... from a total of N" headers, "|"-joined hit cells),
 * recognised by the first record.
 */

import { existsSync, readFileSync } from "node:fs";
import {
  BLAST_FIELDS_PREFIX,
  MalformedRecordError,
  indexBlastFields,
  isHeaderLine,
  isSkippableLine,
  isSummaryRecord,
  parseBlastRecord,
  parseDomainSummary,
  parseRecord,
  parseSummaryRecord,
  type BlastFieldIndex,
  type DomainSummary,
  type RawHit,
  type RecordFormat,
} from "../architecture/index.js";
import { InputFileError } from "./errors.js";

export type HitLayout = "records" | "blast" | "summary";

export interface HitReadResult {
  hits: RawHit[];
  /** Malformed records, skipped */
  issues: MalformedRecordError[];
  layout: HitLayout;
  /** Lines that carried a record (valid or not) */
  recordCount: number;
  /** Domain headers of a rescue summary file */
  domainSummaries: DomainSummary[];
}

/**
 * Parse the text of a hit file.
 *
 * @param source - file name recorded on every issue
 */
export function parseHitText(text: string, format: RecordFormat, source?: string): HitReadResult {
  const hits: RawHit[] = [];
  const issues: MalformedRecordError[] = [];
  const domainSummaries: DomainSummary[] = [];
  let fields: BlastFieldIndex | null = null;
  let layout: HitLayout = "records";
  let recordCount = 0;

  const lines = text.split(/\r?\n/);
  for (const [index, line] of lines.entries()) {
    try {
      if (format === "cdd" && line.startsWith(BLAST_FIELDS_PREFIX)) {
        fields = indexBlastFields(line);
        layout = "blast";
        continue;
      }
      if (format === "rescue" && line.trimStart().startsWith("#")) {
        const summary = parseDomainSummary(line);
        if (summary !== null) {
          domainSummaries.push(summary);
        }
        continue;
      }
      if (isSkippableLine(line)) {
        continue;
      }
      if (recordCount === 0 && fields === null && isHeaderLine(line)) {
        continue;
      }
      if (recordCount === 0 && format === "rescue" && isSummaryRecord(line)) {
        layout = "summary";
      }

      recordCount++;
      if (fields !== null) {
        hits.push(parseBlastRecord(line, fields));
      } else if (layout === "summary") {
        hits.push(...parseSummaryRecord(line));
      } else {
        hits.push(...parseRecord(line, format));
      }
    } catch (err) {
      if (!(err instanceof MalformedRecordError)) {
        throw err;
      }
      issues.push(err.locate({ line: index + 1, source }));
    }
  }

  return { hits, issues, layout, recordCount, domainSummaries };
}

/**
 * Parse rpsblast tabular text. Lines before the "# Fields:" header are
 * reported as issues.
 */
export function parseBlastTabular(text: string): HitReadResult {
  const result = parseHitText(text, "cdd");
  if (result.layout !== "blast") {
    return {
      hits: [],
      issues: [new MalformedRecordError(`No "${BLAST_FIELDS_PREFIX}" header found`, "")],
      layout: "blast",
      recordCount: result.recordCount,
      domainSummaries: [],
    };
  }
  return result;
}

/**
 * Read and parse a hit file.
 *
 * @throws InputFileError if the file does not exist
 */
export function readHitFile(path: string, format: RecordFormat): HitReadResult {
  if (!existsSync(path)) {
    throw new InputFileError("Input file not found", path);
  }
  return parseHitText(readFileSync(path, "utf-8"), format, path);
}

export function readCddFile(path: string): HitReadResult {
  return readHitFile(path, "cdd");
}
