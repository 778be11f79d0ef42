/**
 * Hit parser: one input record → raw domain hits.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * RECORD SHAPES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   cdd     family  system  accession[:LENGTH]  ID:START-END[:EVALUE];...
 *   rescue  family  system  accession[:LENGTH]  ID:START-END  bitscore  evalue  round
 *
 * A CDD row expands into one hit per domain token. Columns past the ones
 * named above are ignored. File coordinates are 1-based inclusive and are
 * converted to 0-based half-open intervals here.
 *
 * The rpsblast tabular layout (a "# Fields:" header naming the columns) is
 * read through indexBlastFields() + parseBlastRecord().
 *
 * Rescue searches also write a summary layout, one protein per row:
 *
 *   # DOM:  DirectHits: 9  ...  (100.0% from a total of 11)     one per domain
 *   label  system[:LENGTH]  DOM|START-END:EVALUE|...|ROUND  ...
 *
 * read through parseDomainSummary() + parseSummaryRecord().
 *
 * A record that fails after its family column was read carries that family
 * on the error, so skipped records can be counted per family.
 */

import { z, type ZodIssue } from "zod";
import { MalformedRecordError } from "./errors.js";
import type { DomainSummary, RawHit, RecordFormat } from "./model.js";

const Field = z.string().trim().min(1, "is empty");

const NumericField = Field.pipe(
  z.coerce.number({ invalid_type_error: "is not a number" }).finite()
);

/**
 * Rescue rounds are written either as integers or as the labels the rescue
 * search emits: DirectHit (round 0), Rescued1, Rescued2, ...
 */
const RoundField = Field.transform((value, ctx) => {
  if (/^\d+$/.test(value)) {
    return Number(value);
  }
  if (value === "DirectHit") {
    return 0;
  }
  const rescued = /^Rescued(\d+)$/.exec(value);
  if (rescued?.[1] !== undefined) {
    return Number(rescued[1]);
  }
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: `is not a rescue round: ${value}`,
  });
  return z.NEVER;
});

export const CddRowSchema = z.object({
  family: Field,
  system: Field,
  accession: Field,
  domains: Field,
});
export type CddRow = z.infer<typeof CddRowSchema>;

export const RescueRowSchema = CddRowSchema.extend({
  bitscore: NumericField,
  evalue: NumericField,
  rescueRound: RoundField,
});
export type RescueRow = z.infer<typeof RescueRowSchema>;

const CDD_COLUMNS = ["family", "system", "accession", "domains"] as const;
const RESCUE_COLUMNS = [...CDD_COLUMNS, "bitscore", "evalue", "rescueRound"] as const;

const DOMAIN_TOKEN = /^([^:\s]+):(\d+)-(\d+)(?::(\S+))?$/;
const ACCESSION_WITH_LENGTH = /^(.+):(\d+)$/;

/**
 * A domain token resolved to internal coordinates.
 */
export interface DomainToken {
  domainId: string;
  start: number;
  end: number;
  evalue: number | null;
}

/**
 * Parse a rescue round written as an integer or a DirectHit / RescuedN label.
 */
export function parseRescueRound(value: string): number | null {
  const parsed = RoundField.safeParse(value);
  return parsed.success ? parsed.data : null;
}

function describeIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(record)";
  return `${path} ${issue.message}`;
}

function toRow(columns: string[], names: readonly string[]): Record<string, string | undefined> {
  const row: Record<string, string | undefined> = {};
  names.forEach((name, i) => {
    row[name] = columns[i];
  });
  return row;
}

/**
 * Convert a 1-based inclusive file interval to a 0-based half-open one.
 */
export function toInternalInterval(
  fileStart: number,
  fileEnd: number,
  record: string
): { start: number; end: number } {
  if (!Number.isSafeInteger(fileStart) || !Number.isSafeInteger(fileEnd)) {
    throw new MalformedRecordError(`Coordinates ${fileStart}-${fileEnd} are not integers`, record);
  }
  if (fileStart < 1) {
    throw new MalformedRecordError(`Start ${fileStart} is before the first residue`, record);
  }
  const start = fileStart - 1;
  const end = fileEnd;
  if (start >= end) {
    throw new MalformedRecordError(`Start ${fileStart} is past end ${fileEnd}`, record);
  }
  return { start, end };
}

/**
 * Parse one `ID:START-END[:EVALUE]` token.
 */
export function parseDomainToken(token: string, record: string): DomainToken {
  const match = DOMAIN_TOKEN.exec(token.trim());
  if (!match) {
    throw new MalformedRecordError(`Domain token "${token}" is not ID:START-END`, record);
  }
  const [, domainId = "", rawStart = "", rawEnd = "", rawEvalue] = match;
  const { start, end } = toInternalInterval(Number(rawStart), Number(rawEnd), record);

  let evalue: number | null = null;
  if (rawEvalue !== undefined) {
    evalue = Number(rawEvalue);
    if (!Number.isFinite(evalue)) {
      throw new MalformedRecordError(`E-value "${rawEvalue}" is not a number`, record);
    }
  }

  return { domainId, start, end, evalue };
}

/**
 * Split an accession column into accession and optional protein length.
 */
export function parseAccession(value: string): { accession: string; length?: number } {
  const match = ACCESSION_WITH_LENGTH.exec(value);
  if (match?.[1] !== undefined && match[2] !== undefined) {
    return { accession: match[1], length: Number(match[2]) };
  }
  return { accession: value };
}

function splitDomainTokens(domains: string): string[] {
  return domains
    .split(";")
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

function parseCdd(columns: string[], record: string): RawHit[] {
  const parsed = CddRowSchema.safeParse(toRow(columns, CDD_COLUMNS));
  if (!parsed.success) {
    throw new MalformedRecordError(parsed.error.issues.map(describeIssue).join("; "), record);
  }
  const row = parsed.data;
  const { accession, length } = parseAccession(row.accession);

  return splitDomainTokens(row.domains).map((token) => {
    const domain = parseDomainToken(token, record);
    return {
      familyId: row.family,
      systemId: row.system,
      accession,
      length,
      ...domain,
    };
  });
}

function parseRescue(columns: string[], record: string): RawHit[] {
  const parsed = RescueRowSchema.safeParse(toRow(columns, RESCUE_COLUMNS));
  if (!parsed.success) {
    throw new MalformedRecordError(parsed.error.issues.map(describeIssue).join("; "), record);
  }
  const row = parsed.data;
  const { accession, length } = parseAccession(row.accession);

  return splitDomainTokens(row.domains).map((token) => {
    const domain = parseDomainToken(token, record);
    return {
      familyId: row.family,
      systemId: row.system,
      accession,
      length,
      domainId: domain.domainId,
      start: domain.start,
      end: domain.end,
      evalue: row.evalue,
      bitscore: row.bitscore,
      rescueRound: row.rescueRound,
    };
  });
}

/**
 * Parse one tab-separated record into raw hits.
 *
 * @throws MalformedRecordError on a missing field, a non-numeric coordinate,
 *   or an interval whose start is not before its end
 */
export function parseRecord(line: string, format: RecordFormat): RawHit[] {
  const record = line.replace(/\r?\n$/, "");
  const columns = record.split("\t");

  return withRecordFamily(columns[0], () => {
    const hits = format === "cdd" ? parseCdd(columns, record) : parseRescue(columns, record);
    if (hits.length === 0) {
      throw new MalformedRecordError("Record has no domain tokens", record);
    }
    return hits;
  });
}

const FAMILY_SHAPE = /^[^.\s]+\.[^.\s]+\.[^.\s]+$/;

/**
 * Run a parse step, tagging a MalformedRecordError with the record's family
 * when the family column holds something shaped like a family id.
 */
function withRecordFamily<T>(family: string | undefined, parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    const familyId = family?.trim();
    if (
      err instanceof MalformedRecordError &&
      err.familyId === undefined &&
      familyId !== undefined &&
      FAMILY_SHAPE.test(familyId)
    ) {
      throw err.locate({ familyId });
    }
    throw err;
  }
}

/**
 * Whether a line carries no record (blank or comment).
 */
export function isSkippableLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.length === 0 || trimmed.startsWith("#");
}

/**
 * Whether a line is a column header row (first column literally "family").
 */
export function isHeaderLine(line: string): boolean {
  const first = line.split("\t")[0]?.trim().toLowerCase();
  return first === "family";
}

// ═══════════════════════════════════════════════════════════════════════════
// RPSBLAST TABULAR OUTPUT
// ═══════════════════════════════════════════════════════════════════════════

export const BLAST_FIELDS_PREFIX = "# Fields:";

/**
 * Column positions resolved from a "# Fields:" header.
 */
export interface BlastFieldIndex {
  queryAccession: number;
  subjectAccession: number;
  queryStart: number;
  queryEnd: number;
  evalue?: number;
  bitscore?: number;
  queryLength?: number;
}

/**
 * Resolve column positions from a "# Fields: a, b, c" header line.
 *
 * @throws MalformedRecordError when a required column is missing
 */
export function indexBlastFields(headerLine: string): BlastFieldIndex {
  const names = headerLine
    .replace(BLAST_FIELDS_PREFIX, "")
    .split(",")
    .map((name) => name.trim());

  const position = (name: string): number | undefined => {
    const index = names.indexOf(name);
    return index >= 0 ? index : undefined;
  };

  const required = (name: string): number => {
    const index = position(name);
    if (index === undefined) {
      throw new MalformedRecordError(`Fields header has no "${name}" column`, headerLine);
    }
    return index;
  };

  return {
    queryAccession: required("query acc."),
    subjectAccession: required("subject accs."),
    queryStart: required("q. start"),
    queryEnd: required("q. end"),
    evalue: position("evalue"),
    bitscore: position("bit score"),
    queryLength: position("query length"),
  };
}

/**
 * Family of a TC accession: its first three dot-separated parts.
 */
export function familyOfAccession(accession: string): string {
  return accession.split(".").slice(0, 3).join(".");
}

function optionalNumber(columns: string[], index: number | undefined, record: string): number | undefined {
  if (index === undefined) {
    return undefined;
  }
  const raw = columns[index]?.trim();
  if (raw === undefined || raw === "") {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new MalformedRecordError(`"${raw}" is not a number`, record);
  }
  return value;
}

/**
 * Parse one data line of rpsblast tabular output.
 */
export function parseBlastRecord(line: string, fields: BlastFieldIndex): RawHit {
  const record = line.replace(/\r?\n$/, "");
  const columns = record.split("\t");
  const query = columns[fields.queryAccession]?.trim();

  return withRecordFamily(query ? familyOfAccession(query) : undefined, () =>
    blastHit(columns, fields, record)
  );
}

function blastHit(columns: string[], fields: BlastFieldIndex, record: string): RawHit {
  const accession = columns[fields.queryAccession]?.trim();
  const domainId = columns[fields.subjectAccession]?.trim();
  if (!accession || !domainId) {
    throw new MalformedRecordError("Missing query or subject accession", record);
  }

  const fileStart = optionalNumber(columns, fields.queryStart, record);
  const fileEnd = optionalNumber(columns, fields.queryEnd, record);
  if (fileStart === undefined || fileEnd === undefined) {
    throw new MalformedRecordError("Missing query coordinates", record);
  }
  const { start, end } = toInternalInterval(fileStart, fileEnd, record);

  return {
    familyId: familyOfAccession(accession),
    systemId: accession,
    accession,
    length: optionalNumber(columns, fields.queryLength, record),
    domainId,
    start,
    end,
    evalue: optionalNumber(columns, fields.evalue, record) ?? null,
    bitscore: optionalNumber(columns, fields.bitscore, record),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// RESCUE SUMMARY LAYOUT
// ═══════════════════════════════════════════════════════════════════════════

const DOMAIN_SUMMARY = /^#\s*([^:\s]+):.*from a total of\s+(\d+)/;

/**
 * Read a "# DOM: ... from a total of N" header, or null for any other line.
 */
export function parseDomainSummary(line: string): DomainSummary | null {
  const match = DOMAIN_SUMMARY.exec(line.trim());
  if (match?.[1] === undefined || match[2] === undefined) {
    return null;
  }
  return { domainId: match[1], total: Number(match[2]) };
}

/**
 * Whether a rescue row uses the summary layout (hit cells joined by "|").
 */
export function isSummaryRecord(line: string): boolean {
  return line.split("\t").slice(2).some((cell) => cell.includes("|"));
}

/**
 * Parse one summary-layout row. Each `DOM|START-END:EVALUE|...|ROUND` cell
 * yields one hit per position; a cell without positions means the domain
 * was not found and yields nothing. The system id doubles as accession and
 * its first three parts name the family.
 */
export function parseSummaryRecord(line: string): RawHit[] {
  const record = line.replace(/\r?\n$/, "");
  const columns = record.split("\t");
  const system = columns[1]?.trim();
  if (!system) {
    throw new MalformedRecordError("Missing system column", record);
  }
  const { accession, length } = parseAccession(system);
  const familyId = familyOfAccession(accession);

  return withRecordFamily(familyId, () => {
    const hits: RawHit[] = [];
    for (const cell of columns.slice(2)) {
      const parts = cell.trim().split("|");
      const [domainId = "", ...rest] = parts;
      const roundLabel = rest.pop();
      if (parts.length < 3 || roundLabel === undefined) {
        continue;
      }
      const rescueRound = parseRescueRound(roundLabel);
      if (rescueRound === null) {
        throw new MalformedRecordError(`"${roundLabel}" is not a rescue round`, record);
      }
      for (const position of rest) {
        const token = parseDomainToken(`${domainId}:${position}`, record);
        hits.push({ familyId, systemId: accession, accession, length, ...token, rescueRound });
      }
    }
    return hits;
  });
}
