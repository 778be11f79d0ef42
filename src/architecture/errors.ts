/**
 * Error taxonomy for architecture derivation.
 *
 *   MalformedRecordError       bad input line; the record is skipped
 *   InvalidProteinLengthError  the protein is excluded from its family
 *   InvalidThresholdError      configuration error; fatal before processing
 *   EmptyFamilyWarning         returned, never thrown
 */

/**
 * Where a record came from. Each field is filled in by whichever layer
 * knows it: the parser (family), the reader (line, source).
 */
export interface RecordLocation {
  /** 1-based line number */
  line?: number;
  /** File the record was read from */
  source?: string;
  /** Family the record belongs to, when that much of it could be read */
  familyId?: string;
}

export class MalformedRecordError extends Error {
  public readonly record: string;
  public readonly line?: number;
  public readonly source?: string;
  public readonly familyId?: string;

  constructor(message: string, record: string, location: RecordLocation = {}) {
    super(message);
    this.name = "MalformedRecordError";
    this.record = record;
    this.line = location.line;
    this.source = location.source;
    this.familyId = location.familyId;
  }

  /**
   * Copy of this error with the given location fields replaced.
   */
  locate(location: RecordLocation): MalformedRecordError {
    return new MalformedRecordError(this.message, this.record, {
      line: location.line ?? this.line,
      source: location.source ?? this.source,
      familyId: location.familyId ?? this.familyId,
    });
  }
}

export class InvalidProteinLengthError extends Error {
  public readonly accession: string;
  public readonly length: number | undefined;

  constructor(accession: string, length: number | undefined, reason: string) {
    super(`Invalid protein length for ${accession} (${length ?? "unknown"}): ${reason}`);
    this.name = "InvalidProteinLengthError";
    this.accession = accession;
    this.length = length;
  }
}

export class InvalidThresholdError extends Error {
  public readonly threshold: number;

  constructor(threshold: number) {
    super(`Characteristic-domain threshold must be within [0, 1], got: ${threshold}`);
    this.name = "InvalidThresholdError";
    this.threshold = threshold;
  }
}

export class EmptyFamilyWarning extends Error {
  public readonly familyId: string;

  constructor(familyId: string, reason: string) {
    super(`Family ${familyId} is empty: ${reason}`);
    this.name = "EmptyFamilyWarning";
    this.familyId = familyId;
  }
}
