/**
 * Errors raised while locating or reading input files.
 */

export class InputFileError extends Error {
  public readonly path: string;

  constructor(message: string, path: string) {
    super(`${message}: ${path}`);
    this.name = "InputFileError";
    this.path = path;
  }
}

export class FamilyFilterError extends Error {
  /** Entries that are not TC family identifiers */
  public readonly invalidIds: string[];

  constructor(invalidIds: string[]) {
    super(`Invalid family identifier(s): ${invalidIds.join(", ")}`);
    this.name = "FamilyFilterError";
    this.invalidIds = invalidIds;
  }
}
