/**
 * Flat-file input and CSV output.
 */

export { InputFileError, FamilyFilterError } from "./errors.js";

export {
  parseHitText,
  parseBlastTabular,
  readHitFile,
  readCddFile,
  type HitLayout,
  type HitReadResult,
} from "./cdd-reader.js";

export {
  RESCUE_FILE_SUFFIX,
  isRescueFile,
  familyIdOfRescueFile,
  findRescueFiles,
  readRescueDirectory,
  type RescueFileResult,
} from "./rescue-reader.js";

export {
  DEFAULT_SEQUENCE_FILE_PATTERN,
  parseFastaLengths,
  sequenceFilePath,
  readSequenceLengths,
  loadFamilyLengths,
} from "./fasta.js";

export {
  FAMILY_ID_PATTERN,
  FamilyIdSchema,
  isFamilyId,
  parseFamilyList,
  parseFamilyIds,
  matchesFamilyFilter,
} from "./family-filter.js";

export {
  CSV_HEADERS,
  formatLiteralFloat,
  formatLiteralString,
  formatDomains,
  formatSeparators,
  escapeCsvField,
  systemToCsvRow,
  renderCsv,
  writeArchitectureCsv,
} from "./csv-export.js";
