/**
 * Domain architecture derivation.
 *
 * Usage:
 *   import { parseRecord, groupHitsByProtein, buildSystem, FamilyBuilder } from "./architecture/index.js";
 *
 *   const hits = lines.flatMap((line) => parseRecord(line, "cdd"));
 *   const builder = new FamilyBuilder("1.A.12", { threshold: 0.5 });
 *   for (const protein of groupHitsByProtein(hits)) {
 *     builder.add(buildSystem(protein, { holeMinimumLength: 50 }));
 *   }
 *   const { family } = builder.build();
 */

export {
  BEGIN_LABEL,
  END_LABEL,
  intervalLength,
  type RecordFormat,
  type RawHit,
  type Domain,
  type Hole,
  type System,
  type FamilyMode,
  type FamilyStatistics,
  type RescueFilter,
  type RescueCall,
  type Family,
  type SystemRef,
  type DomainStatistics,
  type DomainSummary,
  type DomainFoundRate,
} from "./model.js";

export {
  MalformedRecordError,
  InvalidProteinLengthError,
  InvalidThresholdError,
  EmptyFamilyWarning,
  type RecordLocation,
} from "./errors.js";

export {
  CddRowSchema,
  RescueRowSchema,
  BLAST_FIELDS_PREFIX,
  toInternalInterval,
  parseDomainToken,
  parseAccession,
  parseRecord,
  isSkippableLine,
  isHeaderLine,
  indexBlastFields,
  familyOfAccession,
  parseBlastRecord,
  parseRescueRound,
  parseDomainSummary,
  isSummaryRecord,
  parseSummaryRecord,
  type CddRow,
  type RescueRow,
  type DomainToken,
  type BlastFieldIndex,
} from "./hit-parser.js";

export {
  isMoreSignificant,
  sortHits,
  mergeDomains,
  isResolved,
  type MergeOptions,
} from "./domain-merger.js";

export {
  holeLabel,
  assertProteinLength,
  computeGaps,
  retainHoles,
  detectHoles,
} from "./hole-detector.js";

export {
  groupHitsByProtein,
  groupHitsByFamily,
  recordedLength,
  buildSystem,
  type ProteinHits,
  type BuildSystemOptions,
} from "./system-builder.js";

export {
  assertThreshold,
  computeStatistics,
  systemsWithDomain,
  FamilyBuilder,
  aggregateFamily,
  passesRescueFilter,
  selectRescueHits,
  RescueFamilyBuilder,
  FOUND_ROUNDS,
  computeFoundRates,
  filterByFoundRate,
  type AggregationOptions,
  type RescueAggregationOptions,
  type FamilyBuildResult,
  type CountedSystem,
} from "./family-aggregator.js";

export { deepFreeze } from "./freeze.js";
