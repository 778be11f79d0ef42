/**
 * Pipeline driver: parsed hits → one Family per family id.
 *
 * Failures are isolated at the smallest unit that can fail:
 *   - a malformed record was already skipped by the reader; it is logged and
 *     counted here, against its family when the record named one
 *   - a protein with an unusable length is excluded from its family
 *   - a rescue protein with no qualifying hit is left out of its family
 *   - with a minimum found rate, summarised rescue domains found in too few
 *     proteins are dropped before any protein is built
 * Configuration errors are not caught: they surface before any family is
 * processed.
 */

import {
  FamilyBuilder,
  InvalidProteinLengthError,
  RescueFamilyBuilder,
  buildSystem,
  filterByFoundRate,
  groupHitsByFamily,
  groupHitsByProtein,
  recordedLength,
  selectRescueHits,
  type DomainSummary,
  type Family,
  type FamilyMode,
  type MalformedRecordError,
  type ProteinHits,
  type RawHit,
  type RescueFilter,
  type System,
} from "../architecture/index.js";
import type { ArchitectureConfig } from "../config/index.js";
import { matchesFamilyFilter } from "../io/index.js";
import type { Logger } from "../logging/index.js";

/**
 * Sequence lengths of one family's proteins, or null when none are known.
 */
export type LengthSource = (familyId: string) => ReadonlyMap<string, number> | null;

export interface PipelineInput {
  mode: FamilyMode;
  hits: readonly RawHit[];
  /** Records the readers skipped */
  issues?: readonly MalformedRecordError[];
  lengths?: LengthSource;
  /** Rescue mode: per-family domain summary headers, keyed by family id */
  domainSummaries?: ReadonlyMap<string, readonly DomainSummary[]>;
  /** Only these families; empty or absent means every family in the hits */
  families?: readonly string[];
}

export interface PipelineOptions {
  config: Readonly<ArchitectureConfig>;
  logger: Logger;
}

export interface ExcludedProtein {
  accession: string;
  systemId: string;
  reason: string;
}

export interface FamilySummary {
  familyId: string;
  mode: FamilyMode;
  systems: number;
  excludedProteins: ExcludedProtein[];
  /** Rescue mode: proteins with no qualifying hit */
  filteredProteins: number;
  characteristicDomains: readonly string[];
  /** Malformed records attributed to this family */
  skippedRecords: number;
  /** Rescue mode: summarised domains dropped for a low found rate */
  lowFoundRateDomains: string[];
  warnings: string[];
}

export interface RunSummary {
  mode: FamilyMode;
  families: FamilySummary[];
  skippedRecords: number;
  totalSystems: number;
  totalExcluded: number;
}

export interface PipelineResult {
  families: Family[];
  summary: RunSummary;
}

export function rescueFilterOf(config: Readonly<ArchitectureConfig>): RescueFilter {
  return {
    minimumScore: config.rescueMinimumScore,
    acceptedRounds: config.rescueAcceptedRounds,
  };
}

/**
 * Family ids to process, in first-seen order: families with hits, then
 * families known only from skipped records. Requested families that appear
 * in neither are kept so that they show up (empty) in the results.
 */
function familyOrder(
  byFamily: ReadonlyMap<string, RawHit[]>,
  issueFamilies: readonly string[],
  filter: readonly string[]
): string[] {
  const seen = [...new Set([...byFamily.keys(), ...issueFamilies])];
  const present = seen.filter((id) => matchesFamilyFilter(id, filter));
  const missing = filter.filter((id) => !seen.includes(id));
  return [...present, ...missing];
}

/**
 * Drop the family's summarised domains whose found rate is below the
 * configured minimum. A no-op when the rate is 0 or the family has no
 * summaries.
 */
function applyFoundRate(
  hits: readonly RawHit[],
  summaries: readonly DomainSummary[],
  minimumRate: number,
  summary: FamilySummary,
  logger: Logger
): readonly RawHit[] {
  if (minimumRate <= 0 || summaries.length === 0) {
    return hits;
  }
  const kept = filterByFoundRate(hits, summaries, minimumRate);
  const keptIds = new Set(kept.map((hit) => hit.domainId));
  summary.lowFoundRateDomains = [...new Set(hits.map((hit) => hit.domainId))].filter(
    (id) => !keptIds.has(id)
  );
  if (summary.lowFoundRateDomains.length > 0) {
    logger.info("Dropped domains below the found rate", {
      minimumRate,
      domains: summary.lowFoundRateDomains,
    });
  }
  return kept;
}

interface FamilyContext {
  familyId: string;
  options: PipelineOptions;
  lengths: ReadonlyMap<string, number> | null;
  summary: FamilySummary;
  logger: Logger;
}

/**
 * Build one protein's System, or record why it was excluded.
 */
function tryBuildSystem(protein: ProteinHits, context: FamilyContext): System | null {
  const { config } = context.options;
  const length = recordedLength(protein) ?? context.lengths?.get(protein.accession);

  try {
    return buildSystem(protein, {
      length,
      merge: config.mergeOverlappingDomains,
      holeMinimumLength: config.holeMinimumLength,
    });
  } catch (err) {
    if (!(err instanceof InvalidProteinLengthError)) {
      throw err;
    }
    context.summary.excludedProteins.push({
      accession: protein.accession,
      systemId: protein.systemId,
      reason: err.message,
    });
    context.logger.warn("Protein excluded", {
      accession: protein.accession,
      systemId: protein.systemId,
      reason: err.message,
    });
    return null;
  }
}

function buildStandardFamily(proteins: readonly ProteinHits[], context: FamilyContext): Family {
  const builder = new FamilyBuilder(context.familyId, {
    threshold: context.options.config.characteristicThreshold,
  });

  for (const protein of proteins) {
    const system = tryBuildSystem(protein, context);
    if (system !== null) {
      builder.add(system);
    }
  }

  const { family, warnings } = builder.build();
  context.summary.warnings.push(...warnings.map((warning) => warning.message));
  return family;
}

function buildRescueFamily(proteins: readonly ProteinHits[], context: FamilyContext): Family {
  const filter = rescueFilterOf(context.options.config);
  const builder = new RescueFamilyBuilder(context.familyId, {
    threshold: context.options.config.characteristicThreshold,
    filter,
  });

  for (const protein of proteins) {
    const selected = selectRescueHits(protein.hits, filter);
    if (selected.length === 0) {
      context.summary.filteredProteins++;
      context.logger.debug("No qualifying rescued hit", { accession: protein.accession });
      continue;
    }

    const system = tryBuildSystem({ ...protein, hits: selected }, context);
    if (system !== null) {
      builder.add(system, selected);
    }
  }

  const { family, warnings } = builder.build();
  for (const warning of warnings) {
    context.logger.warn(warning.message);
    context.summary.warnings.push(warning.message);
  }
  return family;
}

/**
 * Run the derivation for every family in the input.
 */
export function runArchitecturePipeline(
  input: PipelineInput,
  options: PipelineOptions
): PipelineResult {
  const { logger } = options;
  const issues = input.issues ?? [];

  for (const issue of issues) {
    logger.warn("Skipped malformed record", {
      source: issue.source,
      line: issue.line,
      familyId: issue.familyId,
      message: issue.message,
    });
  }

  const filter = input.families ?? [];
  const byFamily = groupHitsByFamily(input.hits);
  const families: Family[] = [];
  const summaries: FamilySummary[] = [];

  const issueFamilies = issues.flatMap((issue) =>
    issue.familyId !== undefined ? [issue.familyId] : []
  );

  for (const familyId of familyOrder(byFamily, issueFamilies, filter)) {
    const familyLogger = logger.child({ familyId });
    const summary: FamilySummary = {
      familyId,
      mode: input.mode,
      systems: 0,
      excludedProteins: [],
      filteredProteins: 0,
      characteristicDomains: [],
      skippedRecords: issueFamilies.filter((id) => id === familyId).length,
      lowFoundRateDomains: [],
      warnings: [],
    };
    const context: FamilyContext = {
      familyId,
      options,
      lengths: input.lengths?.(familyId) ?? null,
      summary,
      logger: familyLogger,
    };

    let familyHits: readonly RawHit[] = byFamily.get(familyId) ?? [];
    if (input.mode === "rescue") {
      familyHits = applyFoundRate(
        familyHits,
        input.domainSummaries?.get(familyId) ?? [],
        options.config.rescueMinimumFoundRate,
        summary,
        familyLogger
      );
    }
    const proteins = groupHitsByProtein(familyHits);
    familyLogger.debug("Building family", { proteins: proteins.length });

    const family =
      input.mode === "rescue"
        ? buildRescueFamily(proteins, context)
        : buildStandardFamily(proteins, context);

    summary.systems = family.statistics.systemCount;
    summary.characteristicDomains = family.statistics.characteristicDomains;
    familyLogger.info("Family built", {
      systems: summary.systems,
      excluded: summary.excludedProteins.length,
      characteristic: summary.characteristicDomains.length,
    });

    families.push(family);
    summaries.push(summary);
  }

  return {
    families,
    summary: {
      mode: input.mode,
      families: summaries,
      skippedRecords: issues.length,
      totalSystems: summaries.reduce((sum, s) => sum + s.systems, 0),
      totalExcluded: summaries.reduce((sum, s) => sum + s.excludedProteins.length, 0),
    },
  };
}

/**
 * Human-readable run summary.
 */
export function formatRunSummary(summary: RunSummary): string {
  const lines: string[] = [];

  lines.push("═══════════════════════════════════════════════════════════════");
  lines.push(" Domain Architecture Summary");
  lines.push("═══════════════════════════════════════════════════════════════");
  lines.push("");
  lines.push(`Mode:               ${summary.mode}`);
  lines.push(`Families:           ${summary.families.length}`);
  lines.push(`Systems:            ${summary.totalSystems}`);
  lines.push(`Excluded Proteins:  ${summary.totalExcluded}`);
  lines.push(`Skipped Records:    ${summary.skippedRecords}`);

  for (const family of summary.families) {
    lines.push("");
    lines.push("───────────────────────────────────────────────────────────────");
    lines.push(` ${family.familyId}`);
    lines.push("───────────────────────────────────────────────────────────────");
    lines.push(`  Systems:          ${family.systems}`);
    lines.push(`  Excluded:         ${family.excludedProteins.length}`);
    lines.push(`  Skipped Records:  ${family.skippedRecords}`);
    if (family.mode === "rescue") {
      lines.push(`  Filtered Out:     ${family.filteredProteins}`);
      if (family.lowFoundRateDomains.length > 0) {
        lines.push(`  Low Found Rate:   ${family.lowFoundRateDomains.join(", ")}`);
      }
    }
    const characteristic =
      family.characteristicDomains.length > 0 ? family.characteristicDomains.join(", ") : "(none)";
    lines.push(`  Characteristic:   ${characteristic}`);
    for (const warning of family.warnings) {
      lines.push(`  ⚠ ${warning}`);
    }
  }

  lines.push("");
  lines.push("═══════════════════════════════════════════════════════════════");

  return lines.join("\n");
}
