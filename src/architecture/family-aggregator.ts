/**
 * Family aggregator.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * CHARACTERISTIC DOMAINS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * For every domain id observed in a family:
 *
 *   count(d)     = number of systems containing d (a system counts once)
 *   frequency(d) = count(d) / number of systems
 *
 * d is characteristic when frequency(d) ≥ threshold.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * MODES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * STANDARD: a system contains d when one of its resolved domains has id d.
 *
 * RESCUE: rescued hits are lower-confidence evidence. Before counting, each
 * protein's hits go through selectRescueHits():
 *   - bitscore ≥ minimumScore and round in acceptedRounds
 *   - per domain id, only the earliest qualifying round survives
 * A system contains d when one of its selected hits has id d. A protein with
 * no selected hit is not part of the family at all.
 *
 * Summary-layout rescue files also allow a family-wide prefilter: a domain
 * is kept only if the share of proteins where it was found directly or in
 * the first rescue round reaches a minimum found rate.
 *
 * Builders own their accumulators; statistics are computed once on build()
 * and the resulting Family is frozen.
 */

import { EmptyFamilyWarning, InvalidThresholdError } from "./errors.js";
import { deepFreeze } from "./freeze.js";
import { intervalLength } from "./model.js";
import type {
  Domain,
  DomainFoundRate,
  DomainStatistics,
  DomainSummary,
  Family,
  FamilyMode,
  FamilyStatistics,
  RawHit,
  RescueCall,
  RescueFilter,
  System,
  SystemRef,
} from "./model.js";

export interface AggregationOptions {
  /** Fraction of systems, within [0, 1] */
  threshold: number;
}

export interface RescueAggregationOptions extends AggregationOptions {
  filter: RescueFilter;
}

export interface FamilyBuildResult {
  family: Family;
  warnings: EmptyFamilyWarning[];
}

/**
 * @throws InvalidThresholdError if threshold is not within [0, 1]
 */
export function assertThreshold(threshold: number): void {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new InvalidThresholdError(threshold);
  }
}

export interface CountedSystem {
  system: System;
  /** The domain intervals this system counts with */
  occurrences: readonly Domain[];
}

interface DomainAccumulator {
  count: number;
  lengthSum: number;
  occurrences: number;
  bitscoreSum: number;
  bitscores: number;
  systems: SystemRef[];
}

/**
 * Compute family statistics from systems and the domain occurrences each
 * one counts. A system counts toward a domain once, however many
 * occurrences it has.
 */
export function computeStatistics(
  entries: readonly CountedSystem[],
  threshold: number
): FamilyStatistics {
  const systemCount = entries.length;
  const accumulators = new Map<string, DomainAccumulator>();
  let totalLength = 0;
  let totalDomains = 0;

  for (const { system, occurrences } of entries) {
    totalLength += system.length;
    totalDomains += system.domains.length;

    const seen = new Set<string>();
    for (const domain of occurrences) {
      let acc = accumulators.get(domain.domainId);
      if (acc === undefined) {
        acc = { count: 0, lengthSum: 0, occurrences: 0, bitscoreSum: 0, bitscores: 0, systems: [] };
        accumulators.set(domain.domainId, acc);
      }
      acc.lengthSum += intervalLength(domain);
      acc.occurrences++;
      if (domain.bitscore !== undefined) {
        acc.bitscoreSum += domain.bitscore;
        acc.bitscores++;
      }
      if (!seen.has(domain.domainId)) {
        seen.add(domain.domainId);
        acc.count++;
        acc.systems.push({ systemId: system.systemId, accession: system.accession });
      }
    }
  }

  const domainCounts = new Map<string, number>();
  const domainFrequencies = new Map<string, number>();
  const domainStatistics = new Map<string, DomainStatistics>();
  const characteristicDomains: string[] = [];
  for (const [id, acc] of accumulators) {
    const frequency = acc.count / systemCount;
    domainCounts.set(id, acc.count);
    domainFrequencies.set(id, frequency);
    domainStatistics.set(id, {
      count: acc.count,
      averageLength: acc.lengthSum / acc.occurrences,
      averageBitscore: acc.bitscores > 0 ? acc.bitscoreSum / acc.bitscores : null,
      systems: acc.systems,
    });
    if (frequency >= threshold) {
      characteristicDomains.push(id);
    }
  }

  return {
    systemCount,
    averageLength: systemCount > 0 ? totalLength / systemCount : 0,
    totalDomains,
    domainCounts,
    domainFrequencies,
    characteristicDomains,
    domainStatistics,
    threshold,
  };
}

/**
 * Systems of a family that contain a domain, in family order.
 */
export function systemsWithDomain(family: Family, domainId: string): System[] {
  const refs = family.statistics.domainStatistics.get(domainId)?.systems ?? [];
  return family.systems.filter((system) =>
    refs.some((ref) => ref.systemId === system.systemId && ref.accession === system.accession)
  );
}

/**
 * Shared accumulator for both builders.
 */
abstract class BaseFamilyBuilder {
  public readonly familyId: string;
  protected readonly threshold: number;
  private readonly entries: CountedSystem[] = [];
  private result: FamilyBuildResult | null = null;

  constructor(familyId: string, options: AggregationOptions) {
    assertThreshold(options.threshold);
    this.familyId = familyId;
    this.threshold = options.threshold;
  }

  get size(): number {
    return this.entries.length;
  }

  get isBuilt(): boolean {
    return this.result !== null;
  }

  protected append(system: System, occurrences: readonly Domain[]): void {
    if (this.result !== null) {
      throw new Error(`Family ${this.familyId} has already been built`);
    }
    if (system.familyId !== this.familyId) {
      throw new Error(
        `System ${system.accession} belongs to family ${system.familyId}, not ${this.familyId}`
      );
    }
    this.entries.push({ system, occurrences });
  }

  protected abstract readonly mode: FamilyMode;

  protected abstract finish(family: Family): FamilyBuildResult;

  /**
   * Compute statistics and freeze the family. Later calls return the same result.
   */
  build(): FamilyBuildResult {
    if (this.result !== null) {
      return this.result;
    }

    const family: Family = {
      familyId: this.familyId,
      mode: this.mode,
      systems: this.entries.map((entry) => entry.system),
      statistics: computeStatistics(this.entries, this.threshold),
    };

    this.result = this.finish(family);
    return this.result;
  }
}

/**
 * Builds a standard-mode family one system at a time.
 *
 * @example
 *   const builder = new FamilyBuilder("1.A.12", { threshold: 0.5 });
 *   for (const system of systems) builder.add(system);
 *   const { family } = builder.build();
 */
export class FamilyBuilder extends BaseFamilyBuilder {
  protected readonly mode = "standard";

  add(system: System): this {
    this.append(system, system.domains);
    return this;
  }

  protected finish(family: Family): FamilyBuildResult {
    return { family: deepFreeze(family), warnings: [] };
  }
}

/**
 * Aggregate an already-built list of systems.
 */
export function aggregateFamily(
  familyId: string,
  systems: Iterable<System>,
  options: AggregationOptions
): FamilyBuildResult {
  const builder = new FamilyBuilder(familyId, options);
  for (const system of systems) {
    builder.add(system);
  }
  return builder.build();
}

// ═══════════════════════════════════════════════════════════════════════════
// RESCUE MODE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Whether one rescued hit passes the score and round filter. A hit without
 * a bitscore passes only when no positive minimum score is set.
 */
export function passesRescueFilter(hit: RawHit, filter: RescueFilter): boolean {
  const scorePasses =
    hit.bitscore !== undefined ? hit.bitscore >= filter.minimumScore : filter.minimumScore <= 0;
  return (
    scorePasses &&
    hit.rescueRound !== undefined &&
    filter.acceptedRounds.includes(hit.rescueRound)
  );
}

/**
 * Hits of one protein that count as rescue evidence: those passing the
 * filter, restricted per domain id to the earliest qualifying round.
 */
export function selectRescueHits(hits: readonly RawHit[], filter: RescueFilter): RawHit[] {
  const qualifying = hits.filter((hit) => passesRescueFilter(hit, filter));

  const earliestRound = new Map<string, number>();
  for (const hit of qualifying) {
    const round = hit.rescueRound ?? 0;
    const known = earliestRound.get(hit.domainId);
    if (known === undefined || round < known) {
      earliestRound.set(hit.domainId, round);
    }
  }

  return qualifying.filter((hit) => hit.rescueRound === earliestRound.get(hit.domainId));
}

/**
 * The call counted for one domain of one system: earliest round, then
 * highest bitscore.
 */
function countedCall(accession: string, hits: readonly RawHit[]): RescueCall {
  let best: RescueCall | null = null;
  for (const hit of hits) {
    const call: RescueCall = {
      accession,
      round: hit.rescueRound ?? 0,
      bitscore: hit.bitscore ?? null,
    };
    if (
      best === null ||
      call.round < best.round ||
      (call.round === best.round && (call.bitscore ?? -Infinity) > (best.bitscore ?? -Infinity))
    ) {
      best = call;
    }
  }
  return best ?? { accession, round: 0, bitscore: null };
}

/**
 * Builds a rescue-mode family. Each system is added together with the hits
 * selectRescueHits() kept for it.
 */
export class RescueFamilyBuilder extends BaseFamilyBuilder {
  protected readonly mode = "rescue";
  private readonly filter: RescueFilter;
  private readonly evidence = new Map<string, RescueCall[]>();

  constructor(familyId: string, options: RescueAggregationOptions) {
    super(familyId, options);
    this.filter = {
      minimumScore: options.filter.minimumScore,
      acceptedRounds: [...options.filter.acceptedRounds],
    };
  }

  /**
   * Add a system with its selected rescue hits.
   *
   * @returns false (and leaves the family unchanged) when no hit qualifies
   */
  add(system: System, selectedHits: readonly RawHit[]): boolean {
    const byDomain = new Map<string, RawHit[]>();
    for (const hit of selectedHits) {
      if (hit.accession !== system.accession || !passesRescueFilter(hit, this.filter)) {
        continue;
      }
      const list = byDomain.get(hit.domainId) ?? [];
      list.push(hit);
      byDomain.set(hit.domainId, list);
    }

    if (byDomain.size === 0) {
      return false;
    }

    this.append(system, [...byDomain.values()].flat());
    for (const [domainId, hits] of byDomain) {
      const calls = this.evidence.get(domainId) ?? [];
      calls.push(countedCall(system.accession, hits));
      this.evidence.set(domainId, calls);
    }
    return true;
  }

  protected finish(family: Family): FamilyBuildResult {
    const warnings =
      family.systems.length === 0
        ? [new EmptyFamilyWarning(this.familyId, "no system has a qualifying rescued hit")]
        : [];

    return {
      family: deepFreeze({
        ...family,
        rescueFilter: this.filter,
        rescueEvidence: this.evidence,
      }),
      warnings,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// FOUND-RATE PREFILTER
// ═══════════════════════════════════════════════════════════════════════════

/** Rounds whose hits count as found: direct hits and first-round rescues */
export const FOUND_ROUNDS: readonly number[] = [0, 1];

/**
 * Found rate of every summarised domain: proteins with a direct or
 * first-round hit of the domain, over the total its summary reports.
 */
export function computeFoundRates(
  hits: readonly RawHit[],
  summaries: readonly DomainSummary[]
): DomainFoundRate[] {
  const foundIn = new Map<string, Set<string>>();
  for (const hit of hits) {
    if (hit.rescueRound === undefined || !FOUND_ROUNDS.includes(hit.rescueRound)) {
      continue;
    }
    const proteins = foundIn.get(hit.domainId) ?? new Set<string>();
    proteins.add(`${hit.systemId}\t${hit.accession}`);
    foundIn.set(hit.domainId, proteins);
  }

  return summaries.map(({ domainId, total }) => {
    const found = foundIn.get(domainId)?.size ?? 0;
    return { domainId, found, total, rate: total > 0 ? found / total : 0 };
  });
}

/**
 * Keep only hits of domains whose found rate reaches the minimum. Domains
 * without a summary header are dropped. With no summaries at all there is
 * nothing to measure against and every hit is kept.
 */
export function filterByFoundRate(
  hits: readonly RawHit[],
  summaries: readonly DomainSummary[],
  minimumRate: number
): RawHit[] {
  if (summaries.length === 0) {
    return [...hits];
  }
  const kept = new Set(
    computeFoundRates(hits, summaries)
      .filter((entry) => entry.rate >= minimumRate)
      .map((entry) => entry.domainId)
  );
  return hits.filter((hit) => kept.has(hit.domainId));
}
