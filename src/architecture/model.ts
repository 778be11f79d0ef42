/**
 * Domain architecture model.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * COORDINATES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Every interval in this model is 0-based and half-open: [start, end).
 * Input files use 1-based inclusive coordinates; the hit parser converts on
 * the way in and the CSV exporter converts back on the way out.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * LIFECYCLE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   RawHit   transient, consumed while a System is built
 *   Domain   created once by the merger, never mutated
 *   Hole     created once by the hole detector, never mutated
 *   System   deep-frozen as soon as its domains and holes are known
 *   Family   built incrementally, statistics computed once, then frozen
 */

/**
 * Input formats understood by the hit parser.
 */
export type RecordFormat = "cdd" | "rescue";

/**
 * One domain hit as read from an input record, before overlap resolution.
 */
export interface RawHit {
  readonly familyId: string;
  readonly systemId: string;
  readonly accession: string;
  /** Protein length when the record carries it (ACCESSION:LENGTH) */
  readonly length?: number;
  readonly domainId: string;
  readonly start: number;
  readonly end: number;
  /** null when the record reports no e-value */
  readonly evalue: number | null;
  readonly bitscore?: number;
  readonly rescueRound?: number;
}

/**
 * A resolved domain on one protein.
 */
export interface Domain {
  readonly domainId: string;
  readonly start: number;
  readonly end: number;
  readonly evalue: number | null;
  readonly bitscore?: number;
  readonly rescueRound?: number;
}

/** Label used for the protein boundaries in hole names */
export const BEGIN_LABEL = "BEGIN";
export const END_LABEL = "END";

/**
 * A gap between two domains, or between a protein end and its nearest domain.
 */
export interface Hole {
  /** "BEGIN→X", "X→Y", "X→END" or "BEGIN→END" */
  readonly label: string;
  readonly start: number;
  readonly end: number;
  readonly length: number;
}

/**
 * One protein record and its domain architecture.
 */
export interface System {
  readonly familyId: string;
  /** Subfamily / TC system identifier */
  readonly systemId: string;
  readonly accession: string;
  readonly length: number;
  readonly domains: readonly Domain[];
  readonly holes: readonly Hole[];
  /** Residues outside every domain, including gaps too short to be holes */
  readonly uncoveredResidues: number;
  /** Fraction of the protein covered by domains */
  readonly coverage: number;
}

export type FamilyMode = "standard" | "rescue";

/**
 * Identifies one system within its family.
 */
export interface SystemRef {
  readonly systemId: string;
  readonly accession: string;
}

/**
 * What a family knows about one of its domains.
 */
export interface DomainStatistics {
  /** Systems containing the domain */
  readonly count: number;
  /** Mean length of the counted occurrences */
  readonly averageLength: number;
  /** null when no counted occurrence carries a bitscore */
  readonly averageBitscore: number | null;
  readonly systems: readonly SystemRef[];
}

/**
 * Aggregated domain statistics for one family.
 */
export interface FamilyStatistics {
  readonly systemCount: number;
  readonly averageLength: number;
  readonly totalDomains: number;
  /** Domain id → number of systems containing it */
  readonly domainCounts: ReadonlyMap<string, number>;
  /** Domain id → domainCounts / systemCount */
  readonly domainFrequencies: ReadonlyMap<string, number>;
  readonly characteristicDomains: readonly string[];
  /** Domain id → count, mean length, mean bitscore and containing systems */
  readonly domainStatistics: ReadonlyMap<string, DomainStatistics>;
  readonly threshold: number;
}

/**
 * Filter applied to rescued hits before they count as evidence.
 */
export interface RescueFilter {
  readonly minimumScore: number;
  readonly acceptedRounds: readonly number[];
}

/**
 * The rescued hit that was counted for one system.
 */
export interface RescueCall {
  readonly accession: string;
  readonly round: number;
  /** null for layouts that report no bitscore */
  readonly bitscore: number | null;
}

/**
 * Per-domain header of a rescue summary file: the number of family proteins
 * the domain is measured against.
 */
export interface DomainSummary {
  readonly domainId: string;
  readonly total: number;
}

/**
 * Share of a family's proteins in which a domain was found directly or in
 * the first rescue round.
 */
export interface DomainFoundRate {
  readonly domainId: string;
  readonly found: number;
  readonly total: number;
  readonly rate: number;
}

/**
 * A named group of systems with frozen statistics.
 */
export interface Family {
  readonly familyId: string;
  readonly mode: FamilyMode;
  readonly systems: readonly System[];
  readonly statistics: FamilyStatistics;
  /** Present only when the family was built from rescue data */
  readonly rescueFilter?: RescueFilter;
  /** Domain id → the call counted for each system (rescue mode only) */
  readonly rescueEvidence?: ReadonlyMap<string, readonly RescueCall[]>;
}

/**
 * Length of a domain or hole interval.
 */
export function intervalLength(interval: { start: number; end: number }): number {
  return interval.end - interval.start;
}
