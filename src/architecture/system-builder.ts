/**
 * System assembly: raw hits of one protein → immutable System.
 */

import { mergeDomains } from "./domain-merger.js";
import { assertProteinLength, computeGaps, retainHoles } from "./hole-detector.js";
import { deepFreeze } from "./freeze.js";
import { intervalLength, type RawHit, type System } from "./model.js";

/**
 * All raw hits of one protein within one family/subfamily.
 */
export interface ProteinHits {
  readonly familyId: string;
  readonly systemId: string;
  readonly accession: string;
  readonly hits: readonly RawHit[];
}

export interface BuildSystemOptions {
  /** Protein length; falls back to the length carried by the hits */
  length?: number;
  merge?: boolean;
  holeMinimumLength: number;
}

function proteinKey(hit: RawHit): string {
  return `${hit.familyId}\t${hit.systemId}\t${hit.accession}`;
}

/**
 * Group hits by protein (family, subfamily, accession) in one pass.
 * Groups come back in first-seen order.
 */
export function groupHitsByProtein(hits: Iterable<RawHit>): ProteinHits[] {
  const groups = new Map<string, { familyId: string; systemId: string; accession: string; hits: RawHit[] }>();

  for (const hit of hits) {
    const key = proteinKey(hit);
    const group = groups.get(key);
    if (group) {
      group.hits.push(hit);
    } else {
      groups.set(key, {
        familyId: hit.familyId,
        systemId: hit.systemId,
        accession: hit.accession,
        hits: [hit],
      });
    }
  }

  return [...groups.values()];
}

/**
 * Group hits by family id, first-seen order.
 */
export function groupHitsByFamily(hits: Iterable<RawHit>): Map<string, RawHit[]> {
  const families = new Map<string, RawHit[]>();
  for (const hit of hits) {
    const list = families.get(hit.familyId) ?? [];
    list.push(hit);
    families.set(hit.familyId, list);
  }
  return families;
}

/**
 * Length carried by the protein's own records, if any.
 */
export function recordedLength(protein: ProteinHits): number | undefined {
  return protein.hits.find((hit) => hit.length !== undefined)?.length;
}

/**
 * Build the immutable System for one protein.
 *
 * @throws InvalidProteinLengthError when the length cannot hold the domains
 */
export function buildSystem(protein: ProteinHits, options: BuildSystemOptions): System {
  const length = options.length ?? recordedLength(protein);
  const domains = mergeDomains(protein.hits, { merge: options.merge });
  assertProteinLength(protein.accession, length, domains);

  const gaps = computeGaps(length, domains, protein.accession);
  const holes = retainHoles(gaps, options.holeMinimumLength);
  const uncoveredResidues = gaps.reduce((sum, gap) => sum + gap.length, 0);
  const covered = domains.reduce((sum, domain) => sum + intervalLength(domain), 0);

  return deepFreeze({
    familyId: protein.familyId,
    systemId: protein.systemId,
    accession: protein.accession,
    length,
    domains,
    holes,
    uncoveredResidues,
    coverage: length > 0 ? covered / length : 0,
  });
}
