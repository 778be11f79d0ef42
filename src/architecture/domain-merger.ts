/**
 * Domain merger: resolves overlapping hits on one protein into an ordered,
 * non-overlapping domain list.
 *
 * Hits are swept left to right after a stable sort on (start asc, end desc),
 * so a hit that contains another is always seen first. Each incoming hit
 * either closes the open domain (no overlap) or is resolved against it:
 *
 *   merge ON   the open domain's end grows to cover both hits; it carries the
 *              identity of the more significant hit
 *   merge OFF  the less significant hit is dropped whole
 *
 * Significance is the e-value: smaller wins, a missing e-value loses to any
 * reported one, and exact ties keep the domain already open.
 */

import type { Domain } from "./model.js";

export interface MergeOptions {
  /** Extend overlapping domains (true) or drop the weaker hit (false). Default: true */
  merge?: boolean;
}

/**
 * Whether `a` is strictly more significant than `b`.
 */
export function isMoreSignificant(a: Domain, b: Domain): boolean {
  if (a.evalue === null) {
    return false;
  }
  if (b.evalue === null) {
    return true;
  }
  return a.evalue < b.evalue;
}

function toDomain(hit: Domain, start: number, end: number): Domain {
  return {
    domainId: hit.domainId,
    start,
    end,
    evalue: hit.evalue,
    ...(hit.bitscore !== undefined ? { bitscore: hit.bitscore } : {}),
    ...(hit.rescueRound !== undefined ? { rescueRound: hit.rescueRound } : {}),
  };
}

/**
 * Order hits by start ascending, then end descending. Stable.
 */
export function sortHits<T extends Domain>(hits: readonly T[]): T[] {
  return [...hits].sort((a, b) => a.start - b.start || b.end - a.end);
}

/**
 * Resolve the hits of one protein into its final domain list.
 */
export function mergeDomains(hits: readonly Domain[], options: MergeOptions = {}): Domain[] {
  const { merge = true } = options;
  const sorted = sortHits(hits);
  const first = sorted[0];
  if (first === undefined) {
    return [];
  }

  const result: Domain[] = [];
  let current = toDomain(first, first.start, first.end);

  for (const hit of sorted.slice(1)) {
    if (hit.start >= current.end) {
      result.push(current);
      current = toDomain(hit, hit.start, hit.end);
      continue;
    }

    const incomingWins = isMoreSignificant(hit, current);

    if (merge) {
      const end = Math.max(current.end, hit.end);
      current = toDomain(incomingWins ? hit : current, current.start, end);
    } else if (incomingWins) {
      current = toDomain(hit, hit.start, hit.end);
    }
  }

  result.push(current);
  return result;
}

/**
 * Whether a domain list is sorted by start and pairwise non-overlapping.
 */
export function isResolved(domains: readonly Domain[]): boolean {
  for (let i = 1; i < domains.length; i++) {
    const previous = domains[i - 1];
    const next = domains[i];
    if (previous === undefined || next === undefined || previous.end > next.start) {
      return false;
    }
  }
  return true;
}
