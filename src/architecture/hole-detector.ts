/**
 * Hole detector: gaps between a protein's resolved domains.
 *
 * computeGaps() returns every gap, so that domains + gaps always partition
 * [0, length). retainHoles() is the one place that decides which gaps are
 * long enough to be reported as holes; nothing else drops gaps.
 */

import { InvalidProteinLengthError } from "./errors.js";
import { BEGIN_LABEL, END_LABEL, type Domain, type Hole } from "./model.js";

export function holeLabel(left: string, right: string): string {
  return `${left}→${right}`;
}

function makeHole(label: string, start: number, end: number): Hole {
  return { label, start, end, length: end - start };
}

/**
 * Reject lengths that cannot hold the given domains.
 */
export function assertProteinLength(
  accession: string,
  length: number | undefined,
  domains: readonly Domain[]
): asserts length is number {
  if (length === undefined || !Number.isFinite(length)) {
    if (domains.length > 0) {
      throw new InvalidProteinLengthError(accession, length, "length is unknown but domains exist");
    }
    throw new InvalidProteinLengthError(accession, length, "length is unknown");
  }
  if (!Number.isInteger(length) || length < 0) {
    throw new InvalidProteinLengthError(accession, length, "length must be a non-negative integer");
  }
  if (length === 0 && domains.length > 0) {
    throw new InvalidProteinLengthError(accession, length, "length is zero but domains exist");
  }
  const last = domains[domains.length - 1];
  if (last !== undefined && last.end > length) {
    throw new InvalidProteinLengthError(
      accession,
      length,
      `domain ${last.domainId} ends at ${last.end}, past the protein end`
    );
  }
}

/**
 * Every gap of a protein, in order, before any suppression.
 *
 * @param domains - sorted, non-overlapping (mergeDomains output)
 * @throws InvalidProteinLengthError
 */
export function computeGaps(
  length: number | undefined,
  domains: readonly Domain[],
  accession = "(protein)"
): Hole[] {
  assertProteinLength(accession, length, domains);

  const first = domains[0];
  const last = domains[domains.length - 1];
  if (first === undefined || last === undefined) {
    return length > 0 ? [makeHole(holeLabel(BEGIN_LABEL, END_LABEL), 0, length)] : [];
  }

  const gaps: Hole[] = [];

  if (first.start > 0) {
    gaps.push(makeHole(holeLabel(BEGIN_LABEL, first.domainId), 0, first.start));
  }

  for (let i = 1; i < domains.length; i++) {
    const previous = domains[i - 1];
    const next = domains[i];
    if (previous !== undefined && next !== undefined && next.start > previous.end) {
      gaps.push(makeHole(holeLabel(previous.domainId, next.domainId), previous.end, next.start));
    }
  }

  if (last.end < length) {
    gaps.push(makeHole(holeLabel(last.domainId, END_LABEL), last.end, length));
  }

  return gaps;
}

/**
 * Hole suppression policy: a gap is a hole only if it is strictly longer
 * than the minimum length.
 */
export function retainHoles(gaps: readonly Hole[], minimumLength: number): Hole[] {
  return gaps.filter((gap) => gap.length > minimumLength);
}

/**
 * Holes of a protein after suppression.
 */
export function detectHoles(
  length: number | undefined,
  domains: readonly Domain[],
  minimumLength: number,
  accession?: string
): Hole[] {
  return retainHoles(computeGaps(length, domains, accession), minimumLength);
}
