/**
 * Family aggregator tests.
 *
 * Run: node --import tsx --test src/architecture/family-aggregator.test.ts
 *
 * Covers:
 *   1. Standard statistics and the characteristic-domain rule
 *   2. Builder lifecycle (threshold check, family check, build once)
 *   3. Rescue filtering, earliest-round selection and evidence
 *   4. Score monotonicity in rescue mode
 *   5. Per-domain statistics
 *   6. Found-rate prefilter for summarised rescue domains
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";

import {
  FamilyBuilder,
  RescueFamilyBuilder,
  aggregateFamily,
  computeFoundRates,
  filterByFoundRate,
  selectRescueHits,
  systemsWithDomain,
} from "./family-aggregator.js";
import { buildSystem, groupHitsByProtein } from "./system-builder.js";
import { EmptyFamilyWarning, InvalidThresholdError } from "./errors.js";
import type { RawHit, RescueFilter, System } from "./model.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

function system(accession: string, length: number, domainIds: string[], familyId = "1.A.1"): System {
  return {
    familyId,
    systemId: `${familyId}.1`,
    accession,
    length,
    domains: domainIds.map((domainId, i) => ({
      domainId,
      start: i * 10,
      end: i * 10 + 5,
      evalue: null,
    })),
    holes: [],
    uncoveredResidues: 0,
    coverage: 0,
  };
}

const FOUR_SYSTEMS = [
  system("S1", 100, ["D1", "D2"]),
  system("S2", 200, ["D1"]),
  system("S3", 300, ["D1"]),
  system("S4", 400, ["D3"]),
];

function rescueHit(
  accession: string,
  domainId: string,
  start: number,
  end: number,
  bitscore: number,
  rescueRound: number
): RawHit {
  return {
    familyId: "1.A.1",
    systemId: "1.A.1.1",
    accession,
    length: 300,
    domainId,
    start,
    end,
    evalue: 1e-5,
    bitscore,
    rescueRound,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// STANDARD MODE
// ═══════════════════════════════════════════════════════════════════════════

describe("standard family statistics", () => {
  test("counts systems per domain and derives frequencies", () => {
    const { family, warnings } = aggregateFamily("1.A.1", FOUR_SYSTEMS, { threshold: 0.5 });
    const stats = family.statistics;

    assert.equal(stats.systemCount, 4);
    assert.equal(stats.averageLength, 250);
    assert.equal(stats.totalDomains, 5);
    assert.deepEqual([...stats.domainCounts], [
      ["D1", 3],
      ["D2", 1],
      ["D3", 1],
    ]);
    assert.equal(stats.domainFrequencies.get("D1"), 0.75);
    assert.equal(stats.domainFrequencies.get("D2"), 0.25);
    assert.deepEqual(stats.characteristicDomains, ["D1"]);
    assert.deepEqual(warnings, []);
  });

  test("a higher threshold leaves no characteristic domain", () => {
    const { family } = aggregateFamily("1.A.1", FOUR_SYSTEMS, { threshold: 0.8 });
    assert.deepEqual(family.statistics.characteristicDomains, []);
  });

  test("frequency equal to the threshold is characteristic", () => {
    const { family } = aggregateFamily(
      "1.A.1",
      [system("S1", 10, ["A"]), system("S2", 10, ["A"]), system("S3", 10, ["B"]), system("S4", 10, ["B"])],
      { threshold: 0.5 }
    );
    assert.deepEqual(family.statistics.characteristicDomains, ["A", "B"]);
  });

  test("a domain repeated within one system counts once", () => {
    const { family } = aggregateFamily("1.A.1", [system("S1", 10, ["A", "A"])], { threshold: 0.5 });
    assert.equal(family.statistics.domainCounts.get("A"), 1);
    assert.equal(family.statistics.totalDomains, 2);
  });

  test("empty input gives an empty family without warnings", () => {
    const { family, warnings } = aggregateFamily("1.A.1", [], { threshold: 0.5 });
    assert.equal(family.statistics.systemCount, 0);
    assert.equal(family.statistics.averageLength, 0);
    assert.equal(family.statistics.domainCounts.size, 0);
    assert.deepEqual(family.statistics.characteristicDomains, []);
    assert.deepEqual(warnings, []);
  });

  test("characteristic set agrees with frequencies", () => {
    for (const threshold of [0, 0.25, 0.5, 0.75, 1]) {
      const { family } = aggregateFamily("1.A.1", FOUR_SYSTEMS, { threshold });
      const stats = family.statistics;
      for (const [id, frequency] of stats.domainFrequencies) {
        assert.equal(stats.characteristicDomains.includes(id), frequency >= threshold);
      }
    }
  });
});

describe("FamilyBuilder lifecycle", () => {
  test("rejects thresholds outside [0, 1]", () => {
    for (const threshold of [-0.1, 1.5, Number.NaN]) {
      assert.throws(() => new FamilyBuilder("1.A.1", { threshold }), InvalidThresholdError);
    }
  });

  test("rejects a system from another family", () => {
    const builder = new FamilyBuilder("1.A.1", { threshold: 0.5 });
    assert.throws(() => builder.add(system("Q1", 10, ["A"], "2.A.1")), /belongs to family 2\.A\.1/);
  });

  test("builds once and then refuses more systems", () => {
    const builder = new FamilyBuilder("1.A.1", { threshold: 0.5 });
    builder.add(FOUR_SYSTEMS[0] ?? system("S1", 10, []));
    const first = builder.build();

    assert.equal(builder.build(), first);
    assert.equal(builder.isBuilt, true);
    assert.throws(() => builder.add(system("S9", 10, ["A"])), /already been built/);
  });

  test("the built family is frozen", () => {
    const { family } = aggregateFamily("1.A.1", FOUR_SYSTEMS, { threshold: 0.5 });
    assert.equal(Object.isFrozen(family), true);
    assert.equal(Object.isFrozen(family.statistics), true);
    assert.equal(Object.isFrozen(family.systems), true);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// RESCUE MODE
// ═══════════════════════════════════════════════════════════════════════════

describe("selectRescueHits", () => {
  const hits = [rescueHit("R1", "PF1", 0, 50, 80, 2), rescueHit("R1", "PF1", 10, 60, 95, 1)];

  test("drops hits under the score and keeps accepted rounds", () => {
    const selected = selectRescueHits(hits, { minimumScore: 90, acceptedRounds: [1, 2] });
    assert.deepEqual(selected, [hits[1]]);
  });

  test("keeps only the earliest qualifying round per domain", () => {
    const selected = selectRescueHits(hits, { minimumScore: 50, acceptedRounds: [1, 2] });
    assert.deepEqual(selected, [hits[1]]);
  });

  test("rounds outside the accepted set never count", () => {
    const selected = selectRescueHits(hits, { minimumScore: 0, acceptedRounds: [2] });
    assert.deepEqual(selected, [hits[0]]);
  });

  test("hits without a bitscore pass only when no positive score is required", () => {
    const bare: RawHit = { ...rescueHit("R1", "PF1", 0, 50, 0, 1), bitscore: undefined };
    assert.deepEqual(selectRescueHits([bare], { minimumScore: 0, acceptedRounds: [1] }), [bare]);
    assert.deepEqual(selectRescueHits([bare], { minimumScore: 1, acceptedRounds: [1] }), []);
  });
});

describe("RescueFamilyBuilder", () => {
  function buildRescue(hits: RawHit[], filter: RescueFilter, threshold = 0.5) {
    const builder = new RescueFamilyBuilder("1.A.1", { threshold, filter });
    for (const protein of groupHitsByProtein(hits)) {
      const selected = selectRescueHits(protein.hits, filter);
      if (selected.length === 0) {
        continue;
      }
      builder.add(buildSystem({ ...protein, hits: selected }, { holeMinimumLength: 50 }), selected);
    }
    return builder.build();
  }

  test("records the call that was counted", () => {
    const filter = { minimumScore: 90, acceptedRounds: [1, 2] };
    const { family, warnings } = buildRescue(
      [rescueHit("R1", "PF1", 0, 50, 80, 2), rescueHit("R1", "PF1", 10, 60, 95, 1)],
      filter
    );

    assert.equal(family.mode, "rescue");
    assert.equal(family.statistics.domainCounts.get("PF1"), 1);
    assert.deepEqual(family.rescueEvidence?.get("PF1"), [{ accession: "R1", round: 1, bitscore: 95 }]);
    assert.deepEqual(family.rescueFilter, filter);
    assert.deepEqual(warnings, []);
  });

  test("a counted hit without a bitscore is recorded with a null score", () => {
    const bare: RawHit = { ...rescueHit("R1", "PF1", 0, 50, 0, 1), bitscore: undefined };
    const { family } = buildRescue([bare], { minimumScore: 0, acceptedRounds: [1] });
    assert.deepEqual(family.rescueEvidence?.get("PF1"), [{ accession: "R1", round: 1, bitscore: null }]);
  });

  test("domain statistics come from the selected hits", () => {
    const { family } = buildRescue(
      [rescueHit("R1", "PF1", 0, 50, 95, 1), rescueHit("R1", "PF1", 10, 60, 80, 2)],
      { minimumScore: 0, acceptedRounds: [1, 2] }
    );
    assert.deepEqual(family.statistics.domainStatistics.get("PF1"), {
      count: 1,
      averageLength: 50,
      averageBitscore: 95,
      systems: [{ systemId: "1.A.1.1", accession: "R1" }],
    });
  });

  test("a system without qualifying hits is not added", () => {
    const builder = new RescueFamilyBuilder("1.A.1", {
      threshold: 0.5,
      filter: { minimumScore: 0, acceptedRounds: [0] },
    });
    assert.equal(builder.add(system("R1", 100, ["PF1"]), []), false);
    assert.equal(builder.size, 0);
  });

  test("an empty rescue family returns a warning", () => {
    const { family, warnings } = buildRescue([rescueHit("R1", "PF1", 0, 50, 10, 1)], {
      minimumScore: 1000,
      acceptedRounds: [1],
    });

    assert.equal(family.systems.length, 0);
    assert.equal(warnings.length, 1);
    assert.ok(warnings[0] instanceof EmptyFamilyWarning);
    assert.equal(warnings[0]?.familyId, "1.A.1");
  });

  test("raising the minimum score never raises a count", () => {
    const hits = [
      rescueHit("R1", "PF1", 0, 50, 95, 1),
      rescueHit("R1", "PF2", 100, 150, 60, 2),
      rescueHit("R2", "PF1", 0, 50, 70, 0),
      rescueHit("R2", "PF1", 5, 40, 120, 2),
      rescueHit("R3", "PF2", 100, 150, 85, 1),
      rescueHit("R3", "PF3", 200, 260, 40, 1),
    ];

    let previous: ReadonlyMap<string, number> | null = null;
    for (const minimumScore of [0, 50, 80, 100, 130]) {
      const { family } = buildRescue(hits, { minimumScore, acceptedRounds: [0, 1, 2] });
      const counts = family.statistics.domainCounts;
      if (previous !== null) {
        for (const [id, count] of counts) {
          assert.ok(count <= (previous.get(id) ?? 0), `${id} rose at score ${minimumScore}`);
        }
      }
      previous = counts;
    }
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// PER-DOMAIN STATISTICS
// ═══════════════════════════════════════════════════════════════════════════

describe("per-domain statistics", () => {
  const withScores: System = {
    ...system("S1", 100, []),
    domains: [
      { domainId: "X", start: 0, end: 30, evalue: null, bitscore: 50 },
      { domainId: "X", start: 40, end: 50, evalue: null, bitscore: 70 },
      { domainId: "Y", start: 60, end: 80, evalue: null },
    ],
  };
  const withoutScores: System = {
    ...system("S2", 100, []),
    domains: [{ domainId: "X", start: 0, end: 20, evalue: null }],
  };
  const { family } = aggregateFamily("1.A.1", [withScores, withoutScores], { threshold: 0.5 });

  test("average every occurrence and list the containing systems", () => {
    assert.deepEqual(family.statistics.domainStatistics.get("X"), {
      count: 2,
      averageLength: 20,
      averageBitscore: 60,
      systems: [
        { systemId: "1.A.1.1", accession: "S1" },
        { systemId: "1.A.1.1", accession: "S2" },
      ],
    });
    assert.deepEqual(family.statistics.domainStatistics.get("Y"), {
      count: 1,
      averageLength: 20,
      averageBitscore: null,
      systems: [{ systemId: "1.A.1.1", accession: "S1" }],
    });
  });

  test("count agrees with domainCounts", () => {
    for (const [id, stats] of family.statistics.domainStatistics) {
      assert.equal(stats.count, family.statistics.domainCounts.get(id));
    }
  });

  test("systemsWithDomain returns the containing systems in family order", () => {
    assert.deepEqual(
      systemsWithDomain(family, "X").map((s) => s.accession),
      ["S1", "S2"]
    );
    assert.deepEqual(
      systemsWithDomain(family, "Y").map((s) => s.accession),
      ["S1"]
    );
    assert.deepEqual(systemsWithDomain(family, "Z"), []);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// FOUND-RATE PREFILTER
// ═══════════════════════════════════════════════════════════════════════════

describe("found rates", () => {
  const hits = [
    rescueHit("P1", "PF1", 0, 50, 90, 0),
    rescueHit("P1", "PF1", 60, 90, 80, 1),
    rescueHit("P2", "PF1", 0, 50, 70, 2),
    rescueHit("P3", "PF2", 0, 40, 60, 1),
    rescueHit("P4", "PF9", 0, 40, 60, 0),
  ];
  const summaries = [
    { domainId: "PF1", total: 4 },
    { domainId: "PF2", total: 2 },
    { domainId: "PF3", total: 5 },
  ];

  test("count distinct proteins found directly or in the first round", () => {
    assert.deepEqual(computeFoundRates(hits, summaries), [
      { domainId: "PF1", found: 1, total: 4, rate: 0.25 },
      { domainId: "PF2", found: 1, total: 2, rate: 0.5 },
      { domainId: "PF3", found: 0, total: 5, rate: 0 },
    ]);
  });

  test("a zero total gives a zero rate", () => {
    assert.deepEqual(computeFoundRates(hits, [{ domainId: "PF2", total: 0 }]), [
      { domainId: "PF2", found: 1, total: 0, rate: 0 },
    ]);
  });

  test("keeps domains at or above the rate and drops unsummarised ones", () => {
    assert.deepEqual(filterByFoundRate(hits, summaries, 0.5), [hits[3]]);
    assert.deepEqual(filterByFoundRate(hits, summaries, 0.25), [hits[0], hits[1], hits[2], hits[3]]);
  });

  test("without summaries every hit is kept", () => {
    assert.deepEqual(filterByFoundRate(hits, [], 0.8), hits);
  });
});
