/**
 * CSV export tests.
 *
 * Run: node --import tsx --test src/io/csv-export.test.ts
 */

import { after, describe, test } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  escapeCsvField,
  formatDomains,
  formatLiteralFloat,
  formatLiteralString,
  formatSeparators,
  renderCsv,
  systemToCsvRow,
  writeArchitectureCsv,
} from "./csv-export.js";
import type { System } from "../architecture/index.js";

const SYSTEM: System = {
  familyId: "1.A.1",
  systemId: "1.A.1.1",
  accession: "P1",
  length: 100,
  domains: [{ domainId: "X", start: 10, end: 60, evalue: 1e-8 }],
  holes: [
    { label: "BEGIN→X", start: 0, end: 10, length: 10 },
    { label: "X→END", start: 60, end: 100, length: 40 },
  ],
  uncoveredResidues: 50,
  coverage: 0.5,
};

const workDir = mkdtempSync(join(tmpdir(), "domarch-csv-"));

after(() => {
  rmSync(workDir, { recursive: true, force: true });
});

describe("formatLiteralFloat", () => {
  test("small values use a two-digit exponent", () => {
    assert.equal(formatLiteralFloat(1e-5), "1e-05");
    assert.equal(formatLiteralFloat(1.5e-10), "1.5e-10");
    assert.equal(formatLiteralFloat(2.5e-100), "2.5e-100");
  });

  test("mid-range values are plain decimals", () => {
    assert.equal(formatLiteralFloat(0.001), "0.001");
    assert.equal(formatLiteralFloat(0.0001), "0.0001");
    assert.equal(formatLiteralFloat(123.456), "123.456");
  });

  test("integral values keep a trailing .0", () => {
    assert.equal(formatLiteralFloat(2), "2.0");
    assert.equal(formatLiteralFloat(0), "0.0");
    assert.equal(formatLiteralFloat(-3), "-3.0");
  });

  test("large values switch to exponent form at 1e16", () => {
    assert.equal(formatLiteralFloat(1e15), "1000000000000000.0");
    assert.equal(formatLiteralFloat(1e16), "1e+16");
  });

  test("non-finite values", () => {
    assert.equal(formatLiteralFloat(Number.NaN), "nan");
    assert.equal(formatLiteralFloat(Number.POSITIVE_INFINITY), "inf");
  });
});

describe("literal rendering", () => {
  test("strings are single-quoted unless they hold a single quote", () => {
    assert.equal(formatLiteralString("abc"), "'abc'");
    assert.equal(formatLiteralString("it's"), `"it's"`);
  });

  test("domains use 1-based inclusive coordinates", () => {
    assert.equal(formatDomains(SYSTEM.domains), "[('X', 11, 60, 1e-08)]");
  });

  test("unknown e-value renders as None", () => {
    assert.equal(
      formatDomains([{ domainId: "Y", start: 0, end: 5, evalue: null }]),
      "[('Y', 1, 5, None)]"
    );
  });

  test("separators keep hole boundaries", () => {
    assert.equal(formatSeparators(SYSTEM.holes), "[('BEGIN→X', 0, 10), ('X→END', 60, 100)]");
  });

  test("empty lists", () => {
    assert.equal(formatDomains([]), "[]");
    assert.equal(formatSeparators([]), "[]");
  });
});

describe("CSV", () => {
  test("quotes only fields that need it", () => {
    assert.equal(escapeCsvField("plain"), "plain");
    assert.equal(escapeCsvField("a,b"), '"a,b"');
    assert.equal(escapeCsvField('a"b'), '"a""b"');
  });

  test("row columns", () => {
    assert.deepEqual(systemToCsvRow(SYSTEM), [
      "P1",
      "100",
      "1.A.1",
      "1.A.1.1",
      "[('X', 11, 60, 1e-08)]",
      "[('BEGIN→X', 0, 10), ('X→END', 60, 100)]",
    ]);
  });

  test("renders header and rows with CRLF", () => {
    assert.equal(
      renderCsv([SYSTEM]),
      "Accession,Length,Family,Subfamily,Domains,Separators\r\n" +
        `P1,100,1.A.1,1.A.1.1,"[('X', 11, 60, 1e-08)]","[('BEGIN→X', 0, 10), ('X→END', 60, 100)]"\r\n`
    );
  });

  test("writes the file, creating its directory", () => {
    const path = writeArchitectureCsv(join(workDir, "out", "data.csv"), [SYSTEM]);
    assert.equal(readFileSync(path, "utf-8"), renderCsv([SYSTEM]));
  });
});
