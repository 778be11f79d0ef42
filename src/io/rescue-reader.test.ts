/**
 * Rescue directory reader tests.
 *
 * Run: node --import tsx --test src/io/rescue-reader.test.ts
 */

import { after, describe, test } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { basename, join } from "node:path";
import { tmpdir } from "node:os";

import { familyIdOfRescueFile, findRescueFiles, isRescueFile, readRescueDirectory } from "./rescue-reader.js";
import { InputFileError } from "./errors.js";

const workDir = mkdtempSync(join(tmpdir(), "domarch-rescue-"));

writeFileSync(
  join(workDir, "2.A.1_rescuedDomains.tsv"),
  "2.A.1\t2.A.1.1\tQ1:200\tPF9:1-50\t70\t1e-4\tDirectHit\n"
);
writeFileSync(
  join(workDir, "1.A.1_rescuedDomains.tsv"),
  "1.A.1\t1.A.1.1\tR1:300\tPF1:11-60\t80\t1e-5\tRescued2\nnot a record\n"
);
writeFileSync(join(workDir, "notes.txt"), "ignored");

after(() => {
  rmSync(workDir, { recursive: true, force: true });
});

describe("rescue files", () => {
  test("recognises the file name suffix", () => {
    assert.equal(isRescueFile("1.A.1_rescuedDomains.tsv"), true);
    assert.equal(isRescueFile("_rescuedDomains.tsv"), false);
    assert.equal(isRescueFile("1.A.1.tsv"), false);
    assert.equal(familyIdOfRescueFile("/data/1.A.1_rescuedDomains.tsv"), "1.A.1");
  });

  test("finds rescue files in name order", () => {
    assert.deepEqual(
      findRescueFiles(workDir).map((path) => basename(path)),
      ["1.A.1_rescuedDomains.tsv", "2.A.1_rescuedDomains.tsv"]
    );
  });

  test("reads every file with its issues", () => {
    const files = readRescueDirectory(workDir);
    assert.deepEqual(
      files.map((file) => [file.familyId, file.hits.length, file.issues.length]),
      [
        ["1.A.1", 1, 1],
        ["2.A.1", 1, 0],
      ]
    );
  });

  test("skipped records carry the file's family and path", () => {
    const [file] = readRescueDirectory(workDir, ["1.A.1"]);
    const issue = file?.issues[0];
    assert.equal(issue?.familyId, "1.A.1");
    assert.equal(issue?.source, join(workDir, "1.A.1_rescuedDomains.tsv"));
    assert.equal(issue?.line, 2);
  });

  test("restricts to the requested families", () => {
    const files = readRescueDirectory(workDir, ["2.A.1"]);
    assert.deepEqual(
      files.map((file) => file.familyId),
      ["2.A.1"]
    );
  });

  test("missing directory", () => {
    assert.throws(() => findRescueFiles(join(workDir, "absent")), InputFileError);
  });
});
