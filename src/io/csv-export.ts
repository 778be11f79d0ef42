/**
 * CSV export of system architectures.
 *
 * One row per system:
 *
 *   Accession,Length,Family,Subfamily,Domains,Separators
 *
 * Domains and Separators hold list-of-tuple literals that downstream tooling
 * evaluates as plain literals:
 *
 *   Domains     [('CDD1', 11, 40, 1e-05), ...]   1-based inclusive coordinates
 *   Separators  [('BEGIN→CDD1', 0, 10), ...]     0-based hole boundaries
 *
 * Fields are quoted only when needed; rows end in CRLF.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { Domain, Hole, System } from "../architecture/index.js";

export const CSV_HEADERS = ["Accession", "Length", "Family", "Subfamily", "Domains", "Separators"] as const;

const CSV_LINE_END = "\r\n";

// ═══════════════════════════════════════════════════════════════════════════
// LITERAL RENDERING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Render a float in literal notation: shortest round-trip digits, exponent
 * form below 1e-4 or from 1e16 up, ".0" on integral values.
 */
export function formatLiteralFloat(value: number): string {
  if (Number.isNaN(value)) {
    return "nan";
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? "inf" : "-inf";
  }
  if (value === 0) {
    return Object.is(value, -0) ? "-0.0" : "0.0";
  }

  const [mantissa = "", exponentText = "0"] = value.toExponential().split("e");
  const exponent = Number(exponentText);

  if (exponent < -4 || exponent >= 16) {
    const sign = exponent < 0 ? "-" : "+";
    const digits = String(Math.abs(exponent)).padStart(2, "0");
    return `${mantissa}e${sign}${digits}`;
  }

  const text = String(value);
  return text.includes(".") ? text : `${text}.0`;
}

export function formatLiteralString(value: string): string {
  const escaped = value.replace(/\\/g, "\\\\");
  if (value.includes("'") && !value.includes('"')) {
    return `"${escaped}"`;
  }
  return `'${escaped.replace(/'/g, "\\'")}'`;
}

type LiteralValue = string | number | null;

function formatLiteral(value: LiteralValue, integral: boolean): string {
  if (value === null) {
    return "None";
  }
  if (typeof value === "string") {
    return formatLiteralString(value);
  }
  return integral ? String(value) : formatLiteralFloat(value);
}

function formatTupleList(tuples: readonly string[][]): string {
  return `[${tuples.map((items) => `(${items.join(", ")})`).join(", ")}]`;
}

export function formatDomains(domains: readonly Domain[]): string {
  return formatTupleList(
    domains.map((domain) => [
      formatLiteral(domain.domainId, false),
      formatLiteral(domain.start + 1, true),
      formatLiteral(domain.end, true),
      formatLiteral(domain.evalue, false),
    ])
  );
}

export function formatSeparators(holes: readonly Hole[]): string {
  return formatTupleList(
    holes.map((hole) => [
      formatLiteral(hole.label, false),
      formatLiteral(hole.start, true),
      formatLiteral(hole.end, true),
    ])
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// CSV
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Quote a field only if it contains a delimiter, quote or line break.
 */
export function escapeCsvField(field: string): string {
  if (/[",\r\n]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}

export function systemToCsvRow(system: System): string[] {
  return [
    system.accession,
    String(system.length),
    system.familyId,
    system.systemId,
    formatDomains(system.domains),
    formatSeparators(system.holes),
  ];
}

export function renderCsv(systems: Iterable<System>): string {
  const rows: string[][] = [[...CSV_HEADERS]];
  for (const system of systems) {
    rows.push(systemToCsvRow(system));
  }
  return rows.map((row) => row.map(escapeCsvField).join(",") + CSV_LINE_END).join("");
}

/**
 * Write the CSV file, creating its directory if needed.
 *
 * @returns the path written
 */
export function writeArchitectureCsv(path: string, systems: Iterable<System>): string {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, renderCsv(systems), "utf-8");
  return path;
}
