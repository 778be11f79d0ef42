/**
 * JSON run report.
 *
 * Every run can write `architecture-{runId}.json` next to its CSV, holding
 * the configuration the run used, the run summary and every family with its
 * statistics and systems. The file name shares the run ID with the log file
 * entries of the same run.
 */

import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type {
  DomainStatistics,
  Family,
  RescueCall,
  RescueFilter,
  System,
} from "../architecture/index.js";
import type { ArchitectureConfig } from "../config/index.js";
import type { PipelineResult, RunSummary } from "./run.js";

export const REPORT_VERSION = "1.0.0";

export interface FamilyStatisticsJson {
  systemCount: number;
  averageLength: number;
  totalDomains: number;
  domainCounts: Record<string, number>;
  domainFrequencies: Record<string, number>;
  characteristicDomains: string[];
  domainStatistics: Record<string, DomainStatistics>;
  threshold: number;
}

export interface FamilyJson {
  familyId: string;
  mode: Family["mode"];
  statistics: FamilyStatisticsJson;
  rescueFilter?: RescueFilter;
  rescueEvidence?: Record<string, readonly RescueCall[]>;
  systems: readonly System[];
}

export interface ArchitectureReport {
  reportVersion: string;
  runId: string;
  generatedAt: string;
  config: Readonly<ArchitectureConfig>;
  summary: RunSummary;
  families: FamilyJson[];
}

/**
 * Plain-object form of a Family (Maps become objects, insertion order kept).
 */
export function familyToJson(family: Family): FamilyJson {
  const { statistics } = family;
  return {
    familyId: family.familyId,
    mode: family.mode,
    statistics: {
      systemCount: statistics.systemCount,
      averageLength: statistics.averageLength,
      totalDomains: statistics.totalDomains,
      domainCounts: Object.fromEntries(statistics.domainCounts),
      domainFrequencies: Object.fromEntries(statistics.domainFrequencies),
      characteristicDomains: [...statistics.characteristicDomains],
      domainStatistics: Object.fromEntries(statistics.domainStatistics),
      threshold: statistics.threshold,
    },
    ...(family.rescueFilter !== undefined ? { rescueFilter: family.rescueFilter } : {}),
    ...(family.rescueEvidence !== undefined
      ? { rescueEvidence: Object.fromEntries(family.rescueEvidence) }
      : {}),
    systems: family.systems,
  };
}

export function createArchitectureReport(
  result: PipelineResult,
  config: Readonly<ArchitectureConfig>,
  runId: string,
  generatedAt: Date = new Date()
): ArchitectureReport {
  return {
    reportVersion: REPORT_VERSION,
    runId,
    generatedAt: generatedAt.toISOString(),
    config,
    summary: result.summary,
    families: result.families.map(familyToJson),
  };
}

export function serializeArchitectureReport(report: ArchitectureReport, pretty = true): string {
  return JSON.stringify(report, null, pretty ? 2 : undefined);
}

/**
 * @returns Filename in format "architecture-{runId}.json"
 */
export function getReportFilename(runId: string): string {
  return `architecture-${runId}.json`;
}

/**
 * Save a report to a file.
 *
 * @returns Full path to the saved file
 */
export function saveArchitectureReport(
  report: ArchitectureReport,
  directory: string,
  filename?: string
): string {
  const name = filename ?? getReportFilename(report.runId);
  const filePath = join(directory, name);

  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }

  writeFileSync(filePath, serializeArchitectureReport(report), "utf-8");
  return filePath;
}
