/**
 * Run orchestration and reporting.
 */

export {
  runArchitecturePipeline,
  formatRunSummary,
  rescueFilterOf,
  type LengthSource,
  type PipelineInput,
  type PipelineOptions,
  type PipelineResult,
  type ExcludedProtein,
  type FamilySummary,
  type RunSummary,
} from "./run.js";

export {
  REPORT_VERSION,
  familyToJson,
  createArchitectureReport,
  serializeArchitectureReport,
  getReportFilename,
  saveArchitectureReport,
  type ArchitectureReport,
  type FamilyJson,
  type FamilyStatisticsJson,
} from "./serialization.js";
