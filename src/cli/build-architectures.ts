#!/usr/bin/env node
/**
 * CLI command to derive domain architectures for TC families.
 *
 * Reads either a CDD hit file or a directory of rescue TSVs, builds one
 * System per protein and one Family per family id, then writes:
 *   - <output>/<data>                      CSV, one row per system
 *   - <output>/architecture-{runId}.json   run report
 *
 * Usage:
 *   npx tsx src/cli/build-architectures.ts --cdd hits.tsv [options]
 *   npx tsx src/cli/build-architectures.ts --rescue rescued/ [options]
 *
 * Options:
 *   --cdd <path>             CDD hit file (records or rpsblast tabular)
 *   --rescue <dir>           Directory of <family>_rescuedDomains.tsv files
 *   --sequences <dir>        Directory of tcdb-{familyId}.faa files (protein lengths;
 *                            default: $DOMARCH_SEQUENCES_DIR)
 *   --families <list|path>   Comma-separated family ids, or a file with one per line
 *   --output <dir>           Output directory (default: output)
 *   --data <name>            CSV file name (default: architectures.csv)
 *   --merge <0|1>            Merge overlapping domains (default: 1)
 *   --hole-threshold <n>     Minimum hole length (default: 50)
 *   --char-threshold <x>     Characteristic-domain threshold in [0, 1] (default: 0.5)
 *   --min-score <x>          Rescue: minimum bitscore (default: 0)
 *   --rounds <list>          Rescue: accepted rounds, e.g. 1,2 (default: 0,1,2)
 *   --found-rate <x>         Rescue: minimum found rate of summarised domains (default: 0, off)
 *   --log-level <level>      debug, info, warn or error
 *   --json                   Print the run summary as JSON
 *   -h, --help               Show help
 *
 * Exit codes:
 *   0 - Run completed
 *   1 - Usage, configuration or input error
 */

import { existsSync, realpathSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";

import {
  InvalidThresholdError,
  type DomainSummary,
  type MalformedRecordError,
  type RawHit,
} from "../architecture/index.js";
import {
  ArchitectureConfigError,
  ConfigError,
  config as appConfig,
  defaultSequencesDir,
  isLogLevel,
  resolveArchitectureConfig,
  resolveLogLevel,
  validateConfig,
  type ArchitectureConfig,
} from "../config/index.js";
import {
  FamilyFilterError,
  InputFileError,
  loadFamilyLengths,
  parseFamilyIds,
  readCddFile,
  readRescueDirectory,
  writeArchitectureCsv,
} from "../io/index.js";
import { createLogger, initRunId, type Logger, type LogLevel } from "../logging/index.js";
import {
  createArchitectureReport,
  formatRunSummary,
  runArchitecturePipeline,
  saveArchitectureReport,
  type LengthSource,
  type PipelineResult,
} from "../pipeline/index.js";

// ============================================================
// Types
// ============================================================

export type InputSource = { mode: "standard"; cdd: string } | { mode: "rescue"; rescue: string };

export interface CliOptions {
  input: InputSource;
  sequences?: string;
  families?: string;
  output: string;
  data: string;
  json: boolean;
  logLevel?: LogLevel;
  overrides: Partial<ArchitectureConfig>;
}

export interface RunOutput {
  config: Readonly<ArchitectureConfig>;
  result: PipelineResult;
  csvPath: string;
  reportPath: string;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

// ============================================================
// CLI Parsing
// ============================================================

const HELP_TEXT = `
Usage: build-architectures (--cdd <path> | --rescue <dir>) [options]

Options:
  --cdd <path>             CDD hit file (records or rpsblast tabular)
  --rescue <dir>           Directory of <family>_rescuedDomains.tsv files
  --sequences <dir>        Directory of tcdb-{familyId}.faa files (protein lengths;
                           default: $DOMARCH_SEQUENCES_DIR)
  --families <list|path>   Comma-separated family ids, or a file with one per line
  --output <dir>           Output directory (default: output)
  --data <name>            CSV file name (default: architectures.csv)
  --merge <0|1>            Merge overlapping domains (default: 1)
  --hole-threshold <n>     Minimum hole length (default: 50)
  --char-threshold <x>     Characteristic-domain threshold in [0, 1] (default: 0.5)
  --min-score <x>          Rescue: minimum bitscore (default: 0)
  --rounds <list>          Rescue: accepted rounds, e.g. 1,2 (default: 0,1,2)
  --found-rate <x>         Rescue: minimum found rate of summarised domains (default: 0, off)
  --log-level <level>      debug, info, warn or error
  --json                   Print the run summary as JSON
  -h, --help               Show this help message
`;

function parseMergeFlag(value: string): boolean {
  const normalized = value.toLowerCase();
  if (["1", "true", "yes"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no"].includes(normalized)) {
    return false;
  }
  throw new CliUsageError(`--merge must be 0 or 1, got: ${value}`);
}

function parseRounds(value: string): number[] {
  const parts = value.split(",").map((part) => part.trim());
  if (!parts.every((part) => /^\d+$/.test(part))) {
    throw new CliUsageError(`--rounds must be a comma-separated list of integers, got: ${value}`);
  }
  return parts.map((part) => parseInt(part, 10));
}

/**
 * Numbers are passed through as parsed; range checks belong to the config schema.
 */
function parseNumber(flag: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || Number.isNaN(parsed)) {
    throw new CliUsageError(`${flag} must be a number, got: ${value}`);
  }
  return parsed;
}

const CLI_OPTIONS = {
  cdd: { type: "string" },
  rescue: { type: "string" },
  sequences: { type: "string" },
  families: { type: "string" },
  output: { type: "string", default: "output" },
  data: { type: "string", default: "architectures.csv" },
  merge: { type: "string" },
  "hole-threshold": { type: "string" },
  "char-threshold": { type: "string" },
  "min-score": { type: "string" },
  rounds: { type: "string" },
  "found-rate": { type: "string" },
  "log-level": { type: "string" },
  json: { type: "boolean", default: false },
  help: { type: "boolean", short: "h", default: false },
} as const;

function readArgs(argv: string[]) {
  return parseArgs({ args: argv, options: CLI_OPTIONS });
}

/**
 * Parse command-line arguments.
 *
 * @returns null when help was requested
 * @throws CliUsageError
 */
export function parseCliOptions(argv: string[]): CliOptions | null {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }
  const { values } = parsed;

  if (values.help) {
    return null;
  }

  let input: InputSource;
  if (values.cdd !== undefined && values.rescue !== undefined) {
    throw new CliUsageError("--cdd and --rescue are mutually exclusive");
  } else if (values.cdd !== undefined) {
    input = { mode: "standard", cdd: values.cdd };
  } else if (values.rescue !== undefined) {
    input = { mode: "rescue", rescue: values.rescue };
  } else {
    throw new CliUsageError("One of --cdd or --rescue is required");
  }

  const logLevel = values["log-level"];
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new CliUsageError(`--log-level must be debug, info, warn or error, got: ${logLevel}`);
  }

  const overrides: Partial<ArchitectureConfig> = {};
  if (values.merge !== undefined) {
    overrides.mergeOverlappingDomains = parseMergeFlag(values.merge);
  }
  if (values["hole-threshold"] !== undefined) {
    overrides.holeMinimumLength = parseNumber("--hole-threshold", values["hole-threshold"]);
  }
  if (values["char-threshold"] !== undefined) {
    overrides.characteristicThreshold = parseNumber("--char-threshold", values["char-threshold"]);
  }
  if (values["min-score"] !== undefined) {
    overrides.rescueMinimumScore = parseNumber("--min-score", values["min-score"]);
  }
  if (values.rounds !== undefined) {
    overrides.rescueAcceptedRounds = parseRounds(values.rounds);
  }
  if (values["found-rate"] !== undefined) {
    overrides.rescueMinimumFoundRate = parseNumber("--found-rate", values["found-rate"]);
  }

  return {
    input,
    sequences: values.sequences ?? defaultSequencesDir(),
    families: values.families,
    output: values.output,
    data: values.data,
    json: values.json,
    logLevel,
    overrides,
  };
}

// ============================================================
// Run
// ============================================================

interface InputRead {
  hits: RawHit[];
  issues: MalformedRecordError[];
  domainSummaries?: Map<string, DomainSummary[]>;
}

function readInput(input: InputSource, families: readonly string[]): InputRead {
  if (input.mode === "standard") {
    const { hits, issues } = readCddFile(input.cdd);
    return { hits, issues };
  }

  const files = readRescueDirectory(input.rescue, families);
  const domainSummaries = new Map<string, DomainSummary[]>();
  for (const file of files) {
    const summaries = domainSummaries.get(file.familyId) ?? [];
    summaries.push(...file.domainSummaries);
    domainSummaries.set(file.familyId, summaries);
  }
  return {
    hits: files.flatMap((file) => file.hits),
    issues: files.flatMap((file) => file.issues),
    domainSummaries,
  };
}

/**
 * Resolve configuration, read the input, build every family and write the
 * CSV and JSON report.
 *
 * @throws ConfigError | ArchitectureConfigError | InputFileError | FamilyFilterError
 */
export function executeRun(options: CliOptions, runId: string, logger: Logger): RunOutput {
  const config = resolveArchitectureConfig(options.overrides);
  logger.info("Configuration loaded", { ...config });

  const families = options.families !== undefined ? parseFamilyIds(options.families) : [];
  const { hits, issues, domainSummaries } = readInput(options.input, families);
  logger.info("Input read", {
    mode: options.input.mode,
    hits: hits.length,
    skippedRecords: issues.length,
  });

  const sequences = options.sequences;
  const lengths: LengthSource | undefined =
    sequences !== undefined
      ? (familyId) => {
          const found = loadFamilyLengths(sequences, familyId);
          if (found === null) {
            logger.warn("No sequence file for family", { familyId, directory: sequences });
          }
          return found;
        }
      : undefined;

  const result = runArchitecturePipeline(
    { mode: options.input.mode, hits, issues, lengths, families, domainSummaries },
    { config, logger }
  );

  const csvPath = writeArchitectureCsv(
    join(options.output, options.data),
    result.families.flatMap((family) => family.systems)
  );
  const reportPath = saveArchitectureReport(
    createArchitectureReport(result, config, runId),
    options.output
  );
  logger.info("Output written", { csvPath, reportPath });

  return { config, result, csvPath, reportPath };
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  green: "\x1b[32m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function describeError(err: unknown): string | null {
  if (err instanceof ArchitectureConfigError) {
    return err.format();
  }
  if (
    err instanceof CliUsageError ||
    err instanceof ConfigError ||
    err instanceof InputFileError ||
    err instanceof FamilyFilterError ||
    err instanceof InvalidThresholdError
  ) {
    return err.message;
  }
  return null;
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const runId = initRunId();

  let options: CliOptions | null;
  try {
    options = parseCliOptions(process.argv.slice(2));
  } catch (err) {
    console.error(c("red", `Error: ${describeError(err) ?? String(err)}`));
    console.error(HELP_TEXT);
    process.exit(1);
  }

  if (options === null) {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  try {
    validateConfig();
    const logger = createLogger({
      level: options.logLevel ?? resolveLogLevel(),
      logDir: appConfig.logDir,
    });
    logger.info("Run starting", { runId, mode: options.input.mode });

    const { result, csvPath, reportPath } = executeRun(options, runId, logger);

    if (options.json) {
      console.log(JSON.stringify({ runId, csvPath, reportPath, summary: result.summary }, null, 2));
    } else {
      console.log(formatRunSummary(result.summary));
      console.log(c("green", `✓ CSV:    ${csvPath}`));
      console.log(c("green", `✓ Report: ${reportPath}`));
    }
    process.exit(0);
  } catch (err) {
    const message = describeError(err);
    if (message === null) {
      throw err;
    }
    console.error(c("red", `Error: ${message}`));
    process.exit(1);
  }
}

/**
 * Whether the script node was started with is this module, following
 * symlinks such as an npm bin link.
 */
export function isMainModule(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (scriptPath === undefined || !existsSync(scriptPath)) {
    return false;
  }
  return realpathSync(scriptPath) === realpathSync(fileURLToPath(moduleUrl));
}

// Only run when executed directly (not imported by tests)
if (isMainModule(process.argv[1], import.meta.url)) {
  main().catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(c("red", `Unexpected error: ${message}`));
    process.exit(1);
  });
}
