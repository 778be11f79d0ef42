/**
 * Lightweight logging utility.
 * Outputs to both console and log file with timestamps and run ID.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogContext = Record<string, unknown>;

/**
 * Receives every formatted entry that passes the level filter.
 */
export type LogSink = (level: LogLevel, entry: string) => void;

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable console output */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Additional destination, e.g. an in-memory buffer */
  sink?: LogSink;
  /** Context merged into every entry */
  context?: LogContext;
}

const DEFAULT_OPTIONS: Required<Omit<LoggerOptions, "sink" | "context">> = {
  level: "info",
  logDir: "output/logs",
  logFile: "domain-architecture.log",
  console: true,
  file: true,
};

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger writing to the same destinations with extra bound context */
  child(context: LogContext): Logger;
}

/**
 * Format a log entry with timestamp, level, run ID, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext
): string {
  const timestamp = new Date().toISOString();
  const runId = getRunId() ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${timestamp}] [${levelStr}] [${runId}] ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

/**
 * Get console method for log level.
 */
function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const logFilePath = join(opts.logDir, opts.logFile);

  // Ensure log directory exists
  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function write(level: LogLevel, entry: string): void {
    if (opts.console) {
      getConsoleMethod(level)(entry);
    }

    if (opts.file) {
      try {
        appendFileSync(logFilePath, entry + "\n");
      } catch (err) {
        // Fallback to console if file write fails
        console.error(`Failed to write to log file: ${err}`);
      }
    }

    opts.sink?.(level, entry);
  }

  function bind(bound: LogContext): Logger {
    function log(level: LogLevel, message: string, context?: LogContext): void {
      if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
        return;
      }
      write(level, formatLogEntry(level, message, { ...bound, ...context }));
    }

    return {
      debug: (message, context) => log("debug", message, context),
      info: (message, context) => log("info", message, context),
      warn: (message, context) => log("warn", message, context),
      error: (message, context) => log("error", message, context),
      child: (context) => bind({ ...bound, ...context }),
    };
  }

  return bind(options.context ?? {});
}

/**
 * Logger that records entries in memory only.
 */
export function createMemoryLogger(level: LogLevel = "debug"): Logger & {
  entries: { level: LogLevel; entry: string }[];
} {
  const entries: { level: LogLevel; entry: string }[] = [];
  const logger = createLogger({
    level,
    console: false,
    file: false,
    sink: (entryLevel, entry) => entries.push({ level: entryLevel, entry }),
  });
  return { ...logger, entries };
}
