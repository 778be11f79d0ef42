/**
 * Domain architecture derivation for transporter families.
 *
 * Library entry point. The command-line tool lives in
 * src/cli/build-architectures.ts.
 */

export * from "./architecture/index.js";
export * from "./io/index.js";
export * from "./pipeline/index.js";
export {
  config,
  loadConfig,
  validateConfig,
  resolveLogLevel,
  isLogLevel,
  ConfigError,
  ArchitectureConfigSchema,
  ArchitectureConfigError,
  DEFAULT_ARCHITECTURE_CONFIG,
  ARCHITECTURE_ENV,
  loadArchitectureConfig,
  validateArchitectureConfig,
  architectureConfigFromEnv,
  resolveArchitectureConfig,
  type AppConfig,
  type ArchitectureConfig,
  type ConfigValidationIssue,
} from "./config/index.js";
export {
  createLogger,
  createMemoryLogger,
  generateRunId,
  initRunId,
  getRunId,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logging/index.js";
