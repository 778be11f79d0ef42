/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, optionalEnv, optionalEnvBool } from "./env.js";
import type { LogLevel } from "../logging/logger.js";

export { ConfigError } from "./env.js";

// Re-export architecture configuration module
export * from "./architecture/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Application name */
  readonly appName: string;
  /** Directory for log files */
  readonly logDir: string;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Load application configuration from the environment.
 */
export function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    appName: optionalEnv("APP_NAME", "domain-architecture"),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
  };
}

/** Environment variable naming the default protein sequences directory */
export const SEQUENCES_DIR_ENV = "DOMARCH_SEQUENCES_DIR";

/**
 * Sequences directory to use when none is given on the command line.
 */
export function defaultSequencesDir(): string | undefined {
  const directory = optionalEnv(SEQUENCES_DIR_ENV, "");
  return directory !== "" ? directory : undefined;
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Validate application configuration.
 * Call this at application startup to fail fast.
 */
export function validateConfig(appConfig: AppConfig = config): void {
  if (!["development", "production", "test"].includes(appConfig.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${appConfig.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(appConfig.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${appConfig.logLevel}. Must be debug, info, warn, or error.`
    );
  }
}

/**
 * Configured log level, or "debug" when DEBUG is set.
 *
 * @throws ConfigError if LOG_LEVEL is not a known level
 */
export function resolveLogLevel(appConfig: AppConfig = config): LogLevel {
  if (appConfig.debug) {
    return "debug";
  }
  if (!isLogLevel(appConfig.logLevel)) {
    throw new ConfigError(`Invalid LOG_LEVEL: ${appConfig.logLevel}.`);
  }
  return appConfig.logLevel;
}
