/**
 * Typed readers for DOMARCH_* and application environment variables.
 *
 * Every reader treats an unset or empty variable as absent and returns the
 * given default; a set but unparseable value is a ConfigError naming the
 * variable.
 */

import "dotenv/config";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function readEnv(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === "" ? undefined : value;
}

/**
 * String variable, or the default when unset.
 */
export function optionalEnv(key: string, defaultValue: string): string {
  return readEnv(key) ?? defaultValue;
}

/**
 * Integer variable (base 10).
 */
export function optionalEnvInt(key: string, defaultValue: number): number {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigError(`Environment variable ${key} must be a valid integer, got: ${value}`);
  }
  return parsed;
}

const TRUE_WORDS = ["true", "1", "yes"];
const FALSE_WORDS = ["false", "0", "no"];

/**
 * Boolean variable: true/false, 1/0 or yes/no, case-insensitive.
 */
export function optionalEnvBool(key: string, defaultValue: boolean): boolean {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const normalized = value.toLowerCase();
  if (TRUE_WORDS.includes(normalized)) {
    return true;
  }
  if (FALSE_WORDS.includes(normalized)) {
    return false;
  }
  throw new ConfigError(
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`
  );
}

/**
 * Finite number variable, e.g. a frequency threshold or a found rate.
 */
export function optionalEnvFloat(key: string, defaultValue: number): number {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

/**
 * Comma-separated list of non-negative integers, such as rescue rounds "0,1,2".
 */
export function optionalEnvIntList(key: string, defaultValue: number[]): number[] {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const parts = value.split(",").map((part) => part.trim());
  if (!parts.every((part) => /^\d+$/.test(part))) {
    throw new ConfigError(
      `Environment variable ${key} must be a comma-separated list of integers, got: ${value}`
    );
  }
  return parts.map((part) => parseInt(part, 10));
}
