/**
 * Architecture configuration loader and validator.
 *
 * Sources, lowest precedence first:
 *   1. DEFAULT_ARCHITECTURE_CONFIG
 *   2. DOMARCH_* environment variables (.env is loaded by dotenv)
 *   3. explicit overrides (CLI flags)
 */

import type { ZodIssue } from "zod";
import { deepFreeze } from "../../architecture/freeze.js";
import { optionalEnvBool, optionalEnvFloat, optionalEnvInt, optionalEnvIntList } from "../env.js";
import { ARCHITECTURE_ENV, DEFAULT_ARCHITECTURE_CONFIG } from "./defaults.js";
import { ArchitectureConfigSchema, type ArchitectureConfig } from "./schema.js";

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

/**
 * Structured validation error for architecture configuration.
 */
export class ArchitectureConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "ArchitectureConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Architecture configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate and freeze an architecture configuration.
 *
 * @throws ArchitectureConfigError if validation fails
 */
export function loadArchitectureConfig(input: unknown): Readonly<ArchitectureConfig> {
  const result = ArchitectureConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ArchitectureConfigError(
      `Invalid architecture configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate architecture configuration without loading.
 */
export function validateArchitectureConfig(input: unknown): {
  success: boolean;
  config?: ArchitectureConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = ArchitectureConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

/**
 * Defaults overlaid with DOMARCH_* environment variables. Not validated.
 *
 * @throws ConfigError when a variable cannot be parsed
 */
export function architectureConfigFromEnv(): ArchitectureConfig {
  const defaults = DEFAULT_ARCHITECTURE_CONFIG;
  return {
    mergeOverlappingDomains: optionalEnvBool(
      ARCHITECTURE_ENV.mergeOverlappingDomains,
      defaults.mergeOverlappingDomains
    ),
    holeMinimumLength: optionalEnvInt(ARCHITECTURE_ENV.holeMinimumLength, defaults.holeMinimumLength),
    characteristicThreshold: optionalEnvFloat(
      ARCHITECTURE_ENV.characteristicThreshold,
      defaults.characteristicThreshold
    ),
    rescueMinimumScore: optionalEnvFloat(ARCHITECTURE_ENV.rescueMinimumScore, defaults.rescueMinimumScore),
    rescueAcceptedRounds: optionalEnvIntList(
      ARCHITECTURE_ENV.rescueAcceptedRounds,
      defaults.rescueAcceptedRounds
    ),
    rescueMinimumFoundRate: optionalEnvFloat(
      ARCHITECTURE_ENV.rescueMinimumFoundRate,
      defaults.rescueMinimumFoundRate
    ),
  };
}

/**
 * Resolve the run configuration: defaults < environment < overrides.
 *
 * @throws ConfigError | ArchitectureConfigError
 */
export function resolveArchitectureConfig(
  overrides: Partial<ArchitectureConfig> = {}
): Readonly<ArchitectureConfig> {
  const base = architectureConfigFromEnv();
  return loadArchitectureConfig({
    mergeOverlappingDomains: overrides.mergeOverlappingDomains ?? base.mergeOverlappingDomains,
    holeMinimumLength: overrides.holeMinimumLength ?? base.holeMinimumLength,
    characteristicThreshold: overrides.characteristicThreshold ?? base.characteristicThreshold,
    rescueMinimumScore: overrides.rescueMinimumScore ?? base.rescueMinimumScore,
    rescueAcceptedRounds: overrides.rescueAcceptedRounds ?? base.rescueAcceptedRounds,
    rescueMinimumFoundRate: overrides.rescueMinimumFoundRate ?? base.rescueMinimumFoundRate,
  });
}
