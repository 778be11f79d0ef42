/**
 * Architecture configuration module.
 *
 * Usage:
 *   import { resolveArchitectureConfig } from "./config/architecture/index.js";
 *
 *   // Defaults + DOMARCH_* environment
 *   const config = resolveArchitectureConfig();
 *
 *   // With CLI overrides
 *   const strict = resolveArchitectureConfig({ holeMinimumLength: 20 });
 */

export type { ArchitectureConfig } from "./schema.js";
export { ArchitectureConfigSchema } from "./schema.js";

export {
  loadArchitectureConfig,
  validateArchitectureConfig,
  architectureConfigFromEnv,
  resolveArchitectureConfig,
  ArchitectureConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export { DEFAULT_ARCHITECTURE_CONFIG, ARCHITECTURE_ENV } from "./defaults.js";
