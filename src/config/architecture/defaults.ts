/**
 * Default architecture configuration.
 */

import type { ArchitectureConfig } from "./schema.js";

export const DEFAULT_ARCHITECTURE_CONFIG: ArchitectureConfig = {
  mergeOverlappingDomains: true,
  holeMinimumLength: 50,
  characteristicThreshold: 0.5,

  // Every rescued hit counts unless a run asks for more
  rescueMinimumScore: 0,
  rescueAcceptedRounds: [0, 1, 2],
  rescueMinimumFoundRate: 0,
};

/** Environment variables that override the defaults */
export const ARCHITECTURE_ENV = {
  mergeOverlappingDomains: "DOMARCH_MERGE_DOMAINS",
  holeMinimumLength: "DOMARCH_HOLE_THRESHOLD",
  characteristicThreshold: "DOMARCH_CHAR_THRESHOLD",
  rescueMinimumScore: "DOMARCH_RESCUE_MIN_SCORE",
  rescueAcceptedRounds: "DOMARCH_RESCUE_ROUNDS",
  rescueMinimumFoundRate: "DOMARCH_RESCUE_FOUND_RATE",
} as const satisfies Record<keyof ArchitectureConfig, string>;
