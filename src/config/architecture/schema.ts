/**
 * Architecture configuration schema.
 *
 * Validated once at startup and frozen; every family in a run is derived
 * under the same merge policy and thresholds.
 */

import { z } from "zod";

export const ArchitectureConfigSchema = z
  .object({
    /** Extend overlapping domains instead of dropping the weaker hit */
    mergeOverlappingDomains: z
      .boolean()
      .describe("Merge overlapping domain hits (true) or keep only the most significant one (false)"),

    /** Gaps must be strictly longer than this to be reported as holes */
    holeMinimumLength: z
      .number()
      .int()
      .min(0)
      .describe("Minimum hole length; shorter or equal gaps are suppressed"),

    characteristicThreshold: z
      .number()
      .min(0)
      .max(1)
      .describe("Fraction of systems a domain must appear in to be characteristic"),

    rescueMinimumScore: z
      .number()
      .finite()
      .describe("Minimum bitscore for a rescued hit to count"),

    rescueAcceptedRounds: z
      .array(z.number().int().min(0))
      .min(1)
      .describe("Rescue rounds whose hits count (0 = direct hit)"),

    /** 0 disables the prefilter */
    rescueMinimumFoundRate: z
      .number()
      .min(0)
      .max(1)
      .describe("Share of proteins a summarised domain must be found in (direct or round 1) to be kept"),
  })
  .strict();

export type ArchitectureConfig = z.infer<typeof ArchitectureConfigSchema>;
