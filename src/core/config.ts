import { z } from "zod";

import {
  DEFAULT_FAILURE_PATTERNS,
  mergeFailurePatterns,
  type FailurePatterns,
} from "./failure-patterns.js";

const PatternListSchema = z.array(z.string().min(1));

const FailurePatternOverridesSchema = z
  .object({
    quota: z
      .object({
        common: PatternListSchema.optional(),
        providers: z.record(PatternListSchema).optional(),
      })
      .strict()
      .optional(),
    timeout: PatternListSchema.optional(),
    network: PatternListSchema.optional(),
    permission: PatternListSchema.optional(),
    failure_keywords: PatternListSchema.optional(),
    informational: PatternListSchema.optional(),
    start_markers: PatternListSchema.optional(),
    success_markers: PatternListSchema.optional(),
  })
  .strict();

export const StageNameSchema = z.enum(["marker", "unifier"]);
export type StageName = z.infer<typeof StageNameSchema>;

export const MarkrunConfigSchema = z.object({
  default_provider: z.string().min(1).default("claude"),
  max_parallel: z.number().int().positive().default(4),
  verbose: z.boolean().default(true),

  // Name of the per-student artifact the marker writes into processed/final.
  output_file_suffix: z.string().min(1).default("_feedback.md"),

  failure_patterns: FailurePatternOverridesSchema.default({}),
});

export type MarkrunConfig = z.infer<typeof MarkrunConfigSchema>;

export function defaultConfig(): MarkrunConfig {
  return MarkrunConfigSchema.parse({});
}

export function resolveFailurePatterns(config: MarkrunConfig): FailurePatterns {
  return mergeFailurePatterns(DEFAULT_FAILURE_PATTERNS, config.failure_patterns);
}
