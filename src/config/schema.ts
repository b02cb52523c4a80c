/**
 * Zod validation schemas for configuration.
 */

import { z } from "zod";

/**
 * Score range schema.
 */
export const ScoreRangeSpecSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("binary") }),
  z.object({ type: z.literal("five_point") }),
  z.object({ type: z.literal("ten_point") }),
  z.object({ type: z.literal("percentage") }),
  z.object({
    type: z.literal("custom"),
    min: z.number(),
    max: z.number(),
    step: z.number().positive().optional(),
  }),
]);

/**
 * Data source configuration schema.
 */
export const DataConfigSchema = z.object({
  path: z.string().min(1, "Data path is required"),
  columns: z
    .object({
      input: z.string().min(1).default("question"),
      response: z.string().min(1).default("response"),
      human_score: z.string().min(1).default("human_score"),
    })
    .default({}),
  metadata_columns: z.array(z.string()).default([]),
  /** Column holding pre-computed judge scores (metrics command) */
  judge_score_column: z.string().optional(),
});

/**
 * Kappa weighting schema.
 */
export const KappaWeightingSchema = z.enum(["none", "linear", "quadratic"]);

/**
 * Correlation method schema.
 */
export const CorrelationMethodSchema = z.enum(["pearson", "spearman"]);

/**
 * Metrics configuration schema.
 */
export const MetricsConfigSchema = z.object({
  kappa_weighting: KappaWeightingSchema.default("none"),
  correlation_method: CorrelationMethodSchema.default("pearson"),
  tolerance: z.number().min(0).default(0),
  continuous_bins: z.number().int().min(2).max(1000).default(20),
});

/**
 * Shared judge defaults schema.
 */
export const JudgeDefaultsSchema = z.object({
  model: z.string().min(1).default("claude-sonnet-4-5-20250929"),
  temperature: z.number().min(0).max(2).default(0),
  max_tokens: z.number().int().min(1).max(4096).default(16),
});

/**
 * Judge configuration schema.
 */
export const JudgeConfigSchema = z.object({
  name: z.string().min(1).optional(),
  prompt: z.string().min(1, "Judge prompt is required"),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  params: z.record(z.string(), z.unknown()).default({}),
});

/**
 * Output format schema.
 */
export const OutputFormatSchema = z.enum(["json", "yaml"]);

/**
 * Output configuration schema.
 */
export const OutputConfigSchema = z.object({
  dir: z.string().min(1).default("results"),
  format: OutputFormatSchema.default("json"),
});

/**
 * Tuning configuration schema.
 */
export const TuningConfigSchema = z.object({
  timeouts: z
    .object({
      retry_initial_ms: z.number().int().min(0).optional(),
      retry_max_ms: z.number().int().min(0).optional(),
    })
    .default({}),
  retry: z
    .object({
      max_retries: z.number().int().min(0).max(10).optional(),
      backoff_multiplier: z.number().min(1).optional(),
      jitter_factor: z.number().min(0).max(1).optional(),
    })
    .default({}),
  limits: z
    .object({
      prompt_display_length: z.number().int().min(10).optional(),
      progress_bar_width: z.number().int().min(5).optional(),
    })
    .default({}),
});

/**
 * Complete configuration schema.
 */
export const AlignConfigSchema = z.object({
  data: DataConfigSchema,
  score_range: ScoreRangeSpecSchema.default({ type: "five_point" }),
  metrics: MetricsConfigSchema.default({}),
  judge: JudgeDefaultsSchema.default({}),
  judges: z.array(JudgeConfigSchema).default([]),
  max_concurrent: z.number().int().min(1).max(50).default(10),
  output: OutputConfigSchema.default({}),
  tuning: TuningConfigSchema.default({}),
  verbose: z.boolean().default(false),
  debug: z.boolean().default(false),
});

/**
 * Type inference from schema.
 */
export type AlignConfig = z.infer<typeof AlignConfigSchema>;
export type DataConfig = z.infer<typeof DataConfigSchema>;
export type MetricsConfig = z.infer<typeof MetricsConfigSchema>;
export type JudgeDefaults = z.infer<typeof JudgeDefaultsSchema>;
export type JudgeConfigInput = z.input<typeof JudgeConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type TuningOverrides = z.infer<typeof TuningConfigSchema>;
