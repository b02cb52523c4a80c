/**
 * Configuration type definitions.
 * File-level configuration types are inferred from the zod schemas.
 */

export type {
  AlignConfig,
  DataConfig,
  MetricsConfig,
  JudgeDefaults,
  JudgeConfigInput,
  OutputConfig,
  OutputFormat,
} from "../config/schema.js";

/**
 * Retry timing configuration.
 */
export interface TimeoutsConfig {
  /** Initial retry delay */
  retry_initial_ms: number;
  /** Maximum retry delay */
  retry_max_ms: number;
}

/**
 * Retry behavior configuration.
 */
export interface RetryTuningConfig {
  max_retries: number;
  backoff_multiplier: number;
  /** Random jitter (0-1) added to each delay */
  jitter_factor: number;
}

/**
 * Display limits.
 */
export interface LimitsConfig {
  /** Characters of a prompt shown in tables and verbose progress */
  prompt_display_length: number;
  progress_bar_width: number;
}

/**
 * Fully resolved tuning configuration.
 */
export interface TuningConfig {
  timeouts: TimeoutsConfig;
  retry: RetryTuningConfig;
  limits: LimitsConfig;
}
