/**
 * Default configuration values.
 */

import type {
  AlignConfig,
  JudgeDefaults,
  MetricsOptions,
  TuningConfig,
} from "../types/index.js";

/**
 * Default bin count for continuous score ranges.
 * 20 bins keeps every bin at 5% of the range.
 */
export const DEFAULT_CONTINUOUS_BINS = 20;

/**
 * Default metrics configuration.
 */
export const DEFAULT_METRICS: MetricsOptions = {
  kappa_weighting: "none",
  correlation_method: "pearson",
  tolerance: 0,
  continuous_bins: DEFAULT_CONTINUOUS_BINS,
};

/**
 * Default judge settings.
 */
export const DEFAULT_JUDGE: JudgeDefaults = {
  model: "claude-sonnet-4-5-20250929",
  temperature: 0,
  max_tokens: 16,
};

/**
 * Default number of concurrent judge calls.
 */
export const DEFAULT_MAX_CONCURRENT = 10;

/**
 * Default tuning configuration.
 * These values can be overridden in the config file under `tuning`.
 */
export const DEFAULT_TUNING: TuningConfig = {
  timeouts: {
    retry_initial_ms: 1000,
    retry_max_ms: 30000,
  },
  retry: {
    max_retries: 3,
    backoff_multiplier: 2,
    jitter_factor: 0.1,
  },
  limits: {
    prompt_display_length: 60,
    progress_bar_width: 20,
  },
};

/**
 * Get resolved tuning configuration with defaults.
 *
 * Merges user-provided tuning config with defaults, ensuring all values
 * are present even if the user only overrides a subset.
 *
 * @param tuning - User-provided tuning overrides (optional)
 * @returns Complete tuning configuration with defaults applied
 */
export function getResolvedTuning(tuning?: {
  timeouts?: Partial<TuningConfig["timeouts"]> | undefined;
  retry?: Partial<TuningConfig["retry"]> | undefined;
  limits?: Partial<TuningConfig["limits"]> | undefined;
}): TuningConfig {
  if (!tuning) {
    return DEFAULT_TUNING;
  }

  return {
    timeouts: { ...DEFAULT_TUNING.timeouts, ...tuning.timeouts },
    retry: { ...DEFAULT_TUNING.retry, ...tuning.retry },
    limits: { ...DEFAULT_TUNING.limits, ...tuning.limits },
  };
}

/**
 * Create default configuration for a data file.
 *
 * @param dataPath - Path to the human score file
 * @returns Complete configuration with defaults
 */
export function createDefaultConfig(dataPath: string): AlignConfig {
  return {
    data: {
      path: dataPath,
      columns: {
        input: "question",
        response: "response",
        human_score: "human_score",
      },
      metadata_columns: [],
    },
    score_range: { type: "five_point" },
    metrics: { ...DEFAULT_METRICS },
    judge: { ...DEFAULT_JUDGE },
    judges: [],
    max_concurrent: DEFAULT_MAX_CONCURRENT,
    output: { dir: "results", format: "json" },
    tuning: { timeouts: {}, retry: {}, limits: {} },
    verbose: false,
    debug: false,
  };
}
