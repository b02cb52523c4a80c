/**
 * Configuration module exports.
 */

export {
  loadConfig,
  loadConfigWithOverrides,
  validateConfig,
  resolveModelId,
  type CLIOptions,
} from "./loader.js";

export {
  AlignConfigSchema,
  DataConfigSchema,
  ScoreRangeSpecSchema,
  MetricsConfigSchema,
  KappaWeightingSchema,
  CorrelationMethodSchema,
  JudgeDefaultsSchema,
  JudgeConfigSchema,
  OutputConfigSchema,
  OutputFormatSchema,
  TuningConfigSchema,
} from "./schema.js";

export {
  createDefaultConfig,
  getResolvedTuning,
  DEFAULT_CONTINUOUS_BINS,
  DEFAULT_METRICS,
  DEFAULT_JUDGE,
  DEFAULT_MAX_CONCURRENT,
  DEFAULT_TUNING,
} from "./defaults.js";
