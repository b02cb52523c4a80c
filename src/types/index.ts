/**
 * Centralized type exports.
 */

// Score types
export type {
  ScoreRangeKind,
  ScoreRange,
  ScoreRangeSpec,
  ScoreBuckets,
} from "./score.js";

// Evaluation types
export type {
  EvaluationItem,
  ScorableItem,
  KappaWeighting,
  CorrelationMethod,
  ConfusionMatrix,
  MetricsOptions,
  AlignmentResult,
  LoadedRow,
} from "./evaluation.js";

// Judge types
export type { JudgeConfig, JudgeExecutor } from "./judge.js";

// Comparison types
export type {
  SuccessfulComparisonEntry,
  FailedComparisonEntry,
  CancelledComparisonEntry,
  ComparisonEntry,
  ComparisonResults,
  DisagreementItem,
} from "./comparison.js";

// Config types
export type {
  AlignConfig,
  DataConfig,
  MetricsConfig,
  JudgeDefaults,
  JudgeConfigInput,
  OutputConfig,
  OutputFormat,
  TimeoutsConfig,
  RetryTuningConfig,
  LimitsConfig,
  TuningConfig,
} from "./config.js";

// Progress types
export type { ProgressCallbacks } from "./progress.js";
