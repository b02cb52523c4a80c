/**
 * judge-align library entry point.
 */

export * from "./errors.js";
export type {
  ScoreRangeKind,
  ScoreRangeSpec,
  ScoreBuckets,
  EvaluationItem,
  ScorableItem,
  KappaWeighting,
  CorrelationMethod,
  ConfusionMatrix,
  MetricsOptions,
  AlignmentResult,
  LoadedRow,
  JudgeConfig,
  JudgeExecutor,
  SuccessfulComparisonEntry,
  FailedComparisonEntry,
  CancelledComparisonEntry,
  ComparisonEntry,
  ComparisonResults,
  DisagreementItem,
  AlignConfig,
  JudgeConfigInput,
  ProgressCallbacks,
} from "./types/index.js";

export * from "./scoring/index.js";
export * from "./metrics/index.js";
export * from "./judge/index.js";
export * from "./data/index.js";
export * from "./tracker/index.js";
export * from "./comparison/index.js";

export {
  loadConfig,
  loadConfigWithOverrides,
  validateConfig,
  resolveModelId,
  AlignConfigSchema,
  DEFAULT_CONTINUOUS_BINS,
  DEFAULT_JUDGE,
  DEFAULT_METRICS,
  DEFAULT_TUNING,
} from "./config/index.js";

export {
  createExecutor,
  createTracker,
  exportPromptWorkflow,
  runAlignmentWorkflow,
  runComparisonWorkflow,
  runMetricsWorkflow,
  type CompareWorkflowResult,
  type RunWorkflowResult,
  type WorkflowDeps,
} from "./pipeline.js";

export { configureLogger, logger, type LogLevel } from "./utils/logging.js";
