/**
 * Utility module exports.
 */

export {
  withRetry,
  isTransientError,
  calculateDelay,
  createRetryOptionsFromTuning,
  sleep,
  DEFAULT_RETRY_OPTIONS,
  type RetryOptions,
} from "./retry.js";

export {
  parallel,
  runExclusiveOrReject,
  type ParallelOptions,
  type ParallelResult,
} from "./concurrency.js";

export {
  logger,
  configureLogger,
  debug,
  info,
  warn,
  error,
  success,
  resetLogger,
  sectionHeader,
  progressBar,
  progressLine,
  table,
  type ColumnAlign,
  type LogLevel,
  type LoggerConfig,
} from "./logging.js";

export {
  ensureDir,
  writeJson,
  writeYaml,
  writeStructured,
  readText,
  writeText,
  getResultsDir,
} from "./file-io.js";

export { generateRunId } from "./ids.js";
