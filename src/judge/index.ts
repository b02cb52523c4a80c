/**
 * Judge configuration, execution and batch scoring.
 */

export {
  createJudgeConfig,
  configKey,
  configsEqual,
  getConfigLabel,
  stableStringify,
} from "./judge-config.js";
export { buildSystemPrompt, buildUserPrompt } from "./prompt-builder.js";
export { parseScore } from "./score-parser.js";
export {
  AnthropicJudgeExecutor,
  type AnthropicJudgeExecutorOptions,
  type MessagesClient,
} from "./anthropic-executor.js";
export {
  scoreItems,
  type BatchRunOptions,
  type BatchRunOutcome,
  type ItemFailure,
} from "./batch-runner.js";
export {
  consoleProgress,
  verboseProgress,
  silentProgress,
  createProgressReporter,
} from "./progress-reporters.js";
