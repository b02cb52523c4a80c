/**
 * Config-driven workflows behind the CLI commands.
 *
 * Each workflow builds its collaborators from an AlignConfig, runs, and
 * writes its results under `output.dir/<run-id>/`.
 */

import path from "node:path";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { getDisagreementItems } from "./comparison/disagreement.js";
import { getResolvedTuning } from "./config/defaults.js";
import { CsvDataLoader } from "./data/data-loader.js";
import { ConfigLoadError, JudgeNotConfiguredError } from "./errors.js";
import { AnthropicJudgeExecutor, type MessagesClient } from "./judge/anthropic-executor.js";
import { silentProgress } from "./judge/progress-reporters.js";
import { scoreRangeFromSpec } from "./scoring/score-range.js";
import { AlignmentTracker } from "./tracker/alignment-tracker.js";
import { generateRunId } from "./utils/ids.js";
import { getResultsDir, readText, writeStructured, writeText } from "./utils/file-io.js";
import { logger } from "./utils/logging.js";
import { createRetryOptionsFromTuning } from "./utils/retry.js";

import type {
  AlignConfig,
  AlignmentResult,
  ComparisonResults,
  DisagreementItem,
  EvaluationItem,
  JudgeConfigInput,
  JudgeExecutor,
  ProgressCallbacks,
} from "./types/index.js";

/**
 * Collaborators a workflow may be handed instead of building its own.
 */
export interface WorkflowDeps {
  executor?: JudgeExecutor;
  /** Used to build the Anthropic executor when no executor is given */
  apiKey?: string | undefined;
  client?: MessagesClient;
  progress?: ProgressCallbacks;
  signal?: AbortSignal;
  runId?: string;
}

/**
 * Build the Anthropic judge executor described by a configuration.
 */
export function createExecutor(
  config: AlignConfig,
  deps: Pick<WorkflowDeps, "apiKey" | "client"> = {},
): AnthropicJudgeExecutor {
  const tuning = getResolvedTuning(config.tuning);
  return new AnthropicJudgeExecutor({
    scoreRange: scoreRangeFromSpec(config.score_range),
    maxTokens: config.judge.max_tokens,
    retry: {
      ...createRetryOptionsFromTuning(tuning),
      onRetry: (error, attempt, delayMs) => {
        logger.debug(
          `Judge call retry ${String(attempt)} in ${String(delayMs)}ms: ${error instanceof Error ? error.message : String(error)}`,
        );
      },
    },
    ...(deps.client ? { client: deps.client } : {}),
    ...(deps.apiKey ? { apiKey: deps.apiKey } : {}),
  });
}

/**
 * Build a tracker wired to the configuration's data columns, range,
 * metrics and concurrency.
 */
export function createTracker(
  config: AlignConfig,
  deps: WorkflowDeps = {},
  options: { withJudgeColumn?: boolean } = {},
): AlignmentTracker {
  const executor =
    deps.executor ??
    (options.withJudgeColumn ? undefined : createExecutor(config, deps));

  return new AlignmentTracker({
    scoreRange: scoreRangeFromSpec(config.score_range),
    ...(executor ? { executor } : {}),
    dataLoader: new CsvDataLoader({
      columns: config.data.columns,
      metadataColumns: config.data.metadata_columns,
      judgeScoreColumn: options.withJudgeColumn
        ? config.data.judge_score_column
        : undefined,
    }),
    concurrency: config.max_concurrent,
    metrics: config.metrics,
    progress: deps.progress ?? silentProgress,
    judgeDefaults: config.judge,
  });
}

function requireJudges(config: AlignConfig): JudgeConfigInput[] {
  if (config.judges.length === 0) {
    throw new JudgeNotConfiguredError(
      "No judges configured. Add a `judges` entry or pass --prompt.",
    );
  }
  return config.judges;
}

/**
 * Outcome of the `run` workflow.
 */
export interface RunWorkflowResult {
  runId: string;
  result: AlignmentResult;
  outputPath: string;
}

/**
 * Judge every item with one configuration and write the result.
 *
 * @param config - Validated configuration
 * @param deps - Executor, progress and cancellation
 * @param judgeName - Configured judge to use (first when omitted)
 */
export async function runAlignmentWorkflow(
  config: AlignConfig,
  deps: WorkflowDeps = {},
  judgeName?: string,
): Promise<RunWorkflowResult> {
  const judges = requireJudges(config);
  const selected =
    judgeName === undefined
      ? judges[0]
      : judges.find((judge) => judge.name === judgeName);
  if (!selected) {
    throw new JudgeNotConfiguredError(`No judge named "${judgeName ?? ""}" in the configuration`);
  }

  const tracker = createTracker(config, deps);
  await tracker.loadHumanScores(config.data.path);
  tracker.setJudge(selected);

  const result = await tracker.runAlignmentTest(
    deps.signal ? { signal: deps.signal } : {},
  );

  const runId = deps.runId ?? result.run_id;
  const outputPath = writeStructured(
    path.join(getResultsDir(config.output.dir, runId), "alignment"),
    result,
    config.output.format,
  );

  return { runId, result, outputPath };
}

/**
 * Outcome of the `compare` workflow.
 */
export interface CompareWorkflowResult {
  runId: string;
  results: ComparisonResults;
  items: readonly EvaluationItem[];
  disagreements: DisagreementItem[];
  outputPath: string;
}

/**
 * Run every configured judge and write the comparison.
 *
 * @param config - Validated configuration
 * @param deps - Executor, progress and cancellation
 * @param disagreementThreshold - Minimum judge score spread to report
 */
export async function runComparisonWorkflow(
  config: AlignConfig,
  deps: WorkflowDeps = {},
  disagreementThreshold = 1,
): Promise<CompareWorkflowResult> {
  const judges = requireJudges(config);

  const tracker = createTracker(config, deps);
  await tracker.loadHumanScores(config.data.path);

  const comparison = tracker.createComparison();
  comparison.addConfigs(judges);

  const items = tracker.items;
  const results = await comparison.runComparison(
    items,
    deps.signal ? { signal: deps.signal } : {},
  );
  const disagreements = getDisagreementItems(results, items, disagreementThreshold);

  const runId = deps.runId ?? generateRunId();
  const outputPath = writeStructured(
    path.join(getResultsDir(config.output.dir, runId), "comparison"),
    { ...results, disagreements },
    config.output.format,
  );

  return { runId, results, items, disagreements, outputPath };
}

/**
 * Measure alignment of pre-computed judge scores. No judge is called.
 *
 * @param config - Configuration with `data.judge_score_column` set
 * @param deps - Run id override
 * @throws ConfigLoadError if no judge score column is configured
 */
export async function runMetricsWorkflow(
  config: AlignConfig,
  deps: Pick<WorkflowDeps, "runId"> = {},
): Promise<RunWorkflowResult> {
  if (!config.data.judge_score_column) {
    throw new ConfigLoadError(
      "The metrics command needs data.judge_score_column (or --judge-column)",
    );
  }

  const tracker = createTracker(config, {}, { withJudgeColumn: true });
  await tracker.loadHumanScores(config.data.path);
  const result = tracker.calculateAlignment();

  const runId = deps.runId ?? result.run_id;
  const outputPath = writeStructured(
    path.join(getResultsDir(config.output.dir, runId), "alignment"),
    result,
    config.output.format,
  );

  return { runId, result, outputPath };
}

/**
 * Best configuration recorded in a saved comparison file.
 */
const SavedComparisonSchema = z.object({
  best: z
    .object({
      label: z.string(),
      config: z.object({ prompt: z.string() }),
    })
    .nullable(),
});

/**
 * Write a judge prompt to a file.
 *
 * The prompt comes from the best entry of a saved comparison when
 * `resultsPath` is given, otherwise from the named (or first) configured
 * judge.
 *
 * @returns The prompt written
 */
export function exportPromptWorkflow(
  config: AlignConfig | null,
  destination: string,
  source: { resultsPath?: string; judgeName?: string } = {},
): string {
  let prompt: string;

  if (source.resultsPath !== undefined) {
    const raw: unknown = parseYaml(readText(source.resultsPath));
    const saved = SavedComparisonSchema.parse(raw);
    if (!saved.best) {
      throw new JudgeNotConfiguredError(
        `The comparison in ${source.resultsPath} has no successful judge`,
      );
    }
    prompt = saved.best.config.prompt;
  } else {
    if (!config) {
      throw new ConfigLoadError(
        "Exporting a configured judge's prompt needs a config file",
      );
    }
    const judges = requireJudges(config);
    const selected =
      source.judgeName === undefined
        ? judges[0]
        : judges.find((judge) => judge.name === source.judgeName);
    if (!selected) {
      throw new JudgeNotConfiguredError(
        `No judge named "${source.judgeName ?? ""}" in the configuration`,
      );
    }
    prompt = selected.prompt;
  }

  writeText(destination, prompt);
  return prompt;
}
