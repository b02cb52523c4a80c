/**
 * Batch runner - score a set of items under one judge configuration.
 *
 * Items are copied first and scores are written into the copies by
 * input index, so completion order never affects which item gets which
 * score and the caller's items are untouched until it adopts the copies.
 */

import { JudgeExecutionError, RunCancelledError, toError } from "../errors.js";
import { cloneForRun } from "../scoring/evaluation-item.js";
import { assertWithinRange } from "../scoring/score-range.js";
import { parallel } from "../utils/concurrency.js";

import type {
  EvaluationItem,
  JudgeConfig,
  JudgeExecutor,
  ProgressCallbacks,
  ScoreRange,
} from "../types/index.js";

/**
 * Batch run options.
 */
export interface BatchRunOptions {
  executor: JudgeExecutor;
  config: JudgeConfig;
  scoreRange: ScoreRange;
  /** Maximum concurrent judge calls */
  concurrency: number;
  /** Label reported to progress callbacks */
  label?: string;
  progress?: ProgressCallbacks;
  signal?: AbortSignal | undefined;
}

/**
 * A judge call that failed.
 */
export interface ItemFailure {
  index: number;
  item: EvaluationItem;
  error: JudgeExecutionError;
}

/**
 * Outcome of a batch run.
 */
export interface BatchRunOutcome {
  /** Scored copies, in input order */
  items: EvaluationItem[];
  /** Items sent to the judge (those with a human score) */
  judgedCount: number;
  failures: ItemFailure[];
  durationMs: number;
}

function asJudgeError(err: unknown, config: JudgeConfig): JudgeExecutionError {
  if (err instanceof JudgeExecutionError) {
    return err;
  }
  const cause = toError(err);
  return new JudgeExecutionError(cause.message, config, cause);
}

/**
 * Judge every item that has a human score.
 *
 * Per-item failures are collected, not thrown. A score outside the range
 * counts as a failure.
 *
 * @param items - Items to score (not modified)
 * @param options - Executor, configuration and limits
 * @returns Scored copies and failures
 * @throws RunCancelledError if the signal aborts before or during the run
 */
export async function scoreItems(
  items: readonly EvaluationItem[],
  options: BatchRunOptions,
): Promise<BatchRunOutcome> {
  const { executor, config, scoreRange, concurrency, progress, signal } = options;
  const label = options.label ?? config.name ?? config.model;

  if (signal?.aborted) {
    throw new RunCancelledError(`Run "${label}" cancelled before it started`);
  }

  const copies = cloneForRun(items);
  const candidates = copies
    .map((item, index) => ({ item, index }))
    .filter(({ item }) => item.human_score !== null);

  const startTime = Date.now();
  progress?.onRunStart?.(label, candidates.length);

  const failures: ItemFailure[] = [];

  await parallel({
    items: candidates,
    concurrency,
    signal,
    fn: async ({ item }) => {
      try {
        const score = await executor.evaluate(
          item.input_text,
          item.response_text,
          config,
          signal,
        );
        assertWithinRange(scoreRange, score, "Judge score");
        return score;
      } catch (err) {
        throw asJudgeError(err, config);
      }
    },
    onComplete: (score, position, completed, total) => {
      const candidate = candidates[position];
      if (candidate) {
        candidate.item.judge_score = score;
        progress?.onItemComplete?.(candidate.item, score, completed, total);
      }
    },
    onError: (error, { item, index }) => {
      const judgeError = asJudgeError(error, config);
      failures.push({ index, item, error: judgeError });
      progress?.onError?.(judgeError, item);
    },
  });

  if (signal?.aborted) {
    throw new RunCancelledError(`Run "${label}" cancelled`);
  }

  failures.sort((a, b) => a.index - b.index);
  const durationMs = Date.now() - startTime;
  progress?.onRunComplete?.(label, durationMs, candidates.length);

  return {
    items: copies,
    judgedCount: candidates.length,
    failures,
    durationMs,
  };
}
