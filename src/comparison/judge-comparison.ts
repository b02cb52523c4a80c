/**
 * JudgeComparison - run several judge configurations over one item set
 * and rank them by alignment with the human scores.
 *
 * Configurations run one after another, each on its own fresh copy of
 * the items, so scores never leak between configurations.
 */

import { Mutex } from "async-mutex";

import { DEFAULT_JUDGE, DEFAULT_MAX_CONCURRENT } from "../config/defaults.js";
import {
  ConcurrentRunError,
  DuplicateConfigError,
  JudgeNotConfiguredError,
  NoDataError,
  NoSuccessfulRunsError,
  RunCancelledError,
  toError,
} from "../errors.js";
import { scoreItems } from "../judge/batch-runner.js";
import { configKey, createJudgeConfig, getConfigLabel } from "../judge/judge-config.js";
import { silentProgress } from "../judge/progress-reporters.js";
import { calculateAlignmentResult } from "../metrics/alignment-metrics.js";
import { cloneForRun } from "../scoring/evaluation-item.js";
import { ScoreRange } from "../scoring/score-range.js";
import { runExclusiveOrReject } from "../utils/concurrency.js";
import { logger } from "../utils/logging.js";

import { getBest, rankEntries } from "./ranking.js";

import type {
  ComparisonEntry,
  ComparisonResults,
  EvaluationItem,
  JudgeConfig,
  JudgeConfigInput,
  JudgeDefaults,
  JudgeExecutor,
  MetricsOptions,
  ProgressCallbacks,
  SuccessfulComparisonEntry,
} from "../types/index.js";

/**
 * Comparison options.
 */
export interface JudgeComparisonOptions {
  executor: JudgeExecutor;
  scoreRange?: ScoreRange;
  /** Maximum concurrent judge calls within one configuration's run */
  concurrency?: number;
  metrics?: Partial<MetricsOptions>;
  progress?: ProgressCallbacks;
  /** Model and temperature for configurations that omit them */
  judgeDefaults?: Pick<JudgeDefaults, "model" | "temperature">;
}

/**
 * Run options.
 */
export interface RunComparisonOptions {
  /** Aborting cancels the running configuration and skips the rest */
  signal?: AbortSignal;
}

export class JudgeComparison {
  private readonly executor: JudgeExecutor;
  private readonly scoreRange: ScoreRange;
  private readonly concurrency: number;
  private readonly metrics: Partial<MetricsOptions>;
  private readonly progress: ProgressCallbacks;
  private readonly judgeDefaults: Pick<JudgeDefaults, "model" | "temperature">;

  private readonly registered: JudgeConfig[] = [];
  private readonly keys = new Set<string>();
  private readonly runLock = new Mutex();
  private results: ComparisonResults | null = null;

  constructor(options: JudgeComparisonOptions) {
    this.executor = options.executor;
    this.scoreRange = options.scoreRange ?? ScoreRange.FIVE_POINT;
    this.concurrency = options.concurrency ?? DEFAULT_MAX_CONCURRENT;
    this.metrics = options.metrics ?? {};
    this.progress = options.progress ?? silentProgress;
    this.judgeDefaults = options.judgeDefaults ?? DEFAULT_JUDGE;
  }

  /**
   * Registered configurations, in registration order.
   */
  get configs(): readonly JudgeConfig[] {
    return [...this.registered];
  }

  /**
   * Results of the latest comparison, or null before the first run.
   */
  get lastResults(): ComparisonResults | null {
    return this.results;
  }

  /**
   * Register configurations.
   *
   * Either every configuration is added or none is: a configuration equal
   * by value to a registered one, or to another in the same batch, rejects
   * the whole batch.
   *
   * @param configs - Configurations or their inputs
   * @throws DuplicateConfigError on a repeated configuration
   */
  addConfigs(configs: readonly JudgeConfigInput[]): void {
    const built = configs.map((input) => createJudgeConfig(input, this.judgeDefaults));
    const batchKeys = new Set<string>();

    for (const config of built) {
      const key = configKey(config);
      if (this.keys.has(key) || batchKeys.has(key)) {
        throw new DuplicateConfigError(
          `Judge configuration "${config.name ?? config.prompt.slice(0, 40)}" is already registered`,
          config,
        );
      }
      batchKeys.add(key);
    }

    this.registered.push(...built);
    for (const key of batchKeys) {
      this.keys.add(key);
    }
  }

  /**
   * Register one named configuration.
   *
   * @param name - Display name
   * @param prompt - Judge instructions
   * @param overrides - Model, temperature or params
   * @returns The registered configuration
   * @throws DuplicateConfigError on a repeated configuration
   */
  addJudge(
    name: string,
    prompt: string,
    overrides: Omit<JudgeConfigInput, "name" | "prompt"> = {},
  ): JudgeConfig {
    this.addConfigs([{ ...overrides, name, prompt }]);
    const added = this.registered[this.registered.length - 1];
    if (!added) {
      throw new Error(`Failed to register judge "${name}"`);
    }
    return added;
  }

  /**
   * Run every registered configuration over `items`.
   *
   * A configuration with any failed judge call is recorded as failed and
   * the comparison moves on. When aborted, the running and remaining
   * configurations are recorded as cancelled and finished ones are kept.
   *
   * @param items - Items with human scores (not modified)
   * @param options - Cancellation signal
   * @returns Entries in registration order plus the best entry
   * @throws NoDataError if there are no items
   * @throws JudgeNotConfiguredError if no configuration is registered
   * @throws ConcurrentRunError if a comparison is already running
   * @throws NoSuccessfulRunsError if every configuration failed
   */
  async runComparison(
    items: readonly EvaluationItem[],
    options: RunComparisonOptions = {},
  ): Promise<ComparisonResults> {
    return runExclusiveOrReject(
      this.runLock,
      () =>
        new ConcurrentRunError(
          "A comparison is already running. Await it before starting another.",
        ),
      () => this.execute(items, options.signal),
    );
  }

  /**
   * Best entry of the latest comparison.
   *
   * @throws NoSuccessfulRunsError if nothing has run or nothing succeeded
   */
  getBest(): SuccessfulComparisonEntry {
    if (!this.results) {
      throw new NoSuccessfulRunsError("No comparison has been run yet");
    }
    return getBest(this.results);
  }

  /**
   * Prompt of the best configuration of the latest comparison.
   *
   * @throws NoSuccessfulRunsError if nothing has run or nothing succeeded
   */
  getBestPrompt(): string {
    return this.getBest().config.prompt;
  }

  private async execute(
    items: readonly EvaluationItem[],
    signal: AbortSignal | undefined,
  ): Promise<ComparisonResults> {
    if (items.length === 0) {
      throw new NoDataError("No evaluation items to compare on.");
    }
    if (this.registered.length === 0) {
      throw new JudgeNotConfiguredError(
        "No judge configurations registered. Call addConfigs() first.",
      );
    }

    const snapshot = cloneForRun(items);
    const labels = this.uniqueLabels();
    const entries: ComparisonEntry[] = [];
    let cancelled = false;

    for (const [index, config] of this.registered.entries()) {
      const base = {
        config,
        label: labels[index] ?? getConfigLabel(config, index),
        registration_index: index,
      };

      if (cancelled || signal?.aborted) {
        cancelled = true;
        entries.push(Object.freeze({ ...base, status: "cancelled" }));
        continue;
      }

      try {
        entries.push(Object.freeze(await this.runOne(snapshot, base, signal)));
      } catch (err) {
        if (err instanceof RunCancelledError) {
          cancelled = true;
          logger.warn(`Comparison cancelled during "${base.label}"`);
          entries.push(Object.freeze({ ...base, status: "cancelled" }));
          continue;
        }
        const error = toError(err);
        logger.warn(`Judge "${base.label}" failed: ${error.message}`);
        entries.push(
          Object.freeze({
            ...base,
            status: "failed",
            error: error.message,
            error_name: error.name,
            failed_items: 0,
          }),
        );
      }
    }

    const [best] = rankEntries(entries);
    const results: ComparisonResults = Object.freeze({
      entries: Object.freeze(entries),
      best: best ?? null,
      cancelled,
      item_count: snapshot.length,
      timestamp: new Date().toISOString(),
    });
    this.results = results;

    if (entries.every((entry) => entry.status === "failed")) {
      throw new NoSuccessfulRunsError(
        `All ${String(entries.length)} judge configurations failed`,
        results,
      );
    }

    return results;
  }

  private async runOne(
    snapshot: readonly EvaluationItem[],
    base: { config: JudgeConfig; label: string; registration_index: number },
    signal: AbortSignal | undefined,
  ): Promise<ComparisonEntry> {
    const outcome = await scoreItems(snapshot, {
      executor: this.executor,
      config: base.config,
      scoreRange: this.scoreRange,
      concurrency: this.concurrency,
      label: base.label,
      progress: this.progress,
      signal,
    });

    const [firstFailure] = outcome.failures;
    if (firstFailure) {
      logger.warn(
        `Judge "${base.label}" failed on ${String(outcome.failures.length)} of ${String(outcome.judgedCount)} items`,
      );
      return {
        ...base,
        status: "failed",
        error: firstFailure.error.message,
        error_name: firstFailure.error.name,
        failed_items: outcome.failures.length,
      };
    }

    const result = calculateAlignmentResult(
      outcome.items,
      this.scoreRange,
      this.metrics,
      { judgeConfig: base.config },
    );

    return {
      ...base,
      status: "success",
      result,
      judge_scores: Object.freeze(
        outcome.items.map((item) => item.judge_score),
      ),
    };
  }

  private uniqueLabels(): string[] {
    const seen = new Set<string>();
    return this.registered.map((config, index) => {
      const label = getConfigLabel(config, index);
      const unique = seen.has(label) ? `${label}#${String(index + 1)}` : label;
      seen.add(unique);
      return unique;
    });
  }
}
