/**
 * AlignmentTracker - owns a working set of human-scored items and the
 * active judge configuration, runs the judge over the items and measures
 * how well it agrees with the humans.
 */

import { Mutex } from "async-mutex";

import { DEFAULT_JUDGE, DEFAULT_MAX_CONCURRENT } from "../config/defaults.js";
import { JudgeComparison } from "../comparison/judge-comparison.js";
import { compareResults } from "../comparison/ranking.js";
import { CsvDataLoader, type DataLoader } from "../data/data-loader.js";
import {
  ConcurrentRunError,
  JudgeNotConfiguredError,
  NoDataError,
} from "../errors.js";
import { scoreItems } from "../judge/batch-runner.js";
import { createJudgeConfig } from "../judge/judge-config.js";
import { silentProgress } from "../judge/progress-reporters.js";
import { calculateAlignmentResult } from "../metrics/alignment-metrics.js";
import {
  createEvaluationItem,
  getItemKey,
} from "../scoring/evaluation-item.js";
import { ScoreRange, assertWithinRange } from "../scoring/score-range.js";
import { runExclusiveOrReject } from "../utils/concurrency.js";
import { writeText } from "../utils/file-io.js";
import { logger } from "../utils/logging.js";

import type {
  AlignmentResult,
  EvaluationItem,
  JudgeConfig,
  JudgeConfigInput,
  JudgeDefaults,
  JudgeExecutor,
  MetricsOptions,
  ProgressCallbacks,
} from "../types/index.js";

/**
 * Tracker options.
 */
export interface AlignmentTrackerOptions {
  scoreRange?: ScoreRange;
  /** Judge backend; required for runAlignmentTest */
  executor?: JudgeExecutor;
  /** Source of human scores (defaults to a CSV loader) */
  dataLoader?: DataLoader;
  /** Maximum concurrent judge calls */
  concurrency?: number;
  metrics?: Partial<MetricsOptions>;
  progress?: ProgressCallbacks;
  judgeDefaults?: Pick<JudgeDefaults, "model" | "temperature">;
}

/**
 * One measured configuration.
 */
export interface TrackerHistoryEntry {
  /** Null for metrics computed without a configured judge */
  config: JudgeConfig | null;
  result: AlignmentResult;
}

/**
 * Run options.
 */
export interface RunAlignmentOptions {
  signal?: AbortSignal;
}

/**
 * @example
 * ```typescript
 * const tracker = new AlignmentTracker({
 *   scoreRange: ScoreRange.FIVE_POINT,
 *   executor: new AnthropicJudgeExecutor({ apiKey, scoreRange: ScoreRange.FIVE_POINT }),
 * });
 * await tracker.loadHumanScores("./scores.csv");
 * tracker.setJudge({ prompt: "Rate the answer's accuracy." });
 * const result = await tracker.runAlignmentTest();
 * console.log(result.kappa_score);
 * ```
 */
export class AlignmentTracker {
  readonly scoreRange: ScoreRange;

  private readonly executor: JudgeExecutor | undefined;
  private readonly dataLoader: DataLoader;
  private readonly concurrency: number;
  private readonly metrics: Partial<MetricsOptions>;
  private readonly progress: ProgressCallbacks;
  private readonly judgeDefaults: Pick<JudgeDefaults, "model" | "temperature">;

  private readonly workingSet = new Map<string, EvaluationItem>();
  private readonly runs: TrackerHistoryEntry[] = [];
  private readonly runLock = new Mutex();
  private judge: JudgeConfig | null = null;
  /** Configuration that produced the working set's judge scores */
  private scoredBy: JudgeConfig | null = null;

  constructor(options: AlignmentTrackerOptions = {}) {
    this.scoreRange = options.scoreRange ?? ScoreRange.FIVE_POINT;
    this.executor = options.executor;
    this.dataLoader = options.dataLoader ?? new CsvDataLoader();
    this.concurrency = options.concurrency ?? DEFAULT_MAX_CONCURRENT;
    this.metrics = options.metrics ?? {};
    this.progress = options.progress ?? silentProgress;
    this.judgeDefaults = options.judgeDefaults ?? DEFAULT_JUDGE;
  }

  /**
   * Snapshot of the working set, in insertion order.
   */
  get items(): readonly EvaluationItem[] {
    return [...this.workingSet.values()].map((item) => ({
      ...item,
      metadata: { ...item.metadata },
    }));
  }

  /**
   * Active judge configuration, or null.
   */
  get judgeConfig(): JudgeConfig | null {
    return this.judge;
  }

  /**
   * Every measurement taken, oldest first.
   */
  get history(): readonly TrackerHistoryEntry[] {
    return [...this.runs];
  }

  /**
   * Add one item. An item with the same input and response text is
   * replaced.
   *
   * @throws ScoreRangeError if the human score is out of range
   */
  addEvaluationItem(
    inputText: string,
    responseText: string,
    humanScore: number | null,
    metadata: Record<string, unknown> = {},
  ): void {
    const item = createEvaluationItem(
      {
        input_text: inputText,
        response_text: responseText,
        human_score: humanScore,
        metadata,
      },
      this.scoreRange,
    );
    this.workingSet.set(getItemKey(item), item);
  }

  /**
   * Load human scores through the data loader and merge them into the
   * working set. Every row is validated before any is merged.
   *
   * Rows carrying a judge score (pre-computed) keep it, and later
   * measurements are then attributed to no configuration.
   *
   * @param source - Source passed to the data loader
   * @returns Number of rows loaded
   * @throws DataLoadError if the source cannot be read or parsed
   * @throws ScoreRangeError if a score is out of range
   */
  async loadHumanScores(source: string): Promise<number> {
    const rows = await this.dataLoader.load(source);

    const loaded = rows.map((row) => {
      const item = createEvaluationItem(row, this.scoreRange);
      if (row.judge_score !== undefined && row.judge_score !== null) {
        assertWithinRange(this.scoreRange, row.judge_score, "Judge score");
        item.judge_score = row.judge_score;
      }
      return item;
    });

    for (const item of loaded) {
      this.workingSet.set(getItemKey(item), item);
    }
    if (loaded.some((item) => item.judge_score !== null)) {
      this.scoredBy = null;
    }

    logger.debug(
      `Loaded ${String(loaded.length)} rows from ${source}; working set has ${String(this.workingSet.size)} items`,
    );
    return loaded.length;
  }

  /**
   * Set the active judge configuration. No network call is made.
   *
   * @param config - Configuration or its input
   * @returns The frozen configuration
   */
  setJudge(config: JudgeConfigInput): JudgeConfig {
    this.judge = createJudgeConfig(config, this.judgeDefaults);
    return this.judge;
  }

  /**
   * Judge every item with a human score under the active configuration
   * and measure alignment.
   *
   * Items are judged on a private copy; scores land in the working set
   * only once the whole batch is done. Items whose judge call failed are
   * excluded from the metrics and counted on the result.
   *
   * @param options - Cancellation signal
   * @returns Alignment result
   * @throws NoDataError if the working set is empty
   * @throws JudgeNotConfiguredError if no judge or executor is set
   * @throws ConcurrentRunError if a run is already in progress
   * @throws RunCancelledError if aborted
   */
  async runAlignmentTest(
    options: RunAlignmentOptions = {},
  ): Promise<AlignmentResult> {
    return runExclusiveOrReject(
      this.runLock,
      () => new ConcurrentRunError(),
      async () => {
        if (this.workingSet.size === 0) {
          throw new NoDataError();
        }
        const config = this.requireJudge();
        if (!this.executor) {
          throw new JudgeNotConfiguredError(
            "No judge executor configured. Pass one to the tracker.",
          );
        }

        const outcome = await scoreItems([...this.workingSet.values()], {
          executor: this.executor,
          config,
          scoreRange: this.scoreRange,
          concurrency: this.concurrency,
          progress: this.progress,
          signal: options.signal,
        });

        for (const failure of outcome.failures) {
          logger.debug(
            `Judge call failed for item ${String(failure.index)}: ${failure.error.message}`,
          );
        }

        for (const scored of outcome.items) {
          const current = this.workingSet.get(getItemKey(scored));
          if (current) {
            current.judge_score = scored.judge_score;
          }
        }
        this.scoredBy = config;

        const result = calculateAlignmentResult(
          outcome.items,
          this.scoreRange,
          this.metrics,
          { judgeConfig: config, failedCount: outcome.failures.length },
        );
        this.runs.push({ config, result });
        return result;
      },
    );
  }

  /**
   * Measure alignment over the working set as it stands, without
   * calling the judge. The result is credited to the configuration of
   * the last run that wrote judge scores, not the active one.
   *
   * @returns Alignment result
   * @throws NoDataError if the working set is empty
   * @throws InsufficientDataError if fewer than 2 items are scorable
   */
  calculateAlignment(): AlignmentResult {
    if (this.workingSet.size === 0) {
      throw new NoDataError();
    }
    const result = calculateAlignmentResult(
      [...this.workingSet.values()],
      this.scoreRange,
      this.metrics,
      { judgeConfig: this.scoredBy },
    );
    this.runs.push({ config: this.scoredBy, result });
    return result;
  }

  /**
   * Best measured configuration so far.
   *
   * @returns Highest-ranked history entry with a configuration, or null
   */
  getBestPrompt(): (TrackerHistoryEntry & { config: JudgeConfig }) | null {
    let best: (TrackerHistoryEntry & { config: JudgeConfig }) | null = null;
    for (const entry of this.runs) {
      const { config, result } = entry;
      if (config === null) {
        continue;
      }
      if (best === null || compareResults(result, best.result) < 0) {
        best = { config, result };
      }
    }
    return best;
  }

  /**
   * Human-readable state summary.
   */
  summary(): string {
    const items = [...this.workingSet.values()];
    const withHuman = items.filter((item) => item.human_score !== null).length;
    const judged = items.filter((item) => item.judge_score !== null).length;
    const latest = this.runs[this.runs.length - 1];

    const lines = [
      "Alignment Tracker Summary",
      "─".repeat(40),
      `Score Range:      ${this.scoreRange.name} [${String(this.scoreRange.min)}, ${String(this.scoreRange.max)}]`,
      `Items:            ${String(items.length)} (${String(withHuman)} human-scored, ${String(judged)} judged)`,
      `Judge:            ${this.judge ? `${this.judge.name ?? "unnamed"} (${this.judge.model})` : "not configured"}`,
      `Tests Run:        ${String(this.runs.length)}`,
    ];

    if (latest) {
      lines.push(`Latest Kappa:     ${latest.result.kappa_score.toFixed(3)}`);
      lines.push(
        `Latest Agreement: ${(latest.result.agreement_rate * 100).toFixed(1)}%`,
      );
    }

    return lines.join("\n");
  }

  /**
   * Drop every item. History and the judge configuration are kept.
   *
   * @throws ConcurrentRunError if a run is in progress
   */
  clearData(): void {
    if (this.runLock.isLocked()) {
      throw new ConcurrentRunError("Cannot clear data while a run is in progress.");
    }
    this.workingSet.clear();
    this.scoredBy = null;
  }

  /**
   * Return the active prompt, writing it verbatim to `filePath` if given.
   *
   * @param filePath - Destination file (optional)
   * @returns Prompt text
   * @throws JudgeNotConfiguredError if no judge is set
   */
  exportPrompt(filePath?: string): string {
    const { prompt } = this.requireJudge();
    if (filePath !== undefined) {
      writeText(filePath, prompt);
      logger.debug(`Prompt written to ${filePath}`);
    }
    return prompt;
  }

  /**
   * A comparison sharing this tracker's executor, range and options.
   *
   * @throws JudgeNotConfiguredError if the tracker has no executor
   */
  createComparison(): JudgeComparison {
    if (!this.executor) {
      throw new JudgeNotConfiguredError(
        "No judge executor configured. Pass one to the tracker.",
      );
    }
    return new JudgeComparison({
      executor: this.executor,
      scoreRange: this.scoreRange,
      concurrency: this.concurrency,
      metrics: this.metrics,
      progress: this.progress,
      judgeDefaults: this.judgeDefaults,
    });
  }

  private requireJudge(): JudgeConfig {
    if (!this.judge) {
      throw new JudgeNotConfiguredError();
    }
    return this.judge;
  }
}
