/**
 * Evaluation item and alignment result type definitions.
 */

import type { JudgeConfig } from "./judge.js";
import type { ScoreRange } from "./score.js";

/**
 * One question/response pair scored by a human and (later) by a judge.
 */
export interface EvaluationItem {
  /** The question or prompt under evaluation */
  input_text: string;
  /** The content being scored */
  response_text: string;
  /** Ground truth score, null until loaded */
  human_score: number | null;
  /** Score from the latest judge run, null until judged */
  judge_score: number | null;
  metadata: Record<string, unknown>;
}

/**
 * An item with both score sides present.
 */
export interface ScorableItem extends EvaluationItem {
  human_score: number;
  judge_score: number;
}

/**
 * Disagreement cost used by Cohen's kappa.
 */
export type KappaWeighting = "none" | "linear" | "quadratic";

/**
 * Correlation coefficient.
 */
export type CorrelationMethod = "pearson" | "spearman";

/**
 * Confusion matrix over discretized score buckets.
 *
 * Rows are human buckets, columns judge buckets, both ordered by
 * ascending bucket value.
 */
export interface ConfusionMatrix {
  readonly labels: readonly number[];
  /** counts[humanIndex][judgeIndex] */
  readonly counts: readonly (readonly number[])[];
}

/**
 * Options shared by the metric functions.
 */
export interface MetricsOptions {
  kappa_weighting: KappaWeighting;
  correlation_method: CorrelationMethod;
  /** Agreement tolerance in score units */
  tolerance: number;
  /** Bin count for continuous score ranges */
  continuous_bins: number;
}

/**
 * Snapshot of alignment metrics for one judge configuration.
 */
export interface AlignmentResult {
  readonly run_id: string;
  readonly kappa_score: number;
  readonly kappa_weighting: KappaWeighting;
  readonly agreement_rate: number;
  readonly tolerance: number;
  /** Null when the correlation is undefined (a side has zero variance) */
  readonly correlation: number | null;
  readonly correlation_method: CorrelationMethod;
  readonly confusion_matrix: ConfusionMatrix;
  /** Items that contributed to the metrics */
  readonly sample_size: number;
  /** Items left out because a score side is missing */
  readonly excluded_count: number;
  /** Of the excluded items, those whose judge call failed */
  readonly failed_count: number;
  readonly score_range: ScoreRange;
  readonly timestamp: string;
  readonly judge_config: JudgeConfig | null;
}

/**
 * A row produced by a data loader.
 */
export interface LoadedRow {
  input_text: string;
  response_text: string;
  human_score: number;
  /** Present when the source carries pre-computed judge scores */
  judge_score?: number | null;
  metadata: Record<string, unknown>;
}
