/**
 * AlignmentMetrics - build an AlignmentResult from scored items.
 *
 * The statistics themselves are pure functions (kappa.ts, agreement.ts,
 * correlation.ts, confusion-matrix.ts). This module bundles them into one
 * immutable snapshot and reports the conditions that shrink the sample.
 */

import { DEFAULT_METRICS } from "../config/defaults.js";
import { UndefinedCorrelationError } from "../errors.js";
import { partitionScorable } from "../scoring/evaluation-item.js";
import { generateRunId } from "../utils/ids.js";
import { logger } from "../utils/logging.js";

import { calculateAgreementRate } from "./agreement.js";
import { getConfusionMatrix } from "./confusion-matrix.js";
import { calculateCorrelation } from "./correlation.js";
import { calculateKappa } from "./kappa.js";

import type {
  AlignmentResult,
  EvaluationItem,
  JudgeConfig,
  MetricsOptions,
  ScoreRange,
} from "../types/index.js";

/**
 * Context attached to a computed result.
 */
export interface AlignmentContext {
  /** Configuration that produced the judge scores */
  judgeConfig?: JudgeConfig | null;
  /** Items whose judge call failed during the run */
  failedCount?: number;
  /** Run identifier (generated when omitted) */
  runId?: string;
}

/**
 * Resolve partial metrics options against the defaults.
 *
 * @param options - Partial options
 * @returns Complete options
 */
export function resolveMetricsOptions(
  options: Partial<MetricsOptions> = {},
): MetricsOptions {
  return { ...DEFAULT_METRICS, ...options };
}

/**
 * Compute every alignment statistic over the scorable subset of `items`.
 *
 * Items missing a score side are left out and counted; a warning reports
 * how many. An undefined correlation (a constant score side) is recorded
 * as null with a warning instead of failing the whole result. Kappa and
 * agreement errors propagate.
 *
 * @param items - Evaluation items
 * @param range - Active score range
 * @param options - Metric options
 * @param context - Judge config, failure count and run id
 * @returns Frozen alignment result
 * @throws InsufficientDataError if fewer than 2 items are scorable
 */
export function calculateAlignmentResult(
  items: readonly EvaluationItem[],
  range: ScoreRange,
  options: Partial<MetricsOptions> = {},
  context: AlignmentContext = {},
): AlignmentResult {
  const resolved = resolveMetricsOptions(options);
  const { scorable, excluded } = partitionScorable(items);
  const failedCount = context.failedCount ?? 0;

  if (failedCount > 0) {
    logger.warn(
      `${String(failedCount)} of ${String(items.length)} judge calls failed; those items are excluded from the metrics`,
    );
  }
  if (excluded > failedCount) {
    logger.warn(
      `${String(excluded - failedCount)} of ${String(items.length)} items are missing a human or judge score and were excluded from the metrics`,
    );
  }

  const kappa = calculateKappa(scorable, range, {
    weighting: resolved.kappa_weighting,
    continuousBins: resolved.continuous_bins,
  });
  const agreementRate = calculateAgreementRate(scorable, resolved.tolerance);

  let correlation: number | null;
  try {
    correlation = calculateCorrelation(scorable, resolved.correlation_method);
  } catch (err) {
    if (!(err instanceof UndefinedCorrelationError)) {
      throw err;
    }
    logger.warn(`${err.message}; correlation recorded as null`);
    correlation = null;
  }

  const confusionMatrix = getConfusionMatrix(
    scorable,
    range,
    resolved.continuous_bins,
  );

  return Object.freeze({
    run_id: context.runId ?? generateRunId(),
    kappa_score: kappa,
    kappa_weighting: resolved.kappa_weighting,
    agreement_rate: agreementRate,
    tolerance: resolved.tolerance,
    correlation,
    correlation_method: resolved.correlation_method,
    confusion_matrix: confusionMatrix,
    sample_size: scorable.length,
    excluded_count: excluded,
    failed_count: failedCount,
    score_range: range,
    timestamp: new Date().toISOString(),
    judge_config: context.judgeConfig ?? null,
  });
}
