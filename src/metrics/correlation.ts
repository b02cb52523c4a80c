/**
 * Pearson and Spearman correlation between human and judge scores.
 */

import { InsufficientDataError, UndefinedCorrelationError } from "../errors.js";
import { partitionScorable } from "../scoring/evaluation-item.js";

import type { CorrelationMethod, EvaluationItem } from "../types/index.js";

function isConstant(values: readonly number[]): boolean {
  return values.every((value) => value === values[0]);
}

function mean(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Pearson product-moment correlation of two equal-length series.
 *
 * @param xs - First series
 * @param ys - Second series
 * @returns Coefficient clamped to [-1, 1]
 * @throws UndefinedCorrelationError if either series is constant
 */
export function pearson(xs: readonly number[], ys: readonly number[]): number {
  if (isConstant(xs) || isConstant(ys)) {
    throw new UndefinedCorrelationError(
      "Correlation is undefined when either score series is constant",
      "pearson",
    );
  }

  const meanX = mean(xs);
  const meanY = mean(ys);

  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;
  for (let i = 0; i < xs.length; i++) {
    const dx = (xs[i] ?? meanX) - meanX;
    const dy = (ys[i] ?? meanY) - meanY;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }

  const r = covariance / Math.sqrt(varianceX * varianceY);
  return Math.min(1, Math.max(-1, r));
}

/**
 * 1-based ranks; tied values share the average of their positions.
 *
 * @example
 * ```typescript
 * rank([10, 20, 20, 30]); // [1, 2.5, 2.5, 4]
 * ```
 */
export function rank(values: readonly number[]): number[] {
  const order = values
    .map((value, index) => ({ value, index }))
    .sort((a, b) => a.value - b.value);

  const ranks = new Array<number>(values.length).fill(0);
  let start = 0;
  while (start < order.length) {
    let end = start;
    while (end + 1 < order.length && order[end + 1]?.value === order[start]?.value) {
      end++;
    }
    const averageRank = (start + end) / 2 + 1;
    for (let k = start; k <= end; k++) {
      const entry = order[k];
      if (entry) {
        ranks[entry.index] = averageRank;
      }
    }
    start = end + 1;
  }

  return ranks;
}

/**
 * Spearman rank correlation: Pearson over average ranks.
 *
 * @param xs - First series
 * @param ys - Second series
 * @returns Coefficient in [-1, 1]
 * @throws UndefinedCorrelationError if either series is constant
 */
export function spearman(xs: readonly number[], ys: readonly number[]): number {
  try {
    return pearson(rank(xs), rank(ys));
  } catch (error) {
    if (error instanceof UndefinedCorrelationError) {
      throw new UndefinedCorrelationError(error.message, "spearman");
    }
    throw error;
  }
}

/**
 * Correlation between human and judge scores.
 *
 * @param items - Evaluation items (items missing a score are ignored)
 * @param method - "pearson" or "spearman"
 * @returns Coefficient in [-1, 1]
 * @throws InsufficientDataError if fewer than 2 items are scorable
 * @throws UndefinedCorrelationError if either side has zero variance
 */
export function calculateCorrelation(
  items: readonly EvaluationItem[],
  method: CorrelationMethod = "pearson",
): number {
  const { scorable } = partitionScorable(items);
  if (scorable.length < 2) {
    throw new InsufficientDataError(
      `Correlation needs at least 2 scored items, got ${String(scorable.length)}`,
      2,
      scorable.length,
    );
  }

  const human = scorable.map((item) => item.human_score);
  const judge = scorable.map((item) => item.judge_score);

  return method === "spearman" ? spearman(human, judge) : pearson(human, judge);
}
