/**
 * Cohen's kappa - chance-corrected agreement between human and judge.
 *
 * All variants use the weighted formulation
 *
 *   p_o = 1 - Σ w_ij · O_ij      p_e = 1 - Σ w_ij · E_ij
 *   κ   = (p_o - p_e) / (1 - p_e)
 *
 * where O is the observed joint distribution of bucket pairs, E the
 * product of the marginals, and w the disagreement cost between bucket
 * indices scaled to [0, 1]:
 * - none:      0 on the diagonal, 1 elsewhere (plain Cohen's kappa)
 * - linear:    |i - j| / (k - 1)
 * - quadratic: ((i - j) / (k - 1))²
 */

import { DEFAULT_CONTINUOUS_BINS } from "../config/defaults.js";
import { InsufficientDataError } from "../errors.js";
import { partitionScorable } from "../scoring/evaluation-item.js";

import {
  getColumnTotals,
  getConfusionMatrix,
  getRowTotals,
} from "./confusion-matrix.js";

import type {
  EvaluationItem,
  KappaWeighting,
  ScoreRange,
} from "../types/index.js";

/**
 * Minimum scorable items for kappa.
 */
export const MIN_KAPPA_ITEMS = 2;

/**
 * Kappa options.
 */
export interface KappaOptions {
  weighting?: KappaWeighting;
  continuousBins?: number;
}

/**
 * Disagreement cost between two bucket indices.
 *
 * @param i - Row bucket index
 * @param j - Column bucket index
 * @param bucketCount - Number of buckets
 * @param weighting - Weighting scheme
 * @returns Cost in [0, 1]
 */
export function disagreementWeight(
  i: number,
  j: number,
  bucketCount: number,
  weighting: KappaWeighting,
): number {
  if (i === j) {
    return 0;
  }

  const distance = Math.abs(i - j) / Math.max(bucketCount - 1, 1);

  switch (weighting) {
    case "none":
      return 1;
    case "linear":
      return distance;
    case "quadratic":
      return distance * distance;
  }
}

/**
 * Calculate Cohen's kappa between human and judge scores.
 *
 * Scores are discretized to the range's buckets first. When chance
 * agreement is already 1 (both sides put every item in the same bucket)
 * the formula is 0/0; that case returns 1.0 since the agreement is
 * perfect.
 *
 * @param items - Evaluation items (items missing a score are ignored)
 * @param range - Active score range
 * @param options - Weighting and continuous bin count
 * @returns Kappa in [-1, 1]
 * @throws InsufficientDataError if fewer than 2 items are scorable
 *
 * @example
 * ```typescript
 * calculateKappa(items, ScoreRange.FIVE_POINT, { weighting: "quadratic" });
 * ```
 */
export function calculateKappa(
  items: readonly EvaluationItem[],
  range: ScoreRange,
  options: KappaOptions = {},
): number {
  const weighting = options.weighting ?? "none";
  const continuousBins = options.continuousBins ?? DEFAULT_CONTINUOUS_BINS;

  const { scorable } = partitionScorable(items);
  if (scorable.length < MIN_KAPPA_ITEMS) {
    throw new InsufficientDataError(
      `Kappa needs at least ${String(MIN_KAPPA_ITEMS)} scored items, got ${String(scorable.length)}`,
      MIN_KAPPA_ITEMS,
      scorable.length,
    );
  }

  const matrix = getConfusionMatrix(scorable, range, continuousBins);
  const n = scorable.length;
  const k = matrix.labels.length;
  const rowTotals = getRowTotals(matrix);
  const colTotals = getColumnTotals(matrix);

  let observedDisagreement = 0;
  let expectedDisagreement = 0;

  for (let i = 0; i < k; i++) {
    const row = matrix.counts[i] ?? [];
    const rowTotal = rowTotals[i] ?? 0;
    for (let j = 0; j < k; j++) {
      const weight = disagreementWeight(i, j, k, weighting);
      if (weight === 0) {
        continue;
      }
      observedDisagreement += (weight * (row[j] ?? 0)) / n;
      expectedDisagreement += (weight * rowTotal * (colTotals[j] ?? 0)) / (n * n);
    }
  }

  // Expected agreement of 1: every item in one shared bucket
  if (expectedDisagreement === 0) {
    return 1.0;
  }

  const observedAgreement = 1 - observedDisagreement;
  const expectedAgreement = 1 - expectedDisagreement;

  return (observedAgreement - expectedAgreement) / (1 - expectedAgreement);
}
