/**
 * Agreement rate within a tolerance.
 */

import { InsufficientDataError } from "../errors.js";
import { partitionScorable } from "../scoring/evaluation-item.js";

import type { EvaluationItem } from "../types/index.js";

/** Absorbs float noise when a difference equals the tolerance exactly. */
const EPSILON = 1e-9;

/**
 * Fraction of items whose human and judge scores differ by at most
 * `tolerance`. Tolerance 0 is exact-match agreement.
 *
 * @param items - Evaluation items (items missing a score are ignored)
 * @param tolerance - Largest absolute difference still counted as agreement
 * @returns Agreement rate in [0, 1]
 * @throws RangeError if tolerance is negative or not a number
 * @throws InsufficientDataError if no item is scorable
 */
export function calculateAgreementRate(
  items: readonly EvaluationItem[],
  tolerance = 0,
): number {
  if (!(tolerance >= 0)) {
    throw new RangeError(
      `Tolerance must be a non-negative number, got ${String(tolerance)}`,
    );
  }

  const { scorable } = partitionScorable(items);
  if (scorable.length === 0) {
    throw new InsufficientDataError(
      "Agreement rate needs at least 1 scored item, got 0",
      1,
      0,
    );
  }

  const agreeing = scorable.filter(
    (item) => Math.abs(item.human_score - item.judge_score) <= tolerance + EPSILON,
  ).length;

  return agreeing / scorable.length;
}
