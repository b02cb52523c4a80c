/**
 * Confusion matrix over discretized score buckets.
 */

import { DEFAULT_CONTINUOUS_BINS } from "../config/defaults.js";
import { partitionScorable } from "../scoring/evaluation-item.js";
import { getScoreBuckets } from "../scoring/score-range.js";

import type {
  ConfusionMatrix,
  EvaluationItem,
  ScoreRange,
} from "../types/index.js";

/**
 * Build the confusion matrix of human (rows) against judge (columns)
 * buckets. Every bucket of the range gets a row and a column, even when
 * empty, so matrices from different runs line up.
 *
 * Items missing either score are ignored.
 *
 * @param items - Evaluation items
 * @param range - Active score range
 * @param continuousBins - Bin count for continuous ranges
 * @returns Labels and counts, ascending by bucket value
 *
 * @example
 * ```typescript
 * const matrix = getConfusionMatrix(items, ScoreRange.BINARY);
 * // matrix.labels: [0, 1]
 * // matrix.counts: [[3, 1], [0, 4]]
 * ```
 */
export function getConfusionMatrix(
  items: readonly EvaluationItem[],
  range: ScoreRange,
  continuousBins: number = DEFAULT_CONTINUOUS_BINS,
): ConfusionMatrix {
  const buckets = getScoreBuckets(range, continuousBins);
  const size = buckets.values.length;
  const counts = Array.from({ length: size }, () =>
    new Array<number>(size).fill(0),
  );

  const { scorable } = partitionScorable(items);
  for (const item of scorable) {
    const row = counts[buckets.indexOf(item.human_score)];
    const col = buckets.indexOf(item.judge_score);
    if (row) {
      row[col] = (row[col] ?? 0) + 1;
    }
  }

  return Object.freeze({
    labels: Object.freeze([...buckets.values]),
    counts: Object.freeze(counts.map((row) => Object.freeze(row))),
  });
}

/**
 * Look up one cell by bucket labels.
 *
 * @param matrix - Confusion matrix
 * @param humanBucket - Row label
 * @param judgeBucket - Column label
 * @returns Count, or 0 for labels not in the matrix
 */
export function getCell(
  matrix: ConfusionMatrix,
  humanBucket: number,
  judgeBucket: number,
): number {
  const row = matrix.labels.indexOf(humanBucket);
  const col = matrix.labels.indexOf(judgeBucket);
  if (row === -1 || col === -1) {
    return 0;
  }
  return matrix.counts[row]?.[col] ?? 0;
}

/**
 * Row sums (human bucket counts).
 *
 * @param matrix - Confusion matrix
 * @returns One total per row
 */
export function getRowTotals(matrix: ConfusionMatrix): number[] {
  return matrix.counts.map((row) => row.reduce((a, b) => a + b, 0));
}

/**
 * Column sums (judge bucket counts).
 *
 * @param matrix - Confusion matrix
 * @returns One total per column
 */
export function getColumnTotals(matrix: ConfusionMatrix): number[] {
  return matrix.labels.map((_, col) =>
    matrix.counts.reduce((sum, row) => sum + (row[col] ?? 0), 0),
  );
}
