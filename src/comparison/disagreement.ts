/**
 * Items on which the compared judges disagree.
 */

import { isSuccessfulEntry } from "./ranking.js";

import type {
  ComparisonResults,
  DisagreementItem,
  EvaluationItem,
} from "../types/index.js";

/**
 * Find items whose judge scores spread by at least `threshold` across the
 * successful configurations.
 *
 * Only items scored by two or more configurations are considered.
 *
 * @param results - Comparison results
 * @param items - The items the comparison ran on, in the same order
 * @param threshold - Minimum max-min spread
 * @returns Disagreements, largest spread first (ties by item order)
 * @throws RangeError if threshold is negative or items do not match the run
 */
export function getDisagreementItems(
  results: ComparisonResults,
  items: readonly EvaluationItem[],
  threshold = 1,
): DisagreementItem[] {
  if (!(threshold >= 0)) {
    throw new RangeError(
      `Disagreement threshold must be a non-negative number, got ${String(threshold)}`,
    );
  }
  if (items.length !== results.item_count) {
    throw new RangeError(
      `Expected the ${String(results.item_count)} compared items, got ${String(items.length)}`,
    );
  }

  const successes = results.entries.filter(isSuccessfulEntry);
  const disagreements: DisagreementItem[] = [];

  items.forEach((item, index) => {
    const scores: Record<string, number> = {};
    for (const entry of successes) {
      const score = entry.judge_scores[index];
      if (score !== null && score !== undefined) {
        scores[entry.label] = score;
      }
    }

    const values = Object.values(scores);
    if (values.length < 2) {
      return;
    }

    const spread = Math.max(...values) - Math.min(...values);
    if (spread >= threshold) {
      disagreements.push({
        index,
        input_text: item.input_text,
        response_text: item.response_text,
        human_score: item.human_score,
        scores,
        spread,
      });
    }
  });

  return disagreements.sort((a, b) => b.spread - a.spread || a.index - b.index);
}
