/**
 * Ranking of judge configurations.
 *
 * Higher kappa wins; ties go to the higher agreement rate, then to the
 * configuration registered first.
 */

import { NoSuccessfulRunsError } from "../errors.js";

import type {
  AlignmentResult,
  ComparisonEntry,
  ComparisonResults,
  SuccessfulComparisonEntry,
} from "../types/index.js";

/**
 * Order two results best-first by kappa, then agreement rate.
 *
 * @returns Negative if `a` ranks above `b`, positive if below, 0 if tied
 */
export function compareResults(a: AlignmentResult, b: AlignmentResult): number {
  if (a.kappa_score !== b.kappa_score) {
    return b.kappa_score - a.kappa_score;
  }
  return b.agreement_rate - a.agreement_rate;
}

/**
 * Order two successful entries best-first, registration order last.
 */
export function compareEntries(
  a: SuccessfulComparisonEntry,
  b: SuccessfulComparisonEntry,
): number {
  return (
    compareResults(a.result, b.result) ||
    a.registration_index - b.registration_index
  );
}

/**
 * Narrow an entry to a successful one.
 */
export function isSuccessfulEntry(
  entry: ComparisonEntry,
): entry is SuccessfulComparisonEntry {
  return entry.status === "success";
}

/**
 * Successful entries, best first.
 *
 * @param entries - Entries in any order
 * @returns Ranked successful entries
 */
export function rankEntries(
  entries: readonly ComparisonEntry[],
): SuccessfulComparisonEntry[] {
  return entries.filter(isSuccessfulEntry).sort(compareEntries);
}

/**
 * Full ranking of a comparison's successful configurations.
 *
 * @param results - Comparison results
 * @returns Ranked successful entries (failed and cancelled omitted)
 */
export function getRankedEntries(
  results: ComparisonResults,
): SuccessfulComparisonEntry[] {
  return rankEntries(results.entries);
}

/**
 * Best successful entry of a comparison.
 *
 * @param results - Comparison results
 * @returns Top-ranked entry
 * @throws NoSuccessfulRunsError if no configuration succeeded
 */
export function getBest(results: ComparisonResults): SuccessfulComparisonEntry {
  const [best] = getRankedEntries(results);
  if (!best) {
    throw new NoSuccessfulRunsError(
      `None of the ${String(results.entries.length)} judge configurations produced a result`,
      results,
    );
  }
  return best;
}
