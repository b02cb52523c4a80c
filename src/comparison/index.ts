/**
 * Judge comparison.
 */

export {
  JudgeComparison,
  type JudgeComparisonOptions,
  type RunComparisonOptions,
} from "./judge-comparison.js";
export {
  compareEntries,
  compareResults,
  getBest,
  getRankedEntries,
  isSuccessfulEntry,
  rankEntries,
} from "./ranking.js";
export { getDisagreementItems } from "./disagreement.js";
export { formatComparison } from "./format.js";
