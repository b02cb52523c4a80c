/**
 * Alignment metrics.
 */

export {
  getConfusionMatrix,
  getCell,
  getRowTotals,
  getColumnTotals,
} from "./confusion-matrix.js";
export {
  calculateKappa,
  disagreementWeight,
  MIN_KAPPA_ITEMS,
  type KappaOptions,
} from "./kappa.js";
export { calculateAgreementRate } from "./agreement.js";
export { calculateCorrelation, pearson, spearman, rank } from "./correlation.js";
export {
  calculateAlignmentResult,
  resolveMetricsOptions,
  type AlignmentContext,
} from "./alignment-metrics.js";
export { formatAlignmentResult, formatConfusionMatrix } from "./format.js";
