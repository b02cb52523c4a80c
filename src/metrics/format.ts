/**
 * Text rendering of alignment results.
 */

import { table, type ColumnAlign } from "../utils/logging.js";

import type { AlignmentResult, ConfusionMatrix } from "../types/index.js";

/**
 * Render a confusion matrix as a table, human buckets down the side and
 * judge buckets across the top.
 *
 * @param matrix - Confusion matrix
 * @returns Table string
 */
export function formatConfusionMatrix(matrix: ConfusionMatrix): string {
  const headers = ["human \\ judge", ...matrix.labels.map(String)];
  const rows = matrix.labels.map((label, i) => [
    String(label),
    ...(matrix.counts[i] ?? []).map(String),
  ]);
  return table(headers, rows, [
    "left",
    ...matrix.labels.map((): ColumnAlign => "right"),
  ]);
}

/**
 * Format an alignment result for display.
 *
 * @param result - Alignment result
 * @returns Formatted string
 */
export function formatAlignmentResult(result: AlignmentResult): string {
  const correlation =
    result.correlation === null ? "undefined" : result.correlation.toFixed(3);

  const lines: string[] = [
    "Alignment Metrics:",
    "─".repeat(40),
    "",
    `Score Range:        ${result.score_range.name} [${String(result.score_range.min)}, ${String(result.score_range.max)}]`,
    `Sample Size:        ${String(result.sample_size)}`,
    `Kappa (${result.kappa_weighting}):`.padEnd(20) + result.kappa_score.toFixed(3),
    `Agreement (±${String(result.tolerance)}):`.padEnd(20) +
      `${(result.agreement_rate * 100).toFixed(1)}%`,
    `Correlation:        ${correlation} (${result.correlation_method})`,
  ];

  if (result.excluded_count > 0) {
    lines.push("");
    lines.push(`Excluded Items:     ${String(result.excluded_count)}`);
    if (result.failed_count > 0) {
      lines.push(`  - Judge failures: ${String(result.failed_count)}`);
    }
  }

  if (result.judge_config) {
    lines.push("");
    lines.push(
      `Judge:              ${result.judge_config.name ?? result.judge_config.model} (temperature ${String(result.judge_config.temperature)})`,
    );
  }

  lines.push("");
  lines.push("Confusion Matrix:");
  lines.push(formatConfusionMatrix(result.confusion_matrix));
  lines.push("");
  lines.push("─".repeat(40));

  return lines.join("\n");
}
