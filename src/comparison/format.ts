/**
 * Text rendering of comparison results.
 */

import { table, type ColumnAlign } from "../utils/logging.js";

import { getRankedEntries } from "./ranking.js";

import type { ComparisonEntry, ComparisonResults } from "../types/index.js";

const COLUMN_ALIGN: readonly ColumnAlign[] = [
  "right",
  "left",
  "left",
  "right",
  "right",
  "right",
  "right",
  "right",
  "left",
];

function statusText(entry: ComparisonEntry): string {
  switch (entry.status) {
    case "success":
      return "ok";
    case "failed":
      return entry.failed_items > 0
        ? `failed (${String(entry.failed_items)} items)`
        : "failed";
    case "cancelled":
      return "cancelled";
  }
}

/**
 * Render the ranking table: successful configurations by rank, then the
 * failed and cancelled ones in registration order.
 *
 * @param results - Comparison results
 * @returns Table followed by the best configuration line
 */
export function formatComparison(results: ComparisonResults): string {
  const headers = [
    "Rank",
    "Name",
    "Model",
    "Temp",
    "Kappa",
    "Agreement",
    "Correlation",
    "N",
    "Status",
  ];

  const ranked = getRankedEntries(results);
  const rankedRows = ranked.map((entry, i) => [
    String(i + 1),
    entry.label,
    entry.config.model,
    String(entry.config.temperature),
    entry.result.kappa_score.toFixed(3),
    `${(entry.result.agreement_rate * 100).toFixed(1)}%`,
    entry.result.correlation === null ? "n/a" : entry.result.correlation.toFixed(3),
    String(entry.result.sample_size),
    statusText(entry),
  ]);

  const otherRows = results.entries
    .filter((entry) => entry.status !== "success")
    .map((entry) => [
      "-",
      entry.label,
      entry.config.model,
      String(entry.config.temperature),
      "-",
      "-",
      "-",
      "-",
      statusText(entry),
    ]);

  const lines = [
    table(headers, [...rankedRows, ...otherRows], COLUMN_ALIGN),
    "",
  ];

  if (results.best) {
    lines.push(
      `Best: ${results.best.label} (kappa ${results.best.result.kappa_score.toFixed(3)})`,
    );
  } else {
    lines.push("Best: none (no configuration succeeded)");
  }

  if (results.cancelled) {
    lines.push("Comparison was cancelled before every configuration ran.");
  }

  return lines.join("\n");
}
