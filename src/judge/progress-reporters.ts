/**
 * Progress reporters for judge runs.
 *
 * Pre-built callback sets for reporting progress while a batch of judge
 * calls is in flight.
 */

import { DEFAULT_TUNING } from "../config/defaults.js";
import { progressLine, sectionHeader } from "../utils/logging.js";

import type { ProgressCallbacks } from "../types/index.js";

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

/**
 * Default console progress reporter.
 *
 * Uses carriage return for in-place updates while items are scored.
 *
 * @example
 * ```typescript
 * const tracker = new AlignmentTracker({ executor, progress: consoleProgress });
 * ```
 */
export const consoleProgress: ProgressCallbacks = {
  onRunStart: (label, total) => {
    console.log("");
    sectionHeader(`Judge: ${label}`, total);
  },

  onItemComplete: (_item, _score, completed, total) => {
    process.stdout.write(`\rScored ${progressLine(completed, total)}`);
  },

  onRunComplete: (label, durationMs, count) => {
    const durationSec = (durationMs / 1000).toFixed(1);
    console.log(
      `\n✅ ${label} complete: ${String(count)} items in ${durationSec}s`,
    );
  },

  onError: (error, item) => {
    const itemInfo = item
      ? ` for "${truncate(item.input_text, DEFAULT_TUNING.limits.prompt_display_length)}"`
      : "";
    console.error(`\n❌ Judge error${itemInfo}: ${error.message}`);
  },
};

/**
 * Verbose progress reporter: one line per scored item.
 */
export const verboseProgress: ProgressCallbacks = {
  ...consoleProgress,

  onItemComplete: (item, score, completed, total) => {
    const maxLen = DEFAULT_TUNING.limits.prompt_display_length;
    console.log(
      `[${String(completed)}/${String(total)}] judge=${String(score)} human=${String(item.human_score)} | ${truncate(item.input_text, maxLen)}`,
    );
  },
};

/**
 * Silent progress reporter.
 *
 * No output - useful for testing or library use.
 */
export const silentProgress: ProgressCallbacks = {};

/**
 * Create a custom progress reporter by merging with defaults.
 *
 * @param overrides - Callbacks to override
 * @param base - Base callbacks to extend (defaults to consoleProgress)
 * @returns Merged progress callbacks
 */
export function createProgressReporter(
  overrides: Partial<ProgressCallbacks>,
  base: ProgressCallbacks = consoleProgress,
): ProgressCallbacks {
  return {
    ...base,
    ...overrides,
  };
}
