/**
 * Judge comparison type definitions.
 */

import type { AlignmentResult } from "./evaluation.js";
import type { JudgeConfig } from "./judge.js";

interface ComparisonEntryBase {
  readonly config: JudgeConfig;
  /** Display label (config name or positional fallback) */
  readonly label: string;
  /** Position in registration order */
  readonly registration_index: number;
}

/**
 * A configuration that produced an alignment result.
 */
export interface SuccessfulComparisonEntry extends ComparisonEntryBase {
  readonly status: "success";
  readonly result: AlignmentResult;
  /** Judge scores aligned with the compared items, in input order */
  readonly judge_scores: readonly (number | null)[];
}

/**
 * A configuration whose run failed. The error is captured, not raised.
 */
export interface FailedComparisonEntry extends ComparisonEntryBase {
  readonly status: "failed";
  readonly error: string;
  readonly error_name: string;
  readonly failed_items: number;
}

/**
 * A configuration that did not finish because the comparison was aborted.
 */
export interface CancelledComparisonEntry extends ComparisonEntryBase {
  readonly status: "cancelled";
}

export type ComparisonEntry =
  | SuccessfulComparisonEntry
  | FailedComparisonEntry
  | CancelledComparisonEntry;

/**
 * Outcome of running every registered configuration.
 */
export interface ComparisonResults {
  /** Entries in registration order */
  readonly entries: readonly ComparisonEntry[];
  /** Highest ranked successful entry, null if none succeeded */
  readonly best: SuccessfulComparisonEntry | null;
  readonly cancelled: boolean;
  readonly item_count: number;
  readonly timestamp: string;
}

/**
 * An item the compared judges disagreed on.
 */
export interface DisagreementItem {
  index: number;
  input_text: string;
  response_text: string;
  human_score: number | null;
  /** Judge score per configuration label */
  scores: Record<string, number>;
  /** max - min of the judge scores */
  spread: number;
}
