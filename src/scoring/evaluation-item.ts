/**
 * Evaluation item helpers.
 */

import { assertWithinRange } from "./score-range.js";

import type {
  EvaluationItem,
  ScorableItem,
  ScoreRange,
} from "../types/index.js";

/**
 * Fields accepted when creating an item.
 */
export interface EvaluationItemInput {
  input_text: string;
  response_text: string;
  human_score?: number | null | undefined;
  metadata?: Record<string, unknown> | undefined;
}

/**
 * Create a validated evaluation item.
 *
 * @param input - Item fields
 * @param range - Active score range
 * @returns New item with no judge score
 * @throws Error if a text field is empty
 * @throws ScoreRangeError if the human score is out of range
 */
export function createEvaluationItem(
  input: EvaluationItemInput,
  range: ScoreRange,
): EvaluationItem {
  if (input.input_text.trim() === "") {
    throw new Error("input_text must be a non-empty string");
  }
  if (input.response_text.trim() === "") {
    throw new Error("response_text must be a non-empty string");
  }

  const humanScore = input.human_score ?? null;
  if (humanScore !== null) {
    assertWithinRange(range, humanScore, "Human score");
  }

  return {
    input_text: input.input_text,
    response_text: input.response_text,
    human_score: humanScore,
    judge_score: null,
    metadata: { ...input.metadata },
  };
}

/**
 * Stable identity of an item: its (input_text, response_text) pair.
 *
 * @param item - Item or item fields
 * @returns Key usable in maps
 */
export function getItemKey(
  item: Pick<EvaluationItem, "input_text" | "response_text">,
): string {
  return JSON.stringify([item.input_text, item.response_text]);
}

/**
 * Check whether both score sides are present.
 *
 * @param item - Item to check
 * @returns True if the item can contribute to alignment metrics
 */
export function isScorable(item: EvaluationItem): item is ScorableItem {
  return item.human_score !== null && item.judge_score !== null;
}

/**
 * Split items into the scorable subset and a count of the rest.
 *
 * @param items - Items to partition
 * @returns Scorable items and how many were left out
 */
export function partitionScorable(items: readonly EvaluationItem[]): {
  scorable: ScorableItem[];
  excluded: number;
} {
  const scorable = items.filter(isScorable);
  return { scorable, excluded: items.length - scorable.length };
}

/**
 * Copy items for an isolated run, clearing their judge scores.
 *
 * @param items - Items to copy
 * @returns Independent copies
 */
export function cloneForRun(items: readonly EvaluationItem[]): EvaluationItem[] {
  return items.map((item) => ({
    ...item,
    judge_score: null,
    metadata: { ...item.metadata },
  }));
}
