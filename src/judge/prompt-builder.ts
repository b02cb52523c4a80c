/**
 * Judge prompt construction.
 */

import type { ScoreRange } from "../types/index.js";

/**
 * User prompt template.
 */
const USER_PROMPT_TEMPLATE = `Question: {{input_text}}

Response: {{response_text}}`;

const PLACEHOLDER = /\{\{(input_text|response_text)\}\}/g;

/**
 * Build the system prompt: the configured instructions followed by the
 * output constraint for the active range.
 *
 * @param prompt - Judge instructions
 * @param range - Active score range
 * @returns System prompt
 */
export function buildSystemPrompt(prompt: string, range: ScoreRange): string {
  return `${prompt.trimEnd()}

You must respond with ONLY a number between ${String(range.min)} and ${String(range.max)}.`;
}

/**
 * Build the user prompt for one item.
 *
 * @param inputText - Question under evaluation
 * @param responseText - Response being scored
 * @returns User prompt
 */
export function buildUserPrompt(inputText: string, responseText: string): string {
  // One pass over the template: placeholders inside the texts stay literal
  return USER_PROMPT_TEMPLATE.replace(PLACEHOLDER, (_match, key: string) =>
    key === "input_text" ? inputText : responseText,
  );
}
