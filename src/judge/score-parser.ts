/**
 * Parse a numeric score out of a judge reply.
 */

const NUMBER_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

function toNumber(text: string): number | null {
  // Trailing punctuation such as "4." or "4," from chatty replies
  const cleaned = text.trim().replace(/[.,;:!]+$/, "");
  if (!NUMBER_PATTERN.test(cleaned)) {
    return null;
  }
  return Number(cleaned);
}

/**
 * Extract the score from a reply.
 *
 * The first whitespace-separated token is tried first, then the whole
 * reply.
 *
 * @param reply - Raw reply text
 * @returns Parsed score, or null if the reply holds no number
 *
 * @example
 * ```typescript
 * parseScore("4");            // 4
 * parseScore("3.5 - mostly"); // 3.5
 * parseScore("Great answer"); // null
 * ```
 */
export function parseScore(reply: string): number | null {
  const trimmed = reply.trim();
  if (trimmed === "") {
    return null;
  }

  const firstToken = trimmed.split(/\s+/)[0] ?? "";
  return toNumber(firstToken) ?? toNumber(trimmed);
}
