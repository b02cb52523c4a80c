/**
 * Run identifiers.
 */

import { nanoid } from "nanoid";

/**
 * Generate a unique run ID.
 *
 * Format: YYYYMMDD-HHMMSS-XXXX (timestamp + random suffix)
 *
 * @param now - Clock reading to stamp the ID with
 * @returns Unique run identifier
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = [
    now.getFullYear(),
    String(now.getMonth() + 1).padStart(2, "0"),
    String(now.getDate()).padStart(2, "0"),
  ].join("");

  const timePart = [
    String(now.getHours()).padStart(2, "0"),
    String(now.getMinutes()).padStart(2, "0"),
    String(now.getSeconds()).padStart(2, "0"),
  ].join("");

  return `${datePart}-${timePart}-${nanoid(4)}`;
}
