/**
 * Environment loading for the CLI.
 *
 * Imported first by the entry point so `.env` values are in place before
 * any other module reads `process.env`. dotenv v17+ logs what it injects
 * unless `quiet` is set.
 */
import dotenv from "dotenv";

dotenv.config({ quiet: true });

/**
 * Anthropic API key from the environment, if set and non-empty.
 */
export function readApiKey(): string | undefined {
  const key = process.env["ANTHROPIC_API_KEY"]?.trim();
  return key ? key : undefined;
}
