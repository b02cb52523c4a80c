/**
 * JudgeConfig construction and value equality.
 */

import { DEFAULT_JUDGE } from "../config/defaults.js";
import { resolveModelId } from "../config/loader.js";
import { JudgeConfigSchema } from "../config/schema.js";
import { ConfigValidationError } from "../errors.js";

import type {
  JudgeConfig,
  JudgeConfigInput,
  JudgeDefaults,
} from "../types/index.js";

/**
 * Build a frozen JudgeConfig, filling model and temperature from defaults.
 *
 * @param input - Prompt plus optional overrides
 * @param defaults - Shared judge defaults
 * @returns Immutable configuration
 * @throws ConfigValidationError if the input is invalid
 *
 * @example
 * ```typescript
 * const strict = createJudgeConfig({
 *   name: "strict",
 *   prompt: "Score the answer for factual accuracy.",
 *   temperature: 0,
 * });
 * ```
 */
export function createJudgeConfig(
  input: JudgeConfigInput,
  defaults: Pick<JudgeDefaults, "model" | "temperature"> = DEFAULT_JUDGE,
): JudgeConfig {
  const parsed = JudgeConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigValidationError(
      `Invalid judge configuration: ${issues}`,
      parsed.error,
    );
  }

  const { name, prompt, model, temperature, params } = parsed.data;

  return Object.freeze({
    name,
    prompt,
    model: model ?? defaults.model,
    temperature: temperature ?? defaults.temperature,
    params: Object.freeze({ ...params }),
  });
}

/**
 * JSON with object keys sorted at every level, so equal values always
 * serialize identically.
 *
 * @param value - Value to serialize
 * @returns Canonical JSON text
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(value, (_key, val: unknown) => {
    if (val === null || typeof val !== "object" || Array.isArray(val)) {
      return val;
    }
    return Object.fromEntries(
      Object.entries(val).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
    );
  });
}

/**
 * Identity key of a configuration. The display name is not part of it,
 * and model aliases compare equal to the full model ID.
 *
 * @param config - Judge configuration
 * @returns Key equal for configurations equal by value
 */
export function configKey(config: JudgeConfig): string {
  return stableStringify({
    prompt: config.prompt,
    model: resolveModelId(config.model),
    temperature: config.temperature,
    params: config.params,
  });
}

/**
 * Value equality over prompt, model, temperature and params.
 */
export function configsEqual(a: JudgeConfig, b: JudgeConfig): boolean {
  return configKey(a) === configKey(b);
}

/**
 * Display label: the config's name, or a positional fallback.
 *
 * @param config - Judge configuration
 * @param index - Registration index (0-based)
 * @returns Label such as "strict" or "judge-2"
 */
export function getConfigLabel(config: JudgeConfig, index: number): string {
  return config.name ?? `judge-${String(index + 1)}`;
}
