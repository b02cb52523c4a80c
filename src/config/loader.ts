/**
 * Configuration loader with YAML/JSON support and Zod validation.
 */

import { existsSync, readFileSync } from "node:fs";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import { ConfigLoadError, ConfigValidationError } from "../errors.js";

import { createDefaultConfig } from "./defaults.js";
import { AlignConfigSchema } from "./schema.js";

import type {
  AlignConfig,
  CorrelationMethod,
  KappaWeighting,
} from "../types/index.js";

/**
 * Load configuration from YAML or JSON file.
 *
 * @param configPath - Path to configuration file
 * @returns Validated configuration
 * @throws ConfigLoadError if file cannot be loaded
 * @throws ConfigValidationError if validation fails
 */
export function loadConfig(configPath: string): AlignConfig {
  const absolutePath = path.resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigLoadError(`Configuration file not found: ${absolutePath}`);
  }

  let content: string;
  try {
    content = readFileSync(absolutePath, "utf-8");
  } catch (err) {
    throw new ConfigLoadError(
      `Failed to read configuration file: ${absolutePath}`,
      err instanceof Error ? err : undefined,
    );
  }

  // Parse based on extension
  let rawConfig: unknown;
  const ext = path.extname(absolutePath).toLowerCase();

  try {
    if (ext === ".json") {
      rawConfig = JSON.parse(content);
    } else {
      // YAML is a superset of JSON, so it handles .yaml, .yml and the rest
      rawConfig = parseYaml(content);
    }
  } catch (err) {
    throw new ConfigLoadError(
      `Failed to parse configuration file: ${absolutePath}`,
      err instanceof Error ? err : undefined,
    );
  }

  return validateConfig(rawConfig);
}

/**
 * Validate raw configuration object.
 *
 * @param rawConfig - Raw configuration object
 * @returns Validated configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(rawConfig: unknown): AlignConfig {
  const result = AlignConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new ConfigValidationError(
      `Configuration validation failed:\n${issues}`,
      result.error,
    );
  }

  return result.data;
}

/**
 * CLI options that can override config.
 */
export interface CLIOptions {
  data?: string;
  judgeColumn?: string;
  prompt?: string;
  model?: string;
  temperature?: number;
  concurrency?: number;
  weighting?: KappaWeighting;
  correlation?: CorrelationMethod;
  tolerance?: number;
  output?: "json" | "yaml";
  verbose?: boolean;
  debug?: boolean;
}

/**
 * Load configuration with CLI overrides.
 *
 * @param configPath - Path to configuration file (optional)
 * @param cliOptions - CLI option overrides
 * @returns Validated configuration
 */
export function loadConfigWithOverrides(
  configPath: string | undefined,
  cliOptions: Partial<CLIOptions>,
): AlignConfig {
  let config: AlignConfig;

  if (configPath) {
    config = loadConfig(configPath);
  } else if (cliOptions.data) {
    config = createDefaultConfig(cliOptions.data);
  } else {
    throw new ConfigLoadError("Either config file or --data path is required");
  }

  // Re-validate so overrides go through the same range checks
  return validateConfig(applyOverrides(config, cliOptions));
}

/**
 * Apply CLI overrides to configuration.
 *
 * @param config - Base configuration
 * @param options - CLI options
 * @returns Configuration with overrides applied
 */
function applyOverrides(
  config: AlignConfig,
  options: Partial<CLIOptions>,
): AlignConfig {
  const result = { ...config };

  if (options.data) {
    result.data = { ...result.data, path: options.data };
  }

  if (options.judgeColumn) {
    result.data = { ...result.data, judge_score_column: options.judgeColumn };
  }

  if (options.prompt) {
    // A prompt on the command line replaces the configured judges
    result.judges = [{ prompt: options.prompt, params: {} }];
  }

  if (options.model) {
    result.judge = { ...result.judge, model: options.model };
  }

  if (options.temperature !== undefined) {
    result.judge = { ...result.judge, temperature: options.temperature };
  }

  if (options.concurrency !== undefined) {
    result.max_concurrent = options.concurrency;
  }

  if (options.weighting) {
    result.metrics = { ...result.metrics, kappa_weighting: options.weighting };
  }

  if (options.correlation) {
    result.metrics = {
      ...result.metrics,
      correlation_method: options.correlation,
    };
  }

  if (options.tolerance !== undefined) {
    result.metrics = { ...result.metrics, tolerance: options.tolerance };
  }

  if (options.output) {
    result.output = { ...result.output, format: options.output };
  }

  if (options.verbose !== undefined) {
    result.verbose = options.verbose;
  }

  if (options.debug !== undefined) {
    result.debug = options.debug;
  }

  return result;
}

/**
 * Resolve short model names to full model IDs.
 *
 * @param modelName - Short or full model name
 * @returns Full model ID
 */
export function resolveModelId(modelName: string): string {
  const modelAliases: Record<string, string> = {
    opus: "claude-opus-4-1-20250805",
    "claude-opus-4.1": "claude-opus-4-1-20250805",
    sonnet: "claude-sonnet-4-5-20250929",
    "claude-sonnet-4.5": "claude-sonnet-4-5-20250929",
    "claude-sonnet-4": "claude-sonnet-4-20250514",
    haiku: "claude-3-5-haiku-20241022",
    "claude-haiku-3.5": "claude-3-5-haiku-20241022",
  };

  return modelAliases[modelName] ?? modelName;
}
