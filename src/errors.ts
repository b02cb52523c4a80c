/**
 * Error taxonomy for alignment measurement and judge comparison.
 */

import type {
  ComparisonResults,
  CorrelationMethod,
  JudgeConfig,
  ScoreRange,
} from "./types/index.js";
import type { ZodError } from "zod";

/**
 * A score lies outside the configured range, or a range is malformed.
 */
export class ScoreRangeError extends Error {
  constructor(
    message: string,
    public readonly value: number | null = null,
    public readonly range: ScoreRange | null = null,
  ) {
    super(message);
    this.name = "ScoreRangeError";
  }
}

/**
 * Too few scorable items for a statistic.
 */
export class InsufficientDataError extends Error {
  constructor(
    message: string,
    public readonly required: number,
    public readonly actual: number,
  ) {
    super(message);
    this.name = "InsufficientDataError";
  }
}

/**
 * Correlation is undefined because a score sequence has zero variance.
 */
export class UndefinedCorrelationError extends Error {
  constructor(
    message: string,
    public readonly method: CorrelationMethod,
  ) {
    super(message);
    this.name = "UndefinedCorrelationError";
  }
}

/**
 * The tracker has no items to evaluate.
 */
export class NoDataError extends Error {
  constructor(message = "No evaluation items loaded. Load data first.") {
    super(message);
    this.name = "NoDataError";
  }
}

/**
 * No judge configuration has been set on the tracker.
 */
export class JudgeNotConfiguredError extends Error {
  constructor(message = "No judge configured. Call setJudge() first.") {
    super(message);
    this.name = "JudgeNotConfiguredError";
  }
}

/**
 * A configuration equal by value to a registered one was added.
 */
export class DuplicateConfigError extends Error {
  constructor(
    message: string,
    public readonly config: JudgeConfig,
  ) {
    super(message);
    this.name = "DuplicateConfigError";
  }
}

/**
 * The judge executor failed to produce a score.
 */
export class JudgeExecutionError extends Error {
  override readonly cause?: Error | undefined;

  constructor(
    message: string,
    public readonly config: JudgeConfig | null,
    cause?: Error,
  ) {
    super(message);
    this.name = "JudgeExecutionError";
    this.cause = cause;
  }
}

/**
 * Every configuration in a comparison failed.
 */
export class NoSuccessfulRunsError extends Error {
  constructor(
    message: string,
    public readonly results: ComparisonResults | null = null,
  ) {
    super(message);
    this.name = "NoSuccessfulRunsError";
  }
}

/**
 * A run was started while another run holds the same item set.
 */
export class ConcurrentRunError extends Error {
  constructor(
    message = "A run is already in progress for this item set. Await it before starting another.",
  ) {
    super(message);
    this.name = "ConcurrentRunError";
  }
}

/**
 * A run was aborted through its AbortSignal.
 */
export class RunCancelledError extends Error {
  constructor(message = "Run cancelled") {
    super(message);
    this.name = "RunCancelledError";
  }
}

/**
 * Human scores could not be loaded from a source.
 */
export class DataLoadError extends Error {
  override readonly cause?: Error | undefined;

  constructor(
    message: string,
    public readonly source: string,
    public readonly row: number | null = null,
    cause?: Error,
  ) {
    super(message);
    this.name = "DataLoadError";
    this.cause = cause;
  }
}

/**
 * Configuration load error.
 */
export class ConfigLoadError extends Error {
  override readonly cause?: Error | undefined;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = "ConfigLoadError";
    this.cause = cause;
  }
}

/**
 * Configuration validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly zodError: ZodError,
  ) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

/**
 * Normalize an unknown thrown value into an Error.
 *
 * @param err - Thrown value
 * @returns The value if it is an Error, otherwise a wrapping Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
