/**
 * Retry with exponential backoff for judge API calls.
 * Used by judge executors; the alignment core itself never retries.
 */

import { APIConnectionError, APIUserAbortError } from "@anthropic-ai/sdk";

import { DEFAULT_TUNING } from "../config/defaults.js";

import type { TuningConfig } from "../types/index.js";

/**
 * Retry options.
 */
export interface RetryOptions {
  /** Maximum number of retries */
  maxRetries: number;
  /** Initial delay in milliseconds */
  initialDelayMs: number;
  /** Maximum delay in milliseconds */
  maxDelayMs: number;
  /** Backoff multiplier */
  backoffMultiplier: number;
  /** Jitter factor (0-1) to add randomness */
  jitterFactor: number;
  /** Function to determine if error is retryable */
  isRetryable?: (error: unknown) => boolean;
  /** Callback on retry */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** No further attempts are made once aborted */
  signal?: AbortSignal | undefined;
}

/**
 * Default retry options.
 * Values are sourced from DEFAULT_TUNING for centralized configuration.
 */
export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: DEFAULT_TUNING.retry.max_retries,
  initialDelayMs: DEFAULT_TUNING.timeouts.retry_initial_ms,
  maxDelayMs: DEFAULT_TUNING.timeouts.retry_max_ms,
  backoffMultiplier: DEFAULT_TUNING.retry.backoff_multiplier,
  jitterFactor: DEFAULT_TUNING.retry.jitter_factor,
  isRetryable: isTransientError,
};

/**
 * Create retry options from tuning configuration.
 *
 * @param tuning - Tuning configuration
 * @returns Retry options based on tuning config
 */
export function createRetryOptionsFromTuning(
  tuning: TuningConfig,
): RetryOptions {
  return {
    maxRetries: tuning.retry.max_retries,
    initialDelayMs: tuning.timeouts.retry_initial_ms,
    maxDelayMs: tuning.timeouts.retry_max_ms,
    backoffMultiplier: tuning.retry.backoff_multiplier,
    jitterFactor: tuning.retry.jitter_factor,
    isRetryable: isTransientError,
  };
}

/**
 * Read an HTTP status from an error-like value, if it carries one.
 */
function getStatusCode(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}

const TRANSIENT_MESSAGES = [
  "rate limit",
  "too many requests",
  "overloaded",
  "temporarily unavailable",
  "network",
  "timeout",
  "timed out",
  "econnreset",
  "econnrefused",
  "socket hang up",
];

/**
 * Whether a failed judge call is worth repeating.
 *
 * Rate limits (429), server errors and overload (5xx, including 529) and
 * connection failures are transient. A call aborted by the caller never is.
 *
 * @param error - The error to check
 * @returns True if the error is transient
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof APIUserAbortError) {
    return false;
  }
  if (error instanceof APIConnectionError) {
    return true;
  }

  const status = getStatusCode(error);
  if (status !== undefined) {
    return status === 429 || (status >= 500 && status < 600);
  }

  if (!(error instanceof Error)) {
    return false;
  }
  const message = error.message.toLowerCase();
  return TRANSIENT_MESSAGES.some((fragment) => message.includes(fragment));
}

/**
 * Calculate delay for a retry attempt with exponential backoff and jitter.
 *
 * @param attempt - Current attempt number (0-indexed)
 * @param options - Retry options
 * @returns Delay in milliseconds
 */
export function calculateDelay(attempt: number, options: RetryOptions): number {
  const exponentialDelay =
    options.initialDelayMs * Math.pow(options.backoffMultiplier, attempt);

  const cappedDelay = Math.min(exponentialDelay, options.maxDelayMs);

  const jitter = cappedDelay * options.jitterFactor * Math.random();

  return Math.floor(cappedDelay + jitter);
}

/**
 * Wait for `ms`, waking early if the signal aborts.
 *
 * @param ms - Duration in milliseconds
 * @param signal - Cuts the wait short when aborted
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Run a judge call, repeating it after transient failures.
 *
 * Aborting the signal stops the retries: a pending backoff wait ends at
 * once and the last error is rethrown.
 *
 * @param fn - Call to make
 * @param options - Retry options (optional)
 * @returns Result of the first successful call
 * @throws The last error once retries are exhausted, the error is not
 * retryable or the signal has aborted
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const isRetryable = opts.isRetryable ?? isTransientError;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (
        attempt >= opts.maxRetries ||
        opts.signal?.aborted === true ||
        !isRetryable(error)
      ) {
        throw error;
      }

      const delayMs = calculateDelay(attempt, opts);
      opts.onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs, opts.signal);

      if (opts.signal?.aborted) {
        throw error;
      }
    }
  }
}
