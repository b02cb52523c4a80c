/**
 * Concurrency control utilities.
 * Provides semaphore-based parallel execution and single-run guards.
 */

import { Semaphore, type Mutex } from "async-mutex";

/**
 * Options for parallel execution.
 */
export interface ParallelOptions<T, R> {
  /** Items to process */
  items: readonly T[];
  /** Maximum concurrent executions */
  concurrency: number;
  /** Function to execute for each item */
  fn: (item: T, index: number) => Promise<R>;
  /** Callback on each completion */
  onComplete?: (result: R, index: number, completed: number, total: number) => void;
  /** Callback on each error */
  onError?: (error: Error, item: T, index: number) => void;
  /** Whether to continue on error */
  continueOnError?: boolean;
  /** Items not yet started when the signal aborts are skipped */
  signal?: AbortSignal | undefined;
}

/**
 * Result of parallel execution.
 *
 * `results` is indexed like the input: slot i holds item i's result, or
 * undefined if that item failed or was skipped.
 */
export interface ParallelResult<R> {
  results: (R | undefined)[];
  errors: { index: number; error: Error }[];
  successCount: number;
  errorCount: number;
  skippedCount: number;
}

/**
 * Execute functions in parallel with concurrency control.
 *
 * Completion order does not affect the layout of `results`.
 *
 * @param options - Parallel execution options
 * @returns Results and errors
 */
export async function parallel<T, R>(
  options: ParallelOptions<T, R>,
): Promise<ParallelResult<R>> {
  const {
    items,
    concurrency,
    fn,
    onComplete,
    onError,
    continueOnError = true,
    signal,
  } = options;

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(
      `Concurrency must be a positive integer, got ${String(concurrency)}`,
    );
  }

  const semaphore = new Semaphore(concurrency);
  const results = new Array<R | undefined>(items.length).fill(undefined);
  const errors: { index: number; error: Error }[] = [];
  let successCount = 0;
  let errorCount = 0;
  let skippedCount = 0;

  const promises = items.map(async (item, index) => {
    const [, release] = await semaphore.acquire();

    try {
      if (signal?.aborted) {
        skippedCount++;
        return;
      }

      const result = await fn(item, index);
      results[index] = result;
      successCount++;
      onComplete?.(result, index, successCount + errorCount, items.length);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      errors.push({ index, error });
      errorCount++;
      onError?.(error, item, index);

      if (!continueOnError) {
        throw error;
      }
    } finally {
      release();
    }
  });

  if (continueOnError) {
    await Promise.allSettled(promises);
  } else {
    await Promise.all(promises);
  }

  errors.sort((a, b) => a.index - b.index);

  return { results, errors, successCount, errorCount, skippedCount };
}

/**
 * Run a function while holding a mutex, rejecting instead of queueing
 * when the mutex is already held.
 *
 * @param mutex - Mutex guarding the shared resource
 * @param onBusy - Builds the error raised when the mutex is held
 * @param fn - Function to run exclusively
 * @returns Result of the function
 */
export async function runExclusiveOrReject<T>(
  mutex: Mutex,
  onBusy: () => Error,
  fn: () => Promise<T>,
): Promise<T> {
  if (mutex.isLocked()) {
    throw onBusy();
  }
  return mutex.runExclusive(fn);
}
