import { Mutex } from "async-mutex";
import { describe, expect, it, vi } from "vitest";

import {
  parallel,
  runExclusiveOrReject,
} from "../../../src/utils/concurrency.js";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("parallel", () => {
  it("executes items with concurrency limit", async () => {
    const items = [1, 2, 3, 4, 5];
    const fn = vi.fn().mockImplementation(async (x: number) => x * 2);

    const result = await parallel({ items, concurrency: 2, fn });

    expect(result.results).toEqual([2, 4, 6, 8, 10]);
    expect(result.successCount).toBe(5);
    expect(result.errorCount).toBe(0);
    expect(fn).toHaveBeenCalledTimes(5);
  });

  it("never runs more than the limit at once", async () => {
    let inFlight = 0;
    let peak = 0;

    await parallel({
      items: [1, 2, 3, 4, 5, 6],
      concurrency: 2,
      fn: async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await delay(5);
        inFlight--;
      },
    });

    expect(peak).toBe(2);
  });

  it("keeps results in input order regardless of completion order", async () => {
    const result = await parallel({
      items: [30, 1, 15],
      concurrency: 3,
      fn: async (ms) => {
        await delay(ms);
        return `done-${String(ms)}`;
      },
    });

    expect(result.results).toEqual(["done-30", "done-1", "done-15"]);
  });

  it("handles errors with continueOnError", async () => {
    const result = await parallel({
      items: [1, 2, 3],
      concurrency: 1,
      fn: async (x: number) => {
        if (x === 2) {
          throw new Error("Error on 2");
        }
        return x;
      },
    });

    expect(result.successCount).toBe(2);
    expect(result.errorCount).toBe(1);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.index).toBe(1);
    expect(result.results).toEqual([1, undefined, 3]);
  });

  it("calls callbacks", async () => {
    const onComplete = vi.fn();
    const onError = vi.fn();

    await parallel({
      items: [1, 2],
      concurrency: 1,
      fn: async (x) => {
        if (x === 2) {
          throw new Error("boom");
        }
        return x * 10;
      },
      onComplete,
      onError,
    });

    expect(onComplete).toHaveBeenCalledWith(10, 0, 1, 2);
    expect(onError).toHaveBeenCalledWith(expect.any(Error), 2, 1);
  });

  it("records each failure with its item index", async () => {
    const result = await parallel({
      items: ["a", "b", "c"],
      concurrency: 3,
      fn: (item) =>
        item === "a" ? Promise.resolve(item) : Promise.reject(new Error(item)),
    });

    expect(result.errors.map(({ index, error }) => [index, error.message])).toEqual([
      [1, "b"],
      [2, "c"],
    ]);
  });

  it("skips items not yet started once the signal aborts", async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockImplementation(async (x: number) => {
      if (x === 1) {
        controller.abort();
      }
      return x;
    });

    const result = await parallel({
      items: [1, 2, 3],
      concurrency: 1,
      fn,
      signal: controller.signal,
    });

    expect(fn).toHaveBeenCalledTimes(1);
    expect(result.successCount).toBe(1);
    expect(result.skippedCount).toBe(2);
  });

  it("rejects a concurrency below 1", async () => {
    await expect(
      parallel({ items: [1], concurrency: 0, fn: async (x) => x }),
    ).rejects.toThrow(RangeError);
  });

  it("stops on the first error without continueOnError", async () => {
    await expect(
      parallel({
        items: [1],
        concurrency: 1,
        continueOnError: false,
        fn: () => Promise.reject(new Error("fatal")),
      }),
    ).rejects.toThrow("fatal");
  });
});

describe("runExclusiveOrReject", () => {
  it("runs the function while holding the mutex", async () => {
    const mutex = new Mutex();
    let lockedDuringRun = false;

    const result = await runExclusiveOrReject(
      mutex,
      () => new Error("busy"),
      async () => {
        lockedDuringRun = mutex.isLocked();
        return 42;
      },
    );

    expect(result).toBe(42);
    expect(lockedDuringRun).toBe(true);
    expect(mutex.isLocked()).toBe(false);
  });

  it("rejects instead of queueing while the mutex is held", async () => {
    const mutex = new Mutex();
    const first = runExclusiveOrReject(
      mutex,
      () => new Error("busy"),
      () => delay(10).then(() => "first"),
    );

    await expect(
      runExclusiveOrReject(mutex, () => new Error("busy"), async () => "second"),
    ).rejects.toThrow("busy");
    await expect(first).resolves.toBe("first");
  });

  it("releases the mutex when the function throws", async () => {
    const mutex = new Mutex();

    await expect(
      runExclusiveOrReject(mutex, () => new Error("busy"), () =>
        Promise.reject(new Error("inner")),
      ),
    ).rejects.toThrow("inner");
    expect(mutex.isLocked()).toBe(false);
  });
});
