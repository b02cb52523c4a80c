import { describe, expect, it } from "vitest";

import { InsufficientDataError } from "../../../src/errors.js";
import { calculateAgreementRate } from "../../../src/metrics/agreement.js";
import { makeItems } from "../../mocks/items.js";

describe("calculateAgreementRate", () => {
  it("returns 1 for identical scores", () => {
    expect(calculateAgreementRate(makeItems([1, 2, 3], [1, 2, 3]))).toBe(1);
  });

  it("counts exact matches at tolerance 0", () => {
    const items = makeItems([1, 2, 3, 4], [1, 3, 3, 5]);

    expect(calculateAgreementRate(items)).toBe(0.5);
  });

  it("counts differences up to the tolerance", () => {
    const items = makeItems([1, 2, 3, 4], [1, 3, 3, 5]);

    expect(calculateAgreementRate(items, 0.5)).toBe(0.5);
    expect(calculateAgreementRate(items, 1)).toBe(1);
  });

  it("never decreases as tolerance grows", () => {
    const items = makeItems([1, 2, 3, 4, 5], [5, 3, 1, 4, 2]);
    const rates = [0, 1, 2, 3, 4].map((t) => calculateAgreementRate(items, t));

    expect(rates).toEqual([0.2, 0.4, 0.6, 0.8, 1]);
  });

  it("absorbs float noise at the tolerance boundary", () => {
    const items = makeItems([0.3, 0.5], [0.1 + 0.2, 0.4]);

    expect(calculateAgreementRate(items)).toBe(0.5);
    expect(calculateAgreementRate(items, 0.1)).toBe(1);
  });

  it("ignores items missing a score", () => {
    const items = makeItems([1, 2, null], [1, 4, 3]);

    expect(calculateAgreementRate(items)).toBe(0.5);
  });

  it("rejects a negative or non-numeric tolerance", () => {
    const items = makeItems([1], [1]);

    expect(() => calculateAgreementRate(items, -1)).toThrow(
      "Tolerance must be a non-negative number, got -1",
    );
    expect(() => calculateAgreementRate(items, Number.NaN)).toThrow(RangeError);
  });

  it("requires at least one scorable item", () => {
    expect(() => calculateAgreementRate(makeItems([1], [null]))).toThrow(
      InsufficientDataError,
    );
  });
});
