/**
 * Score ranges - the closed set of scoring scales and their discretization.
 *
 * Binary, five-point and ten-point scales are discrete: each bucket is one
 * step. Percentage and step-less custom ranges are continuous and are cut
 * into equal-width bins (lower edge used as the bucket label).
 */

import { DEFAULT_CONTINUOUS_BINS } from "../config/defaults.js";
import { ScoreRangeError } from "../errors.js";

import type {
  ScoreBuckets,
  ScoreRangeKind,
  ScoreRange as ScoreRangeShape,
  ScoreRangeSpec,
} from "../types/index.js";

/** Tolerance for floating point comparisons on bounds and steps. */
const EPSILON = 1e-9;

/**
 * Round away floating point noise from bucket labels (0.1 + 0.2 etc).
 */
function tidy(value: number): number {
  return Number(value.toFixed(10));
}

/**
 * Validate a range definition.
 *
 * @param range - Range to validate
 * @throws ScoreRangeError if bounds or step are invalid
 */
export function validateScoreRange(range: ScoreRangeShape): void {
  if (!Number.isFinite(range.min) || !Number.isFinite(range.max)) {
    throw new ScoreRangeError(
      `Score range bounds must be finite numbers (got ${String(range.min)}, ${String(range.max)})`,
      null,
      range,
    );
  }

  if (range.min >= range.max) {
    throw new ScoreRangeError(
      `Score range min must be below max (got ${String(range.min)} >= ${String(range.max)})`,
      null,
      range,
    );
  }

  if (!(range.step > 0) || !Number.isFinite(range.step)) {
    throw new ScoreRangeError(
      `Score range step must be positive (got ${String(range.step)})`,
      null,
      range,
    );
  }

  if (!range.continuous) {
    const steps = (range.max - range.min) / range.step;
    if (Math.abs(steps - Math.round(steps)) > EPSILON) {
      throw new ScoreRangeError(
        `Score range (${String(range.min)}, ${String(range.max)}) is not evenly divisible by step ${String(range.step)}`,
        null,
        range,
      );
    }
  }
}

function defineRange(
  kind: ScoreRangeKind,
  name: string,
  min: number,
  max: number,
  step: number,
  continuous: boolean,
): ScoreRangeShape {
  const range: ScoreRangeShape = Object.freeze({
    kind,
    name,
    min,
    max,
    step,
    continuous,
  });
  validateScoreRange(range);
  return range;
}

/**
 * Build a custom range.
 *
 * Without a step the range is continuous.
 *
 * @param min - Lower bound (inclusive)
 * @param max - Upper bound (inclusive)
 * @param step - Discretization step (optional)
 * @returns Validated range
 * @throws ScoreRangeError if the definition is invalid
 */
export function customScoreRange(
  min: number,
  max: number,
  step?: number,
): ScoreRangeShape {
  if (step === undefined) {
    return defineRange("custom", "CUSTOM", min, max, (max - min) / 100, true);
  }
  return defineRange("custom", "CUSTOM", min, max, step, false);
}

/**
 * Standard scoring scales.
 */
export const ScoreRange = {
  /** Pass/fail */
  BINARY: defineRange("binary", "BINARY", 0, 1, 1, false),
  /** Likert scale */
  FIVE_POINT: defineRange("five_point", "FIVE_POINT", 1, 5, 1, false),
  /** 1-10 rating */
  TEN_POINT: defineRange("ten_point", "TEN_POINT", 1, 10, 1, false),
  /** 0-100, treated as continuous */
  PERCENTAGE: defineRange("percentage", "PERCENTAGE", 0, 100, 1, true),
  custom: customScoreRange,
} as const;

export type ScoreRange = ScoreRangeShape;

/**
 * Resolve a serializable range definition.
 *
 * @param spec - Range definition from a config file
 * @returns Score range
 */
export function scoreRangeFromSpec(spec: ScoreRangeSpec): ScoreRangeShape {
  switch (spec.type) {
    case "binary":
      return ScoreRange.BINARY;
    case "five_point":
      return ScoreRange.FIVE_POINT;
    case "ten_point":
      return ScoreRange.TEN_POINT;
    case "percentage":
      return ScoreRange.PERCENTAGE;
    case "custom":
      return customScoreRange(spec.min, spec.max, spec.step);
  }
}

/**
 * Check whether a score lies within a range's bounds.
 *
 * @param range - Score range
 * @param score - Score to check
 * @returns True if finite and within [min, max]
 */
export function isWithinRange(range: ScoreRangeShape, score: number): boolean {
  return (
    Number.isFinite(score) &&
    score >= range.min - EPSILON &&
    score <= range.max + EPSILON
  );
}

/**
 * Reject a score outside the range.
 *
 * @param range - Score range
 * @param score - Score to check
 * @param context - Prefix for the error message
 * @throws ScoreRangeError if the score is out of bounds
 */
export function assertWithinRange(
  range: ScoreRangeShape,
  score: number,
  context = "Score",
): void {
  if (!isWithinRange(range, score)) {
    throw new ScoreRangeError(
      `${context} ${String(score)} is outside the ${range.name} range [${String(range.min)}, ${String(range.max)}]`,
      score,
      range,
    );
  }
}

/**
 * Discretize a range into ordered buckets.
 *
 * @param range - Score range
 * @param continuousBins - Bin count used for continuous ranges
 * @returns Bucket labels and a score-to-index mapper
 */
export function getScoreBuckets(
  range: ScoreRangeShape,
  continuousBins: number = DEFAULT_CONTINUOUS_BINS,
): ScoreBuckets {
  if (range.continuous) {
    if (!Number.isInteger(continuousBins) || continuousBins < 2) {
      throw new RangeError(
        `Continuous bin count must be an integer >= 2, got ${String(continuousBins)}`,
      );
    }

    const width = (range.max - range.min) / continuousBins;
    const values = Array.from({ length: continuousBins }, (_, i) =>
      tidy(range.min + i * width),
    );

    return {
      values,
      indexOf: (score) => {
        const raw = Math.floor((score - range.min) / width + EPSILON);
        return Math.min(Math.max(raw, 0), continuousBins - 1);
      },
    };
  }

  const count = Math.round((range.max - range.min) / range.step) + 1;
  const values = Array.from({ length: count }, (_, i) =>
    tidy(range.min + i * range.step),
  );

  return {
    values,
    indexOf: (score) => {
      const raw = Math.round((score - range.min) / range.step);
      return Math.min(Math.max(raw, 0), count - 1);
    },
  };
}

/**
 * Snap a score to its bucket label.
 *
 * @param range - Score range
 * @param score - Raw score
 * @param continuousBins - Bin count used for continuous ranges
 * @returns Bucket label
 */
export function discretizeScore(
  range: ScoreRangeShape,
  score: number,
  continuousBins: number = DEFAULT_CONTINUOUS_BINS,
): number {
  const buckets = getScoreBuckets(range, continuousBins);
  return buckets.values[buckets.indexOf(score)] ?? range.min;
}
