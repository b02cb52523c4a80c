/**
 * Score scale type definitions.
 */

/**
 * Closed set of supported scoring scales.
 */
export type ScoreRangeKind =
  | "binary"
  | "five_point"
  | "ten_point"
  | "percentage"
  | "custom";

/**
 * A scoring scale with its numeric domain.
 *
 * Discrete scales accept every value in `[min, max]` and snap it to the
 * nearest multiple of `step` from `min`. Continuous scales skip step
 * enforcement and are bucketed into equal-width bins for kappa and the
 * confusion matrix.
 */
export interface ScoreRange {
  readonly kind: ScoreRangeKind;
  /** Display name, e.g. "FIVE_POINT" */
  readonly name: string;
  readonly min: number;
  readonly max: number;
  readonly step: number;
  readonly continuous: boolean;
}

/**
 * Serializable score range definition, as written in config files.
 */
export type ScoreRangeSpec =
  | { type: "binary" }
  | { type: "five_point" }
  | { type: "ten_point" }
  | { type: "percentage" }
  | { type: "custom"; min: number; max: number; step?: number | undefined };

/**
 * Discretized buckets of a score range.
 */
export interface ScoreBuckets {
  /** Representative value of each bucket, ascending */
  values: number[];
  /** Map a raw score to its bucket index */
  indexOf: (score: number) => number;
}
