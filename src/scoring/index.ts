/**
 * Scoring module exports.
 */

export {
  ScoreRange,
  customScoreRange,
  scoreRangeFromSpec,
  validateScoreRange,
  isWithinRange,
  assertWithinRange,
  getScoreBuckets,
  discretizeScore,
} from "./score-range.js";

export {
  createEvaluationItem,
  getItemKey,
  isScorable,
  partitionScorable,
  cloneForRun,
  type EvaluationItemInput,
} from "./evaluation-item.js";
