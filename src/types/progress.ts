/**
 * Progress reporting type definitions.
 */

import type { EvaluationItem } from "./evaluation.js";

/**
 * Progress callbacks for judge runs.
 */
export interface ProgressCallbacks {
  onRunStart?: (label: string, totalItems: number) => void;
  onItemComplete?: (
    item: EvaluationItem,
    score: number,
    completed: number,
    total: number,
  ) => void;
  onRunComplete?: (label: string, durationMs: number, itemCount: number) => void;
  onError?: (error: Error, item?: EvaluationItem) => void;
}
