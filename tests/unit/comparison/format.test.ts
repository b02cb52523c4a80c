import { describe, expect, it } from "vitest";

import { formatComparison } from "../../../src/comparison/format.js";
import {
  cancelledEntry,
  failedEntry,
  makeResults,
  successEntry,
} from "../../mocks/results.js";

describe("formatComparison", () => {
  it("lists ranked entries before failed and cancelled ones", () => {
    const best = successEntry("B", 1, {
      kappa_score: 1,
      agreement_rate: 1,
      correlation: 1,
    });
    const results = makeResults(
      [failedEntry("A", 0), best, cancelledEntry("C", 2)],
      { best, cancelled: true },
    );

    expect(formatComparison(results).split("\n")).toEqual([
      "Rank | Name | Model      | Temp | Kappa | Agreement | Correlation | N | Status          ",
      "-----+------+------------+------+-------+-----------+-------------+---+-----------------",
      "   1 | B    | test-model |    0 | 1.000 |    100.0% |       1.000 | 4 | ok              ",
      "   - | A    | test-model |    0 |     - |         - |           - | - | failed (1 items)",
      "   - | C    | test-model |    0 |     - |         - |           - | - | cancelled       ",
      "",
      "Best: B (kappa 1.000)",
      "Comparison was cancelled before every configuration ran.",
    ]);
  });

  it("shows n/a for an undefined correlation", () => {
    const only = successEntry("solo", 0, { kappa_score: 0.25, correlation: null });
    const lines = formatComparison(makeResults([only], { best: only })).split("\n");

    expect(lines[2]).toContain(" n/a | ");
    expect(lines.at(-1)).toBe("Best: solo (kappa 0.250)");
  });

  it("reports a failure raised before any item ran", () => {
    const lines = formatComparison(makeResults([failedEntry("A", 0, 0)])).split("\n");

    expect(lines[2]?.trimEnd().endsWith("| failed")).toBe(true);
    expect(lines.at(-1)).toBe("Best: none (no configuration succeeded)");
  });
});
