import { describe, expect, it } from "vitest";

import { generateRunId } from "../../../src/utils/ids.js";

describe("generateRunId", () => {
  it("stamps the local date and time", () => {
    const runId = generateRunId(new Date(2026, 0, 5, 7, 8, 9));

    expect(runId).toMatch(/^20260105-070809-[A-Za-z0-9_-]{4}$/);
  });

  it("generates distinct ids for the same instant", () => {
    const now = new Date(2026, 5, 1);
    const ids = new Set(Array.from({ length: 20 }, () => generateRunId(now)));

    expect(ids.size).toBeGreaterThan(1);
  });
});
