import { describe, expect, it } from "vitest";

import {
  AlignConfigSchema,
  DataConfigSchema,
  JudgeConfigSchema,
  MetricsConfigSchema,
  ScoreRangeSpecSchema,
  TuningConfigSchema,
} from "../../../src/config/schema.js";

describe("DataConfigSchema", () => {
  it("applies default column names", () => {
    const result = DataConfigSchema.parse({ path: "./scores.csv" });

    expect(result.columns).toEqual({
      input: "question",
      response: "response",
      human_score: "human_score",
    });
    expect(result.metadata_columns).toEqual([]);
    expect(result.judge_score_column).toBeUndefined();
  });

  it("keeps partial column overrides", () => {
    const result = DataConfigSchema.parse({
      path: "./scores.csv",
      columns: { input: "prompt" },
    });

    expect(result.columns.input).toBe("prompt");
    expect(result.columns.response).toBe("response");
  });
});

describe("ScoreRangeSpecSchema", () => {
  it("accepts the standard scales", () => {
    for (const type of ["binary", "five_point", "ten_point", "percentage"]) {
      expect(ScoreRangeSpecSchema.safeParse({ type }).success).toBe(true);
    }
  });

  it("requires bounds for custom ranges", () => {
    expect(ScoreRangeSpecSchema.safeParse({ type: "custom" }).success).toBe(
      false,
    );
    expect(
      ScoreRangeSpecSchema.safeParse({ type: "custom", min: 0, max: 3 }).success,
    ).toBe(true);
  });

  it("rejects a non-positive custom step", () => {
    expect(
      ScoreRangeSpecSchema.safeParse({ type: "custom", min: 0, max: 3, step: 0 })
        .success,
    ).toBe(false);
  });
});

describe("MetricsConfigSchema", () => {
  it("applies default values", () => {
    expect(MetricsConfigSchema.parse({})).toEqual({
      kappa_weighting: "none",
      correlation_method: "pearson",
      tolerance: 0,
      continuous_bins: 20,
    });
  });

  it("validates the weighting enum", () => {
    expect(
      MetricsConfigSchema.safeParse({ kappa_weighting: "cubic" }).success,
    ).toBe(false);
  });

  it("rejects a negative tolerance", () => {
    expect(MetricsConfigSchema.safeParse({ tolerance: -0.5 }).success).toBe(
      false,
    );
  });

  it("rejects fewer than 2 continuous bins", () => {
    expect(MetricsConfigSchema.safeParse({ continuous_bins: 1 }).success).toBe(
      false,
    );
  });
});

describe("JudgeConfigSchema", () => {
  it("requires a prompt", () => {
    const result = JudgeConfigSchema.safeParse({ prompt: "" });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe("Judge prompt is required");
  });

  it("defaults params to an empty object", () => {
    expect(JudgeConfigSchema.parse({ prompt: "Rate it." })).toEqual({
      prompt: "Rate it.",
      params: {},
    });
  });

  it("bounds temperature to [0, 2]", () => {
    expect(
      JudgeConfigSchema.safeParse({ prompt: "p", temperature: 2.5 }).success,
    ).toBe(false);
    expect(
      JudgeConfigSchema.safeParse({ prompt: "p", temperature: 2 }).success,
    ).toBe(true);
  });
});

describe("TuningConfigSchema", () => {
  it("accepts partial overrides", () => {
    const result = TuningConfigSchema.parse({ retry: { max_retries: 0 } });

    expect(result.retry.max_retries).toBe(0);
    expect(result.timeouts).toEqual({});
  });
});

describe("AlignConfigSchema", () => {
  it("validates complete configuration", () => {
    const result = AlignConfigSchema.safeParse({
      data: { path: "./scores.csv" },
      score_range: { type: "percentage" },
      judges: [{ name: "a", prompt: "Rate it.", model: "haiku" }],
      output: { dir: "out", format: "yaml" },
    });

    expect(result.success).toBe(true);
  });

  it("rejects missing data path", () => {
    expect(AlignConfigSchema.safeParse({}).success).toBe(false);
  });

  it("rejects an unknown output format", () => {
    expect(
      AlignConfigSchema.safeParse({
        data: { path: "./scores.csv" },
        output: { format: "xml" },
      }).success,
    ).toBe(false);
  });
});
