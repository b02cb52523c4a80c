import path from "node:path";

import { describe, expect, it } from "vitest";

import {
  loadConfig,
  loadConfigWithOverrides,
  resolveModelId,
  validateConfig,
} from "../../../src/config/loader.js";
import { ConfigLoadError, ConfigValidationError } from "../../../src/errors.js";

const fixturesPath = path.resolve(process.cwd(), "tests/fixtures");

describe("loadConfig", () => {
  it("loads valid YAML configuration", () => {
    const config = loadConfig(path.join(fixturesPath, "test-config.yaml"));

    expect(config.data.path).toBe("./tests/fixtures/scores.csv");
    expect(config.data.metadata_columns).toEqual(["category"]);
    expect(config.metrics.kappa_weighting).toBe("quadratic");
    expect(config.metrics.tolerance).toBe(1);
    expect(config.judge.model).toBe("haiku");
    expect(config.judges.map((judge) => judge.name)).toEqual([
      "strict",
      "lenient",
    ]);
    expect(config.max_concurrent).toBe(4);
    expect(config.output.format).toBe("yaml");
  });

  it("fills defaults for omitted sections", () => {
    const config = loadConfig(path.join(fixturesPath, "test-config.yaml"));

    expect(config.data.columns).toEqual({
      input: "question",
      response: "response",
      human_score: "human_score",
    });
    expect(config.metrics.correlation_method).toBe("pearson");
    expect(config.judge.temperature).toBe(0);
    expect(config.judge.max_tokens).toBe(16);
  });

  it("loads JSON configuration", () => {
    const config = loadConfig(path.join(fixturesPath, "config.json"));

    expect(config.score_range).toEqual({
      type: "custom",
      min: 0,
      max: 10,
      step: 2,
    });
    expect(config.judges).toEqual([{ prompt: "Rate it.", params: {} }]);
  });

  it("throws on missing file", () => {
    expect(() => loadConfig("/non/existent/config.yaml")).toThrow(
      ConfigLoadError,
    );
  });
});

describe("validateConfig", () => {
  it("validates raw configuration object", () => {
    const config = validateConfig({ data: { path: "./scores.csv" } });

    expect(config.data.path).toBe("./scores.csv");
    expect(config.score_range).toEqual({ type: "five_point" });
    expect(config.judges).toEqual([]);
  });

  it("throws ConfigValidationError on invalid config", () => {
    expect(() => validateConfig({ data: { path: "" } })).toThrow(
      ConfigValidationError,
    );
  });

  it("includes field path in error message", () => {
    expect(() =>
      validateConfig({
        data: { path: "./scores.csv" },
        max_concurrent: 100,
      }),
    ).toThrow(/max_concurrent/);
  });

  it("rejects an unknown score range type", () => {
    expect(() =>
      validateConfig({
        data: { path: "./scores.csv" },
        score_range: { type: "seven_point" },
      }),
    ).toThrow(ConfigValidationError);
  });
});

describe("loadConfigWithOverrides", () => {
  it("builds a default config from --data alone", () => {
    const config = loadConfigWithOverrides(undefined, { data: "./x.csv" });

    expect(config.data.path).toBe("./x.csv");
    expect(config.max_concurrent).toBe(10);
  });

  it("requires a config file or a data path", () => {
    expect(() => loadConfigWithOverrides(undefined, {})).toThrow(
      "Either config file or --data path is required",
    );
  });

  it("applies CLI overrides over the file", () => {
    const config = loadConfigWithOverrides(
      path.join(fixturesPath, "test-config.yaml"),
      {
        model: "sonnet",
        temperature: 0.2,
        concurrency: 2,
        weighting: "linear",
        correlation: "spearman",
        tolerance: 0,
        output: "json",
        judgeColumn: "judge_score",
      },
    );

    expect(config.judge.model).toBe("sonnet");
    expect(config.judge.temperature).toBe(0.2);
    expect(config.max_concurrent).toBe(2);
    expect(config.metrics).toEqual({
      kappa_weighting: "linear",
      correlation_method: "spearman",
      tolerance: 0,
      continuous_bins: 20,
    });
    expect(config.output.format).toBe("json");
    expect(config.data.judge_score_column).toBe("judge_score");
  });

  it("replaces configured judges with --prompt", () => {
    const config = loadConfigWithOverrides(
      path.join(fixturesPath, "test-config.yaml"),
      { prompt: "Only this prompt." },
    );

    expect(config.judges).toEqual([{ prompt: "Only this prompt.", params: {} }]);
  });

  it("validates overridden values", () => {
    expect(() =>
      loadConfigWithOverrides(undefined, { data: "./x.csv", concurrency: 0 }),
    ).toThrow(ConfigValidationError);
  });
});

describe("resolveModelId", () => {
  it("resolves short aliases", () => {
    expect(resolveModelId("sonnet")).toBe("claude-sonnet-4-5-20250929");
    expect(resolveModelId("haiku")).toBe("claude-3-5-haiku-20241022");
  });

  it("passes full model IDs through", () => {
    expect(resolveModelId("claude-opus-4-1-20250805")).toBe(
      "claude-opus-4-1-20250805",
    );
  });
});
