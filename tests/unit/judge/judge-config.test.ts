import { describe, expect, it } from "vitest";

import { ConfigValidationError } from "../../../src/errors.js";
import {
  configKey,
  configsEqual,
  createJudgeConfig,
  getConfigLabel,
  stableStringify,
} from "../../../src/judge/judge-config.js";

describe("createJudgeConfig", () => {
  it("fills model and temperature from the defaults", () => {
    const config = createJudgeConfig({ prompt: "Rate it." });

    expect(config).toEqual({
      name: undefined,
      prompt: "Rate it.",
      model: "claude-sonnet-4-5-20250929",
      temperature: 0,
      params: {},
    });
  });

  it("uses the given defaults", () => {
    const config = createJudgeConfig(
      { prompt: "Rate it." },
      { model: "haiku", temperature: 0.3 },
    );

    expect(config.model).toBe("haiku");
    expect(config.temperature).toBe(0.3);
  });

  it("keeps explicit values over defaults", () => {
    const config = createJudgeConfig(
      { prompt: "Rate it.", model: "opus", temperature: 0 },
      { model: "haiku", temperature: 0.3 },
    );

    expect(config.model).toBe("opus");
    expect(config.temperature).toBe(0);
  });

  it("freezes the configuration and its params", () => {
    const config = createJudgeConfig({ prompt: "p", params: { top_k: 5 } });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.params)).toBe(true);
  });

  it("does not share params with the input", () => {
    const params: Record<string, unknown> = { top_k: 5 };
    const config = createJudgeConfig({ prompt: "p", params });
    params["top_k"] = 10;

    expect(config.params).toEqual({ top_k: 5 });
  });

  it("reports every invalid field", () => {
    expect(() => createJudgeConfig({ prompt: "" })).toThrow(
      "Invalid judge configuration: prompt: Judge prompt is required",
    );
    expect(() => createJudgeConfig({ prompt: "p", temperature: 3 })).toThrow(
      ConfigValidationError,
    );
  });
});

describe("stableStringify", () => {
  it("sorts keys at every level", () => {
    expect(stableStringify({ b: 1, a: { d: 1, c: 2 } })).toBe(
      '{"a":{"c":2,"d":1},"b":1}',
    );
  });

  it("keeps array order", () => {
    expect(stableStringify({ list: [3, 1, 2] })).toBe('{"list":[3,1,2]}');
  });
});

describe("configsEqual", () => {
  it("ignores the name", () => {
    const a = createJudgeConfig({ name: "a", prompt: "Rate it." });
    const b = createJudgeConfig({ name: "b", prompt: "Rate it." });

    expect(configsEqual(a, b)).toBe(true);
    expect(configKey(a)).toBe(configKey(b));
  });

  it("ignores params key order", () => {
    const a = createJudgeConfig({ prompt: "p", params: { x: 1, y: 2 } });
    const b = createJudgeConfig({ prompt: "p", params: { y: 2, x: 1 } });

    expect(configsEqual(a, b)).toBe(true);
  });

  it("treats a model alias as its full model ID", () => {
    const alias = createJudgeConfig({ prompt: "p", model: "sonnet" });
    const full = createJudgeConfig({
      prompt: "p",
      model: "claude-sonnet-4-5-20250929",
    });

    expect(configsEqual(alias, full)).toBe(true);
    expect(alias.model).toBe("sonnet");
  });

  it("distinguishes prompt, model, temperature and params", () => {
    const base = createJudgeConfig({ prompt: "p" });

    expect(configsEqual(base, createJudgeConfig({ prompt: "q" }))).toBe(false);
    expect(configsEqual(base, createJudgeConfig({ prompt: "p", model: "haiku" }))).toBe(
      false,
    );
    expect(
      configsEqual(base, createJudgeConfig({ prompt: "p", temperature: 0.7 })),
    ).toBe(false);
    expect(
      configsEqual(base, createJudgeConfig({ prompt: "p", params: { top_k: 1 } })),
    ).toBe(false);
  });
});

describe("getConfigLabel", () => {
  it("prefers the name", () => {
    expect(getConfigLabel(createJudgeConfig({ name: "strict", prompt: "p" }), 0)).toBe(
      "strict",
    );
  });

  it("falls back to the 1-based position", () => {
    expect(getConfigLabel(createJudgeConfig({ prompt: "p" }), 1)).toBe("judge-2");
  });
});
