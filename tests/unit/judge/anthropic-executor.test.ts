import { describe, expect, it, vi } from "vitest";

import { JudgeExecutionError } from "../../../src/errors.js";
import { AnthropicJudgeExecutor } from "../../../src/judge/anthropic-executor.js";
import { createJudgeConfig } from "../../../src/judge/judge-config.js";
import { ScoreRange } from "../../../src/scoring/score-range.js";

function textReply(text: string): { content: { type: "text"; text: string }[] } {
  return { content: [{ type: "text", text }] };
}

function createMockClient(text: string) {
  return {
    messages: {
      create: vi.fn().mockResolvedValue(textReply(text)),
    },
  };
}

const config = createJudgeConfig({
  name: "strict",
  prompt: "Score the answer for factual accuracy.",
  model: "sonnet",
});

async function captureError(promise: Promise<unknown>): Promise<JudgeExecutionError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof JudgeExecutionError) {
      return err;
    }
    throw err;
  }
  throw new Error("Expected a JudgeExecutionError");
}

describe("AnthropicJudgeExecutor", () => {
  it("returns the parsed score", async () => {
    const client = createMockClient("4");
    const executor = new AnthropicJudgeExecutor({
      client,
      scoreRange: ScoreRange.FIVE_POINT,
    });

    await expect(executor.evaluate("Q", "A", config)).resolves.toBe(4);
  });

  it("sends the prompt, resolved model and temperature", async () => {
    const client = createMockClient("4");
    const executor = new AnthropicJudgeExecutor({
      client,
      scoreRange: ScoreRange.FIVE_POINT,
    });

    await executor.evaluate("What is 2+2?", "4", config);

    expect(client.messages.create).toHaveBeenCalledWith(
      {
        model: "claude-sonnet-4-5-20250929",
        max_tokens: 16,
        temperature: 0,
        system:
          "Score the answer for factual accuracy.\n\nYou must respond with ONLY a number between 1 and 5.",
        messages: [{ role: "user", content: "Question: What is 2+2?\n\nResponse: 4" }],
      },
      { signal: undefined },
    );
  });

  it("passes the abort signal to the client", async () => {
    const client = createMockClient("4");
    const executor = new AnthropicJudgeExecutor({
      client,
      scoreRange: ScoreRange.FIVE_POINT,
    });
    const controller = new AbortController();

    await executor.evaluate("Q", "A", config, controller.signal);

    expect(client.messages.create).toHaveBeenCalledWith(expect.any(Object), {
      signal: controller.signal,
    });
  });

  it("takes max_tokens from config params over the default", async () => {
    const client = createMockClient("4");
    const executor = new AnthropicJudgeExecutor({
      client,
      scoreRange: ScoreRange.FIVE_POINT,
      maxTokens: 8,
    });

    await executor.evaluate("Q", "A", createJudgeConfig({ prompt: "p" }));
    await executor.evaluate(
      "Q",
      "A",
      createJudgeConfig({ prompt: "p", params: { max_tokens: 32 } }),
    );

    expect(client.messages.create).toHaveBeenNthCalledWith(
      1,
      expect.objectContaining({ max_tokens: 8 }),
      expect.any(Object),
    );
    expect(client.messages.create).toHaveBeenNthCalledWith(
      2,
      expect.objectContaining({ max_tokens: 32 }),
      expect.any(Object),
    );
  });

  it("rejects a reply without a number", async () => {
    const executor = new AnthropicJudgeExecutor({
      client: createMockClient("Great answer"),
      scoreRange: ScoreRange.FIVE_POINT,
    });

    const error = await captureError(executor.evaluate("Q", "A", config));

    expect(error.message).toBe('Judge reply is not a number: "Great answer"');
    expect(error.config).toBe(config);
  });

  it("rejects a score outside the range", async () => {
    const executor = new AnthropicJudgeExecutor({
      client: createMockClient("9"),
      scoreRange: ScoreRange.FIVE_POINT,
    });

    const error = await captureError(executor.evaluate("Q", "A", config));

    expect(error.message).toBe("Judge score 9 is outside the FIVE_POINT range [1, 5]");
  });

  it("wraps API failures with their cause", async () => {
    const cause = new Error("invalid x-api-key");
    const executor = new AnthropicJudgeExecutor({
      client: { messages: { create: vi.fn().mockRejectedValue(cause) } },
      scoreRange: ScoreRange.FIVE_POINT,
    });

    const error = await captureError(executor.evaluate("Q", "A", config));

    expect(error.message).toBe("Judge call failed: invalid x-api-key");
    expect(error.cause).toBe(cause);
  });

  it("retries transient API failures", async () => {
    const create = vi
      .fn()
      .mockRejectedValueOnce(Object.assign(new Error("rate limited"), { status: 429 }))
      .mockResolvedValueOnce(textReply("2"));
    const onRetry = vi.fn();
    const executor = new AnthropicJudgeExecutor({
      client: { messages: { create } },
      scoreRange: ScoreRange.FIVE_POINT,
      retry: { initialDelayMs: 0, maxDelayMs: 0, jitterFactor: 0, onRetry },
    });

    await expect(executor.evaluate("Q", "A", config)).resolves.toBe(2);
    expect(create).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(expect.any(Error), 1, 0);
  });

  it("fails when the reply has no text block", async () => {
    const executor = new AnthropicJudgeExecutor({
      client: { messages: { create: vi.fn().mockResolvedValue({ content: [] }) } },
      scoreRange: ScoreRange.FIVE_POINT,
    });

    const error = await captureError(executor.evaluate("Q", "A", config));

    expect(error.message).toBe("Judge call failed: No text block in judge response");
  });

  it("quotes at most 80 characters of a bad reply", async () => {
    const reply = `Well ${"x".repeat(100)}`;
    const executor = new AnthropicJudgeExecutor({
      client: createMockClient(reply),
      scoreRange: ScoreRange.FIVE_POINT,
    });

    const error = await captureError(executor.evaluate("Q", "A", config));

    expect(error.message).toBe(`Judge reply is not a number: "${reply.slice(0, 80)}"`);
  });
});
