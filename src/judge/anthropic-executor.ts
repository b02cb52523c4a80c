/**
 * Judge executor backed by the Anthropic Messages API.
 *
 * Sends the configured prompt as the system prompt, asks for a bare
 * number, and parses the reply. Transient API errors are retried here;
 * the alignment core never retries.
 */

import Anthropic from "@anthropic-ai/sdk";

import { resolveModelId } from "../config/loader.js";
import { DEFAULT_JUDGE } from "../config/defaults.js";
import { JudgeExecutionError, toError } from "../errors.js";
import { isWithinRange } from "../scoring/score-range.js";
import { withRetry, type RetryOptions } from "../utils/retry.js";

import { buildSystemPrompt, buildUserPrompt } from "./prompt-builder.js";
import { parseScore } from "./score-parser.js";

import type { JudgeConfig, JudgeExecutor, ScoreRange } from "../types/index.js";

/**
 * The slice of the Anthropic client the executor calls.
 */
export interface MessagesClient {
  messages: {
    create(
      body: Anthropic.MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal | undefined },
    ): PromiseLike<Anthropic.Message>;
  };
}

/**
 * Executor options.
 */
export interface AnthropicJudgeExecutorOptions {
  /** Range replies are validated against */
  scoreRange: ScoreRange;
  /** Client to use; one is built from `apiKey` when omitted */
  client?: MessagesClient;
  apiKey?: string;
  /** Default reply budget; `params.max_tokens` on a config overrides it */
  maxTokens?: number;
  retry?: Partial<RetryOptions>;
}

/** Longest reply excerpt quoted in error messages. */
const REPLY_EXCERPT_LENGTH = 80;

function readMaxTokens(params: Readonly<Record<string, unknown>>): number | undefined {
  const value = params["max_tokens"];
  return typeof value === "number" && Number.isInteger(value) && value > 0
    ? value
    : undefined;
}

/**
 * Anthropic-backed judge.
 *
 * @example
 * ```typescript
 * const executor = new AnthropicJudgeExecutor({
 *   apiKey: process.env.ANTHROPIC_API_KEY,
 *   scoreRange: ScoreRange.FIVE_POINT,
 * });
 * const score = await executor.evaluate(question, answer, config);
 * ```
 */
export class AnthropicJudgeExecutor implements JudgeExecutor {
  private readonly client: MessagesClient;
  private readonly scoreRange: ScoreRange;
  private readonly maxTokens: number;
  private readonly retry: Partial<RetryOptions>;

  constructor(options: AnthropicJudgeExecutorOptions) {
    this.client = options.client ?? new Anthropic({ apiKey: options.apiKey });
    this.scoreRange = options.scoreRange;
    this.maxTokens = options.maxTokens ?? DEFAULT_JUDGE.max_tokens;
    this.retry = options.retry ?? {};
  }

  async evaluate(
    inputText: string,
    responseText: string,
    config: JudgeConfig,
    signal?: AbortSignal,
  ): Promise<number> {
    let reply: string;
    try {
      reply = await withRetry(
        async () => {
          const message = await this.client.messages.create(
            {
              model: resolveModelId(config.model),
              max_tokens: readMaxTokens(config.params) ?? this.maxTokens,
              temperature: config.temperature,
              system: buildSystemPrompt(config.prompt, this.scoreRange),
              messages: [
                { role: "user", content: buildUserPrompt(inputText, responseText) },
              ],
            },
            { signal },
          );

          const textBlock = message.content.find((block) => block.type === "text");
          if (textBlock?.type !== "text") {
            throw new Error("No text block in judge response");
          }
          return textBlock.text;
        },
        { ...this.retry, signal },
      );
    } catch (err) {
      const cause = toError(err);
      throw new JudgeExecutionError(
        `Judge call failed: ${cause.message}`,
        config,
        cause,
      );
    }

    const score = parseScore(reply);
    if (score === null) {
      const excerpt = reply.trim().slice(0, REPLY_EXCERPT_LENGTH);
      throw new JudgeExecutionError(
        `Judge reply is not a number: "${excerpt}"`,
        config,
      );
    }

    if (!isWithinRange(this.scoreRange, score)) {
      throw new JudgeExecutionError(
        `Judge score ${String(score)} is outside the ${this.scoreRange.name} range [${String(this.scoreRange.min)}, ${String(this.scoreRange.max)}]`,
        config,
      );
    }

    return score;
  }
}
