/**
 * Judge configuration and executor contract.
 */

/**
 * A comparable judge configuration.
 *
 * Two configurations are the same when prompt, model, temperature and
 * params are equal; `name` is a display label only.
 */
export interface JudgeConfig {
  readonly name?: string | undefined;
  readonly prompt: string;
  readonly model: string;
  readonly temperature: number;
  readonly params: Readonly<Record<string, unknown>>;
}

/**
 * Scores one item under one configuration.
 *
 * Implementations own network access, credentials and retry policy.
 * A failed evaluation rejects, ideally with a JudgeExecutionError.
 */
export interface JudgeExecutor {
  evaluate(
    inputText: string,
    responseText: string,
    config: JudgeConfig,
    signal?: AbortSignal,
  ): Promise<number>;
}
