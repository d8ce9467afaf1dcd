import pLimit from "p-limit";

import { textPart, type GenerateContentResponse } from "../contracts/content";
import { errorMessage } from "../control-plane/errors";
import { createLogger, type Logger } from "../logger";
import type { GenerationConfig, GenerativeModel } from "../providers/generative_model";
import { RateLimiter } from "./rate_limiter";

export const DEFAULT_VERIFICATION_WORKERS = 8;

export type VerificationPoolOptions = {
  model: GenerativeModel;
  rateLimiter?: RateLimiter;
  generationConfig?: GenerationConfig;
  logger?: Logger;
};

/**
 * Runs one grounded generation per prompt with bounded parallelism.
 *
 * Results keep input order. A failing prompt leaves `null` in its slot and is only
 * logged; sibling prompts are never cancelled.
 */
export class VerificationPool {
  private readonly model: GenerativeModel;
  private readonly rateLimiter: RateLimiter;
  private readonly generationConfig: GenerationConfig;
  private readonly log: Logger;

  constructor(options: VerificationPoolOptions) {
    this.model = options.model;
    this.rateLimiter = options.rateLimiter ?? new RateLimiter({ logger: options.logger });
    this.generationConfig = options.generationConfig ?? { temperature: 0, maxOutputTokens: 8192 };
    this.log = options.logger ?? createLogger({ plane: "verification" });
  }

  private async generate(prompt: string): Promise<GenerateContentResponse> {
    await this.rateLimiter.acquire();
    return this.model.generateContent({
      contents: [{ role: "user", parts: [textPart(prompt)] }],
      generationConfig: this.generationConfig,
    });
  }

  async generateTexts(
    prompts: readonly string[],
    workers: number = DEFAULT_VERIFICATION_WORKERS
  ): Promise<Array<GenerateContentResponse | null>> {
    const results: Array<GenerateContentResponse | null> = prompts.map(() => null);
    if (prompts.length === 0) return results;

    const limit = pLimit(Math.max(1, workers));
    let completed = 0;

    await Promise.all(
      prompts.map((prompt, index) =>
        limit(async () => {
          try {
            results[index] = await this.generate(prompt);
          } catch (error) {
            this.log.warn(
              { index, promptChars: prompt.length, error: errorMessage(error) },
              "verification.task_failed"
            );
          } finally {
            completed += 1;
            this.log.debug(
              { completed, total: prompts.length },
              "verification.progress"
            );
          }
        })
      )
    );

    return results;
  }
}
