import { setTimeout as sleep } from "node:timers/promises";

import pLimit from "p-limit";

import { createLogger, type Logger } from "../logger";

export type RateLimiterOptions = {
  maxCallsPerWindow?: number;
  windowMs?: number;
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => number;
  logger?: Logger;
};

export type RateLimiterSnapshot = {
  callCount: number;
  windowStartedAt: number;
  resets: number;
};

/**
 * Fixed-window call budget shared by every verification worker.
 *
 * When the budget is spent, the worker that notices sleeps one full window while holding
 * the lock, so every other worker queues behind it, then the count restarts from zero.
 * This is a hard periodic reset, not a sliding window.
 */
export class RateLimiter {
  readonly maxCallsPerWindow: number;
  readonly windowMs: number;

  private callCount = 0;
  private resets = 0;
  private windowStartedAt: number;
  private readonly lock = pLimit(1);
  private readonly sleep: (ms: number) => Promise<unknown>;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(options: RateLimiterOptions = {}) {
    this.maxCallsPerWindow = options.maxCallsPerWindow ?? 60;
    this.windowMs = options.windowMs ?? 60_000;
    this.sleep = options.sleep ?? ((ms) => sleep(ms));
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLogger({ plane: "verification" });
    this.windowStartedAt = this.now();

    if (!Number.isInteger(this.maxCallsPerWindow) || this.maxCallsPerWindow < 1) {
      throw new RangeError(`maxCallsPerWindow must be a positive integer, got ${this.maxCallsPerWindow}`);
    }
  }

  /** Resolves once the caller may issue one model call. */
  acquire(): Promise<void> {
    return this.lock(async () => {
      if (this.callCount >= this.maxCallsPerWindow) {
        this.log.info(
          {
            callCount: this.callCount,
            maxCallsPerWindow: this.maxCallsPerWindow,
            windowMs: this.windowMs,
            windowAgeMs: this.now() - this.windowStartedAt,
          },
          "rate_limiter.window_exhausted"
        );
        await this.sleep(this.windowMs);
        this.callCount = 0;
        this.resets += 1;
        this.windowStartedAt = this.now();
      }
      this.callCount += 1;
    });
  }

  snapshot(): RateLimiterSnapshot {
    return {
      callCount: this.callCount,
      windowStartedAt: this.windowStartedAt,
      resets: this.resets,
    };
  }
}
