import { setTimeout as delay } from "node:timers/promises";
import { AbortError } from "./errors.js";
import type { RateLimiter, RateLimiterConfig } from "./types.js";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`, or rejects with AbortError as soon as `signal` aborts. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) throw new AbortError();
    throw err;
  }
}

/**
 * Spaces requests at least `minDelayMs` apart. The API tier decides the
 * delay (10s on the free key, 5s on the paid key).
 */
export class IntervalRateLimiter implements RateLimiter {
  private readonly minDelayMs: number;
  private readonly wait: Sleep;
  private readonly now: () => number;

  private backoffUntil = 0;
  private lastCallAt: number | null = null;

  constructor(
    config: RateLimiterConfig = {},
    deps: { sleep?: Sleep; now?: () => number } = {},
  ) {
    this.minDelayMs = config.minDelayMs ?? 0;
    this.wait = deps.sleep ?? sleep;
    this.now = deps.now ?? Date.now;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    // Server asked us to slow down (429 + Retry-After)
    const now = this.now();
    if (this.backoffUntil > now) {
      await this.wait(this.backoffUntil - now, signal);
    }

    if (this.minDelayMs > 0 && this.lastCallAt !== null) {
      const elapsed = this.now() - this.lastCallAt;
      if (elapsed < this.minDelayMs) {
        await this.wait(this.minDelayMs - elapsed, signal);
      }
    }

    this.lastCallAt = this.now();
  }

  backoff(retryAfterMs: number): void {
    this.backoffUntil = Math.max(this.backoffUntil, this.now() + retryAfterMs);
  }
}

export function createRateLimiter(
  config: RateLimiterConfig = {},
  deps: { sleep?: Sleep; now?: () => number } = {},
): RateLimiter {
  return new IntervalRateLimiter(config, deps);
}
