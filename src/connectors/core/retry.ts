import { PROGRESSIVE_BACKOFF_MS } from "./config.js";
import { errorMessage, RetriesExhaustedError, TransientRemoteError } from "./errors.js";
import { sleep, type Sleep } from "./rate-limiter.js";

export interface RetryOptions {
  /** Delay before retry n is `scheduleMs[n]`; one more failure is fatal. */
  scheduleMs?: readonly number[];
  retryOn?: (err: unknown) => boolean;
  onRetry?: (retry: number, delayMs: number, err: unknown) => void;
  sleep?: Sleep;
  /** Aborts a pending retry delay. */
  signal?: AbortSignal;
}

function isRetryableError(err: unknown): boolean {
  return err instanceof TransientRemoteError;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const schedule = opts.scheduleMs ?? PROGRESSIVE_BACKOFF_MS;
  const retryOn = opts.retryOn ?? isRetryableError;
  const wait = opts.sleep ?? sleep;

  for (let retry = 0; ; retry++) {
    try {
      return await fn();
    } catch (err) {
      if (!retryOn(err)) {
        throw err;
      }
      const delay = schedule[retry];
      if (delay === undefined) {
        throw new RetriesExhaustedError(
          `${errorMessage(err)} Too many retries (${retry}), giving up`,
          retry + 1,
        );
      }
      opts.onRetry?.(retry + 1, delay, err);
      if (delay > 0) await wait(delay, opts.signal);
    }
  }
}

/** Format a delay as HH:MM:SS for retry countdowns. */
export function formatCountdown(ms: number): string {
  const total = Math.max(0, Math.round(ms / 1000));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  return [h, m, s].map((n) => String(n).padStart(2, "0")).join(":");
}
