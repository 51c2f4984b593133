/**
 * HTTP GET against the catalog API.
 *
 * Every attempt goes through the shared rate limiter, so consecutive
 * requests (retries included) are spaced by the configured delay. Status
 * codes are sorted into fatal and transient; transient failures follow the
 * progressive backoff schedule before giving up.
 */

import type { CatalogConfig } from "../core/config.js";
import {
  errorMessage,
  FatalRemoteError,
  throwIfAborted,
  TransientRemoteError,
} from "../core/errors.js";
import type { Sleep } from "../core/rate-limiter.js";
import { formatCountdown, withRetry } from "../core/retry.js";
import type { Logger, RateLimiter } from "../core/types.js";

// ─── Constants ───

const TRANSIENT_STATUSES = new Set([429, 500, 502, 503, 504, 520, 522, 524, 525]);

const FATAL_STATUS_REASONS: Record<number, string> = {
  401: "The API key was rejected",
  422: "The API rejected the request parameters",
};

export type FetchFn = (
  input: string,
  init?: { headers?: Record<string, string>; signal?: AbortSignal },
) => Promise<Response>;

export type RemoteResult =
  | { status: "ok"; body: unknown }
  | { status: "not-found" };

export interface GetJsonOptions {
  /** Human-readable description of the request, used in log lines. */
  label: string;
  /** Report a 404 as `not-found` instead of failing. */
  allowNotFound?: boolean;
}

// ─── Remote Client ───

export class RemoteClient {
  private readonly config: CatalogConfig;
  private readonly rateLimiter: RateLimiter;
  private readonly logger: Logger;
  private readonly signal: AbortSignal;
  private readonly fetchFn: FetchFn;
  private readonly sleep: Sleep | undefined;

  constructor(opts: {
    config: CatalogConfig;
    rateLimiter: RateLimiter;
    logger: Logger;
    signal: AbortSignal;
    fetchFn?: FetchFn;
    sleep?: Sleep;
  }) {
    this.config = opts.config;
    this.rateLimiter = opts.rateLimiter;
    this.logger = opts.logger;
    this.signal = opts.signal;
    this.fetchFn = opts.fetchFn ?? ((input, init) => fetch(input, init));
    this.sleep = opts.sleep;
  }

  async getJson(url: string, opts: GetJsonOptions): Promise<RemoteResult> {
    return withRetry(() => this.attempt(url, opts), {
      scheduleMs: this.config.retryScheduleMs,
      sleep: this.sleep,
      signal: this.signal,
      onRetry: (retry, delayMs, err) => {
        this.logger.warn(
          `${opts.label} failed: ${errorMessage(err)} Retry ${retry} in ${formatCountdown(delayMs)}`,
        );
      },
    });
  }

  private async attempt(url: string, opts: GetJsonOptions): Promise<RemoteResult> {
    throwIfAborted(this.signal);
    await this.rateLimiter.acquire(this.signal);
    throwIfAborted(this.signal);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        headers: { Accept: "application/json" },
        signal: AbortSignal.any([
          this.signal,
          AbortSignal.timeout(this.config.requestTimeoutMs),
        ]),
      });
    } catch (err) {
      throwIfAborted(this.signal);
      if (isNetworkError(err)) {
        throw new TransientRemoteError(`${opts.label}: ${errorMessage(err)}.`, null);
      }
      throw err;
    }

    if (response.status === 404 && opts.allowNotFound) {
      await discardBody(response);
      return { status: "not-found" };
    }

    if (!response.ok) {
      await discardBody(response);
      throw this.classify(response, opts.label);
    }

    try {
      const body: unknown = await response.json();
      return { status: "ok", body };
    } catch (err) {
      throwIfAborted(this.signal);
      throw new TransientRemoteError(
        `${opts.label}: unreadable response body (${errorMessage(err)}).`,
        response.status,
      );
    }
  }

  private classify(response: Response, label: string): Error {
    const { status } = response;

    if (TRANSIENT_STATUSES.has(status) || status >= 500) {
      const retryAfterMs = parseRetryAfter(response.headers.get("retry-after"));
      if (status === 429 && retryAfterMs !== null) {
        this.rateLimiter.backoff(retryAfterMs);
      }
      return new TransientRemoteError(
        `${label}: HTTP ${status}.`,
        status,
        retryAfterMs,
      );
    }

    const reason = FATAL_STATUS_REASONS[status] ?? "Unexpected response";
    return new FatalRemoteError(`${label}: ${reason} (HTTP ${status}).`, status);
  }
}

// ─── Helpers ───

/** Seconds form only; the API does not send HTTP dates. */
export function parseRetryAfter(header: string | null): number | null {
  if (header === null) return null;
  const seconds = Number(header);
  if (!Number.isFinite(seconds) || seconds < 0) return null;
  return seconds * 1000;
}

/** Releases the connection of a response whose body is not read. */
async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel();
}

function isNetworkError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  // undici reports connection failures as TypeError("fetch failed")
  if (err instanceof TypeError) return err.message === "fetch failed";
  return err.name === "TimeoutError" || err.name === "AbortError";
}
