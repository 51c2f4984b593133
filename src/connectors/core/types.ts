/** Core type definitions for catalog-mirror. */

// ─── Rate Limiter ───

export interface RateLimiterConfig {
  minDelayMs?: number;
}

export interface RateLimiter {
  acquire(signal?: AbortSignal): Promise<void>;
  backoff(retryAfterMs: number): void;
}

// ─── Logger ───

export interface Logger {
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  progress(current: number, total: number, label: string): void;
}

// ─── Cache Store ───

/** A collection id, or the collection-independent changes feed. */
export type CacheScope = number | "updates";

export type CacheNamespace = "listing" | "detail";

export type CacheLookup<T = unknown> =
  | { status: "hit"; value: T }
  | { status: "miss" }
  | { status: "corrupt"; error: string };

export interface CacheStore {
  put(
    scope: CacheScope,
    namespace: CacheNamespace,
    key: number,
    value: unknown,
  ): Promise<void>;
  get(
    scope: CacheScope,
    namespace: CacheNamespace,
    key: number,
  ): Promise<CacheLookup>;
  has(scope: CacheScope, namespace: CacheNamespace, key: number): Promise<boolean>;
  listKeys(scope: CacheScope, namespace: CacheNamespace): Promise<number[]>;
  delete(
    scope: CacheScope,
    namespace: CacheNamespace,
    key: number,
  ): Promise<void>;
  deleteAll(scope: CacheScope): Promise<void>;
  replaceAll(
    scope: CacheScope,
    namespace: CacheNamespace,
    entries: ReadonlyArray<readonly [number, unknown]>,
  ): Promise<void>;
  listCollections(): Promise<number[]>;
  readDocument(name: string): Promise<CacheLookup>;
  writeDocument(name: string, value: unknown): Promise<void>;
}

// ─── Output Writer ───

export interface OutputWriter {
  writeJson(relativePath: string, data: unknown): Promise<string>;
  writeDelimited(
    relativePath: string,
    columns: readonly string[],
    rows: ReadonlyArray<Record<string, string>>,
    delimiter: string,
  ): Promise<string>;
  remove(relativePath: string): Promise<void>;
}
