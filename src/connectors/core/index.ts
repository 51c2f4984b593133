// Cache store
export {
  createCacheStore,
  decodePayload,
  encodePayload,
  FileCacheStore,
  MemoryCacheStore,
} from "./cache-store.js";
export type { CacheStoreOptions } from "./cache-store.js";
// Config
export {
  CatalogConfigSchema,
  configFromEnv,
  OUTPUT_FORMATS,
  parseConfig,
  PROGRESSIVE_BACKOFF_MS,
} from "./config.js";
export type { CatalogConfig, CatalogConfigInput, OutputFormat } from "./config.js";
// Durations
export { estimateRemaining, formatDuration } from "./duration.js";
// Errors
export {
  AbortError,
  CatalogError,
  ConfigError,
  EmptyCollectionError,
  errorMessage,
  FatalRemoteError,
  isFatal,
  RetriesExhaustedError,
  throwIfAborted,
  TransientRemoteError,
} from "./errors.js";
// Logger
export { ConsoleLogger, createLogger } from "./logger.js";
// Output writer
export { createOutputWriter, FileOutputWriter, formatDelimited, formatField } from "./output.js";
// Rate limiter
export { createRateLimiter, IntervalRateLimiter, sleep } from "./rate-limiter.js";
export type { Sleep } from "./rate-limiter.js";
export type { RetryOptions } from "./retry.js";
// Retry helper
export { formatCountdown, withRetry } from "./retry.js";
// File names
export { sanitizeFilename } from "./slugify.js";
// State management
export {
  Completion,
  CompletionTracker,
  deserializeCompletion,
  serializeCompletion,
  UPDATE_STALE_AFTER_MS,
  UpdateProgress,
  UpdateTracker,
} from "./state.js";
export type { CompletionPhase, CompletionState, UpdateState } from "./state.js";
export type {
  CacheLookup,
  CacheNamespace,
  CacheScope,
  CacheStore,
  Logger,
  OutputWriter,
  RateLimiter,
  RateLimiterConfig,
} from "./types.js";
