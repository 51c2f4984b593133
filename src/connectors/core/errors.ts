export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "CatalogError";
  }
}

export class ConfigError extends CatalogError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", details);
    this.name = "ConfigError";
  }
}

/** 401, 422 and unexpected statuses: retrying cannot help. */
export class FatalRemoteError extends CatalogError {
  constructor(
    message: string,
    public readonly status: number | null,
    details?: Record<string, unknown>,
  ) {
    super(message, "FATAL_REMOTE", details);
    this.name = "FatalRemoteError";
  }
}

/** Timeouts, dropped connections, 429 and 5xx. */
export class TransientRemoteError extends CatalogError {
  constructor(
    message: string,
    public readonly status: number | null,
    public readonly retryAfterMs: number | null = null,
  ) {
    super(message, "TRANSIENT_REMOTE", { status });
    this.name = "TransientRemoteError";
  }
}

export class RetriesExhaustedError extends CatalogError {
  constructor(message: string, public readonly attempts: number) {
    super(message, "RETRIES_EXHAUSTED", { attempts });
    this.name = "RetriesExhaustedError";
  }
}

export class EmptyCollectionError extends CatalogError {
  constructor(public readonly collectionId: number, collectionName: string) {
    super(
      `${collectionName} [ID: ${collectionId}] has no items`,
      "EMPTY_COLLECTION",
      { collectionId },
    );
    this.name = "EmptyCollectionError";
  }
}

export class AbortError extends CatalogError {
  constructor() {
    super("Sync aborted", "ABORTED");
    this.name = "AbortError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new AbortError();
  }
}

/** Anything other than an abort ends the run with a failure. */
export function isFatal(err: unknown): boolean {
  return !(err instanceof AbortError);
}
