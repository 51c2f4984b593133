import * as path from "node:path";
import { createCacheStore } from "../core/cache-store.js";
import type { CatalogConfig } from "../core/config.js";
import { isFatal } from "../core/errors.js";
import { createLogger } from "../core/logger.js";
import { createOutputWriter } from "../core/output.js";
import { createRateLimiter, type Sleep } from "../core/rate-limiter.js";
import { CompletionTracker, type CompletionPhase, UpdateTracker } from "../core/state.js";
import type { CacheStore, Logger, OutputWriter } from "../core/types.js";
import { CatalogApi } from "./api.js";
import { RemoteClient, type FetchFn } from "./client.js";
import { cachedCollectionName, loadCollections } from "./collections.js";
import { runUpdate, type UpdateOptions, type UpdateResult } from "./reconciler.js";
import { syncCollection, type CollectionSyncResult, type SyncOptions } from "./sync.js";
import type { CatalogSource, Collection, PipelineContext } from "./types.js";

export interface EngineDeps {
  store?: CacheStore;
  writer?: OutputWriter;
  logger?: Logger;
  /** Replaces the HTTP layer entirely. */
  source?: CatalogSource;
  fetchFn?: FetchFn;
  sleep?: Sleep;
  now?: () => Date;
}

export interface CollectionStatus {
  collectionId: number;
  name: string;
  phase: CompletionPhase;
  lastSynced: string | null;
}

/**
 * Wires configuration, cache, API client and logger into a pipeline context
 * for each command, with Ctrl-C mapped to the context's abort signal.
 */
export class SyncEngine {
  private readonly config: CatalogConfig;
  private readonly deps: EngineDeps;
  private readonly store: CacheStore;
  private readonly writer: OutputWriter;
  private readonly logger: Logger;

  constructor(config: CatalogConfig, deps: EngineDeps = {}) {
    this.config = config;
    this.deps = deps;
    this.store = deps.store ?? createCacheStore(path.resolve(config.cacheDir), { compress: config.compress });
    this.writer = deps.writer ?? createOutputWriter(path.resolve(config.outputDir));
    this.logger = deps.logger ?? createLogger("catalog");
  }

  async listCollections(opts: { refresh?: boolean } = {}): Promise<Collection[]> {
    return this.run("Listing collections", (ctx) => loadCollections(ctx, opts));
  }

  async sync(collectionId: number, opts: SyncOptions = {}): Promise<CollectionSyncResult> {
    return this.run(`Sync of collection ${collectionId}`, async (ctx) => {
      const result = await syncCollection(ctx, collectionId, this.writer, opts);
      this.logger.info(`Sync complete: ${result.collection.name}`, {
        pages: result.pagesFetched,
        details: result.detailsFetched,
        durationMs: result.durationMs,
      });
      return result;
    });
  }

  async update(opts: UpdateOptions): Promise<UpdateResult> {
    return this.run("Update", (ctx) =>
      runUpdate(ctx, new UpdateTracker(this.store), opts, this.writer),
    );
  }

  private context(signal: AbortSignal): PipelineContext {
    const rateLimiter = createRateLimiter(
      { minDelayMs: this.config.rateLimitMs },
      { sleep: this.deps.sleep },
    );
    const source =
      this.deps.source ??
      new CatalogApi(
        new RemoteClient({
          config: this.config,
          rateLimiter,
          logger: this.logger,
          signal,
          fetchFn: this.deps.fetchFn,
          sleep: this.deps.sleep,
        }),
        this.config,
      );

    return {
      config: this.config,
      source,
      store: this.store,
      tracker: new CompletionTracker(this.store),
      logger: this.logger,
      signal,
      now: this.deps.now ?? (() => new Date()),
    };
  }

  private async run<T>(label: string, fn: (ctx: PipelineContext) => Promise<T>): Promise<T> {
    const ac = new AbortController();

    // Handle SIGINT gracefully
    const sigHandler = () => {
      this.logger.warn("Received interrupt, stopping...");
      ac.abort();
    };
    process.on("SIGINT", sigHandler);

    try {
      return await fn(this.context(ac.signal));
    } catch (err) {
      // The caller reports fatal errors
      if (!isFatal(err)) {
        this.logger.warn(`${label} stopped. Run the same command again to resume.`);
      }
      throw err;
    } finally {
      process.removeListener("SIGINT", sigHandler);
    }
  }
}

/** Completion state of every cached collection. Needs no API access. */
export async function readCacheStatus(store: CacheStore): Promise<CollectionStatus[]> {
  const tracker = new CompletionTracker(store);
  const statuses: CollectionStatus[] = [];
  for (const collectionId of await store.listCollections()) {
    const state = await tracker.load(collectionId);
    statuses.push({
      collectionId,
      name: await cachedCollectionName({ store }, collectionId),
      phase: state.phase,
      lastSynced: state.lastSynced,
    });
  }
  return statuses;
}
