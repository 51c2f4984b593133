import { Completion } from "../core/state.js";
import type { OutputWriter } from "../core/types.js";
import { resolveCollection } from "./collections.js";
import { runDetailStage } from "./detail-stage.js";
import { exportCollection } from "./export.js";
import { runListingStage } from "./listing-stage.js";
import type { CollectionRef, PipelineContext } from "./types.js";

export interface SyncOptions {
  /** Discard the collection's cache and start from offset 0. */
  restart?: boolean;
}

export interface CollectionSyncResult {
  collection: CollectionRef;
  alreadyComplete: boolean;
  pagesFetched: number;
  itemsFetched: number;
  detailsFetched: number;
  notFound: number;
  outputFiles: string[];
  durationMs: number;
}

/**
 * Bring one collection's cache to `complete` and export it. Each stage picks
 * up where an interrupted run left off.
 */
export async function syncCollection(
  ctx: PipelineContext,
  collectionId: number,
  writer: OutputWriter,
  opts: SyncOptions = {},
): Promise<CollectionSyncResult> {
  const startTime = Date.now();
  const { tracker, logger, now } = ctx;
  const collection = await resolveCollection(ctx, collectionId);

  let state = opts.restart
    ? await tracker.reset(collection.id)
    : await tracker.load(collection.id);
  if (opts.restart) {
    logger.info(`Discarded the cache for ${collection.name}, starting from scratch`);
  }

  const alreadyComplete = Completion.detailsDone(state);
  let pagesFetched = 0;
  let itemsFetched = 0;
  let detailsFetched = 0;
  let notFound = 0;

  if (alreadyComplete) {
    logger.info(
      `${collection.name} [ID: ${collection.id}] is already downloaded, writing output files from the cache`,
    );
  } else {
    const listing = await runListingStage(ctx, collection, state);
    pagesFetched = listing.pagesFetched;
    itemsFetched = listing.itemsFetched;

    const details = await runDetailStage(ctx, collection, listing.state);
    detailsFetched = details.detailsFetched;
    notFound = details.notFound;

    state = Completion.markSynced(details.state, now());
    await tracker.save(collection.id, state);
  }

  const outputFiles = await exportCollection(ctx, collection, writer);

  return {
    collection,
    alreadyComplete,
    pagesFetched,
    itemsFetched,
    detailsFetched,
    notFound,
    outputFiles,
    durationMs: Date.now() - startTime,
  };
}
