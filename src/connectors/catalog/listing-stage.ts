/**
 * Stage 1: page through a collection's catalog listing into the cache.
 */

import { EmptyCollectionError } from "../core/errors.js";
import { Completion, type CompletionState } from "../core/state.js";
import { fetchPages, resumeOffset } from "./pages.js";
import type { CollectionRef, PipelineContext } from "./types.js";

export interface ListingStageResult {
  state: CompletionState;
  pagesFetched: number;
  itemsFetched: number;
}

export async function runListingStage(
  ctx: PipelineContext,
  collection: CollectionRef,
  state: CompletionState,
): Promise<ListingStageResult> {
  if (state.phase !== "listing") {
    return { state, pagesFetched: 0, itemsFetched: 0 };
  }

  const { store, source, tracker, logger, config } = ctx;
  const offset = resumeOffset(await store.listKeys(collection.id, "listing"), config.pageSize);
  if (offset > 0) {
    logger.info(`Requests were previously interrupted, resuming from offset ${offset}`);
  }
  logger.info(`Retrieving items for ${collection.name} [ID: ${collection.id}]...`);

  const outcome = await fetchPages(ctx, {
    scope: collection.id,
    fetchPage: (pageOffset, limit) => source.fetchListingPage(collection.id, pageOffset, limit),
    onPage: async (pageOffset, page) => {
      await tracker.save(collection.id, state);
      logger.info(
        `Cached items ${pageOffset.toLocaleString("en-US")}-${(pageOffset + page.games.length).toLocaleString("en-US")}`,
      );
    },
  });

  if (outcome.status === "empty") {
    await store.deleteAll(collection.id);
    throw new EmptyCollectionError(collection.id, collection.name);
  }

  const next = Completion.completeListing(state);
  await tracker.save(collection.id, next);
  logger.info(`Finished retrieving items for ${collection.name}`, {
    pages: outcome.pagesFetched,
    items: outcome.itemsFetched,
  });

  return {
    state: next,
    pagesFetched: outcome.pagesFetched,
    itemsFetched: outcome.itemsFetched,
  };
}
