/**
 * Stage 2: fetch the detail record of every listed item that has none cached.
 */

import { estimateRemaining } from "../core/duration.js";
import { throwIfAborted } from "../core/errors.js";
import { Completion, type CompletionState } from "../core/state.js";
import { readListingItems } from "./pages.js";
import { ItemDetailSchema, type CollectionRef, type PipelineContext } from "./types.js";

export interface DetailStageResult {
  state: CompletionState;
  detailsFetched: number;
  notFound: number;
}

interface PendingItem {
  id: number;
  title: string;
}

/**
 * Listed items without a usable cached detail, in listing order, each id
 * once. Corrupt or malformed details count as missing.
 */
export async function pendingDetails(
  ctx: PipelineContext,
  collectionId: number,
): Promise<{ total: number; pending: PendingItem[] }> {
  const seen = new Set<number>();
  const pending: PendingItem[] = [];
  for await (const item of readListingItems(ctx, collectionId)) {
    if (seen.has(item.game_id)) continue;
    seen.add(item.game_id);
    const lookup = await ctx.store.get(collectionId, "detail", item.game_id);
    if (lookup.status === "hit" && ItemDetailSchema.safeParse(lookup.value).success) continue;
    if (lookup.status !== "miss") {
      ctx.logger.warn(`Details for item ${item.game_id} are corrupt, downloading them again`);
    }
    pending.push({ id: item.game_id, title: item.title });
  }
  return { total: seen.size, pending };
}

export async function runDetailStage(
  ctx: PipelineContext,
  collection: CollectionRef,
  state: CompletionState,
): Promise<DetailStageResult> {
  if (state.phase !== "details") {
    return { state, detailsFetched: 0, notFound: 0 };
  }

  const { store, source, tracker, logger, config, signal } = ctx;

  if (config.skipDetails) {
    logger.info("Skipping item details");
    const next = Completion.completeDetails(state);
    await tracker.save(collection.id, next);
    return { state: next, detailsFetched: 0, notFound: 0 };
  }

  const { total, pending } = await pendingDetails(ctx, collection.id);
  const done = total - pending.length;
  if (pending.length > 0) {
    logger.info(
      `Retrieving details for ${pending.length.toLocaleString("en-US")} items. Estimated time to completion: ${estimateRemaining(pending.length, config.rateLimitMs)}`,
    );
  }

  let detailsFetched = 0;
  let notFound = 0;
  for (const [index, item] of pending.entries()) {
    throwIfAborted(signal);
    const result = await source.fetchItemDetail(collection.id, item.id);
    if (result.status === "not-found") {
      notFound++;
      logger.warn(`No details found for ${item.title} [ID: ${item.id}], skipping`);
    } else {
      await store.put(collection.id, "detail", item.id, result.detail);
      detailsFetched++;
    }
    logger.progress(done + index + 1, total, "Details");
  }

  const next = Completion.completeDetails(state);
  await tracker.save(collection.id, next);
  return { state: next, detailsFetched, notFound };
}
