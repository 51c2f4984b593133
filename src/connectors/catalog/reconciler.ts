/**
 * Update Reconciler.
 *
 * Downloads the "recently changed" feed for a window of days and applies
 * it to every fully synced collection: changed items are replaced, items
 * that left the collection are evicted, the listing cache is rebuilt in
 * id order and the affected detail records are fetched again.
 */

import { estimateRemaining } from "../core/duration.js";
import { throwIfAborted } from "../core/errors.js";
import { Completion, UpdateProgress, type UpdateState, type UpdateTracker } from "../core/state.js";
import type { OutputWriter } from "../core/types.js";
import { cachedCollectionName } from "./collections.js";
import { exportCollection } from "./export.js";
import { fetchPages, readFeedRecords, readListingItems, stripHeavyFields } from "./pages.js";
import type { ChangeRecord, CollectionRef, ListingItem, PipelineContext } from "./types.js";

// ─── Constants ───

/** Collections synced longer ago than this may have missed changes. */
export const SYNC_GAP_WARNING_MS = 21 * 24 * 60 * 60 * 1000;

/** Share of a collection whose eviction is worth a warning. */
export const EVICTION_WARNING_RATIO = 0.05;

// ─── Types ───

export interface IdRange {
  from: number;
  to: number;
}

export interface UpdateOptions {
  days: number;
  /** Inclusive collection id range to apply the feed to. */
  range?: IdRange;
  forceRestart?: boolean;
  /** Download the feed and stop. */
  fetchOnly?: boolean;
}

export type CollectionOutcome =
  | { collectionId: number; name: string; status: "incomplete" }
  | { collectionId: number; name: string; status: "unchanged" }
  | {
      collectionId: number;
      name: string;
      status: "updated";
      related: number;
      evicted: number;
      detailsFetched: number;
      detailsRemoved: number;
    };

export interface FeedResult {
  state: UpdateState;
  pagesFetched: number;
  reused: boolean;
}

export interface UpdateResult {
  feed: FeedResult;
  records: number;
  outcomes: CollectionOutcome[];
}

export interface Partition {
  /** Items that are members of the collection, first record per id. */
  related: Map<number, ChangeRecord>;
  /** Ids whose record no longer lists the collection. */
  unrelated: Set<number>;
}

// ─── Feed Download ───

function restartReason(state: UpdateState, opts: UpdateOptions, now: Date): string | null {
  if (opts.forceRestart) return "Restarting the update download as requested";
  if (UpdateProgress.isStale(state, now)) {
    return "Update cache is stale, downloading update data from scratch";
  }
  if (state.daysRequested !== null && state.daysRequested !== opts.days) {
    return "The number of days to update differs from the last request, downloading update data from scratch";
  }
  return null;
}

export async function downloadChangesFeed(
  ctx: PipelineContext,
  updates: UpdateTracker,
  opts: UpdateOptions,
): Promise<FeedResult> {
  const { source, logger, now } = ctx;
  let state = await updates.load();

  const reason = restartReason(state, opts, now());
  if (reason) {
    logger.warn(reason);
    state = await updates.reset();
  } else if (state.finished) {
    logger.info(`Reusing the downloaded changes from the last ${opts.days} days`);
    return { state, pagesFetched: 0, reused: true };
  }

  logger.info(`Getting changes from the last ${opts.days} days...`);
  const outcome = await fetchPages(ctx, {
    scope: "updates",
    fetchPage: (offset, limit) => source.fetchChangesPage(opts.days, offset, limit),
    onPage: async () => {
      state = UpdateProgress.recordPage(state, opts.days, now());
      await updates.save(state);
    },
  });

  state = UpdateProgress.finish(UpdateProgress.recordPage(state, opts.days, now()));
  await updates.save(state);
  return {
    state,
    pagesFetched: outcome.status === "done" ? outcome.pagesFetched : 0,
    reused: false,
  };
}

// ─── Reconciliation ───

export function partitionChanges(records: Iterable<ChangeRecord>, collectionId: number): Partition {
  const related = new Map<number, ChangeRecord>();
  const unrelated = new Set<number>();
  for (const record of records) {
    const member = (record.platforms ?? []).some((p) => p.platform_id === collectionId);
    if (member) {
      if (!related.has(record.game_id)) related.set(record.game_id, record);
    } else {
      unrelated.add(record.game_id);
    }
  }
  return { related, unrelated };
}

/** Unrelated ids that are cached and not also reported as members. */
export function evictedIds(partition: Partition, existing: ReadonlySet<number>): number[] {
  return [...partition.unrelated]
    .filter((id) => !partition.related.has(id) && existing.has(id))
    .sort((a, b) => a - b);
}

/** Ascending ids, `pageSize` items per page, keyed by page offset. */
export function paginate(
  items: ReadonlyMap<number, ListingItem>,
  pageSize: number,
): Array<readonly [number, { games: ListingItem[] }]> {
  const ids = [...items.keys()].sort((a, b) => a - b);
  const pages: Array<readonly [number, { games: ListingItem[] }]> = [];
  for (let start = 0; start < ids.length; start += pageSize) {
    const games: ListingItem[] = [];
    for (const id of ids.slice(start, start + pageSize)) {
      const item = items.get(id);
      if (item) games.push(item);
    }
    pages.push([start, { games }] as const);
  }
  return pages;
}

export async function reconcileCollection(
  ctx: PipelineContext,
  collection: CollectionRef,
  records: readonly ChangeRecord[],
  writer?: OutputWriter,
): Promise<CollectionOutcome> {
  const { store, source, tracker, logger, config, now, signal } = ctx;
  const base = { collectionId: collection.id, name: collection.name };

  let state = await tracker.load(collection.id);
  if (state.phase !== "complete") {
    logger.warn(
      `${collection.name} [ID: ${collection.id}] has not finished downloading, skipping. Sync it before applying updates.`,
    );
    return { ...base, status: "incomplete" };
  }

  const current = now();
  if (
    state.lastSynced === null ||
    current.getTime() - new Date(state.lastSynced).getTime() > SYNC_GAP_WARNING_MS
  ) {
    logger.warn(
      `${collection.name} [ID: ${collection.id}] was last synced more than 21 days ago, so changes may have been missed. Consider a full resync.`,
    );
  }

  const existing = new Map<number, ListingItem>();
  for await (const item of readListingItems(ctx, collection.id)) {
    if (!existing.has(item.game_id)) existing.set(item.game_id, item);
  }

  const partition = partitionChanges(records, collection.id);
  const evicted = evictedIds(partition, new Set(existing.keys()));

  if (partition.related.size === 0 && evicted.length === 0) {
    logger.info(`No changes for ${collection.name} [ID: ${collection.id}]`);
    return { ...base, status: "unchanged" };
  }

  logger.info(`Updating ${collection.name} [ID: ${collection.id}]`, {
    changed: partition.related.size,
    evicted: evicted.length,
  });

  const merged = new Map(existing);
  for (const id of evicted) merged.delete(id);
  for (const [id, record] of partition.related) merged.set(id, stripHeavyFields(record));
  await store.replaceAll(collection.id, "listing", paginate(merged, config.pageSize));

  let detailsFetched = 0;
  let detailsRemoved = 0;
  if (!config.skipDetails) {
    const relatedIds = [...partition.related.keys()].sort((a, b) => a - b);
    if (relatedIds.length > 0) {
      logger.info(
        `Retrieving details for ${relatedIds.length.toLocaleString("en-US")} changed items. Estimated time to completion: ${estimateRemaining(relatedIds.length, config.rateLimitMs)}`,
      );
    }
    for (const [index, id] of relatedIds.entries()) {
      throwIfAborted(signal);
      const result = await source.fetchItemDetail(collection.id, id);
      if (result.status === "not-found") {
        await store.delete(collection.id, "detail", id);
        detailsRemoved++;
      } else {
        await store.put(collection.id, "detail", id, result.detail);
        detailsFetched++;
      }
      logger.progress(index + 1, relatedIds.length, "Details");
    }
  }

  for (const id of evicted) {
    await store.delete(collection.id, "detail", id);
    detailsRemoved++;
  }

  if (existing.size > 0 && evicted.length / existing.size > EVICTION_WARNING_RATIO) {
    logger.warn(
      `${evicted.length.toLocaleString("en-US")} of ${existing.size.toLocaleString("en-US")} items were removed from ${collection.name}, more than ${EVICTION_WARNING_RATIO * 100}% of the collection`,
    );
  }

  state = Completion.markSynced(state, now());
  await tracker.save(collection.id, state);

  if (writer) await exportCollection(ctx, collection, writer);

  return {
    ...base,
    status: "updated",
    related: partition.related.size,
    evicted: evicted.length,
    detailsFetched,
    detailsRemoved,
  };
}

// ─── Entry Point ───

function inRange(id: number, range: IdRange | undefined): boolean {
  return range === undefined || (id >= range.from && id <= range.to);
}

/** A complete collection synced at or after the feed download already reflects it. */
async function alreadyApplied(
  ctx: PipelineContext,
  collectionId: number,
  feed: UpdateState,
): Promise<boolean> {
  if (feed.lastRun === null) return false;
  const state = await ctx.tracker.load(collectionId);
  if (state.phase !== "complete" || state.lastSynced === null) return false;
  return new Date(state.lastSynced).getTime() >= new Date(feed.lastRun).getTime();
}

export async function runUpdate(
  ctx: PipelineContext,
  updates: UpdateTracker,
  opts: UpdateOptions,
  writer?: OutputWriter,
): Promise<UpdateResult> {
  const feed = await downloadChangesFeed(ctx, updates, opts);

  const records: ChangeRecord[] = [];
  for await (const record of readFeedRecords(ctx, opts.days)) records.push(record);
  ctx.logger.info(`${records.length.toLocaleString("en-US")} changed items in the last ${opts.days} days`);

  if (opts.fetchOnly) {
    return { feed, records: records.length, outcomes: [] };
  }

  const outcomes: CollectionOutcome[] = [];
  for (const collectionId of await ctx.store.listCollections()) {
    if (!inRange(collectionId, opts.range)) continue;
    throwIfAborted(ctx.signal);
    const name = await cachedCollectionName(ctx, collectionId);
    if (await alreadyApplied(ctx, collectionId, feed.state)) {
      ctx.logger.info(`${name} [ID: ${collectionId}] already has the downloaded changes, skipping`);
      outcomes.push({ collectionId, name, status: "unchanged" });
      continue;
    }
    outcomes.push(await reconcileCollection(ctx, { id: collectionId, name }, records, writer));
  }
  return { feed, records: records.length, outcomes };
}
