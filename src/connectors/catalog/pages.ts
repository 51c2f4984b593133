/**
 * Paged downloads and cached page readers shared by both stages, the
 * changes feed and the exporter.
 */

import { errorMessage, throwIfAborted } from "../core/errors.js";
import type { CacheScope } from "../core/types.js";
import {
  ItemDetailSchema,
  ListingPageSchema,
  type ItemDetail,
  type ListingItem,
  type ListingPage,
  type PipelineContext,
} from "./types.js";

// ─── Paging ───

/** Next offset to request given the offsets already cached. */
export function resumeOffset(cachedOffsets: readonly number[], pageSize: number): number {
  if (cachedOffsets.length === 0) return 0;
  return Math.max(...cachedOffsets) + pageSize;
}

/** Screenshots are never exported and make up most of a page's size. */
export function stripHeavyFields(item: ListingItem): ListingItem {
  const { sample_screenshots: _screenshots, ...rest } = item;
  return rest;
}

export function stripPage(page: ListingPage): ListingPage {
  return { games: page.games.map(stripHeavyFields) };
}

export type FetchPage = (offset: number, limit: number) => Promise<ListingPage>;

export type PagingOutcome =
  | { status: "empty" }
  | { status: "done"; pagesFetched: number; itemsFetched: number };

/**
 * Fetch pages from the resume offset until a short page. Each page is
 * cached before `onPage` runs, so persisted progress never points past
 * what is on disk. An empty first page is reported without caching anything.
 */
export async function fetchPages(
  ctx: Pick<PipelineContext, "store" | "config" | "signal">,
  opts: {
    scope: CacheScope;
    fetchPage: FetchPage;
    onPage: (offset: number, page: ListingPage) => Promise<void>;
  },
): Promise<PagingOutcome> {
  const { store, config, signal } = ctx;
  const { pageSize } = config;
  let offset = resumeOffset(await store.listKeys(opts.scope, "listing"), pageSize);
  let pagesFetched = 0;
  let itemsFetched = 0;

  for (;;) {
    throwIfAborted(signal);
    const page = stripPage(await opts.fetchPage(offset, pageSize));

    if (page.games.length === 0) {
      if (offset === 0) return { status: "empty" };
      break;
    }

    await store.put(opts.scope, "listing", offset, page);
    await opts.onPage(offset, page);
    pagesFetched++;
    itemsFetched += page.games.length;

    if (page.games.length < pageSize) break;
    offset += pageSize;
  }

  return { status: "done", pagesFetched, itemsFetched };
}

// ─── Cached Readers ───

/**
 * Read one cached page. A corrupt or malformed page is downloaded again
 * with `refetch` and overwritten; a missing page reads as null.
 */
export async function readCachedPage(
  ctx: Pick<PipelineContext, "store" | "logger">,
  scope: CacheScope,
  offset: number,
  refetch: FetchPage,
  pageSize: number,
): Promise<ListingPage | null> {
  const lookup = await ctx.store.get(scope, "listing", offset);
  if (lookup.status === "miss") return null;

  if (lookup.status === "hit") {
    const parsed = ListingPageSchema.safeParse(lookup.value);
    if (parsed.success) return parsed.data;
    ctx.logger.warn(`Cached page ${scope}/${offset} is malformed, downloading it again`, {
      error: errorMessage(parsed.error),
    });
  } else {
    ctx.logger.warn(`Cached page ${scope}/${offset} is corrupt, downloading it again`, {
      error: lookup.error,
    });
  }

  const page = stripPage(await refetch(offset, pageSize));
  await ctx.store.put(scope, "listing", offset, page);
  return page;
}

/** Every cached listing item of a collection, in offset order. */
export async function* readListingItems(
  ctx: PipelineContext,
  collectionId: number,
): AsyncGenerator<ListingItem> {
  const refetch: FetchPage = (offset, limit) =>
    ctx.source.fetchListingPage(collectionId, offset, limit);
  for (const offset of await ctx.store.listKeys(collectionId, "listing")) {
    throwIfAborted(ctx.signal);
    const page = await readCachedPage(ctx, collectionId, offset, refetch, ctx.config.pageSize);
    if (page) yield* page.games;
  }
}

/** Every record of the cached changes feed, in offset order. */
export async function* readFeedRecords(
  ctx: PipelineContext,
  days: number,
): AsyncGenerator<ListingItem> {
  const refetch: FetchPage = (offset, limit) =>
    ctx.source.fetchChangesPage(days, offset, limit);
  for (const offset of await ctx.store.listKeys("updates", "listing")) {
    throwIfAborted(ctx.signal);
    const page = await readCachedPage(ctx, "updates", offset, refetch, ctx.config.pageSize);
    if (page) yield* page.games;
  }
}

/**
 * Every cached detail of a collection in ascending item id order. A corrupt
 * entry is downloaded again, and removed when the API no longer has it.
 */
export async function* readDetails(
  ctx: PipelineContext,
  collectionId: number,
): AsyncGenerator<ItemDetail> {
  for (const itemId of await ctx.store.listKeys(collectionId, "detail")) {
    throwIfAborted(ctx.signal);
    const lookup = await ctx.store.get(collectionId, "detail", itemId);
    if (lookup.status === "miss") continue;

    if (lookup.status === "hit") {
      const parsed = ItemDetailSchema.safeParse(lookup.value);
      if (parsed.success) {
        yield parsed.data;
        continue;
      }
    }

    ctx.logger.warn(`Details for item ${itemId} are corrupt, downloading them again`);
    const result = await ctx.source.fetchItemDetail(collectionId, itemId);
    if (result.status === "not-found") {
      await ctx.store.delete(collectionId, "detail", itemId);
      continue;
    }
    await ctx.store.put(collectionId, "detail", itemId, result.detail);
    yield result.detail;
  }
}
