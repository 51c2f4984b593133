/** Catalog API records and pipeline context. */

import { z } from "zod";
import type { CatalogConfig } from "../core/config.js";
import type { CompletionTracker } from "../core/state.js";
import type { CacheStore, Logger } from "../core/types.js";

// ─── Wire Records ───
// Named fields are the ones the pipeline and exporter read. Anything else
// the API sends is kept as-is.

export const CollectionSchema = z
  .object({
    platform_id: z.number().int(),
    platform_name: z.string(),
  })
  .passthrough();

export const CollectionListSchema = z.object({
  platforms: z.array(CollectionSchema),
});

export const AlternateTitleSchema = z
  .object({
    description: z.string().nullish(),
    title: z.string().nullish(),
  })
  .passthrough();

export const GenreSchema = z
  .object({
    genre_category: z.string().nullish(),
    genre_category_id: z.number().nullish(),
    genre_id: z.number().nullish(),
    genre_name: z.string().nullish(),
  })
  .passthrough();

export const MembershipSchema = z
  .object({
    platform_id: z.number().int(),
    platform_name: z.string().nullish(),
    first_release_date: z.string().nullish(),
  })
  .passthrough();

export const ListingItemSchema = z
  .object({
    game_id: z.number().int(),
    title: z.string(),
    alternate_titles: z.array(AlternateTitleSchema).nullish(),
    genres: z.array(GenreSchema).nullish(),
    platforms: z.array(MembershipSchema).nullish(),
    description: z.string().nullish(),
    moby_url: z.string().nullish(),
    official_url: z.string().nullish(),
    sample_screenshots: z.array(z.unknown()).nullish(),
  })
  .passthrough();

/** A missing `games` key is how the API reports a page past the end. */
export const ListingPageSchema = z.object({
  games: z.array(ListingItemSchema).default([]),
});

export const CompanySchema = z
  .object({
    company_id: z.number().nullish(),
    company_name: z.string().nullish(),
    role: z.string().nullish(),
  })
  .passthrough();

export const ProductCodeSchema = z.record(z.unknown());

export const ReleaseSchema = z
  .object({
    release_date: z.string().nullish(),
    description: z.string().nullish(),
    countries: z.array(z.string()).nullish(),
    companies: z.array(CompanySchema).nullish(),
    product_codes: z.array(ProductCodeSchema).nullish(),
  })
  .passthrough();

export const ItemDetailSchema = z
  .object({
    game_id: z.number().int(),
    attributes: z.array(z.record(z.unknown())).nullish(),
    patches: z.array(z.record(z.unknown())).nullish(),
    ratings: z.array(z.record(z.unknown())).nullish(),
    releases: z.array(ReleaseSchema).nullish(),
  })
  .passthrough();

export type Collection = z.infer<typeof CollectionSchema>;
export type ListingItem = z.infer<typeof ListingItemSchema>;
export type ListingPage = z.infer<typeof ListingPageSchema>;
export type ItemDetail = z.infer<typeof ItemDetailSchema>;
export type Release = z.infer<typeof ReleaseSchema>;

/** An item as the changes feed reports it, with its current memberships. */
export type ChangeRecord = ListingItem;

export type DetailLookup =
  | { status: "ok"; detail: ItemDetail }
  | { status: "not-found" };

// ─── Remote Source ───

export interface CatalogSource {
  fetchCollections(): Promise<Collection[]>;
  fetchListingPage(
    collectionId: number,
    offset: number,
    limit: number,
  ): Promise<ListingPage>;
  fetchItemDetail(collectionId: number, itemId: number): Promise<DetailLookup>;
  fetchChangesPage(
    days: number,
    offset: number,
    limit: number,
  ): Promise<ListingPage>;
}

// ─── Pipeline Context ───

export interface PipelineContext {
  config: CatalogConfig;
  source: CatalogSource;
  store: CacheStore;
  tracker: CompletionTracker;
  logger: Logger;
  signal: AbortSignal;
  now: () => Date;
}

export interface CollectionRef {
  id: number;
  name: string;
}
