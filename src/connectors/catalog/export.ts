/**
 * Export a synced collection from the cache.
 *
 * Delimited output is split into one primary table and several child
 * tables keyed by item id, so that no table grows past the column limits of
 * desktop database tools. JSON output is a single document with each listing
 * item merged with its detail record.
 */

import { sanitizeFilename } from "../core/slugify.js";
import type { OutputWriter } from "../core/types.js";
import { readDetails, readListingItems } from "./pages.js";
import type { CollectionRef, ItemDetail, ListingItem, PipelineContext } from "./types.js";

// ─── Types ───

export type Row = Record<string, string>;

export interface Table {
  name: string;
  columns: string[];
  rows: Row[];
}

type Flat = Record<string, unknown>;

// Not part of the primary table; `sample_cover.*` is dropped as well
const PRIMARY_DROPPED = new Set([
  "moby_score",
  "num_votes",
  "platforms",
  "sample_screenshots",
  "alternate_titles",
  "genres",
]);

// ─── Cell Values ───

/** Make a value safe for tools that split records on line breaks and tabs. */
export function sanitizeValue(value: string): string {
  return value
    .replace(/\r\n|\r|\n/g, " ")
    .replace(/\t/g, "    ")
    .replace(/[“”]/g, '"')
    .replace(/[‘’]/g, "'")
    .replace(/[\u200b\u200c]/g, "");
}

function isScalar(value: unknown): value is string | number | boolean {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

export function toCell(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (isScalar(value)) return sanitizeValue(String(value));
  if (Array.isArray(value) && value.every(isScalar)) {
    return sanitizeValue(value.map(String).join(", "));
  }
  return sanitizeValue(JSON.stringify(value));
}

function isPlainObject(value: unknown): value is Flat {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Nested objects become dotted column names; arrays stay whole. */
export function flatten(record: Flat, prefix = ""): Flat {
  const out: Flat = {};
  for (const [key, value] of Object.entries(record)) {
    if (isPlainObject(value)) {
      Object.assign(out, flatten(value, `${prefix}${key}.`));
    } else {
      out[`${prefix}${key}`] = value;
    }
  }
  return out;
}

/** Columns are `leading` followed by every other key in order of first appearance. */
export function buildTable(name: string, records: Flat[], leading: readonly string[] = ["game_id"]): Table {
  const columns: string[] = [...leading];
  const known = new Set(columns);
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!known.has(key)) {
        known.add(key);
        columns.push(key);
      }
    }
  }
  const rows = records.map((record) => {
    const row: Row = {};
    for (const column of columns) row[column] = toCell(record[column]);
    return row;
  });
  return { name, columns, rows };
}

// ─── Tables ───

/** First occurrence of each item id, ascending. */
export function uniqueItems(items: readonly ListingItem[]): ListingItem[] {
  const byId = new Map<number, ListingItem>();
  for (const item of items) {
    if (!byId.has(item.game_id)) byId.set(item.game_id, item);
  }
  return [...byId.values()].sort((a, b) => a.game_id - b.game_id);
}

function primaryRecord(item: ListingItem): Flat {
  const out: Flat = {};
  for (const [key, value] of Object.entries(flatten(item))) {
    if (PRIMARY_DROPPED.has(key) || key === "sample_cover" || key.startsWith("sample_cover.")) {
      continue;
    }
    out[key] = value;
  }
  return out;
}

function nonEmpty(value: unknown): boolean {
  return value !== null && value !== undefined && value !== "";
}

export function buildListingTables(items: readonly ListingItem[]): Table[] {
  const primary = items.map(primaryRecord);

  const alternateTitles: Flat[] = [];
  const genres: Flat[] = [];
  for (const item of items) {
    for (const alt of item.alternate_titles ?? []) {
      if (nonEmpty(alt.title)) alternateTitles.push({ game_id: item.game_id, ...flatten(alt) });
    }
    for (const genre of item.genres ?? []) {
      if (!nonEmpty(genre.genre_category)) continue;
      genres.push({
        game_id: item.game_id,
        ...flatten(genre),
        genre_category_id: genre.genre_category_id ?? 0,
        genre_id: genre.genre_id ?? 0,
      });
    }
  }

  return [
    buildTable("(Primary) Games", primary, ["game_id", "title"]),
    buildTable("Alternate titles", alternateTitles),
    buildTable("Genres", genres),
  ];
}

export function buildDetailTables(details: readonly ItemDetail[]): Table[] {
  const attributes: Flat[] = [];
  const releases: Flat[] = [];
  const productCodes: Flat[] = [];
  const patches: Flat[] = [];
  const ratings: Flat[] = [];
  const releaseLeading = ["game_id", "releases.release_date"];

  for (const detail of details) {
    const gameId = detail.game_id;
    for (const attribute of detail.attributes ?? []) {
      attributes.push({ game_id: gameId, ...flatten(attribute) });
    }
    for (const release of detail.releases ?? []) {
      const releaseDate = release.release_date ?? "";
      const countries = release.countries?.length ? release.countries : [""];
      // One row per company and country
      for (const company of release.companies ?? []) {
        for (const country of countries) {
          releases.push({
            game_id: gameId,
            "releases.release_date": releaseDate,
            ...flatten(company),
            "releases.countries": country,
            "releases.description": release.description ?? "",
          });
        }
      }
      for (const code of release.product_codes ?? []) {
        productCodes.push({
          game_id: gameId,
          "releases.release_date": releaseDate,
          ...flatten(code),
        });
      }
    }
    for (const patch of detail.patches ?? []) {
      patches.push({ game_id: gameId, ...flatten(patch) });
    }
    for (const rating of detail.ratings ?? []) {
      ratings.push({ game_id: gameId, ...flatten(rating) });
    }
  }

  return [
    buildTable("Attributes", attributes),
    buildTable("Releases", releases, releaseLeading),
    buildTable("Product codes", productCodes, releaseLeading),
    buildTable("Patches", patches),
    buildTable("Ratings", ratings),
  ];
}

// ─── JSON ───

/** Keys sorted, with `title` then `game_id` leading. */
export function mergeItem(item: ListingItem, detail: ItemDetail | undefined): Flat {
  const merged: Flat = { ...item, ...detail };
  const { title, game_id, ...rest } = merged;
  const sorted: Flat = { title, game_id };
  for (const key of Object.keys(rest).sort()) sorted[key] = rest[key];
  return sorted;
}

export function buildJsonDocument(
  items: readonly ListingItem[],
  details: ReadonlyMap<number, ItemDetail>,
): { games: Flat[] } {
  return { games: items.map((item) => mergeItem(item, details.get(item.game_id))) };
}

// ─── Export ───

export function outputBaseName(prefix: string, collectionName: string): string {
  return `${prefix}${sanitizeFilename(collectionName)}`;
}

/**
 * Write the configured output files for a collection and return their
 * paths. Tables without rows are removed rather than left stale.
 */
export async function exportCollection(
  ctx: PipelineContext,
  collection: CollectionRef,
  writer: OutputWriter,
): Promise<string[]> {
  const { config, logger } = ctx;
  if (config.format === "none") return [];

  const listed: ListingItem[] = [];
  for await (const item of readListingItems(ctx, collection.id)) listed.push(item);
  const items = uniqueItems(listed);
  const listedIds = new Set(items.map((item) => item.game_id));

  const details = new Map<number, ItemDetail>();
  for await (const detail of readDetails(ctx, collection.id)) {
    if (listedIds.has(detail.game_id)) details.set(detail.game_id, detail);
  }

  const baseName = outputBaseName(config.prefix, collection.name);
  const written: string[] = [];

  if (config.format === "json" || config.format === "both") {
    written.push(await writer.writeJson(`${baseName}.json`, buildJsonDocument(items, details)));
  }

  if (config.format === "delimited" || config.format === "both") {
    if (details.size === 0) {
      logger.warn(
        `${collection.name} has no cached item details, so only listing tables are written. Sync it without skipping details to get the rest.`,
      );
    }
    const tables = [
      ...buildListingTables(items),
      ...buildDetailTables([...details.values()].sort((a, b) => a.game_id - b.game_id)),
    ];
    for (const table of tables) {
      const file = `${baseName} - ${table.name}.txt`;
      if (table.rows.length === 0 && table.name !== "(Primary) Games") {
        await writer.remove(file);
        continue;
      }
      written.push(await writer.writeDelimited(file, table.columns, table.rows, config.delimiter));
    }
  }

  logger.info(`Wrote ${written.length} output file${written.length === 1 ? "" : "s"} for ${collection.name}`);
  return written;
}
