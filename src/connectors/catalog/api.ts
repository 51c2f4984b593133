/**
 * Catalog API endpoints.
 *
 * Builds request URLs and validates response bodies on top of the
 * rate-limited, retrying RemoteClient.
 */

import type { CatalogConfig } from "../core/config.js";
import { FatalRemoteError } from "../core/errors.js";
import type { RemoteClient } from "./client.js";
import {
  CollectionListSchema,
  ItemDetailSchema,
  ListingPageSchema,
  type CatalogSource,
  type Collection,
  type DetailLookup,
  type ListingPage,
} from "./types.js";

type Query = Record<string, string | number>;

export class CatalogApi implements CatalogSource {
  private readonly client: RemoteClient;
  private readonly config: CatalogConfig;

  constructor(client: RemoteClient, config: CatalogConfig) {
    this.client = client;
    this.config = config;
  }

  async fetchCollections(): Promise<Collection[]> {
    const body = await this.getOk(this.url("platforms"), "Collection list");
    const parsed = CollectionListSchema.safeParse(body);
    if (!parsed.success) throw malformed("Collection list", parsed.error.message);
    return parsed.data.platforms;
  }

  async fetchListingPage(
    collectionId: number,
    offset: number,
    limit: number,
  ): Promise<ListingPage> {
    const label = `Collection ${collectionId} listing at offset ${offset}`;
    const body = await this.getOk(
      this.url("games", { platform: collectionId, offset, limit }),
      label,
    );
    return parseListingPage(body, label);
  }

  async fetchItemDetail(collectionId: number, itemId: number): Promise<DetailLookup> {
    const label = `Details for item ${itemId} in collection ${collectionId}`;
    const result = await this.client.getJson(
      this.url(`games/${itemId}/platforms/${collectionId}`),
      { label, allowNotFound: true },
    );
    if (result.status === "not-found") return result;

    const parsed = ItemDetailSchema.safeParse(withItemId(result.body, itemId));
    if (!parsed.success) throw malformed(label, parsed.error.message);
    return { status: "ok", detail: parsed.data };
  }

  async fetchChangesPage(days: number, offset: number, limit: number): Promise<ListingPage> {
    const label = `Changes in the last ${days} days at offset ${offset}`;
    const body = await this.getOk(
      this.url("games/recent", { format: "normal", age: days, offset, limit }),
      label,
    );
    return parseListingPage(body, label);
  }

  // ─── Helpers ───

  private url(endpoint: string, query: Query = {}): string {
    const url = new URL(`${this.config.baseUrl.replace(/\/+$/, "")}/${endpoint}`);
    url.searchParams.set("api_key", this.config.apiKey);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private async getOk(url: string, label: string): Promise<unknown> {
    const result = await this.client.getJson(url, { label });
    if (result.status === "not-found") {
      throw new FatalRemoteError(`${label}: not found (HTTP 404).`, 404);
    }
    return result.body;
  }
}

function parseListingPage(body: unknown, label: string): ListingPage {
  const parsed = ListingPageSchema.safeParse(body);
  if (!parsed.success) throw malformed(label, parsed.error.message);
  return parsed.data;
}

/** Details are keyed by the requested item id whatever the body says. */
function withItemId(body: unknown, itemId: number): unknown {
  if (typeof body !== "object" || body === null || Array.isArray(body)) return body;
  return { ...body, game_id: itemId };
}

function malformed(label: string, detail: string): FatalRemoteError {
  return new FatalRemoteError(`${label}: unexpected response shape.`, null, {
    issues: detail,
  });
}
