import { describe, expect, it, vi } from "vitest";
import { CatalogApi } from "../../../src/connectors/catalog/api.js";
import { RemoteClient, type FetchFn } from "../../../src/connectors/catalog/client.js";
import { parseConfig } from "../../../src/connectors/core/config.js";
import { FatalRemoteError } from "../../../src/connectors/core/errors.js";
import { mockLogger } from "./fake-catalog.js";

function setup(status: number, body: unknown) {
  const fetchFn = vi.fn<FetchFn>(async () => new Response(JSON.stringify(body), { status }));
  const config = parseConfig({
    apiKey: "test-secret",
    baseUrl: "http://localhost:9999/v1/",
    retryScheduleMs: [],
  });
  const client = new RemoteClient({
    config,
    rateLimiter: { acquire: async () => {}, backoff: () => {} },
    logger: mockLogger(),
    signal: new AbortController().signal,
    fetchFn,
  });
  return { api: new CatalogApi(client, config), fetchFn };
}

describe("CatalogApi", () => {
  it("lists collections", async () => {
    const { api, fetchFn } = setup(200, {
      platforms: [{ platform_id: 3, platform_name: "Platform 3" }],
    });

    expect(await api.fetchCollections()).toEqual([{ platform_id: 3, platform_name: "Platform 3" }]);
    expect(fetchFn.mock.calls[0]?.[0]).toBe("http://localhost:9999/v1/platforms?api_key=test-secret");
  });

  it("requests a listing page by collection, offset and limit", async () => {
    const { api, fetchFn } = setup(200, { games: [{ game_id: 1, title: "Game 1" }] });

    const page = await api.fetchListingPage(3, 200, 100);

    expect(page.games.map((g) => g.game_id)).toEqual([1]);
    expect(fetchFn.mock.calls[0]?.[0]).toBe(
      "http://localhost:9999/v1/games?api_key=test-secret&platform=3&offset=200&limit=100",
    );
  });

  it("reads a body without games as an empty page", async () => {
    const { api } = setup(200, {});
    expect(await api.fetchListingPage(3, 0, 100)).toEqual({ games: [] });
  });

  it("rejects a page of the wrong shape", async () => {
    const { api } = setup(200, { games: [{ title: 5 }] });

    await expect(api.fetchListingPage(3, 0, 100)).rejects.toThrow(
      new FatalRemoteError("Collection 3 listing at offset 0: unexpected response shape.", null),
    );
  });

  it("fails on a missing listing", async () => {
    const { api } = setup(404, {});

    await expect(api.fetchListingPage(3, 0, 100)).rejects.toThrow(
      "Collection 3 listing at offset 0: Unexpected response (HTTP 404).",
    );
  });

  it("keys a detail by the requested item id", async () => {
    const { api, fetchFn } = setup(200, { game_id: 99, attributes: [] });

    expect(await api.fetchItemDetail(3, 12)).toEqual({
      status: "ok",
      detail: { game_id: 12, attributes: [] },
    });
    expect(fetchFn.mock.calls[0]?.[0]).toBe(
      "http://localhost:9999/v1/games/12/platforms/3?api_key=test-secret",
    );
  });

  it("reports a missing detail", async () => {
    const { api } = setup(404, {});
    expect(await api.fetchItemDetail(3, 12)).toEqual({ status: "not-found" });
  });

  it("requests the changes feed", async () => {
    const { api, fetchFn } = setup(200, { games: [] });

    await api.fetchChangesPage(7, 0, 100);

    expect(fetchFn.mock.calls[0]?.[0]).toBe(
      "http://localhost:9999/v1/games/recent?api_key=test-secret&format=normal&age=7&offset=0&limit=100",
    );
  });
});
