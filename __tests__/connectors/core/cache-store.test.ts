import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  decodePayload,
  encodePayload,
  FileCacheStore,
  MemoryCacheStore,
} from "../../../src/connectors/core/cache-store.js";
import type { CacheStore } from "../../../src/connectors/core/types.js";

describe("payload encoding", () => {
  it("stores plain JSON by default", () => {
    expect(encodePayload({ games: [1] }, false)).toBe('{"games":[1]}');
  });

  it("wraps compressed payloads in a gzip envelope", () => {
    const encoded = JSON.parse(encodePayload({ games: [1] }, true));
    expect(encoded.encoding).toBe("gzip");
    expect(decodePayload(JSON.stringify(encoded))).toEqual({
      status: "hit",
      value: { games: [1] },
    });
  });

  it("reports unparseable content as corrupt", () => {
    expect(decodePayload('{"games": [').status).toBe("corrupt");
    expect(decodePayload('{"encoding":"gzip","data":"bm90IGd6aXA="}').status).toBe("corrupt");
  });
});

// Both backends must behave the same
const backends: Array<[string, () => { store: CacheStore; cleanup: () => void }]> = [
  [
    "FileCacheStore",
    () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), "catalog-cache-test-"));
      return {
        store: new FileCacheStore(dir),
        cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
      };
    },
  ],
  ["MemoryCacheStore", () => ({ store: new MemoryCacheStore(), cleanup: () => {} })],
];

describe.each(backends)("%s", (_name, create) => {
  let store: CacheStore;
  let cleanup: () => void;

  beforeEach(() => {
    ({ store, cleanup } = create());
  });

  afterEach(() => {
    cleanup();
  });

  it("returns miss for absent keys", async () => {
    expect(await store.get(3, "listing", 0)).toEqual({ status: "miss" });
    expect(await store.has(3, "listing", 0)).toBe(false);
  });

  it("round-trips values", async () => {
    await store.put(3, "detail", 42, { game_id: 42, title: "Pong" });
    expect(await store.get(3, "detail", 42)).toEqual({
      status: "hit",
      value: { game_id: 42, title: "Pong" },
    });
    expect(await store.has(3, "detail", 42)).toBe(true);
  });

  it("lists keys in numeric order", async () => {
    for (const key of [100, 20, 0, 1000]) {
      await store.put(3, "listing", key, { games: [] });
    }
    expect(await store.listKeys(3, "listing")).toEqual([0, 20, 100, 1000]);
  });

  it("keeps namespaces and scopes apart", async () => {
    await store.put(3, "listing", 0, { games: [] });
    await store.put(3, "detail", 5, {});
    await store.put(4, "listing", 100, { games: [] });
    await store.put("updates", "listing", 200, { games: [] });

    expect(await store.listKeys(3, "listing")).toEqual([0]);
    expect(await store.listKeys(3, "detail")).toEqual([5]);
    expect(await store.listKeys("updates", "listing")).toEqual([200]);
    expect(await store.listCollections()).toEqual([3, 4]);
  });

  it("rejects keys that are not non-negative integers", async () => {
    await expect(store.put(3, "listing", -100, {})).rejects.toThrow(RangeError);
    await expect(store.put(3, "listing", 1.5, {})).rejects.toThrow(RangeError);
  });

  it("deletes one key or a whole scope", async () => {
    await store.put(3, "detail", 1, {});
    await store.put(3, "detail", 2, {});
    await store.delete(3, "detail", 1);
    expect(await store.listKeys(3, "detail")).toEqual([2]);

    await store.deleteAll(3);
    expect(await store.listKeys(3, "detail")).toEqual([]);
    expect(await store.listCollections()).toEqual([]);
  });

  it("replaceAll swaps the page set and drops missing keys", async () => {
    await store.put(3, "listing", 0, { games: ["a"] });
    await store.put(3, "listing", 100, { games: ["b"] });
    await store.put(3, "listing", 200, { games: ["c"] });

    await store.replaceAll(3, "listing", [
      [0, { games: ["x"] }],
      [100, { games: ["y"] }],
    ]);

    expect(await store.listKeys(3, "listing")).toEqual([0, 100]);
    expect(await store.get(3, "listing", 0)).toEqual({ status: "hit", value: { games: ["x"] } });
    expect(await store.get(3, "listing", 100)).toEqual({ status: "hit", value: { games: ["y"] } });
  });

  it("round-trips documents", async () => {
    await store.writeDocument("3/status.json", { stage1Done: true });
    expect(await store.readDocument("3/status.json")).toEqual({
      status: "hit",
      value: { stage1Done: true },
    });
    expect(await store.readDocument("missing.json")).toEqual({ status: "miss" });
  });
});

describe("FileCacheStore on disk", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "catalog-cache-test-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("lays out pages and details by collection", async () => {
    const store = new FileCacheStore(dir);
    await store.put(3, "listing", 100, { games: [] });
    await store.put(3, "detail", 42, { game_id: 42 });
    await store.put("updates", "listing", 0, { games: [] });

    expect(fs.readFileSync(path.join(dir, "3", "listing", "100.json"), "utf-8")).toBe('{"games":[]}');
    expect(fs.existsSync(path.join(dir, "3", "detail", "42.json"))).toBe(true);
    expect(fs.existsSync(path.join(dir, "updates", "0.json"))).toBe(true);
  });

  it("leaves no temp files behind", async () => {
    const store = new FileCacheStore(dir);
    await store.put(3, "listing", 0, { games: [] });
    await store.replaceAll(3, "listing", [[0, { games: [] }], [100, { games: [] }]]);
    expect(fs.readdirSync(path.join(dir, "3", "listing")).sort()).toEqual(["0.json", "100.json"]);
  });

  it("ignores stray temp files when listing keys", async () => {
    const store = new FileCacheStore(dir);
    await store.put(3, "listing", 0, { games: [] });
    fs.writeFileSync(path.join(dir, "3", "listing", "100.json.tmp"), "{");
    expect(await store.listKeys(3, "listing")).toEqual([0]);
  });

  it("reads a truncated file as corrupt", async () => {
    const store = new FileCacheStore(dir);
    fs.mkdirSync(path.join(dir, "3", "detail"), { recursive: true });
    fs.writeFileSync(path.join(dir, "3", "detail", "9.json"), '{"game_id": 9, "attr');
    expect((await store.get(3, "detail", 9)).status).toBe("corrupt");
  });

  it("reads compressed and plain entries side by side", async () => {
    await new FileCacheStore(dir).put(3, "detail", 1, { game_id: 1 });
    const compressed = new FileCacheStore(dir, { compress: true });
    await compressed.put(3, "detail", 2, { game_id: 2 });

    const raw = JSON.parse(fs.readFileSync(path.join(dir, "3", "detail", "2.json"), "utf-8"));
    expect(raw.encoding).toBe("gzip");
    expect(await compressed.get(3, "detail", 1)).toEqual({ status: "hit", value: { game_id: 1 } });
    expect(await compressed.get(3, "detail", 2)).toEqual({ status: "hit", value: { game_id: 2 } });
  });
});
