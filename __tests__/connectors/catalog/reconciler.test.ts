import { describe, expect, it } from "vitest";
import {
  downloadChangesFeed,
  evictedIds,
  paginate,
  partitionChanges,
  reconcileCollection,
  runUpdate,
} from "../../../src/connectors/catalog/reconciler.js";
import type { ListingItem } from "../../../src/connectors/catalog/types.js";
import { Completion, UpdateProgress, UpdateTracker } from "../../../src/connectors/core/state.js";
import {
  cachedIds,
  FakeCatalog,
  makeContext,
  makeDetail,
  makeItem,
  MemoryOutputWriter,
  NOW,
} from "./fake-catalog.js";

const collection = { id: 3, name: "Platform 3" };
const RECENT_SYNC = "2026-03-09T00:00:00.000Z";

/** A collection 3 holding items 1-3, fully synced a day before NOW. */
async function syncedContext(source = new FakeCatalog(), now?: () => Date) {
  const ctx = makeContext({ source, now });
  await ctx.store.put(3, "listing", 0, { games: [makeItem(1, [3]), makeItem(2, [3])] });
  await ctx.store.put(3, "listing", 2, { games: [makeItem(3, [3])] });
  for (const id of [1, 2, 3]) await ctx.store.put(3, "detail", id, makeDetail(id));
  const complete = Completion.completeDetails(Completion.completeListing(Completion.initial()));
  await ctx.tracker.save(3, { ...complete, lastSynced: RECENT_SYNC });
  return ctx;
}

describe("partitionChanges", () => {
  it("splits records by membership and keeps the first related record", () => {
    const first = makeItem(2, [3], { title: "First" });
    const second = makeItem(2, [3], { title: "Second" });
    const partition = partitionChanges([first, makeItem(5, [4]), second], 3);

    expect([...partition.related.keys()]).toEqual([2]);
    expect(partition.related.get(2)?.title).toBe("First");
    expect([...partition.unrelated]).toEqual([5]);
  });

  it("treats records without memberships as unrelated", () => {
    const record: ListingItem = { game_id: 8, title: "Loose" };
    expect([...partitionChanges([record], 3).unrelated]).toEqual([8]);
  });
});

describe("evictedIds", () => {
  it("only evicts cached ids that are not also related", () => {
    const partition = partitionChanges(
      [makeItem(1, [4]), makeItem(2, [4]), makeItem(2, [3]), makeItem(9, [4])],
      3,
    );
    expect(evictedIds(partition, new Set([1, 2, 3]))).toEqual([1]);
  });
});

describe("paginate", () => {
  it("orders by id and keys pages by offset", () => {
    const items = new Map([5, 1, 3].map((id) => [id, makeItem(id, [3])]));
    const pages = paginate(items, 2);
    expect(pages.map(([offset, page]) => [offset, page.games.map((g) => g.game_id)])).toEqual([
      [0, [1, 3]],
      [2, [5]],
    ]);
  });
});

describe("reconcileCollection", () => {
  it("replaces changed items, adds new ones and evicts departed ones", async () => {
    const source = new FakeCatalog();
    source.details.set("3:2", makeDetail(2, { patches: [{ patch_id: 1 }] }));
    source.details.set("3:4", makeDetail(4));
    const ctx = await syncedContext(source);

    const records = [
      makeItem(2, [3], { title: "Game 2 Remastered" }),
      makeItem(3, [5]),
      makeItem(4, [3]),
    ];
    const outcome = await reconcileCollection(ctx, collection, records);

    expect(outcome).toEqual({
      collectionId: 3,
      name: "Platform 3",
      status: "updated",
      related: 2,
      evicted: 1,
      detailsFetched: 2,
      detailsRemoved: 1,
    });
    expect(await cachedIds(ctx.store, 3)).toEqual([1, 2, 4]);
    expect(await ctx.store.listKeys(3, "listing")).toEqual([0, 2]);
    expect(await ctx.store.get(3, "listing", 0)).toEqual({
      status: "hit",
      value: { games: [makeItem(1, [3]), makeItem(2, [3], { title: "Game 2 Remastered" })] },
    });
    expect(await ctx.store.listKeys(3, "detail")).toEqual([1, 2, 4]);
    expect(await ctx.store.get(3, "detail", 2)).toEqual({
      status: "hit",
      value: makeDetail(2, { patches: [{ patch_id: 1 }] }),
    });
    expect(source.calls).toEqual(["detail:3:2", "detail:3:4"]);
    expect(await ctx.tracker.load(3)).toEqual({ phase: "complete", lastSynced: NOW.toISOString() });
  });

  it("warns when more than 5% of the collection is evicted", async () => {
    const ctx = await syncedContext();
    await reconcileCollection(ctx, collection, [makeItem(3, [5])]);
    expect(ctx.logger.warn).toHaveBeenCalledWith(
      "1 of 3 items were removed from Platform 3, more than 5% of the collection",
    );
  });

  it("leaves the cache untouched when nothing applies", async () => {
    const source = new FakeCatalog();
    const ctx = await syncedContext(source);
    const before = ctx.store.snapshot();

    const outcome = await reconcileCollection(ctx, collection, [
      makeItem(7, [4]),
      makeItem(8, [5]),
    ]);

    expect(outcome.status).toBe("unchanged");
    expect(ctx.store.snapshot()).toEqual(before);
    expect(source.calls).toEqual([]);
  });

  it("deletes a stale detail when the API no longer has it", async () => {
    const source = new FakeCatalog();
    const ctx = await syncedContext(source);

    const outcome = await reconcileCollection(ctx, collection, [makeItem(2, [3])]);

    expect(outcome).toMatchObject({ status: "updated", detailsFetched: 0, detailsRemoved: 1 });
    expect(await ctx.store.listKeys(3, "detail")).toEqual([1, 3]);
  });

  it("skips collections that are not fully downloaded", async () => {
    const ctx = makeContext();
    await ctx.tracker.save(3, Completion.completeListing(Completion.initial()));

    const outcome = await reconcileCollection(ctx, collection, [makeItem(1, [3])]);

    expect(outcome.status).toBe("incomplete");
    expect(ctx.logger.warn).toHaveBeenCalledWith(
      "Platform 3 [ID: 3] has not finished downloading, skipping. Sync it before applying updates.",
    );
    expect(await ctx.store.listKeys(3, "listing")).toEqual([]);
  });

  it("warns about a long gap since the last sync and carries on", async () => {
    const ctx = await syncedContext();
    await ctx.tracker.save(3, {
      phase: "complete",
      lastSynced: "2026-02-01T00:00:00.000Z",
    });

    const outcome = await reconcileCollection(ctx, collection, [makeItem(3, [5])]);

    expect(ctx.logger.warn).toHaveBeenCalledWith(
      "Platform 3 [ID: 3] was last synced more than 21 days ago, so changes may have been missed. Consider a full resync.",
    );
    expect(outcome.status).toBe("updated");
  });

  it("exports the collection after applying changes", async () => {
    const ctx = await syncedContext();
    const writer = new MemoryOutputWriter();

    await reconcileCollection(ctx, collection, [makeItem(3, [5])], writer);

    expect([...writer.tables.keys()]).toContain("Platform 3 - (Primary) Games.txt");
  });
});

describe("downloadChangesFeed", () => {
  function feedSource(count: number) {
    const source = new FakeCatalog();
    source.changes = Array.from({ length: count }, (_, i) => makeItem(100 + i, [3]));
    return source;
  }

  it("downloads every page and marks the feed finished", async () => {
    const source = feedSource(3);
    const ctx = makeContext({ source });
    const updates = new UpdateTracker(ctx.store);

    const result = await downloadChangesFeed(ctx, updates, { days: 7 });

    expect(source.calls).toEqual(["changes:7:0", "changes:7:2"]);
    expect(result).toMatchObject({ pagesFetched: 2, reused: false });
    expect(await updates.load()).toEqual({
      finished: true,
      lastRun: NOW.toISOString(),
      daysRequested: 7,
    });
  });

  it("reuses a finished feed that is still fresh", async () => {
    const source = feedSource(3);
    const ctx = makeContext({ source });
    const updates = new UpdateTracker(ctx.store);
    await updates.save({ finished: true, lastRun: "2026-03-10T10:00:00.000Z", daysRequested: 7 });

    const result = await downloadChangesFeed(ctx, updates, { days: 7 });

    expect(result.reused).toBe(true);
    expect(source.calls).toEqual([]);
  });

  it("resumes an unfinished feed", async () => {
    const source = feedSource(5);
    const ctx = makeContext({ source });
    const updates = new UpdateTracker(ctx.store);
    await ctx.store.put("updates", "listing", 0, { games: source.changes.slice(0, 2) });
    await updates.save(
      UpdateProgress.recordPage(UpdateProgress.initial(), 7, new Date("2026-03-10T11:00:00.000Z")),
    );

    await downloadChangesFeed(ctx, updates, { days: 7 });

    expect(source.calls).toEqual(["changes:7:2", "changes:7:4"]);
  });

  it("starts over when the partial feed is stale", async () => {
    const source = feedSource(5);
    const ctx = makeContext({ source });
    const updates = new UpdateTracker(ctx.store);
    await ctx.store.put("updates", "listing", 0, { games: source.changes.slice(0, 2) });
    await ctx.store.put("updates", "listing", 2, { games: source.changes.slice(2, 4) });
    await updates.save(
      UpdateProgress.recordPage(UpdateProgress.initial(), 7, new Date("2026-03-10T05:00:00.000Z")),
    );

    await downloadChangesFeed(ctx, updates, { days: 7 });

    expect(source.calls[0]).toBe("changes:7:0");
    expect(ctx.logger.warn).toHaveBeenCalledWith(
      "Update cache is stale, downloading update data from scratch",
    );
  });

  it("starts over when a different window is requested", async () => {
    const source = feedSource(1);
    const ctx = makeContext({ source });
    const updates = new UpdateTracker(ctx.store);
    await ctx.store.put("updates", "listing", 0, { games: [] });
    await updates.save({ finished: true, lastRun: "2026-03-10T11:00:00.000Z", daysRequested: 7 });

    await downloadChangesFeed(ctx, updates, { days: 14 });

    expect(source.calls).toEqual(["changes:14:0"]);
    expect((await updates.load()).daysRequested).toBe(14);
  });

  it("starts over when asked to", async () => {
    const source = feedSource(1);
    const ctx = makeContext({ source });
    const updates = new UpdateTracker(ctx.store);
    await updates.save({ finished: true, lastRun: "2026-03-10T11:00:00.000Z", daysRequested: 7 });

    await downloadChangesFeed(ctx, updates, { days: 7, forceRestart: true });

    expect(source.calls).toEqual(["changes:7:0"]);
  });

  it("finishes an empty feed", async () => {
    const source = feedSource(0);
    const ctx = makeContext({ source });
    const updates = new UpdateTracker(ctx.store);

    await downloadChangesFeed(ctx, updates, { days: 1 });

    expect((await updates.load()).finished).toBe(true);
    expect(await ctx.store.listKeys("updates", "listing")).toEqual([]);
  });
});

describe("runUpdate", () => {
  it("applies the feed to every cached collection in range", async () => {
    const source = new FakeCatalog();
    source.changes = [makeItem(3, [5]), makeItem(40, [9])];
    const ctx = await syncedContext(source);
    await ctx.store.put(9, "listing", 0, { games: [makeItem(40, [9])] });
    await ctx.tracker.save(9, Completion.initial());

    const result = await runUpdate(ctx, new UpdateTracker(ctx.store), {
      days: 7,
      range: { from: 1, to: 5 },
    });

    expect(result.records).toBe(2);
    expect(result.outcomes.map((o) => [o.collectionId, o.status])).toEqual([[3, "updated"]]);
    expect(await cachedIds(ctx.store, 3)).toEqual([1, 2]);
  });

  it("does not apply the same feed twice", async () => {
    const source = new FakeCatalog();
    source.changes = [makeItem(2, [3], { title: "Game 2 Remastered" })];
    source.details.set("3:2", makeDetail(2));
    const ctx = await syncedContext(source);
    const updates = new UpdateTracker(ctx.store);

    await runUpdate(ctx, updates, { days: 7 });
    const before = ctx.store.snapshot();
    const second = await runUpdate(ctx, updates, { days: 7 });

    expect(source.calls).toEqual(["changes:7:0", "detail:3:2"]);
    expect(second.outcomes).toEqual([
      { collectionId: 3, name: "Collection 3", status: "unchanged" },
    ]);
    expect(ctx.store.snapshot()).toEqual(before);
    expect(ctx.logger.info).toHaveBeenCalledWith(
      "Collection 3 [ID: 3] already has the downloaded changes, skipping",
    );
  });

  it("applies a newer download of the feed again", async () => {
    const source = new FakeCatalog();
    source.changes = [makeItem(2, [3])];
    source.details.set("3:2", makeDetail(2));
    let time = NOW.getTime();
    const ctx = await syncedContext(source, () => new Date(time));
    const updates = new UpdateTracker(ctx.store);
    await runUpdate(ctx, updates, { days: 7 });
    source.calls.length = 0;
    time += 60_000;

    const result = await runUpdate(ctx, updates, { days: 7, forceRestart: true });

    expect(source.calls).toEqual(["changes:7:0", "detail:3:2"]);
    expect(result.outcomes[0]?.status).toBe("updated");
  });

  it("reports collections that are not complete", async () => {
    const source = new FakeCatalog();
    source.changes = [makeItem(40, [9])];
    const ctx = makeContext({ source });
    await ctx.tracker.save(9, Completion.initial());

    const result = await runUpdate(ctx, new UpdateTracker(ctx.store), { days: 7 });

    expect(result.outcomes).toEqual([
      { collectionId: 9, name: "Collection 9", status: "incomplete" },
    ]);
  });

  it("only downloads the feed with fetchOnly", async () => {
    const source = new FakeCatalog();
    source.changes = [makeItem(3, [5])];
    const ctx = await syncedContext(source);
    const before = await cachedIds(ctx.store, 3);

    const result = await runUpdate(ctx, new UpdateTracker(ctx.store), { days: 7, fetchOnly: true });

    expect(result.outcomes).toEqual([]);
    expect(source.calls).toEqual(["changes:7:0"]);
    expect(await cachedIds(ctx.store, 3)).toEqual(before);
  });
});
