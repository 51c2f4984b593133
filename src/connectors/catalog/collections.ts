import { CatalogError } from "../core/errors.js";
import { CollectionListSchema, type Collection, type CollectionRef, type PipelineContext } from "./types.js";

const COLLECTIONS_DOCUMENT = "collections.json";

type CollectionsContext = Pick<PipelineContext, "store" | "source" | "logger">;

function byName(a: Collection, b: Collection): number {
  return a.platform_name.localeCompare(b.platform_name, "en", { sensitivity: "base" });
}

/**
 * The full collection list, from the side cache unless `refresh` is set or
 * the cached copy is unusable.
 */
export async function loadCollections(
  ctx: CollectionsContext,
  opts: { refresh?: boolean } = {},
): Promise<Collection[]> {
  if (!opts.refresh) {
    const lookup = await ctx.store.readDocument(COLLECTIONS_DOCUMENT);
    if (lookup.status === "hit") {
      const parsed = CollectionListSchema.safeParse(lookup.value);
      if (parsed.success) return parsed.data.platforms;
      ctx.logger.warn("Cached collection list is malformed, downloading it again");
    } else if (lookup.status === "corrupt") {
      ctx.logger.warn("Cached collection list is corrupt, downloading it again");
    }
  }

  ctx.logger.info("Retrieving collections...");
  const platforms = [...(await ctx.source.fetchCollections())].sort(byName);
  await ctx.store.writeDocument(COLLECTIONS_DOCUMENT, { platforms });
  return platforms;
}

/**
 * Look up a collection's name. A cached list that lacks the id is refreshed
 * once, since collections are added over time.
 */
export async function resolveCollection(
  ctx: CollectionsContext,
  collectionId: number,
): Promise<CollectionRef> {
  const find = (list: Collection[]) => list.find((c) => c.platform_id === collectionId);

  const found =
    find(await loadCollections(ctx)) ?? find(await loadCollections(ctx, { refresh: true }));
  if (!found) {
    throw new CatalogError(`Collection ${collectionId} does not exist`, "UNKNOWN_COLLECTION", {
      collectionId,
    });
  }
  return { id: found.platform_id, name: found.platform_name };
}

/** Name for a cached collection without going to the API. */
export async function cachedCollectionName(
  ctx: Pick<PipelineContext, "store">,
  collectionId: number,
): Promise<string> {
  const lookup = await ctx.store.readDocument(COLLECTIONS_DOCUMENT);
  if (lookup.status === "hit") {
    const parsed = CollectionListSchema.safeParse(lookup.value);
    const found = parsed.success
      ? parsed.data.platforms.find((c) => c.platform_id === collectionId)
      : undefined;
    if (found) return found.platform_name;
  }
  return `Collection ${collectionId}`;
}
