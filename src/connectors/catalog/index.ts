export * from "../core/index.js";
export { CatalogApi } from "./api.js";
export { parseRetryAfter, RemoteClient } from "./client.js";
export type { FetchFn, GetJsonOptions, RemoteResult } from "./client.js";
export { cachedCollectionName, loadCollections, resolveCollection } from "./collections.js";
export { pendingDetails, runDetailStage } from "./detail-stage.js";
export type { DetailStageResult } from "./detail-stage.js";
export { readCacheStatus, SyncEngine } from "./engine.js";
export type { CollectionStatus, EngineDeps } from "./engine.js";
export {
  buildDetailTables,
  buildJsonDocument,
  buildListingTables,
  exportCollection,
  outputBaseName,
  sanitizeValue,
} from "./export.js";
export type { Row, Table } from "./export.js";
export { runListingStage } from "./listing-stage.js";
export type { ListingStageResult } from "./listing-stage.js";
export {
  fetchPages,
  readDetails,
  readFeedRecords,
  readListingItems,
  resumeOffset,
  stripHeavyFields,
} from "./pages.js";
export {
  downloadChangesFeed,
  evictedIds,
  paginate,
  partitionChanges,
  reconcileCollection,
  runUpdate,
} from "./reconciler.js";
export type {
  CollectionOutcome,
  IdRange,
  UpdateOptions,
  UpdateResult,
} from "./reconciler.js";
export { syncCollection } from "./sync.js";
export type { CollectionSyncResult, SyncOptions } from "./sync.js";
export type {
  CatalogSource,
  ChangeRecord,
  Collection,
  CollectionRef,
  ItemDetail,
  ListingItem,
  ListingPage,
  PipelineContext,
} from "./types.js";
