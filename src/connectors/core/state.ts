import { z } from "zod";
import type { CacheStore } from "./types.js";

// ─── Completion State ───

export type CompletionPhase = "listing" | "details" | "complete";

/**
 * Per-collection progress. `listing` until Stage 1 sees its last page,
 * `details` until every listed item has a cached detail, then `complete`.
 */
export interface CompletionState {
  readonly phase: CompletionPhase;
  readonly lastSynced: string | null;
}

export const Completion = {
  initial(): CompletionState {
    return { phase: "listing", lastSynced: null };
  },

  completeListing(state: CompletionState): CompletionState {
    return state.phase === "listing" ? { ...state, phase: "details" } : state;
  },

  completeDetails(state: CompletionState): CompletionState {
    return state.phase === "details" ? { ...state, phase: "complete" } : state;
  },

  markSynced(state: CompletionState, now: Date): CompletionState {
    return { ...state, lastSynced: now.toISOString() };
  },

  listingDone(state: CompletionState): boolean {
    return state.phase !== "listing";
  },

  detailsDone(state: CompletionState): boolean {
    return state.phase === "complete";
  },
} as const;

const PersistedCompletionSchema = z.object({
  stage1Done: z.boolean(),
  stage2Done: z.boolean(),
  lastSynced: z.string().datetime().nullable().default(null),
});

export type PersistedCompletion = z.infer<typeof PersistedCompletionSchema>;

export function serializeCompletion(state: CompletionState): PersistedCompletion {
  return {
    stage1Done: Completion.listingDone(state),
    stage2Done: Completion.detailsDone(state),
    lastSynced: state.lastSynced,
  };
}

export function deserializeCompletion(raw: unknown): CompletionState | null {
  const parsed = PersistedCompletionSchema.safeParse(raw);
  if (!parsed.success) return null;
  const { stage1Done, stage2Done, lastSynced } = parsed.data;
  if (!stage1Done && stage2Done) return null;
  const phase: CompletionPhase = !stage1Done
    ? "listing"
    : stage2Done
      ? "complete"
      : "details";
  return { phase, lastSynced };
}

function statusDocument(collectionId: number): string {
  return `${collectionId}/status.json`;
}

export class CompletionTracker {
  private readonly store: CacheStore;

  constructor(store: CacheStore) {
    this.store = store;
  }

  /** Returns the initial state when nothing usable is persisted. */
  async load(collectionId: number): Promise<CompletionState> {
    const lookup = await this.store.readDocument(statusDocument(collectionId));
    if (lookup.status !== "hit") return Completion.initial();
    return deserializeCompletion(lookup.value) ?? Completion.initial();
  }

  /** Whether a status file exists and parses. */
  async exists(collectionId: number): Promise<boolean> {
    const lookup = await this.store.readDocument(statusDocument(collectionId));
    return lookup.status === "hit" && deserializeCompletion(lookup.value) !== null;
  }

  async save(collectionId: number, state: CompletionState): Promise<void> {
    await this.store.writeDocument(
      statusDocument(collectionId),
      serializeCompletion(state),
    );
  }

  /** Wipes every cached page and detail of the collection. */
  async reset(collectionId: number): Promise<CompletionState> {
    await this.store.deleteAll(collectionId);
    const state = Completion.initial();
    await this.save(collectionId, state);
    return state;
  }
}

// ─── Update State ───

/** A partial changes feed older than this cannot be resumed. */
export const UPDATE_STALE_AFTER_MS = 6 * 60 * 60 * 1000;

const UPDATE_DOCUMENT = "updates.json";

const UpdateStateSchema = z.object({
  finished: z.boolean(),
  lastRun: z.string().datetime().nullable(),
  daysRequested: z.number().int().nullable(),
});

export type UpdateState = z.infer<typeof UpdateStateSchema>;

export const UpdateProgress = {
  initial(): UpdateState {
    return { finished: false, lastRun: null, daysRequested: null };
  },

  recordPage(state: UpdateState, days: number, now: Date): UpdateState {
    return { ...state, lastRun: now.toISOString(), daysRequested: days };
  },

  finish(state: UpdateState): UpdateState {
    return { ...state, finished: true };
  },

  isStale(state: UpdateState, now: Date): boolean {
    if (state.lastRun === null) return false;
    return now.getTime() - new Date(state.lastRun).getTime() > UPDATE_STALE_AFTER_MS;
  },
} as const;

export class UpdateTracker {
  private readonly store: CacheStore;

  constructor(store: CacheStore) {
    this.store = store;
  }

  async load(): Promise<UpdateState> {
    const lookup = await this.store.readDocument(UPDATE_DOCUMENT);
    if (lookup.status !== "hit") return UpdateProgress.initial();
    const parsed = UpdateStateSchema.safeParse(lookup.value);
    return parsed.success ? parsed.data : UpdateProgress.initial();
  }

  async save(state: UpdateState): Promise<void> {
    await this.store.writeDocument(UPDATE_DOCUMENT, state);
  }

  /** Drops the cached feed pages so the next download starts at offset 0. */
  async reset(): Promise<UpdateState> {
    await this.store.deleteAll("updates");
    const state = UpdateProgress.initial();
    await this.save(state);
    return state;
  }
}
