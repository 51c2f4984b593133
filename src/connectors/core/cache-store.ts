/**
 * Durable key-value storage for API responses.
 *
 * Layout under the cache root:
 *   <collection>/listing/<offset>.json   one listing page per file
 *   <collection>/detail/<itemId>.json    one item detail per file
 *   updates/<offset>.json                changes feed pages
 *   <name>.json, <collection>/status.json  documents (state, side caches)
 *
 * Every write replaces the whole file through a temp file and a rename, so a
 * crash never leaves a half-written entry behind for the next run.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { gunzipSync, gzipSync } from "node:zlib";
import { z } from "zod";
import { errorMessage } from "./errors.js";
import type {
  CacheLookup,
  CacheNamespace,
  CacheScope,
  CacheStore,
} from "./types.js";

const KEY_FILE = /^(\d+)\.json$/;
const TMP_SUFFIX = ".tmp";

const GzipEnvelopeSchema = z.object({
  encoding: z.literal("gzip"),
  data: z.string(),
});

export interface CacheStoreOptions {
  /** Store payloads gzipped inside a JSON envelope. Reads handle both forms. */
  compress?: boolean;
}

// ─── Encoding ───

export function encodePayload(value: unknown, compress: boolean): string {
  const json = JSON.stringify(value);
  if (!compress) return json;
  const data = gzipSync(Buffer.from(json, "utf-8")).toString("base64");
  return JSON.stringify({ encoding: "gzip", data });
}

export function decodePayload(text: string): CacheLookup {
  try {
    const parsed: unknown = JSON.parse(text);
    const envelope = GzipEnvelopeSchema.safeParse(parsed);
    if (!envelope.success) {
      return { status: "hit", value: parsed };
    }
    const inflated = gunzipSync(Buffer.from(envelope.data.data, "base64"));
    const value: unknown = JSON.parse(inflated.toString("utf-8"));
    return { status: "hit", value };
  } catch (err) {
    return { status: "corrupt", error: errorMessage(err) };
  }
}

// ─── Paths ───

function scopeDir(scope: CacheScope): string {
  return String(scope);
}

function slotDir(scope: CacheScope, namespace: CacheNamespace): string {
  // The changes feed only has pages, so they sit directly in updates/
  return scope === "updates" ? "updates" : `${scope}/${namespace}`;
}

function slotPath(
  scope: CacheScope,
  namespace: CacheNamespace,
  key: number,
): string {
  return `${slotDir(scope, namespace)}/${key}.json`;
}

function assertKey(key: number): void {
  if (!Number.isSafeInteger(key) || key < 0) {
    throw new RangeError(`Cache keys must be non-negative integers, got ${key}`);
  }
}

function numericKeys(names: Iterable<string>): number[] {
  const keys: number[] = [];
  for (const name of names) {
    const match = KEY_FILE.exec(name);
    if (match?.[1]) keys.push(Number(match[1]));
  }
  return keys.sort((a, b) => a - b);
}

// ─── File Backend ───

export class FileCacheStore implements CacheStore {
  private readonly rootDir: string;
  private readonly compress: boolean;

  constructor(rootDir: string, opts: CacheStoreOptions = {}) {
    this.rootDir = rootDir;
    this.compress = opts.compress ?? false;
  }

  private resolve(relativePath: string): string {
    return path.join(this.rootDir, relativePath);
  }

  private atomicWrite(filePath: string, content: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const tmp = `${filePath}${TMP_SUFFIX}`;
    fs.writeFileSync(tmp, content);
    fs.renameSync(tmp, filePath);
  }

  private read(relativePath: string): CacheLookup {
    let text: string;
    try {
      text = fs.readFileSync(this.resolve(relativePath), "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return { status: "miss" };
      throw err;
    }
    return decodePayload(text);
  }

  async put(
    scope: CacheScope,
    namespace: CacheNamespace,
    key: number,
    value: unknown,
  ): Promise<void> {
    assertKey(key);
    this.atomicWrite(
      this.resolve(slotPath(scope, namespace, key)),
      encodePayload(value, this.compress),
    );
  }

  async get(
    scope: CacheScope,
    namespace: CacheNamespace,
    key: number,
  ): Promise<CacheLookup> {
    return this.read(slotPath(scope, namespace, key));
  }

  async has(
    scope: CacheScope,
    namespace: CacheNamespace,
    key: number,
  ): Promise<boolean> {
    return fs.existsSync(this.resolve(slotPath(scope, namespace, key)));
  }

  async listKeys(
    scope: CacheScope,
    namespace: CacheNamespace,
  ): Promise<number[]> {
    const dir = this.resolve(slotDir(scope, namespace));
    if (!fs.existsSync(dir)) return [];
    return numericKeys(fs.readdirSync(dir));
  }

  async delete(
    scope: CacheScope,
    namespace: CacheNamespace,
    key: number,
  ): Promise<void> {
    fs.rmSync(this.resolve(slotPath(scope, namespace, key)), { force: true });
  }

  async deleteAll(scope: CacheScope): Promise<void> {
    fs.rmSync(this.resolve(scopeDir(scope)), { recursive: true, force: true });
  }

  async replaceAll(
    scope: CacheScope,
    namespace: CacheNamespace,
    entries: ReadonlyArray<readonly [number, unknown]>,
  ): Promise<void> {
    for (const [key] of entries) assertKey(key);
    const previous = await this.listKeys(scope, namespace);

    // Stage every page before touching the live set
    const staged: Array<{ tmp: string; target: string }> = [];
    for (const [key, value] of entries) {
      const target = this.resolve(slotPath(scope, namespace, key));
      const tmp = `${target}${TMP_SUFFIX}`;
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(tmp, encodePayload(value, this.compress));
      staged.push({ tmp, target });
    }
    for (const { tmp, target } of staged) {
      fs.renameSync(tmp, target);
    }

    const kept = new Set(entries.map(([key]) => key));
    for (const key of previous) {
      if (!kept.has(key)) await this.delete(scope, namespace, key);
    }
  }

  async listCollections(): Promise<number[]> {
    if (!fs.existsSync(this.rootDir)) return [];
    return fs
      .readdirSync(this.rootDir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory() && /^\d+$/.test(entry.name))
      .map((entry) => Number(entry.name))
      .sort((a, b) => a - b);
  }

  async readDocument(name: string): Promise<CacheLookup> {
    return this.read(name);
  }

  async writeDocument(name: string, value: unknown): Promise<void> {
    this.atomicWrite(this.resolve(name), JSON.stringify(value, null, 2));
  }
}

// ─── In-Memory Backend ───

/**
 * Same layout and encoding as the file backend, held in a map of relative
 * path to file content. Used by tests and for dry runs.
 */
export class MemoryCacheStore implements CacheStore {
  private readonly files = new Map<string, string>();
  private readonly compress: boolean;

  constructor(opts: CacheStoreOptions = {}) {
    this.compress = opts.compress ?? false;
  }

  private read(relativePath: string): CacheLookup {
    const text = this.files.get(relativePath);
    if (text === undefined) return { status: "miss" };
    return decodePayload(text);
  }

  async put(
    scope: CacheScope,
    namespace: CacheNamespace,
    key: number,
    value: unknown,
  ): Promise<void> {
    assertKey(key);
    this.files.set(
      slotPath(scope, namespace, key),
      encodePayload(value, this.compress),
    );
  }

  async get(
    scope: CacheScope,
    namespace: CacheNamespace,
    key: number,
  ): Promise<CacheLookup> {
    return this.read(slotPath(scope, namespace, key));
  }

  async has(
    scope: CacheScope,
    namespace: CacheNamespace,
    key: number,
  ): Promise<boolean> {
    return this.files.has(slotPath(scope, namespace, key));
  }

  async listKeys(
    scope: CacheScope,
    namespace: CacheNamespace,
  ): Promise<number[]> {
    const prefix = `${slotDir(scope, namespace)}/`;
    const names: string[] = [];
    for (const file of this.files.keys()) {
      if (file.startsWith(prefix) && !file.slice(prefix.length).includes("/")) {
        names.push(file.slice(prefix.length));
      }
    }
    return numericKeys(names);
  }

  async delete(
    scope: CacheScope,
    namespace: CacheNamespace,
    key: number,
  ): Promise<void> {
    this.files.delete(slotPath(scope, namespace, key));
  }

  async deleteAll(scope: CacheScope): Promise<void> {
    const prefix = `${scopeDir(scope)}/`;
    for (const file of [...this.files.keys()]) {
      if (file.startsWith(prefix)) this.files.delete(file);
    }
  }

  async replaceAll(
    scope: CacheScope,
    namespace: CacheNamespace,
    entries: ReadonlyArray<readonly [number, unknown]>,
  ): Promise<void> {
    for (const [key] of entries) assertKey(key);
    const previous = await this.listKeys(scope, namespace);
    const kept = new Set(entries.map(([key]) => key));
    for (const [key, value] of entries) {
      this.files.set(
        slotPath(scope, namespace, key),
        encodePayload(value, this.compress),
      );
    }
    for (const key of previous) {
      if (!kept.has(key)) this.files.delete(slotPath(scope, namespace, key));
    }
  }

  async listCollections(): Promise<number[]> {
    const ids = new Set<number>();
    for (const file of this.files.keys()) {
      const head = file.split("/")[0] ?? "";
      if (/^\d+$/.test(head) && file.includes("/")) ids.add(Number(head));
    }
    return [...ids].sort((a, b) => a - b);
  }

  async readDocument(name: string): Promise<CacheLookup> {
    return this.read(name);
  }

  async writeDocument(name: string, value: unknown): Promise<void> {
    this.files.set(name, JSON.stringify(value, null, 2));
  }

  /** Write raw file content, bypassing encoding. */
  setRaw(relativePath: string, content: string): void {
    this.files.set(relativePath, content);
  }

  snapshot(): Map<string, string> {
    return new Map(this.files);
  }
}

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "ENOTDIR")
  );
}

export function createCacheStore(
  rootDir: string,
  opts: CacheStoreOptions = {},
): CacheStore {
  return new FileCacheStore(rootDir, opts);
}
