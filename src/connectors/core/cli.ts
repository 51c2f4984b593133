#!/usr/bin/env node
import * as path from "node:path";
import { Command, InvalidArgumentError, Option } from "commander";
import { config as loadDotenv } from "dotenv";
import { readCacheStatus, SyncEngine } from "../catalog/engine.js";
import type { CollectionOutcome, IdRange } from "../catalog/reconciler.js";
import { createCacheStore } from "./cache-store.js";
import { configFromEnv, OUTPUT_FORMATS, type CatalogConfigInput, type OutputFormat } from "./config.js";
import { formatDuration } from "./duration.js";
import { errorMessage } from "./errors.js";

loadDotenv();
loadDotenv({ path: ".env.local", override: true });

// ─── Argument Parsers ───

function parseId(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError("Expected a collection id.");
  return Number(value);
}

function parseDays(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new InvalidArgumentError("Expected a whole number of days, 1 or more.");
  }
  return Number(value);
}

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (value.trim() === "" || !Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidArgumentError("Expected a number of seconds.");
  }
  return seconds;
}

function parseRange(value: string): IdRange {
  const match = /^(\d+)-(\d+)$/.exec(value);
  const from = Number(match?.[1]);
  const to = Number(match?.[2]);
  if (!match || from > to) {
    throw new InvalidArgumentError('Expected an id range such as "1-50".');
  }
  return { from, to };
}

function parseFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((f) => f === value);
  if (!format) throw new InvalidArgumentError(`Expected one of ${OUTPUT_FORMATS.join(", ")}.`);
  return format;
}

// ─── Shared Options ───

interface SharedFlags {
  format?: OutputFormat;
  delimiter?: string;
  prefix?: string;
  output?: string;
  rateLimit?: number;
  cache?: string;
  compress?: boolean;
  skipDetails?: boolean;
}

function withSharedOptions(command: Command): Command {
  return command
    .addOption(
      new Option("--format <format>", "Output files to write: none, delimited, json or both").argParser(
        parseFormat,
      ),
    )
    .option("--delimiter <char>", "Field delimiter for delimited output (default: tab)")
    .option("--prefix <text>", "Text to put before every output file name")
    .option("--output <dir>", "Directory to write output files to")
    .option("--rate-limit <seconds>", "Seconds between requests (10 on a free key, 5 on a paid key)", parseSeconds)
    .option("--cache <dir>", "Cache directory")
    .option("--compress", "Store cached responses gzipped")
    .option("--skip-details", "Only download listings, not per-item details");
}

function overridesFrom(flags: SharedFlags): Partial<CatalogConfigInput> {
  const overrides: Partial<CatalogConfigInput> = {};
  if (flags.format !== undefined) overrides.format = flags.format;
  if (flags.delimiter !== undefined) overrides.delimiter = flags.delimiter;
  if (flags.prefix !== undefined) overrides.prefix = flags.prefix;
  if (flags.output !== undefined) overrides.outputDir = flags.output;
  if (flags.rateLimit !== undefined) overrides.rateLimitMs = flags.rateLimit * 1000;
  if (flags.cache !== undefined) overrides.cacheDir = flags.cache;
  if (flags.compress) overrides.compress = true;
  if (flags.skipDetails) overrides.skipDetails = true;
  return overrides;
}

function engineFor(flags: SharedFlags): SyncEngine {
  return new SyncEngine(configFromEnv(process.env, overridesFrom(flags)));
}

// ─── Output ───

function printOutcomes(outcomes: CollectionOutcome[]): void {
  console.log("\n═══ Update Summary ═══\n");
  for (const o of outcomes) {
    if (o.status === "updated") {
      console.log(
        `✓ ${o.name} [${o.collectionId}]: ${o.related} changed, ${o.evicted} removed, ${o.detailsFetched} details refreshed`,
      );
    } else if (o.status === "unchanged") {
      console.log(`  ${o.name} [${o.collectionId}]: no changes`);
    } else {
      console.log(`⚠ ${o.name} [${o.collectionId}]: not fully downloaded, skipped`);
    }
  }
}

// ─── Program ───

const program = new Command()
  .name("catalog-mirror")
  .description("Download, cache and export a game catalog, one collection at a time")
  .version("1.0.0");

withSharedOptions(
  program
    .command("collections")
    .description("List every collection with its id")
    .option("--refresh", "Download the list again instead of using the cached copy"),
).action(async (opts: SharedFlags & { refresh?: boolean }) => {
  const collections = await engineFor(opts).listCollections({ refresh: opts.refresh });
  const width = Math.max(4, ...collections.map((c) => c.platform_name.length));
  console.log(`${"Name".padEnd(width)}  ID`);
  console.log(`${"─".repeat(width)}  ──────`);
  for (const c of collections) {
    console.log(`${c.platform_name.padEnd(width)}  ${c.platform_id}`);
  }
});

withSharedOptions(
  program
    .command("sync")
    .description("Download a collection, resuming an interrupted run, and write output files")
    .argument("<collectionId>", "Collection id, see the collections command", parseId)
    .option("--restart", "Discard the cached download and start over"),
).action(async (collectionId: number, opts: SharedFlags & { restart?: boolean }) => {
  const result = await engineFor(opts).sync(collectionId, { restart: opts.restart });
  console.log(
    `\n✓ ${result.collection.name}: ${result.itemsFetched} items and ${result.detailsFetched} details downloaded in ${formatDuration(result.durationMs)}`,
  );
  for (const file of result.outputFiles) console.log(`  ${path.relative(process.cwd(), file)}`);
});

withSharedOptions(
  program
    .command("update")
    .description("Apply the catalog's recent changes to every fully downloaded collection")
    .argument("<days>", "How many days of changes to request", parseDays)
    .option("--range <from-to>", "Only update collections with ids in this range", parseRange)
    .option("--force-restart", "Download the changes again even if a fresh copy is cached")
    .option("--fetch-only", "Download the changes without applying them"),
).action(
  async (
    days: number,
    opts: SharedFlags & { range?: IdRange; forceRestart?: boolean; fetchOnly?: boolean },
  ) => {
    const result = await engineFor(opts).update({
      days,
      range: opts.range,
      forceRestart: opts.forceRestart,
      fetchOnly: opts.fetchOnly,
    });
    if (opts.fetchOnly) {
      console.log(`\n✓ Downloaded ${result.records} changed items`);
    } else {
      printOutcomes(result.outcomes);
    }
  },
);

program
  .command("status")
  .description("Show how far each cached collection has been downloaded")
  .option("--cache <dir>", "Cache directory")
  .action(async (opts: { cache?: string }) => {
    const cacheDir = opts.cache ?? process.env.CATALOG_CACHE_DIR ?? "cache";
    const statuses = await readCacheStatus(createCacheStore(path.resolve(cacheDir)));
    if (statuses.length === 0) {
      console.log(`No collections cached in ${cacheDir}`);
      return;
    }
    for (const s of statuses) {
      console.log(`${s.name} [${s.collectionId}]: ${s.phase}, last synced ${s.lastSynced ?? "never"}`);
    }
  });

if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

program.parseAsync().catch((err: unknown) => {
  console.error(`✗ ${errorMessage(err)}`);
  process.exit(1);
});
