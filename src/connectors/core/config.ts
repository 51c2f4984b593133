import { z } from "zod";
import { ConfigError } from "./errors.js";

/** Seconds to wait before retry n, indexed by retry count. */
export const PROGRESSIVE_BACKOFF_MS = [0, 60, 300, 600, 3600].map(
  (s) => s * 1000,
);

export const OUTPUT_FORMATS = ["none", "delimited", "json", "both"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const CatalogConfigSchema = z.object({
  apiKey: z.string().min(1, "An API key is required"),
  baseUrl: z.string().url().default("https://api.mobygames.com/v1"),
  cacheDir: z.string().default("cache"),
  outputDir: z.string().default("."),
  rateLimitMs: z.number().nonnegative().default(10_000),
  pageSize: z.number().int().positive().default(100),
  requestTimeoutMs: z.number().int().positive().default(60_000),
  retryScheduleMs: z
    .array(z.number().nonnegative())
    .default(PROGRESSIVE_BACKOFF_MS),
  compress: z.boolean().default(false),
  skipDetails: z.boolean().default(false),
  format: z.enum(OUTPUT_FORMATS).default("delimited"),
  delimiter: z.string().length(1, "The delimiter must be one character").default("\t"),
  prefix: z.string().default(""),
});

export type CatalogConfig = z.infer<typeof CatalogConfigSchema>;
export type CatalogConfigInput = z.input<typeof CatalogConfigSchema>;

export function parseConfig(input: CatalogConfigInput): CatalogConfig {
  const result = CatalogConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.join(".") || "config"}: ${i.message}`,
    );
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, {
      issues,
    });
  }
  return result.data;
}

/**
 * Read configuration from an environment map. Only the CLI calls this;
 * everything below it receives the parsed config.
 */
export function configFromEnv(
  env: Record<string, string | undefined>,
  overrides: Partial<CatalogConfigInput> = {},
): CatalogConfig {
  const fromEnv: Partial<CatalogConfigInput> = {};
  if (env.CATALOG_API_KEY) fromEnv.apiKey = env.CATALOG_API_KEY;
  if (env.CATALOG_API_URL) fromEnv.baseUrl = env.CATALOG_API_URL;
  if (env.CATALOG_CACHE_DIR) fromEnv.cacheDir = env.CATALOG_CACHE_DIR;
  if (env.CATALOG_RATE_LIMIT) {
    const seconds = Number(env.CATALOG_RATE_LIMIT);
    if (Number.isNaN(seconds)) {
      throw new ConfigError(
        `CATALOG_RATE_LIMIT must be a number of seconds, got "${env.CATALOG_RATE_LIMIT}"`,
      );
    }
    fromEnv.rateLimitMs = seconds * 1000;
  }

  return parseConfig({ apiKey: "", ...fromEnv, ...overrides });
}
