import "dotenv/config";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import type { RetryTiming } from "../../core/entities/retry";

const supportedLiveFetchProviders = ["source", "mock"] as const;

export type LiveFetchProviderName =
  (typeof supportedLiveFetchProviders)[number];

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  CACHE_DIR: z.string().default(""),
  XDG_CACHE_HOME: z.string().default(""),
  CACHE_DEFAULT_MAX_AGE_DAYS: z.coerce.number().positive().default(30),
  CACHE_LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  REMOTE_STORE_API_URL: z.string().url().default("https://api.github.com"),
  REMOTE_STORE_REPO: z
    .string()
    .regex(/^[\w.-]+\/[\w.-]+$/, "expected owner/repo")
    .default("housing-datasets/data-cache"),
  REMOTE_STORE_TAG: z.string().min(1).default("cache-latest"),
  REMOTE_STORE_TOKEN: z.string().default(""),
  REMOTE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LIVE_FETCH_PROVIDER: z.enum(supportedLiveFetchProviders).default("source"),
  LIVE_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  BCB_SGS_BASE_URL: z.string().url().default("https://api.bcb.gov.br"),
  BCB_OLINDA_BASE_URL: z.string().url().default("https://olinda.bcb.gov.br"),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(8_000),
  VALIDATION_MAX_FUTURE_DAYS: z.coerce.number().int().nonnegative().default(90),
});

export type AppEnv = z.infer<typeof envSchema>;

export const env: AppEnv = envSchema.parse(process.env);

/**
 * Explicit CACHE_DIR wins; otherwise the XDG cache home, then ~/.cache.
 */
export const cacheDir = (appEnv: AppEnv = env): string => {
  if (appEnv.CACHE_DIR.trim()) {
    return appEnv.CACHE_DIR.trim();
  }

  const base = appEnv.XDG_CACHE_HOME.trim() || join(homedir(), ".cache");
  return join(base, "housing-datasets");
};

/**
 * Backoff delays shared by every tier; the attempt budget comes per request.
 */
export const retryDelays = (
  appEnv: AppEnv = env,
): Omit<RetryTiming, "maxAttempts"> => ({
  baseDelayMs: appEnv.RETRY_BASE_DELAY_MS,
  maxDelayMs: Math.max(appEnv.RETRY_MAX_DELAY_MS, appEnv.RETRY_BASE_DELAY_MS),
});
