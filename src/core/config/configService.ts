/**
 * Config service: parses and validates the environment once.
 */

import { z } from "zod";
import { ValidationError } from "../errors.js";
import type { AppConfig } from "./types.js";

/** The insights API rejects relative offsets further out than this. */
export const MAX_FORWARD_DAYS = 182;

const boolFromEnv = z
  .string()
  .optional()
  .transform((v) => ["1", "true", "yes"].includes((v ?? "").toLowerCase()));

const intFromEnv = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const weekStart = z.coerce
  .number()
  .default(0)
  .pipe(z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3), z.literal(4), z.literal(5), z.literal(6)]));

const envSchema = z
  .object({
    DATABASE_URL: z
      .string()
      .min(1)
      .default("postgresql://localhost:5432/listing_metrics?user=listing_metrics&password=listing_metrics"),
    PORT: intFromEnv(3000, 1, 65535),
    MODE: z.enum(["admin", "worker", "hybrid"]).default("hybrid"),
    DRY_RUN: boolFromEnv,
    LOOKBACK_WEEKS: intFromEnv(25, 1, 52),
    LOOKAHEAD_WEEKS: intFromEnv(5, 0, 52),
    MAX_LOOKBACK_DAYS: intFromEnv(180, 7, 730),
    WEEK_STARTS_ON: weekStart,
    SYNC_CRON_HOUR: intFromEnv(5, 0, 23),
    SYNC_CRON_MINUTE: intFromEnv(0, 0, 59),
    LISTING_CONCURRENCY: intFromEnv(1, 1, 16),
    INSIGHTS_API_BASE_URL: z.string().url().default("https://insights.example.com/api/v3"),
    INSIGHTS_MAX_RETRIES: intFromEnv(4, 0, 10),
    INSIGHTS_REQUEST_DELAY_MS: intFromEnv(0, 0, 60_000),
    INSIGHTS_TIMEOUT_MS: intFromEnv(10_000, 100, 120_000),
  })
  .refine((env) => 6 + env.LOOKAHEAD_WEEKS * 7 <= MAX_FORWARD_DAYS, {
    message: `LOOKAHEAD_WEEKS would push the window past the ${MAX_FORWARD_DAYS}-day forward limit`,
    path: ["LOOKAHEAD_WEEKS"],
  });

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ValidationError("Invalid configuration", details);
  }
  const e = parsed.data;
  return {
    databaseUrl: e.DATABASE_URL,
    port: e.PORT,
    mode: e.MODE,
    dryRun: e.DRY_RUN,
    window: {
      lookbackWeeks: e.LOOKBACK_WEEKS,
      lookaheadWeeks: e.LOOKAHEAD_WEEKS,
      maxLookbackDays: e.MAX_LOOKBACK_DAYS,
      weekStartsOn: e.WEEK_STARTS_ON,
    },
    syncHourUtc: e.SYNC_CRON_HOUR,
    syncMinuteUtc: e.SYNC_CRON_MINUTE,
    listingConcurrency: e.LISTING_CONCURRENCY,
    insights: {
      baseUrl: e.INSIGHTS_API_BASE_URL,
      maxRetries: e.INSIGHTS_MAX_RETRIES,
      requestDelayMs: e.INSIGHTS_REQUEST_DELAY_MS,
      timeoutMs: e.INSIGHTS_TIMEOUT_MS,
    },
  };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig();
  return cached;
}
