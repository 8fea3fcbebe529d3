/**
 * Config types: process-level settings read from the environment.
 */

export type ServiceMode = "admin" | "worker" | "hybrid";

/** 0 = Sunday … 6 = Saturday, as in Date#getDay. */
export type WeekStartDay = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export interface WindowConfig {
  lookbackWeeks: number;
  lookaheadWeeks: number;
  maxLookbackDays: number;
  weekStartsOn: WeekStartDay;
}

export interface InsightsApiConfig {
  baseUrl: string;
  maxRetries: number;
  /** Pause after each successful call, keeps a steady rate against the API. */
  requestDelayMs: number;
  timeoutMs: number;
}

export interface AppConfig {
  databaseUrl: string;
  port: number;
  mode: ServiceMode;
  /** From env DRY_RUN: rows kept in memory, last_sync_at left alone. */
  dryRun: boolean;
  window: WindowConfig;
  syncHourUtc: number;
  syncMinuteUtc: number;
  listingConcurrency: number;
  insights: InsightsApiConfig;
}
