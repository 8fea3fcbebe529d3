import { and, asc, eq, gte, lt, sql, type SQL } from "drizzle-orm";
import type { PgColumn } from "drizzle-orm/pg-core";
import type { MetricKind, MetricRecord } from "../../services/types.js";
import type { DrizzleDb } from "../client.js";
import { dailyListingMetrics, weeklySummaryMetrics, weeklyVisibilityMetrics } from "../schema.js";

export type DailyMetricInsert = typeof dailyListingMetrics.$inferInsert;
export type WeeklySummaryInsert = typeof weeklySummaryMetrics.$inferInsert;
export type WeeklyVisibilityInsert = typeof weeklyVisibilityMetrics.$inferInsert;

export type ExportRow = Record<string, string | number | null>;

/** `excluded.<column>` for every listed column: the conflict-update sets each non-key column. */
function excludedSet(columns: Record<string, PgColumn>): Record<string, SQL> {
  return Object.fromEntries(
    Object.entries(columns).map(([key, column]) => [key, sql`excluded.${sql.identifier(column.name)}`])
  );
}

function metric(record: MetricRecord, column: string): number | null {
  return record.metrics[column] ?? null;
}

function dailyValues(r: MetricRecord): DailyMetricInsert {
  return {
    accountId: r.accountId,
    listingId: r.listingId,
    periodKey: r.periodKey,
    scrapeTime: r.scrapeTime,
    listingName: r.listingName,
    conversionRateYour: metric(r, "conversionRateYour"),
    conversionRateSimilar: metric(r, "conversionRateSimilar"),
    p3ImpressionsYour: metric(r, "p3ImpressionsYour"),
    p3ImpressionsSimilar: metric(r, "p3ImpressionsSimilar"),
  };
}

function weeklySummaryValues(r: MetricRecord): WeeklySummaryInsert {
  return {
    accountId: r.accountId,
    listingId: r.listingId,
    periodKey: r.periodKey,
    scrapeTime: r.scrapeTime,
    listingName: r.listingName,
    periodEnd: r.periodEnd,
    conversionRate: metric(r, "conversionRate"),
    conversionRateChange: metric(r, "conversionRateChange"),
    p2ImpressionsFirstPageRate: metric(r, "p2ImpressionsFirstPageRate"),
    searchConversionRate: metric(r, "searchConversionRate"),
    listingConversionRate: metric(r, "listingConversionRate"),
    p3Impressions: metric(r, "p3Impressions"),
    p3ImpressionsChange: metric(r, "p3ImpressionsChange"),
    p2Impressions: metric(r, "p2Impressions"),
  };
}

function weeklyVisibilityValues(r: MetricRecord): WeeklyVisibilityInsert {
  return {
    accountId: r.accountId,
    listingId: r.listingId,
    periodKey: r.periodKey,
    scrapeTime: r.scrapeTime,
    listingName: r.listingName,
    periodEnd: r.periodEnd,
    conversionRate: metric(r, "conversionRate"),
    p2ImpressionsFirstPageRate: metric(r, "p2ImpressionsFirstPageRate"),
    searchConversionRate: metric(r, "searchConversionRate"),
    listingConversionRate: metric(r, "listingConversionRate"),
    p3Impressions: metric(r, "p3Impressions"),
    p2Impressions: metric(r, "p2Impressions"),
  };
}

/**
 * One INSERT ... ON CONFLICT (account_id, listing_id, period_key, scrape_time)
 * DO UPDATE statement for a batch of records of one kind. Not executed until awaited.
 */
export function buildMetricUpsert(db: DrizzleDb, kind: MetricKind, records: readonly MetricRecord[]) {
  switch (kind) {
    case "daily": {
      const t = dailyListingMetrics;
      return db
        .insert(t)
        .values(records.map(dailyValues))
        .onConflictDoUpdate({
          target: [t.accountId, t.listingId, t.periodKey, t.scrapeTime],
          set: excludedSet({
            listingName: t.listingName,
            conversionRateYour: t.conversionRateYour,
            conversionRateSimilar: t.conversionRateSimilar,
            p3ImpressionsYour: t.p3ImpressionsYour,
            p3ImpressionsSimilar: t.p3ImpressionsSimilar,
          }),
        });
    }
    case "weekly_summary": {
      const t = weeklySummaryMetrics;
      return db
        .insert(t)
        .values(records.map(weeklySummaryValues))
        .onConflictDoUpdate({
          target: [t.accountId, t.listingId, t.periodKey, t.scrapeTime],
          set: excludedSet({
            listingName: t.listingName,
            periodEnd: t.periodEnd,
            conversionRate: t.conversionRate,
            conversionRateChange: t.conversionRateChange,
            p2ImpressionsFirstPageRate: t.p2ImpressionsFirstPageRate,
            searchConversionRate: t.searchConversionRate,
            listingConversionRate: t.listingConversionRate,
            p3Impressions: t.p3Impressions,
            p3ImpressionsChange: t.p3ImpressionsChange,
            p2Impressions: t.p2Impressions,
          }),
        });
    }
    case "weekly_visibility": {
      const t = weeklyVisibilityMetrics;
      return db
        .insert(t)
        .values(records.map(weeklyVisibilityValues))
        .onConflictDoUpdate({
          target: [t.accountId, t.listingId, t.periodKey, t.scrapeTime],
          set: excludedSet({
            listingName: t.listingName,
            periodEnd: t.periodEnd,
            conversionRate: t.conversionRate,
            p2ImpressionsFirstPageRate: t.p2ImpressionsFirstPageRate,
            searchConversionRate: t.searchConversionRate,
            listingConversionRate: t.listingConversionRate,
            p3Impressions: t.p3Impressions,
            p2Impressions: t.p2Impressions,
          }),
        });
    }
  }
}

export interface MetricRangeQuery {
  accountId: string;
  /** Inclusive. */
  startDate: string;
  /** Exclusive. */
  endDate: string;
  listingId?: string;
}

/** Stored rows of one kind whose period_key falls in [startDate, endDate). */
export async function listMetricRows(db: DrizzleDb, kind: MetricKind, q: MetricRangeQuery): Promise<ExportRow[]> {
  switch (kind) {
    case "daily": {
      const t = dailyListingMetrics;
      return db
        .select()
        .from(t)
        .where(
          and(
            eq(t.accountId, q.accountId),
            gte(t.periodKey, q.startDate),
            lt(t.periodKey, q.endDate),
            q.listingId ? eq(t.listingId, q.listingId) : undefined
          )
        )
        .orderBy(asc(t.listingId), asc(t.periodKey), asc(t.scrapeTime));
    }
    case "weekly_summary": {
      const t = weeklySummaryMetrics;
      return db
        .select()
        .from(t)
        .where(
          and(
            eq(t.accountId, q.accountId),
            gte(t.periodKey, q.startDate),
            lt(t.periodKey, q.endDate),
            q.listingId ? eq(t.listingId, q.listingId) : undefined
          )
        )
        .orderBy(asc(t.listingId), asc(t.periodKey), asc(t.scrapeTime));
    }
    case "weekly_visibility": {
      const t = weeklyVisibilityMetrics;
      return db
        .select()
        .from(t)
        .where(
          and(
            eq(t.accountId, q.accountId),
            gte(t.periodKey, q.startDate),
            lt(t.periodKey, q.endDate),
            q.listingId ? eq(t.listingId, q.listingId) : undefined
          )
        )
        .orderBy(asc(t.listingId), asc(t.periodKey), asc(t.scrapeTime));
    }
  }
}
