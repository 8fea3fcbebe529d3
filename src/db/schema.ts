/**
 * Drizzle schema: accounts plus one wide table per metric record kind.
 * Metric tables are range-scanned by scrape day; hypertable or partition setup
 * is applied on the database side after drizzle-kit creates them.
 */

import {
  boolean,
  date,
  doublePrecision,
  index,
  jsonb,
  pgTable,
  text,
  timestamp,
  unique,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";

export const accounts = pgTable(
  "accounts",
  {
    accountId: varchar("account_id", { length: 255 }).primaryKey(),
    customerId: uuid("customer_id"),
    credentials: jsonb("credentials").$type<Record<string, string>>(),
    isActive: boolean("is_active").default(true).notNull(),
    lastSyncAt: timestamp("last_sync_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
    deletedAt: timestamp("deleted_at", { withTimezone: true }),
  },
  (t) => [
    index("idx_accounts_customer").on(t.customerId),
    index("idx_accounts_active").on(t.isActive),
  ]
);

export const dailyListingMetrics = pgTable(
  "listing_daily_metrics",
  {
    accountId: varchar("account_id", { length: 255 })
      .notNull()
      .references(() => accounts.accountId),
    listingId: text("listing_id").notNull(),
    periodKey: date("period_key").notNull(),
    scrapeTime: date("scrape_time").notNull(),
    listingName: text("listing_name"),
    conversionRateYour: doublePrecision("conversion_rate_your"),
    conversionRateSimilar: doublePrecision("conversion_rate_similar"),
    p3ImpressionsYour: doublePrecision("p3_impressions_your"),
    p3ImpressionsSimilar: doublePrecision("p3_impressions_similar"),
  },
  (t) => [
    unique("uq_listing_daily_metrics_key").on(t.accountId, t.listingId, t.periodKey, t.scrapeTime),
    index("idx_listing_daily_metrics_scrape").on(t.scrapeTime),
    index("idx_listing_daily_metrics_listing_period").on(t.listingId, t.periodKey, t.scrapeTime),
  ]
);

export const weeklySummaryMetrics = pgTable(
  "listing_weekly_summary_metrics",
  {
    accountId: varchar("account_id", { length: 255 })
      .notNull()
      .references(() => accounts.accountId),
    listingId: text("listing_id").notNull(),
    periodKey: date("period_key").notNull(),
    scrapeTime: date("scrape_time").notNull(),
    listingName: text("listing_name"),
    periodEnd: date("period_end"),
    conversionRate: doublePrecision("conversion_rate"),
    conversionRateChange: doublePrecision("conversion_rate_change"),
    p2ImpressionsFirstPageRate: doublePrecision("p2_impressions_first_page_rate"),
    searchConversionRate: doublePrecision("search_conversion_rate"),
    listingConversionRate: doublePrecision("listing_conversion_rate"),
    p3Impressions: doublePrecision("p3_impressions"),
    p3ImpressionsChange: doublePrecision("p3_impressions_change"),
    p2Impressions: doublePrecision("p2_impressions"),
  },
  (t) => [
    unique("uq_listing_weekly_summary_metrics_key").on(t.accountId, t.listingId, t.periodKey, t.scrapeTime),
    index("idx_listing_weekly_summary_metrics_scrape").on(t.scrapeTime),
    index("idx_listing_weekly_summary_metrics_listing_period").on(t.listingId, t.periodKey, t.scrapeTime),
  ]
);

export const weeklyVisibilityMetrics = pgTable(
  "listing_weekly_visibility_metrics",
  {
    accountId: varchar("account_id", { length: 255 })
      .notNull()
      .references(() => accounts.accountId),
    listingId: text("listing_id").notNull(),
    periodKey: date("period_key").notNull(),
    scrapeTime: date("scrape_time").notNull(),
    listingName: text("listing_name"),
    periodEnd: date("period_end"),
    conversionRate: doublePrecision("conversion_rate"),
    p2ImpressionsFirstPageRate: doublePrecision("p2_impressions_first_page_rate"),
    searchConversionRate: doublePrecision("search_conversion_rate"),
    listingConversionRate: doublePrecision("listing_conversion_rate"),
    p3Impressions: doublePrecision("p3_impressions"),
    p2Impressions: doublePrecision("p2_impressions"),
  },
  (t) => [
    unique("uq_listing_weekly_visibility_metrics_key").on(t.accountId, t.listingId, t.periodKey, t.scrapeTime),
    index("idx_listing_weekly_visibility_metrics_scrape").on(t.scrapeTime),
    index("idx_listing_weekly_visibility_metrics_listing_period").on(t.listingId, t.periodKey, t.scrapeTime),
  ]
);
