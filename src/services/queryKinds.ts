/**
 * Query kind table. Each entry says how one record kind is requested from the
 * insights API and how its response is read back into metric triples; adding a
 * kind is a new entry here plus its table in db/schema.ts.
 */

import type { MetricKind, MetricRequest, QueryKind } from "./types.js";

export type InsightsOperation = "ChartQuery" | "ListOfMetricsQuery";

export type ComponentShape = "lineChart" | "summary" | "metricList";

export type Granularity = "daily" | "weekly";

export interface ExtractionSchema {
  recordKind: MetricKind;
  operation: InsightsOperation;
  granularity: Granularity;
  /** Days per upstream request; the window is cut into slices of this size. */
  sliceDays: number;
  /** One upstream call per slice and request. */
  requests: readonly MetricRequest[];
  /** Ask the API for the market comparison series. */
  includeComparison: boolean;
  /** Path from the response body to the component list; the first component is read. */
  componentPath: readonly string[];
  shape: ComponentShape;
  /** Upstream metric name -> stored column. Unmapped metrics are dropped. */
  columns: Readonly<Record<string, string>>;
}

const COMPONENT_PATH = ["data", "insights", "getPerformanceComponents", "components"] as const;

const CONVERSION_REQUESTS: readonly MetricRequest[] = [
  { metricType: "CONVERSION", groupValues: ["conversion_rate"] },
  { metricType: "CONVERSION", groupValues: ["p3_impressions"] },
];

const WEEKLY_COLUMNS = {
  conversion_rate: "conversionRate",
  p2_impressions_first_page_rate: "p2ImpressionsFirstPageRate",
  search_conversion_rate: "searchConversionRate",
  listing_conversion_rate: "listingConversionRate",
  p3_impressions: "p3Impressions",
  p2_impressions: "p2Impressions",
} as const;

export const QUERY_KINDS = {
  daily: {
    recordKind: "daily",
    operation: "ChartQuery",
    granularity: "daily",
    sliceDays: 28,
    requests: CONVERSION_REQUESTS,
    includeComparison: true,
    componentPath: COMPONENT_PATH,
    shape: "lineChart",
    columns: {
      conversion_rate_your: "conversionRateYour",
      conversion_rate_similar: "conversionRateSimilar",
      p3_impressions_your: "p3ImpressionsYour",
      p3_impressions_similar: "p3ImpressionsSimilar",
    },
  },
  weekly_summary: {
    recordKind: "weekly_summary",
    operation: "ChartQuery",
    granularity: "weekly",
    sliceDays: 7,
    requests: CONVERSION_REQUESTS,
    includeComparison: true,
    componentPath: COMPONENT_PATH,
    shape: "summary",
    columns: {
      ...WEEKLY_COLUMNS,
      conversion_rate_change: "conversionRateChange",
      p3_impressions_change: "p3ImpressionsChange",
    },
  },
  weekly_visibility: {
    recordKind: "weekly_visibility",
    operation: "ListOfMetricsQuery",
    granularity: "weekly",
    sliceDays: 7,
    requests: CONVERSION_REQUESTS,
    includeComparison: false,
    componentPath: COMPONENT_PATH,
    shape: "metricList",
    columns: WEEKLY_COLUMNS,
  },
} as const satisfies Record<QueryKind, ExtractionSchema>;

/** Fetch and write order within one listing. */
export const QUERY_KIND_ORDER: readonly QueryKind[] = ["daily", "weekly_summary", "weekly_visibility"];

export function getExtractionSchema(kind: QueryKind): ExtractionSchema {
  return QUERY_KINDS[kind];
}

/** Stored columns of a kind, in declaration order. */
export function metricColumns(kind: MetricKind): string[] {
  return Array.from(new Set(Object.values(QUERY_KINDS[kind].columns)));
}
