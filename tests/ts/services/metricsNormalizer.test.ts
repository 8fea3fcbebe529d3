import pino from "pino";
import { describe, expect, it, vi } from "vitest";
import { NormalizationError } from "../../../src/core/errors.js";
import {
  coerceMetricValue,
  extractTriples,
  normalize,
  pivotTriples,
} from "../../../src/services/MetricsNormalizer.js";
import { MemoryMetricStore } from "../../../src/services/MetricStoreService.js";
import type { MetricRequest, RawMetricDocument, RawMetricPage } from "../../../src/services/types.js";

const listing = { listingId: "L1", listingName: "Harbor Loft" };
const conversion: MetricRequest = { metricType: "CONVERSION", groupValues: ["conversion_rate"] };
const impressions: MetricRequest = { metricType: "CONVERSION", groupValues: ["p3_impressions"] };

function envelope(component: unknown): unknown {
  return { data: { insights: { getPerformanceComponents: { components: [component] } } } };
}

function page(windowStart: string, windowEnd: string, request: MetricRequest, component: unknown): RawMetricPage {
  return { windowStart, windowEnd, request, body: envelope(component) };
}

function lineChart(your: [string, unknown][], similar: [string, unknown][]) {
  return {
    metricLineCharts: [
      { label: "Your listing", dataPoints: your.map(([ds, value]) => ({ ds, value })) },
      { label: "Similar listings", dataPoints: similar.map(([ds, value]) => ({ ds, value })) },
    ],
  };
}

describe("coerceMetricValue", () => {
  it("accepts numbers, numeric strings and value wrappers", () => {
    expect(coerceMetricValue(0)).toEqual({ ok: true, value: 0 });
    expect(coerceMetricValue(" 12.5 ")).toEqual({ ok: true, value: 12.5 });
    expect(coerceMetricValue({ doubleValue: 0.25 })).toEqual({ ok: true, value: 0.25 });
    expect(coerceMetricValue({ doubleValue: null, longValue: 40 })).toEqual({ ok: true, value: 40 });
  });

  it("treats null and undefined as not reported", () => {
    expect(coerceMetricValue(null)).toEqual({ ok: true, value: null });
    expect(coerceMetricValue(undefined)).toEqual({ ok: true, value: null });
  });

  it("rejects non-numeric values", () => {
    expect(coerceMetricValue("n/a")).toEqual({ ok: false });
    expect(coerceMetricValue(Number.NaN)).toEqual({ ok: false });
    expect(coerceMetricValue(true)).toEqual({ ok: false });
    expect(coerceMetricValue([1])).toEqual({ ok: false });
  });

  it("rejects numeric strings that overflow to infinity", () => {
    expect(coerceMetricValue("1e999")).toEqual({ ok: false });
    expect(coerceMetricValue({ doubleValue: "-1e999" })).toEqual({ ok: false });
  });
});

describe("normalize daily", () => {
  const doc: RawMetricDocument = {
    queryKind: "daily",
    listingId: "L1",
    pages: [
      page(
        "2025-11-02",
        "2025-11-29",
        conversion,
        lineChart(
          [
            ["2025-11-03", { doubleValue: 0.5 }],
            ["2025-11-02", { doubleValue: 0.25 }],
          ],
          [["2025-11-02", { doubleValue: 0.4 }]]
        )
      ),
      page("2025-11-02", "2025-11-29", impressions, lineChart([["2025-11-02", { longValue: 120 }]], [])),
    ],
  };

  it("pivots line charts into one row per day", () => {
    expect(normalize(doc, "daily", listing)).toEqual([
      {
        listingId: "L1",
        listingName: "Harbor Loft",
        periodKey: "2025-11-02",
        periodEnd: null,
        metrics: {
          conversionRateYour: 0.25,
          conversionRateSimilar: 0.4,
          p3ImpressionsYour: 120,
          p3ImpressionsSimilar: null,
        },
      },
      {
        listingId: "L1",
        listingName: "Harbor Loft",
        periodKey: "2025-11-03",
        periodEnd: null,
        metrics: {
          conversionRateYour: 0.5,
          conversionRateSimilar: null,
          p3ImpressionsYour: null,
          p3ImpressionsSimilar: null,
        },
      },
    ]);
  });

  it("does not depend on page order", () => {
    const reversed = { ...doc, pages: [...doc.pages].reverse() };
    expect(normalize(reversed, "daily", listing)).toEqual(normalize(doc, "daily", listing));
  });

  it("skips data points without a valid date", () => {
    const p = page("2025-11-02", "2025-11-29", conversion, lineChart([["not-a-date", 1], ["2025-11-05", 2]], []));
    expect(extractTriples(p, "daily")).toEqual([{ periodKey: "2025-11-05", metric: "conversion_rate_your", value: 2 }]);
  });
});

describe("normalize weekly kinds", () => {
  it("reads the summary primary metric, its change and secondary metrics", () => {
    const doc: RawMetricDocument = {
      queryKind: "weekly_summary",
      listingId: "L1",
      pages: [
        page("2025-11-02", "2025-11-08", conversion, {
          primaryMetric: {
            metricName: "conversion_rate",
            value: { doubleValue: 0.031 },
            valueChange: { doubleValue: -0.004 },
          },
          secondaryMetrics: [
            { metricName: "p2_impressions_first_page_rate", value: { doubleValue: 0.2 } },
            { metricName: "search_conversion_rate", value: "0.015" },
            { metricName: "booking_lead_time", value: 9 },
          ],
        }),
      ],
    };
    expect(normalize(doc, "weekly_summary", listing)).toEqual([
      {
        listingId: "L1",
        listingName: "Harbor Loft",
        periodKey: "2025-11-02",
        periodEnd: "2025-11-08",
        metrics: {
          conversionRate: 0.031,
          conversionRateChange: -0.004,
          p2ImpressionsFirstPageRate: 0.2,
          searchConversionRate: 0.015,
          listingConversionRate: null,
          p3Impressions: null,
          p3ImpressionsChange: null,
          p2Impressions: null,
        },
      },
    ]);
  });

  it("keeps zero distinct from not reported in metric lists", () => {
    const doc: RawMetricDocument = {
      queryKind: "weekly_visibility",
      listingId: "L1",
      pages: [
        page("2025-11-09", "2025-11-15", impressions, {
          metrics: [
            { metricName: "p3_impressions", value: { longValue: 0 } },
            { metricName: "p2_impressions", value: null },
          ],
        }),
      ],
    };
    const [row] = normalize(doc, "weekly_visibility", listing);
    expect(row?.periodEnd).toBe("2025-11-15");
    expect(row?.metrics.p3Impressions).toBe(0);
    expect(row?.metrics.p2Impressions).toBeNull();
  });
});

describe("pivotTriples", () => {
  const silent = pino({ level: "silent" });

  it("prefers a reported value over null and the greater of two reported values", () => {
    const forward = pivotTriples(
      listing,
      "weekly_visibility",
      [
        { periodKey: "2025-11-02", metric: "p3_impressions", value: null },
        { periodKey: "2025-11-02", metric: "p3_impressions", value: 3 },
        { periodKey: "2025-11-02", metric: "p2_impressions", value: 5 },
        { periodKey: "2025-11-02", metric: "p2_impressions", value: 2 },
      ],
      silent
    );
    const backward = pivotTriples(
      listing,
      "weekly_visibility",
      [
        { periodKey: "2025-11-02", metric: "p2_impressions", value: 2 },
        { periodKey: "2025-11-02", metric: "p2_impressions", value: 5 },
        { periodKey: "2025-11-02", metric: "p3_impressions", value: 3 },
        { periodKey: "2025-11-02", metric: "p3_impressions", value: null },
      ],
      silent
    );
    expect(forward).toEqual(backward);
    expect(forward[0]?.metrics.p3Impressions).toBe(3);
    expect(forward[0]?.metrics.p2Impressions).toBe(5);
  });

  it("stores null and warns when a value is not numeric", () => {
    const logger = pino({ level: "silent" });
    const warn = vi.spyOn(logger, "warn");
    const rows = pivotTriples(
      listing,
      "daily",
      [
        { periodKey: "2025-11-02", metric: "conversion_rate_your", value: "n/a" },
        { periodKey: "2025-11-02", metric: "conversion_rate_similar", value: 0.3 },
      ],
      logger
    );
    expect(rows[0]?.metrics.conversionRateYour).toBeNull();
    expect(rows[0]?.metrics.conversionRateSimilar).toBe(0.3);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("nulls an overflowing value so the batch still stores", async () => {
    const rows = pivotTriples(
      listing,
      "weekly_visibility",
      [
        { periodKey: "2025-11-02", metric: "p3_impressions", value: "1e999" },
        { periodKey: "2025-11-02", metric: "p2_impressions", value: 7 },
      ],
      silent
    );
    expect(rows[0]?.metrics.p3Impressions).toBeNull();
    expect(rows[0]?.metrics.p2Impressions).toBe(7);

    const store = new MemoryMetricStore();
    const records = rows.map((row) => ({ ...row, accountId: "acc-1", scrapeTime: "2025-11-10" }));
    await expect(store.upsert("weekly_visibility", records)).resolves.toBe(1);
  });

  it("ignores metric names that collide with object built-ins", () => {
    const rows = pivotTriples(
      listing,
      "weekly_visibility",
      [
        { periodKey: "2025-11-02", metric: "constructor", value: 3 },
        { periodKey: "2025-11-02", metric: "toString", value: 4 },
        { periodKey: "2025-11-02", metric: "p2_impressions", value: 7 },
      ],
      silent
    );
    expect(Object.keys(rows[0]?.metrics ?? {}).sort()).toEqual([
      "conversionRate",
      "listingConversionRate",
      "p2Impressions",
      "p2ImpressionsFirstPageRate",
      "p3Impressions",
      "searchConversionRate",
    ]);
    expect(rows[0]?.metrics.p2Impressions).toBe(7);
  });
});

describe("normalize errors", () => {
  it("rejects a response without the component path", () => {
    const doc: RawMetricDocument = {
      queryKind: "daily",
      listingId: "L1",
      pages: [{ windowStart: "2025-11-02", windowEnd: "2025-11-29", request: conversion, body: { data: {} } }],
    };
    expect(() => normalize(doc, "daily", listing)).toThrow(NormalizationError);
  });

  it("rejects a document of another kind or listing", () => {
    const doc: RawMetricDocument = { queryKind: "daily", listingId: "L1", pages: [] };
    expect(() => normalize(doc, "weekly_summary", listing)).toThrow(NormalizationError);
    expect(() => normalize(doc, "daily", { listingId: "L2", listingName: "Other" })).toThrow(NormalizationError);
  });

  it("returns no rows for an empty component list", () => {
    const doc: RawMetricDocument = {
      queryKind: "weekly_visibility",
      listingId: "L1",
      pages: [
        {
          windowStart: "2025-11-02",
          windowEnd: "2025-11-08",
          request: conversion,
          body: { data: { insights: { getPerformanceComponents: { components: [] } } } },
        },
      ],
    };
    expect(normalize(doc, "weekly_visibility", listing)).toEqual([]);
  });
});
