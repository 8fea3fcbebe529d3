import { describe, expect, it } from "vitest";
import { ValidationError } from "../../../../src/core/errors.js";
import {
  buildListingsPayload,
  buildMetricPayload,
  relativeOffset,
  sliceWindow,
} from "../../../../src/adapters/insights/payloads.js";

describe("relativeOffset", () => {
  it("counts days from the scrape day plus the dashboard shift", () => {
    expect(relativeOffset("2025-11-10", "2025-11-10")).toBe(3);
    expect(relativeOffset("2025-11-02", "2025-11-10")).toBe(-5);
    expect(relativeOffset("2025-12-20", "2025-11-10")).toBe(43);
  });
});

describe("sliceWindow", () => {
  it("cuts the window into fixed slices and truncates the last one", () => {
    expect(sliceWindow({ startDate: "2025-11-02", endDate: "2025-12-20" }, 28, "2025-11-10")).toEqual([
      { startDate: "2025-11-02", endDate: "2025-11-29" },
      { startDate: "2025-11-30", endDate: "2025-12-20" },
    ]);
  });

  it("produces whole weeks for a week-aligned window", () => {
    const slices = sliceWindow({ startDate: "2025-11-02", endDate: "2025-11-22" }, 7, "2025-11-10");
    expect(slices).toEqual([
      { startDate: "2025-11-02", endDate: "2025-11-08" },
      { startDate: "2025-11-09", endDate: "2025-11-15" },
      { startDate: "2025-11-16", endDate: "2025-11-22" },
    ]);
  });

  it("refuses a window ending past the forward limit", () => {
    expect(() => sliceWindow({ startDate: "2025-11-02", endDate: "2026-05-12" }, 7, "2025-11-10")).toThrow(
      ValidationError
    );
  });
});

describe("payload builders", () => {
  it("builds a metric payload with relative offsets and market comparison", () => {
    const payload = buildMetricPayload({
      operation: "ChartQuery",
      listingId: "L1",
      windowStart: "2025-11-02",
      windowEnd: "2025-11-29",
      scrapeDay: "2025-11-10",
      request: { metricType: "CONVERSION", groupValues: ["conversion_rate"] },
      includeComparison: true,
    });
    expect(payload.operationName).toBe("ChartQuery");
    expect(payload.variables.request.clientName).toBe("web-performance-dash-chart");
    expect(payload.variables.request.arguments).toEqual({
      relativeDsStart: -5,
      relativeDsEnd: 22,
      filters: { listingIds: ["L1"] },
      metricType: "CONVERSION",
      groupBys: ["RATING_CATEGORY"],
      groupByValues: ["conversion_rate"],
      metricComparisonType: "MARKET",
    });
  });

  it("leaves out the comparison when not asked for", () => {
    const payload = buildMetricPayload({
      operation: "ListOfMetricsQuery",
      listingId: "L1",
      windowStart: "2025-11-02",
      windowEnd: "2025-11-08",
      scrapeDay: "2025-11-10",
      request: { metricType: "CONVERSION", groupValues: ["p3_impressions"] },
      includeComparison: false,
    });
    expect(payload.variables.request.arguments).not.toHaveProperty("metricComparisonType");
  });

  it("builds the listings payload", () => {
    const payload = buildListingsPayload();
    expect(payload.operationName).toBe("ListingsSectionQuery");
    expect(payload.extensions.persistedQuery.version).toBe(1);
  });
});
