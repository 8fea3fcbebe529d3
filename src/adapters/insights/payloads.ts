/**
 * Persisted-query payloads for the insights API.
 *
 * Dates are sent as day offsets relative to the scrape day. The API's own
 * dashboard shifts those offsets by three days, so the same shift is applied
 * here to get data for the calendar dates actually asked for.
 */

import { differenceInCalendarDays } from "date-fns";
import { MAX_FORWARD_DAYS } from "../../core/config/configService.js";
import { addIsoDays, fromIsoDate, type IsoDate } from "../../core/dates.js";
import { ValidationError } from "../../core/errors.js";
import type { InsightsOperation } from "../../services/queryKinds.js";
import type { MetricRequest, SyncWindow } from "../../services/types.js";

export type OperationName = InsightsOperation | "ListingsSectionQuery";

export interface PersistedOperation {
  hash: string;
  clientName: string;
}

export const OPERATIONS: Record<OperationName, PersistedOperation> = {
  ChartQuery: {
    hash: "aa6e318cc066bbf19511b86acdce32fc59219d8596448b861d794491f46631c5",
    clientName: "web-performance-dash-chart",
  },
  ListOfMetricsQuery: {
    hash: "b22a5ded5e6c6d168f1d224b78f34182e7366e5cc65203ec04f1e718286a09e1",
    clientName: "web-performance-dash-metrics",
  },
  ListingsSectionQuery: {
    hash: "7a646c07b45ad35335b2cde4842e5c5bf69ccebde508b2ba60276832bfb1816b",
    clientName: "web-performance-dash-listings",
  },
};

export const RELATIVE_DAY_SHIFT = 3;

export interface PersistedQueryPayload {
  operationName: OperationName;
  locale: string;
  currency: string;
  variables: {
    request: {
      clientName: string;
      arguments: Record<string, unknown>;
      useStubbedData: boolean;
    };
  };
  extensions: { persistedQuery: { version: 1; sha256Hash: string } };
}

function persisted(operationName: OperationName, args: Record<string, unknown>): PersistedQueryPayload {
  const op = OPERATIONS[operationName];
  return {
    operationName,
    locale: "en",
    currency: "USD",
    variables: { request: { clientName: op.clientName, arguments: args, useStubbedData: false } },
    extensions: { persistedQuery: { version: 1, sha256Hash: op.hash } },
  };
}

export function relativeOffset(day: IsoDate, scrapeDay: IsoDate): number {
  return differenceInCalendarDays(fromIsoDate(day), fromIsoDate(scrapeDay)) + RELATIVE_DAY_SHIFT;
}

export function buildListingsPayload(): PersistedQueryPayload {
  return persisted("ListingsSectionQuery", {
    metricType: "CONVERSION",
    groupBys: ["RATING_CATEGORY"],
    groupByValues: ["occupancy_rate"],
  });
}

export interface MetricPayloadInput {
  operation: InsightsOperation;
  listingId: string;
  windowStart: IsoDate;
  windowEnd: IsoDate;
  scrapeDay: IsoDate;
  request: MetricRequest;
  includeComparison: boolean;
}

export function buildMetricPayload(input: MetricPayloadInput): PersistedQueryPayload {
  const args: Record<string, unknown> = {
    relativeDsStart: relativeOffset(input.windowStart, input.scrapeDay),
    relativeDsEnd: relativeOffset(input.windowEnd, input.scrapeDay),
    filters: { listingIds: [input.listingId] },
    metricType: input.request.metricType,
    groupBys: ["RATING_CATEGORY"],
    groupByValues: input.request.groupValues,
  };
  if (input.includeComparison) args.metricComparisonType = "MARKET";
  return persisted(input.operation, args);
}

/**
 * Cuts the window into consecutive slices of `sliceDays`; the last slice is
 * truncated at the window end. Refuses windows ending past the forward limit.
 */
export function sliceWindow(window: SyncWindow, sliceDays: number, scrapeDay: IsoDate): SyncWindow[] {
  const limit = addIsoDays(scrapeDay, MAX_FORWARD_DAYS);
  if (window.endDate > limit) {
    throw new ValidationError(`Window end ${window.endDate} is past the forward limit ${limit}`);
  }
  const slices: SyncWindow[] = [];
  let start = window.startDate;
  while (start <= window.endDate) {
    const sliceEnd = addIsoDays(start, sliceDays - 1);
    const endDate = sliceEnd < window.endDate ? sliceEnd : window.endDate;
    slices.push({ startDate: start, endDate });
    start = addIsoDays(endDate, 1);
  }
  return slices;
}
