/**
 * Turns raw insights responses into wide metric rows.
 *
 * Extraction reads (period, metric, value) triples out of each page using the
 * query kind's schema; pivoting groups them by (listing, period) into rows with
 * one column per stored metric. Rows carry no account id or scrape time.
 */

import { addIsoDays, isIsoDate, type IsoDate } from "../core/dates.js";
import { NormalizationError } from "../core/errors.js";
import { createChildLogger, type Logger } from "../core/logger.js";
import { metricFieldCoercionFailures } from "../core/metrics.js";
import { getExtractionSchema, metricColumns, type ExtractionSchema } from "./queryKinds.js";
import type {
  ListingRef,
  MetricKind,
  MetricTriple,
  MetricValues,
  NormalizedMetricRow,
  QueryKind,
  RawMetricDocument,
  RawMetricPage,
} from "./types.js";

const log = createChildLogger("metricsNormalizer");

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function records(value: unknown): UnknownRecord[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function stringField(obj: UnknownRecord, key: string): string | undefined {
  const v = obj[key];
  return typeof v === "string" ? v : undefined;
}

const NUMERIC_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export type CoercionResult = { ok: true; value: number | null } | { ok: false };

/**
 * Strict numeric coercion. Accepts finite numbers, numeric strings and the
 * API's { doubleValue } / { longValue } wrappers; null and undefined mean "not
 * reported". Anything else is a failure.
 */
export function coerceMetricValue(raw: unknown): CoercionResult {
  if (raw === null || raw === undefined) return { ok: true, value: null };
  if (typeof raw === "number") return Number.isFinite(raw) ? { ok: true, value: raw } : { ok: false };
  if (typeof raw === "string") {
    const trimmed = raw.trim();
    if (!NUMERIC_RE.test(trimmed)) return { ok: false };
    const value = Number(trimmed);
    return Number.isFinite(value) ? { ok: true, value } : { ok: false };
  }
  if (isRecord(raw)) {
    if (raw.doubleValue !== null && raw.doubleValue !== undefined) return coerceMetricValue(raw.doubleValue);
    if ("longValue" in raw || "doubleValue" in raw) return coerceMetricValue(raw.longValue);
  }
  return { ok: false };
}

function firstComponent(page: RawMetricPage, schema: ExtractionSchema, kind: QueryKind): UnknownRecord {
  let cursor: unknown = page.body;
  for (const key of schema.componentPath) {
    if (!isRecord(cursor) || !(key in cursor)) {
      throw new NormalizationError(
        `Response for ${page.windowStart}..${page.windowEnd} has no "${schema.componentPath.join(".")}"`,
        kind
      );
    }
    cursor = cursor[key];
  }
  if (!Array.isArray(cursor)) {
    throw new NormalizationError(`Component list for ${page.windowStart}..${page.windowEnd} is not an array`, kind);
  }
  const first: unknown = cursor[0];
  return isRecord(first) ? first : {};
}

function lineChartTriples(component: UnknownRecord, page: RawMetricPage): MetricTriple[] {
  const requested = page.request.groupValues[0] ?? "unknown";
  const triples: MetricTriple[] = [];
  for (const chart of records(component.metricLineCharts)) {
    const series = /your/i.test(stringField(chart, "label") ?? "") ? "your" : "similar";
    for (const point of records(chart.dataPoints)) {
      const ds = stringField(point, "ds");
      if (!ds || !isIsoDate(ds)) {
        log.warn({ ds: point.ds, metric: requested }, "Skipping data point without a valid date");
        continue;
      }
      triples.push({ periodKey: ds, metric: `${requested}_${series}`, value: point.value });
    }
  }
  return triples;
}

function summaryTriples(component: UnknownRecord, page: RawMetricPage): MetricTriple[] {
  const triples: MetricTriple[] = [];
  const primary = isRecord(component.primaryMetric) ? component.primaryMetric : undefined;
  const primaryName = primary ? stringField(primary, "metricName") : undefined;
  if (primary && primaryName) {
    triples.push({ periodKey: page.windowStart, metric: primaryName, value: primary.value });
    triples.push({ periodKey: page.windowStart, metric: `${primaryName}_change`, value: primary.valueChange });
  }
  for (const m of records(component.secondaryMetrics)) {
    const name = stringField(m, "metricName");
    if (name) triples.push({ periodKey: page.windowStart, metric: name, value: m.value });
  }
  return triples;
}

function metricListTriples(component: UnknownRecord, page: RawMetricPage): MetricTriple[] {
  const triples: MetricTriple[] = [];
  for (const m of records(component.metrics)) {
    const name = stringField(m, "metricName");
    if (name) triples.push({ periodKey: page.windowStart, metric: name, value: m.value });
  }
  return triples;
}

export function extractTriples(page: RawMetricPage, kind: QueryKind): MetricTriple[] {
  const schema = getExtractionSchema(kind);
  const component = firstComponent(page, schema, kind);
  switch (schema.shape) {
    case "lineChart":
      return lineChartTriples(component, page);
    case "summary":
      return summaryTriples(component, page);
    case "metricList":
      return metricListTriples(component, page);
  }
}

/** Non-null beats null; between two reported values the greater one is kept. */
function preferred(current: number | null | undefined, incoming: number | null): number | null {
  if (current === undefined || current === null) return incoming;
  if (incoming === null) return current;
  return Math.max(current, incoming);
}

export function pivotTriples(
  listing: ListingRef,
  kind: MetricKind,
  triples: readonly MetricTriple[],
  logger: Logger = log
): NormalizedMetricRow[] {
  const schema = getExtractionSchema(kind);
  const columns = metricColumns(kind);
  const byPeriod = new Map<IsoDate, MetricValues>();

  for (const triple of triples) {
    const column = Object.hasOwn(schema.columns, triple.metric) ? schema.columns[triple.metric] : undefined;
    if (!column) {
      logger.debug({ kind, metric: triple.metric }, "Ignoring metric without a column");
      continue;
    }

    let values = byPeriod.get(triple.periodKey);
    if (!values) {
      values = Object.fromEntries(columns.map((c) => [c, null]));
      byPeriod.set(triple.periodKey, values);
    }

    const coerced = coerceMetricValue(triple.value);
    if (!coerced.ok) {
      metricFieldCoercionFailures.inc({ kind });
      logger.warn(
        { kind, listingId: listing.listingId, periodKey: triple.periodKey, metric: triple.metric },
        "Metric value is not numeric; storing null"
      );
    }
    values[column] = preferred(values[column], coerced.ok ? coerced.value : null);
  }

  return [...byPeriod.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([periodKey, metrics]) => ({
      listingId: listing.listingId,
      listingName: listing.listingName,
      periodKey,
      periodEnd: schema.granularity === "weekly" ? addIsoDays(periodKey, 6) : null,
      metrics,
    }));
}

export function normalize(raw: RawMetricDocument, queryKind: QueryKind, listing: ListingRef): NormalizedMetricRow[] {
  if (raw.queryKind !== queryKind) {
    throw new NormalizationError(`Document is ${raw.queryKind}, expected ${queryKind}`, queryKind);
  }
  if (raw.listingId !== listing.listingId) {
    throw new NormalizationError(`Document belongs to listing ${raw.listingId}, not ${listing.listingId}`, queryKind);
  }
  const triples = raw.pages.flatMap((page) => extractTriples(page, queryKind));
  const rows = pivotTriples(listing, getExtractionSchema(queryKind).recordKind, triples);
  log.debug({ queryKind, listingId: listing.listingId, pages: raw.pages.length, rows: rows.length }, "Normalized document");
  return rows;
}
