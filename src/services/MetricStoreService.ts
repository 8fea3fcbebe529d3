/**
 * Metric persistence: validates a batch, then writes it with conflict-update
 * semantics on (account_id, listing_id, period_key, scrape_time).
 *
 * DrizzleMetricStore writes to PostgreSQL; MemoryMetricStore keeps rows in
 * process with the same semantics and backs dry runs, holding at most
 * MEMORY_STORE_MAX_ROWS rows per kind.
 */

import { z } from "zod";
import type { AppConfig } from "../core/config/types.js";
import { isIsoDate } from "../core/dates.js";
import { StoreError, errorMessage } from "../core/errors.js";
import { createChildLogger } from "../core/logger.js";
import { metricRowsUpserted } from "../core/metrics.js";
import { getDb, withTransaction, type DrizzleDb } from "../db/client.js";
import {
  buildMetricUpsert,
  listMetricRows,
  type ExportRow,
  type MetricRangeQuery,
} from "../db/repositories/metrics.js";
import { metricColumns } from "./queryKinds.js";
import type { MetricKind, MetricRecord, MetricStore } from "./types.js";

const log = createChildLogger("metricStore");

/** Rows per INSERT statement. */
export const UPSERT_CHUNK_SIZE = 500;

export interface MetricReader {
  list(kind: MetricKind, query: MetricRangeQuery): Promise<ExportRow[]>;
}

export type MetricRepository = MetricStore & MetricReader;

const isoDate = z.string().refine(isIsoDate, "must be an ISO date (YYYY-MM-DD)");

function recordSchema(kind: MetricKind) {
  const allowed = new Set(metricColumns(kind));
  return z.object({
    accountId: z.string().min(1),
    listingId: z.string().min(1),
    listingName: z.string().nullable(),
    periodKey: isoDate,
    periodEnd: isoDate.nullable(),
    scrapeTime: isoDate,
    metrics: z
      .record(z.number().finite().nullable())
      .superRefine((metrics, ctx) => {
        for (const key of Object.keys(metrics)) {
          if (!allowed.has(key)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown ${kind} column "${key}"` });
          }
        }
      }),
  });
}

const SCHEMAS: Record<MetricKind, ReturnType<typeof recordSchema>> = {
  daily: recordSchema("daily"),
  weekly_summary: recordSchema("weekly_summary"),
  weekly_visibility: recordSchema("weekly_visibility"),
};

/** Rejects the whole batch on the first malformed record. */
export function validateBatch(kind: MetricKind, rows: readonly MetricRecord[]): void {
  const schema = SCHEMAS[kind];
  rows.forEach((row, index) => {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid";
      throw new StoreError(`Malformed ${kind} record at index ${index} (${where})`, kind);
    }
  });
}

export function naturalKey(row: Pick<MetricRecord, "accountId" | "listingId" | "periodKey" | "scrapeTime">): string {
  return [row.accountId, row.listingId, row.periodKey, row.scrapeTime].join("|");
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

export class DrizzleMetricStore implements MetricRepository {
  constructor(private readonly db: DrizzleDb = getDb()) {}

  async upsert(kind: MetricKind, rows: readonly MetricRecord[]): Promise<number> {
    if (rows.length === 0) return 0;
    validateBatch(kind, rows);

    try {
      await withTransaction(async (tx) => {
        for (const part of chunk(rows, UPSERT_CHUNK_SIZE)) {
          await buildMetricUpsert(tx, kind, part);
        }
      }, this.db);
    } catch (err) {
      log.error({ kind, rows: rows.length, err }, "Metric upsert failed");
      throw new StoreError(`Failed to write ${rows.length} ${kind} rows: ${errorMessage(err)}`, kind);
    }

    metricRowsUpserted.inc({ kind }, rows.length);
    log.debug({ kind, rows: rows.length }, "Upserted metric rows");
    return rows.length;
  }

  async list(kind: MetricKind, query: MetricRangeQuery): Promise<ExportRow[]> {
    return listMetricRows(this.db, kind, query);
  }
}

/** Rows kept per kind before the oldest keys are dropped. */
export const MEMORY_STORE_MAX_ROWS = 100_000;

export class MemoryMetricStore implements MetricRepository {
  private readonly tables: Record<MetricKind, Map<string, MetricRecord>> = {
    daily: new Map(),
    weekly_summary: new Map(),
    weekly_visibility: new Map(),
  };

  constructor(private readonly maxRowsPerKind: number = MEMORY_STORE_MAX_ROWS) {}

  async upsert(kind: MetricKind, rows: readonly MetricRecord[]): Promise<number> {
    if (rows.length === 0) return 0;
    validateBatch(kind, rows);
    const table = this.tables[kind];
    for (const row of rows) {
      table.set(naturalKey(row), { ...row, metrics: { ...row.metrics } });
    }
    for (const key of table.keys()) {
      if (table.size <= this.maxRowsPerKind) break;
      table.delete(key);
    }
    metricRowsUpserted.inc({ kind }, rows.length);
    log.debug({ kind, rows: rows.length, dryRun: true }, "Kept metric rows in memory");
    return rows.length;
  }

  /** Stored records of one kind, in insertion order of their keys. */
  rows(kind: MetricKind): MetricRecord[] {
    return [...this.tables[kind].values()];
  }

  async list(kind: MetricKind, query: MetricRangeQuery): Promise<ExportRow[]> {
    const columns = metricColumns(kind);
    return this.rows(kind)
      .filter(
        (r) =>
          r.accountId === query.accountId &&
          r.periodKey >= query.startDate &&
          r.periodKey < query.endDate &&
          (!query.listingId || r.listingId === query.listingId)
      )
      .sort((a, b) => naturalKey(a).localeCompare(naturalKey(b)))
      .map((r) => {
        const row: ExportRow = {
          accountId: r.accountId,
          listingId: r.listingId,
          periodKey: r.periodKey,
          scrapeTime: r.scrapeTime,
          listingName: r.listingName,
        };
        if (kind !== "daily") row.periodEnd = r.periodEnd;
        for (const column of columns) row[column] = r.metrics[column] ?? null;
        return row;
      });
  }
}

export function createMetricStore(config: Pick<AppConfig, "dryRun">): MetricRepository {
  return config.dryRun ? new MemoryMetricStore() : new DrizzleMetricStore();
}
