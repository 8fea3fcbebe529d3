/**
 * Syncs one listing: fetch every query kind, normalize, then write per kind.
 * Nothing is written unless every fetch and normalization succeeded.
 */

import type { IsoDate } from "../core/dates.js";
import { errorMessage } from "../core/errors.js";
import { createChildLogger, type Logger } from "../core/logger.js";
import { normalize } from "./MetricsNormalizer.js";
import { QUERY_KIND_ORDER, getExtractionSchema } from "./queryKinds.js";
import {
  emptyRowsWritten,
  type Account,
  type ListingFailureStage,
  type ListingRef,
  type ListingResult,
  type MetricRecord,
  type MetricStore,
  type MetricsClient,
  type NormalizedMetricRow,
  type QueryKind,
  type RawMetricDocument,
  type RowsWritten,
  type SyncWindow,
} from "./types.js";

export interface ListingSyncDeps {
  metricsClient: MetricsClient;
  store: MetricStore;
  queryKinds?: readonly QueryKind[];
  logger?: Logger;
}

export class ListingSyncService {
  private readonly queryKinds: readonly QueryKind[];
  private readonly log: Logger;

  constructor(private readonly deps: ListingSyncDeps) {
    this.queryKinds = deps.queryKinds ?? QUERY_KIND_ORDER;
    this.log = deps.logger ?? createChildLogger("listingSync");
  }

  async run(account: Account, listing: ListingRef, window: SyncWindow, scrapeTime: IsoDate): Promise<ListingResult> {
    const rowsWritten = emptyRowsWritten();
    const ctx = { accountId: account.accountId, listingId: listing.listingId };
    const failed = (stage: ListingFailureStage, err: unknown): ListingResult => {
      const reason = errorMessage(err);
      this.log.warn({ ...ctx, stage, err }, "Listing sync failed");
      return { listingId: listing.listingId, status: "failed", stage, reason, rowsWritten };
    };

    const documents: [QueryKind, RawMetricDocument][] = [];
    for (const kind of this.queryKinds) {
      try {
        documents.push([kind, await this.deps.metricsClient.fetch(account, listing, kind, window, scrapeTime)]);
      } catch (err) {
        return failed("fetch", err);
      }
    }

    const normalized: [QueryKind, NormalizedMetricRow[]][] = [];
    for (const [kind, doc] of documents) {
      try {
        normalized.push([kind, normalize(doc, kind, listing)]);
      } catch (err) {
        return failed("normalize", err);
      }
    }

    for (const [kind, rows] of normalized) {
      const recordKind = getExtractionSchema(kind).recordKind;
      const records: MetricRecord[] = rows.map((row) => ({ ...row, accountId: account.accountId, scrapeTime }));
      try {
        rowsWritten[recordKind] += await this.deps.store.upsert(recordKind, records);
      } catch (err) {
        return failed("write", err);
      }
    }

    this.log.info({ ...ctx, rowsWritten }, "Listing synced");
    return { listingId: listing.listingId, status: "ok", rowsWritten };
  }
}

export function totalRows(rows: RowsWritten): number {
  return rows.daily + rows.weekly_summary + rows.weekly_visibility;
}
