/**
 * Sync domain types and the collaborator interfaces the sync core depends on.
 */

import type { IsoDate } from "../core/dates.js";

export type AccountCredentials = Record<string, string>;

export interface Account {
  accountId: string;
  customerId: string | null;
  isActive: boolean;
  lastSyncAt: Date | null;
  credentials: AccountCredentials | null;
  deletedAt: Date | null;
}

export type SyncState = { kind: "never" } | { kind: "syncedAt"; at: Date };

export function syncStateOf(account: Pick<Account, "lastSyncAt">): SyncState {
  return account.lastSyncAt ? { kind: "syncedAt", at: account.lastSyncAt } : { kind: "never" };
}

/** Inclusive on both ends. */
export interface SyncWindow {
  startDate: IsoDate;
  endDate: IsoDate;
}

export interface ListingRef {
  listingId: string;
  listingName: string;
}

export type MetricKind = "daily" | "weekly_summary" | "weekly_visibility";
export type QueryKind = MetricKind;

export const METRIC_KINDS: readonly MetricKind[] = ["daily", "weekly_summary", "weekly_visibility"];

export interface MetricRequest {
  metricType: string;
  groupValues: string[];
}

export interface RawMetricPage {
  windowStart: IsoDate;
  windowEnd: IsoDate;
  request: MetricRequest;
  /** Response body as returned by the API. */
  body: unknown;
}

export interface RawMetricDocument {
  queryKind: QueryKind;
  listingId: string;
  pages: RawMetricPage[];
}

export interface MetricTriple {
  periodKey: IsoDate;
  metric: string;
  value: unknown;
}

export type MetricValues = Record<string, number | null>;

export interface NormalizedMetricRow {
  listingId: string;
  listingName: string | null;
  periodKey: IsoDate;
  /** Last day of the period for weekly kinds, null for daily rows. */
  periodEnd: IsoDate | null;
  metrics: MetricValues;
}

export interface MetricRecord extends NormalizedMetricRow {
  accountId: string;
  scrapeTime: IsoDate;
}

export interface AccountProvider {
  get(accountId: string): Promise<Account | null>;
  list(activeOnly: boolean): Promise<Account[]>;
  markSynced(accountId: string, at: Date): Promise<void>;
}

export interface ListingClient {
  listListings(account: Account, window: SyncWindow): Promise<ListingRef[]>;
}

export interface MetricsClient {
  /** `scrapeDay` anchors the API's relative day offsets; defaults to the current UTC day. */
  fetch(
    account: Account,
    listing: ListingRef,
    queryKind: QueryKind,
    window: SyncWindow,
    scrapeDay?: IsoDate
  ): Promise<RawMetricDocument>;
}

export interface MetricStore {
  upsert(kind: MetricKind, rows: readonly MetricRecord[]): Promise<number>;
}

export type RowsWritten = Record<MetricKind, number>;

export function emptyRowsWritten(): RowsWritten {
  return { daily: 0, weekly_summary: 0, weekly_visibility: 0 };
}

export type ListingFailureStage = "fetch" | "normalize" | "write";

export type ListingResult =
  | { listingId: string; status: "ok"; rowsWritten: RowsWritten }
  | {
      listingId: string;
      status: "failed";
      stage: ListingFailureStage;
      reason: string;
      rowsWritten: RowsWritten;
    };

export type TriggerSource = "scheduled" | "manual" | "startup";

export interface SyncReport {
  accountId: string;
  trigger: TriggerSource;
  window: SyncWindow;
  scrapeTime: IsoDate;
  startedAt: Date;
  finishedAt: Date;
  listingsTotal: number;
  listingsOk: number;
  listingsFailed: { listingId: string; reason: string }[];
  /** Listings never started because the run was cancelled. */
  listingsSkipped: number;
  rowsWritten: RowsWritten;
  cancelled: boolean;
  /** Listings ran but last_sync_at could not be written. */
  markSyncFailed: boolean;
}
