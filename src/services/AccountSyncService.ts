/**
 * One account's sync run: Planning -> Enumerating -> PerListing -> Finalizing.
 *
 * Run-level failures (preconditions, listing enumeration) throw. Listing
 * failures never do; they are counted in the SyncReport. `last_sync_at` is
 * written once at the end of a run that enumerated listings and was not
 * cancelled, even if every listing failed.
 */

import type { WindowConfig } from "../core/config/types.js";
import { utcDay } from "../core/dates.js";
import { EnumerationError, PreconditionError, errorMessage } from "../core/errors.js";
import { createChildLogger, type Logger } from "../core/logger.js";
import { listingsProcessedCounter, syncJobCounter, syncJobDuration, syncJobsActive } from "../core/metrics.js";
import { totalRows, type ListingSyncService } from "./ListingSyncService.js";
import { DEFAULT_WINDOW_CONFIG, planWindow } from "./WindowPlanner.js";
import {
  emptyRowsWritten,
  syncStateOf,
  type Account,
  type AccountProvider,
  type ListingClient,
  type ListingRef,
  type ListingResult,
  type SyncReport,
  type TriggerSource,
} from "./types.js";

export interface AccountSyncDeps {
  accounts: Pick<AccountProvider, "markSynced">;
  listings: ListingClient;
  listingSync: Pick<ListingSyncService, "run">;
  window?: WindowConfig;
  /** Listings processed at the same time within one account. */
  concurrency?: number;
  dryRun?: boolean;
  now?: () => Date;
  logger?: Logger;
}

export interface AccountSyncOptions {
  trigger?: TriggerSource;
  signal?: AbortSignal;
}

export function checkPreconditions(account: Account): void {
  if (account.deletedAt) {
    throw new PreconditionError(`Account ${account.accountId} is deleted`, account.accountId);
  }
  if (!account.isActive) {
    throw new PreconditionError(`Account ${account.accountId} is inactive`, account.accountId);
  }
  if (!account.credentials || Object.keys(account.credentials).length === 0) {
    throw new PreconditionError(`Account ${account.accountId} has no credentials`, account.accountId);
  }
}

export class AccountSyncService {
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly window: WindowConfig;
  private readonly concurrency: number;

  constructor(private readonly deps: AccountSyncDeps) {
    this.log = deps.logger ?? createChildLogger("accountSync");
    this.now = deps.now ?? (() => new Date());
    this.window = deps.window ?? DEFAULT_WINDOW_CONFIG;
    this.concurrency = Math.max(1, deps.concurrency ?? 1);
  }

  async run(account: Account, options: AccountSyncOptions = {}): Promise<SyncReport> {
    const trigger = options.trigger ?? "manual";
    const startedAt = this.now();
    const log = this.log.child({ accountId: account.accountId, trigger });

    syncJobsActive.inc();
    const stopTimer = syncJobDuration.startTimer();
    let status = "failed";
    try {
      const report = await this.execute(account, trigger, startedAt, log, options.signal);
      status = report.cancelled ? "cancelled" : "completed";
      return report;
    } finally {
      syncJobsActive.dec();
      stopTimer({ status });
      syncJobCounter.inc({ trigger, status });
    }
  }

  private async execute(
    account: Account,
    trigger: TriggerSource,
    startedAt: Date,
    log: Logger,
    signal: AbortSignal | undefined
  ): Promise<SyncReport> {
    checkPreconditions(account);

    const scrapeTime = utcDay(startedAt);
    const state = syncStateOf(account);
    const window = planWindow(state, scrapeTime, this.window);
    log.info({ state: state.kind, window, scrapeTime }, "Planned sync window");

    let listings: ListingRef[];
    try {
      listings = await this.deps.listings.listListings(account, window);
    } catch (err) {
      log.error({ err }, "Listing enumeration failed");
      throw new EnumerationError(
        `Could not enumerate listings for ${account.accountId}: ${errorMessage(err)}`,
        account.accountId,
        err
      );
    }

    const ordered = [...listings].sort((a, b) =>
      a.listingId < b.listingId ? -1 : a.listingId > b.listingId ? 1 : 0
    );
    const results = await this.runListings(account, ordered, window, scrapeTime, signal);

    const rowsWritten = emptyRowsWritten();
    const listingsFailed: SyncReport["listingsFailed"] = [];
    let listingsOk = 0;
    for (const result of results) {
      rowsWritten.daily += result.rowsWritten.daily;
      rowsWritten.weekly_summary += result.rowsWritten.weekly_summary;
      rowsWritten.weekly_visibility += result.rowsWritten.weekly_visibility;
      if (result.status === "ok") listingsOk++;
      else listingsFailed.push({ listingId: result.listingId, reason: `${result.stage}: ${result.reason}` });
    }
    const listingsSkipped = ordered.length - results.length;
    const cancelled = listingsSkipped > 0;

    let markSyncFailed = false;
    if (cancelled) {
      log.warn({ listingsSkipped }, "Sync cancelled; account left unsynced");
    } else if (this.deps.dryRun) {
      log.info("Dry run; last_sync_at not updated");
    } else {
      try {
        await this.deps.accounts.markSynced(account.accountId, this.now());
      } catch (err) {
        markSyncFailed = true;
        log.error({ err }, "Could not record last_sync_at; listings were synced");
      }
    }

    const report: SyncReport = {
      accountId: account.accountId,
      trigger,
      window,
      scrapeTime,
      startedAt,
      finishedAt: this.now(),
      listingsTotal: ordered.length,
      listingsOk,
      listingsFailed,
      listingsSkipped,
      rowsWritten,
      cancelled,
      markSyncFailed,
    };
    log.info(
      {
        listingsTotal: report.listingsTotal,
        listingsOk,
        listingsFailed: listingsFailed.length,
        listingsSkipped,
        rows: totalRows(rowsWritten),
      },
      "Account sync finished"
    );
    return report;
  }

  /**
   * Runs listings with at most `concurrency` in flight. Once the signal is
   * aborted no further listing starts; started ones finish. Results come back
   * in listing order.
   */
  private async runListings(
    account: Account,
    listings: readonly ListingRef[],
    window: SyncReport["window"],
    scrapeTime: string,
    signal: AbortSignal | undefined
  ): Promise<ListingResult[]> {
    const results: (ListingResult | undefined)[] = new Array(listings.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < listings.length && !signal?.aborted) {
        const index = next++;
        const listing = listings[index];
        if (!listing) return;
        const result = await this.deps.listingSync.run(account, listing, window, scrapeTime);
        listingsProcessedCounter.inc({ status: result.status });
        results[index] = result;
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, listings.length) }, () => worker());
    await Promise.all(workers);
    return results.filter((r): r is ListingResult => r !== undefined);
  }
}
