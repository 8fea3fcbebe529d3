/**
 * Sync wiring and job lifecycle entry point.
 */

import { InsightsClient } from "../adapters/insights/index.js";
import type { AppConfig } from "../core/config/types.js";
import { logger } from "../core/logger.js";
import { AccountSyncService } from "../services/AccountSyncService.js";
import { DbAccountProvider } from "../services/AccountService.js";
import { ListingSyncService } from "../services/ListingSyncService.js";
import { createMetricStore, type MetricRepository } from "../services/MetricStoreService.js";
import { JobScheduler } from "./scheduler.js";
import { TriggerCoordinator } from "./triggerCoordinator.js";

export interface SyncRuntime {
  coordinator: TriggerCoordinator;
  store: MetricRepository;
}

export function createSyncRuntime(config: AppConfig): SyncRuntime {
  const accounts = new DbAccountProvider();
  const store = createMetricStore(config);
  const insights = new InsightsClient(config.insights);
  const orchestrator = new AccountSyncService({
    accounts,
    listings: insights,
    listingSync: new ListingSyncService({ metricsClient: insights, store }),
    window: config.window,
    concurrency: config.listingConcurrency,
    dryRun: config.dryRun,
  });
  const coordinator = new TriggerCoordinator({
    accounts,
    orchestrator,
    schedule: { hourUtc: config.syncHourUtc, minuteUtc: config.syncMinuteUtc },
  });
  coordinator.onOutcome((outcome) => {
    if (outcome.status === "completed") {
      const { report } = outcome;
      logger.info(
        {
          accountId: report.accountId,
          trigger: report.trigger,
          listingsOk: report.listingsOk,
          listingsFailed: report.listingsFailed.length,
          cancelled: report.cancelled,
          markSyncFailed: report.markSyncFailed,
        },
        "Sync outcome"
      );
    }
  });
  return { coordinator, store };
}

let scheduler: JobScheduler | null = null;

/** Daily sync timer plus the startup catch-up check. Worker and hybrid modes only. */
export async function startJobs(coordinator: TriggerCoordinator, config: AppConfig): Promise<void> {
  scheduler = new JobScheduler();
  scheduler.registerDaily(
    "dailySync",
    async () => {
      await coordinator.runScheduled();
    },
    config.syncHourUtc,
    config.syncMinuteUtc
  );
  scheduler.start();
  await coordinator.runStartupCheck();
}

export function stopJobs(): void {
  scheduler?.stop();
  scheduler = null;
}
