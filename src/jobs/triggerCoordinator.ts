/**
 * Decides when an account's sync runs and keeps at most one run per account
 * in flight. Triggers for a busy account are dropped, not queued.
 */

import { utcDay } from "../core/dates.js";
import { NotFoundError, errorMessage } from "../core/errors.js";
import { createChildLogger, type Logger } from "../core/logger.js";
import { syncTriggerCounter } from "../core/metrics.js";
import type { AccountSyncService } from "../services/AccountSyncService.js";
import type { AccountProvider, SyncReport, TriggerSource } from "../services/types.js";
import { dailySlotPassed } from "./scheduler.js";

export type TriggerRejection = "in_flight" | "shutting_down";

export interface TriggerAck {
  accepted: boolean;
  accountId: string;
  reason?: TriggerRejection;
}

export type SyncOutcome =
  | { status: "completed"; accountId: string; source: TriggerSource; report: SyncReport }
  | { status: "failed"; accountId: string; source: TriggerSource; error: Error };

export type OutcomeListener = (outcome: SyncOutcome) => void;

interface RunEntry {
  promise: Promise<void>;
  controller: AbortController;
  source: TriggerSource;
  startedAt: Date;
}

export interface RunningSync {
  accountId: string;
  source: TriggerSource;
  startedAt: Date;
}

export interface TriggerCoordinatorDeps {
  accounts: Pick<AccountProvider, "get" | "list">;
  orchestrator: Pick<AccountSyncService, "run">;
  schedule: { hourUtc: number; minuteUtc: number };
  now?: () => Date;
  logger?: Logger;
}

export class TriggerCoordinator {
  private readonly registry = new Map<string, RunEntry>();
  private readonly listeners: OutcomeListener[] = [];
  private readonly log: Logger;
  private readonly now: () => Date;
  private accepting = true;

  constructor(private readonly deps: TriggerCoordinatorDeps) {
    this.log = deps.logger ?? createChildLogger("triggerCoordinator");
    this.now = deps.now ?? (() => new Date());
  }

  onOutcome(listener: OutcomeListener): void {
    this.listeners.push(listener);
  }

  isRunning(accountId: string): boolean {
    return this.registry.has(accountId);
  }

  running(): RunningSync[] {
    return [...this.registry.entries()].map(([accountId, e]) => ({
      accountId,
      source: e.source,
      startedAt: e.startedAt,
    }));
  }

  /** Lock check and registration happen synchronously; the run itself is dispatched. */
  trigger(accountId: string, source: TriggerSource): TriggerAck {
    if (!this.accepting) return this.reject(accountId, source, "shutting_down");
    if (this.registry.has(accountId)) return this.reject(accountId, source, "in_flight");

    const controller = new AbortController();
    const entry: RunEntry = {
      controller,
      source,
      startedAt: this.now(),
      promise: Promise.resolve(),
    };
    this.registry.set(accountId, entry);
    entry.promise = this.dispatch(accountId, source, controller.signal).finally(() => {
      this.registry.delete(accountId);
    });

    syncTriggerCounter.inc({ source, result: "accepted" });
    this.log.info({ accountId, source }, "Sync triggered");
    return { accepted: true, accountId };
  }

  async runScheduled(): Promise<TriggerAck[]> {
    const accounts = await this.deps.accounts.list(true);
    this.log.info({ accounts: accounts.length }, "Daily sync firing");
    return accounts.map((a) => this.trigger(a.accountId, "scheduled"));
  }

  /** Triggers accounts never synced, or last synced before today once today's slot has passed. */
  async runStartupCheck(now: Date = this.now()): Promise<TriggerAck[]> {
    const today = utcDay(now);
    const slotPassed = dailySlotPassed(now, this.deps.schedule.hourUtc, this.deps.schedule.minuteUtc);
    const accounts = await this.deps.accounts.list(true);
    const due = accounts.filter((a) => a.lastSyncAt === null || (utcDay(a.lastSyncAt) < today && slotPassed));
    this.log.info({ accounts: accounts.length, due: due.length }, "Startup sync check");
    return due.map((a) => this.trigger(a.accountId, "startup"));
  }

  /** Resolves once no run is in flight, including runs started while waiting. */
  async whenIdle(): Promise<void> {
    while (this.registry.size > 0) {
      await Promise.all([...this.registry.values()].map((e) => e.promise));
    }
  }

  /** Stops accepting triggers, aborts in-flight runs (current listings finish) and waits for them. */
  async shutdown(): Promise<void> {
    this.accepting = false;
    for (const [accountId, entry] of this.registry) {
      this.log.info({ accountId }, "Cancelling in-flight sync");
      entry.controller.abort();
    }
    await this.whenIdle();
  }

  private reject(accountId: string, source: TriggerSource, reason: TriggerRejection): TriggerAck {
    syncTriggerCounter.inc({ source, result: "dropped" });
    this.log.info({ accountId, source, reason }, "Sync trigger dropped");
    return { accepted: false, accountId, reason };
  }

  private async dispatch(accountId: string, source: TriggerSource, signal: AbortSignal): Promise<void> {
    let outcome: SyncOutcome;
    try {
      const account = await this.deps.accounts.get(accountId);
      if (!account) throw new NotFoundError("Account", accountId);
      const report = await this.deps.orchestrator.run(account, { trigger: source, signal });
      outcome = { status: "completed", accountId, source, report };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(errorMessage(err));
      this.log.error({ accountId, source, err: error }, "Sync run failed");
      outcome = { status: "failed", accountId, source, error };
    }
    this.emit(outcome);
  }

  private emit(outcome: SyncOutcome): void {
    for (const listener of this.listeners) {
      try {
        listener(outcome);
      } catch (err) {
        this.log.error({ accountId: outcome.accountId, err }, "Outcome listener threw");
      }
    }
  }
}
