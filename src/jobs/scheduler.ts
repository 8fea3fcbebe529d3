/**
 * In-process job scheduler for jobs that fire once a day at a fixed UTC time.
 * The timer is re-armed from the wall clock after each firing, so it never drifts.
 */

import { createChildLogger } from "../core/logger.js";

const log = createChildLogger("jobScheduler");

export type JobFn = () => Promise<void>;

interface DailyJob {
  fn: JobFn;
  hourUtc: number;
  minuteUtc: number;
}

/** Milliseconds from `now` until the next HH:MM UTC; a slot exactly at `now` is tomorrow's. */
export function msUntilNextDaily(now: Date, hourUtc: number, minuteUtc: number): number {
  const next = new Date(
    Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), hourUtc, minuteUtc, 0, 0)
  );
  if (next.getTime() <= now.getTime()) next.setUTCDate(next.getUTCDate() + 1);
  return next.getTime() - now.getTime();
}

/** Whether today's HH:MM UTC slot is at or before `now`. */
export function dailySlotPassed(now: Date, hourUtc: number, minuteUtc: number): boolean {
  return now.getUTCHours() * 60 + now.getUTCMinutes() >= hourUtc * 60 + minuteUtc;
}

export class JobScheduler {
  private jobs = new Map<string, DailyJob>();
  private timers = new Map<string, ReturnType<typeof setTimeout>>();
  private running = false;

  constructor(private readonly now: () => Date = () => new Date()) {}

  registerDaily(name: string, fn: JobFn, hourUtc: number, minuteUtc: number): void {
    this.jobs.set(name, { fn, hourUtc, minuteUtc });
  }

  start(): void {
    this.running = true;
    for (const name of this.jobs.keys()) this.arm(name);
  }

  stop(): void {
    this.running = false;
    for (const [name, id] of this.timers) {
      clearTimeout(id);
      log.info({ job: name }, "Stopped job");
    }
    this.timers.clear();
  }

  private arm(name: string): void {
    const job = this.jobs.get(name);
    if (!job || !this.running) return;
    const delayMs = msUntilNextDaily(this.now(), job.hourUtc, job.minuteUtc);
    const fire = async () => {
      try {
        await job.fn();
      } catch (err) {
        log.error({ job: name, err }, "Job failed");
      } finally {
        this.arm(name);
      }
    };
    this.timers.set(
      name,
      setTimeout(() => void fire(), delayMs)
    );
    log.info({ job: name, nextRunInMs: delayMs }, "Scheduled job");
  }
}
