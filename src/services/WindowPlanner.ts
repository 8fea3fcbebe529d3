/**
 * Poll window planning. Pure: the caller supplies "today".
 *
 * Windows run from a week start to a week end so every weekly slice sent to
 * the insights API is a whole week.
 */

import { addWeeks, endOfWeek, isBefore, startOfWeek, subDays, subWeeks } from "date-fns";
import type { WindowConfig } from "../core/config/types.js";
import { fromIsoDate, toIsoDate, type IsoDate } from "../core/dates.js";
import type { SyncState, SyncWindow } from "./types.js";

export const DEFAULT_WINDOW_CONFIG: WindowConfig = {
  lookbackWeeks: 25,
  lookaheadWeeks: 5,
  maxLookbackDays: 180,
  weekStartsOn: 0,
};

/** Week start on or before `day`. */
export function previousWeekBoundary(day: Date, config: WindowConfig): Date {
  return startOfWeek(day, { weekStartsOn: config.weekStartsOn });
}

/** Week end on or after `day`. */
export function nextWeekBoundary(day: Date, config: WindowConfig): Date {
  return endOfWeek(day, { weekStartsOn: config.weekStartsOn });
}

/** Earliest week start the API still accepts for a backfill starting from `today`. */
export function earliestAllowedStart(today: Date, config: WindowConfig): Date {
  const limit = subDays(today, config.maxLookbackDays);
  const aligned = startOfWeek(limit, { weekStartsOn: config.weekStartsOn });
  return isBefore(aligned, limit) ? addWeeks(aligned, 1) : aligned;
}

export function planWindow(
  state: SyncState,
  today: IsoDate,
  config: WindowConfig = DEFAULT_WINDOW_CONFIG
): SyncWindow {
  const day = fromIsoDate(today);
  const weekStart = previousWeekBoundary(day, config);

  let start: Date;
  if (state.kind === "never") {
    start = subWeeks(weekStart, config.lookbackWeeks);
    const floor = earliestAllowedStart(day, config);
    if (isBefore(start, floor)) start = floor;
  } else {
    // Re-fetch the last complete week to pick up late revisions.
    start = subWeeks(weekStart, 1);
  }

  const end = addWeeks(nextWeekBoundary(day, config), config.lookaheadWeeks);

  return { startDate: toIsoDate(start), endDate: toIsoDate(end) };
}
