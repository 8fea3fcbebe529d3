/**
 * Calendar-date helpers. Dates travel as ISO strings (YYYY-MM-DD); arithmetic
 * goes through date-fns on local-midnight Date values so DST never shifts a day.
 */

import { addDays, format, isValid, parse } from "date-fns";

export type IsoDate = string;

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: unknown): value is IsoDate {
  if (typeof value !== "string" || !ISO_DATE_RE.test(value)) return false;
  return isValid(parse(value, "yyyy-MM-dd", new Date()));
}

export function fromIsoDate(value: IsoDate): Date {
  return parse(value, "yyyy-MM-dd", new Date());
}

export function toIsoDate(date: Date): IsoDate {
  return format(date, "yyyy-MM-dd");
}

export function addIsoDays(value: IsoDate, days: number): IsoDate {
  return toIsoDate(addDays(fromIsoDate(value), days));
}

/** Calendar day in UTC; the scrape day and "today" of every run. */
export function utcDay(at: Date): IsoDate {
  return at.toISOString().slice(0, 10);
}
