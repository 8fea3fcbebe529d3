/**
 * Request validation helpers shared by the HTTP routes.
 */

import { z } from "zod";
import { isIsoDate, type IsoDate } from "./dates.js";
import { ValidationError } from "./errors.js";

export const isoDateString = z.string().refine(isIsoDate, "must be a date in YYYY-MM-DD format");

/** Query-string booleans: "true"/"1" are true, anything else false. */
export const queryBoolean = z
  .union([z.string(), z.boolean()])
  .optional()
  .transform((v) => v === true || v === "true" || v === "1");

/**
 * Parse with a zod schema; failures become a ValidationError whose details
 * list each issue as "path: message".
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, what = "request"): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid ${what}`,
      parsed.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    );
  }
  return parsed.data;
}

/**
 * Validate that startDate is strictly before endDate.
 */
export function validateDateRange(startDate: IsoDate, endDate: IsoDate): void {
  if (startDate >= endDate) {
    throw new ValidationError(`Start date (${startDate}) must be before end date (${endDate})`);
  }
}
