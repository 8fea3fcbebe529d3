import { type Request, type Response, Router } from "express";
import { z } from "zod";
import { NotFoundError, toHttpError } from "../../core/errors.js";
import { isoDateString, parseOrThrow, validateDateRange } from "../../core/validation.js";
import type { ExportRow } from "../../db/repositories/metrics.js";
import type { MetricReader } from "../../services/MetricStoreService.js";
import { getAccount } from "../../services/AccountService.js";

export const metricsQuerySchema = z.object({
  kind: z.enum(["daily", "weekly_summary", "weekly_visibility"]),
  start_date: isoDateString,
  end_date: isoDateString,
  listing_id: z.string().min(1).optional(),
  format: z.enum(["json", "csv"]).default("json"),
});

function snakeCase(key: string): string {
  return key.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toLowerCase();
}

export function rowToJson(row: ExportRow): Record<string, string | number | null> {
  return Object.fromEntries(Object.entries(row).map(([k, v]) => [snakeCase(k), v]));
}

function csvCell(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return "";
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Header from the first row's keys; empty input gives an empty string. */
export function toCsv(rows: readonly ExportRow[]): string {
  const first = rows[0];
  if (!first) return "";
  const keys = Object.keys(first);
  const lines = [keys.map(snakeCase).join(",")];
  for (const row of rows) lines.push(keys.map((k) => csvCell(row[k])).join(","));
  return lines.join("\n") + "\n";
}

function paramStr(v: string | string[] | undefined): string | undefined {
  return typeof v === "string" ? v : v?.[0];
}

export interface MetricsRouterDeps {
  store: MetricReader;
}

export function createMetricsRouter(deps: MetricsRouterDeps): Router {
  const router = Router();

  router.get("/accounts/:accountId/metrics", async (req: Request, res: Response) => {
    try {
      const accountId = paramStr(req.params.accountId);
      if (!accountId) throw new NotFoundError("Account", "undefined");
      const q = parseOrThrow(metricsQuerySchema, req.query, "query");
      validateDateRange(q.start_date, q.end_date);
      await getAccount(accountId, true);

      const rows = await deps.store.list(q.kind, {
        accountId,
        startDate: q.start_date,
        endDate: q.end_date,
        listingId: q.listing_id,
      });

      if (q.format === "csv") {
        res.setHeader("Content-Type", "text/csv; charset=utf-8");
        res.setHeader(
          "Content-Disposition",
          `attachment; filename="${accountId}_${q.kind}_${q.start_date}_${q.end_date}.csv"`
        );
        res.send(toCsv(rows));
        return;
      }
      res.json({ account_id: accountId, kind: q.kind, count: rows.length, items: rows.map(rowToJson) });
    } catch (err) {
      const { status, body } = toHttpError(err);
      res.status(status).json(body);
    }
  });

  return router;
}
