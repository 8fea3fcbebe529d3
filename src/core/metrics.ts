/**
 * Prometheus metrics: HTTP requests, sync runs, upstream API calls, metric rows.
 */

import { Registry, Counter, Gauge, Histogram, collectDefaultMetrics } from "prom-client";

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const httpRequestDuration = new Histogram({
  name: "http_request_duration_seconds",
  help: "HTTP request duration in seconds",
  labelNames: ["method", "path", "status"] as const,
  registers: [registry],
});

export const syncTriggerCounter = new Counter({
  name: "sync_triggers_total",
  help: "Sync triggers received, by source and whether they were accepted",
  labelNames: ["source", "result"] as const,
  registers: [registry],
});

export const syncJobCounter = new Counter({
  name: "sync_jobs_total",
  help: "Sync runs finished, by trigger and status",
  labelNames: ["trigger", "status"] as const,
  registers: [registry],
});

export const syncJobDuration = new Histogram({
  name: "sync_job_duration_seconds",
  help: "Duration of one account sync run in seconds",
  labelNames: ["status"] as const,
  buckets: [1, 5, 15, 30, 60, 120, 300, 600, 1200],
  registers: [registry],
});

export const syncJobsActive = new Gauge({
  name: "sync_jobs_active",
  help: "Account sync runs currently in flight",
  registers: [registry],
});

export const listingsProcessedCounter = new Counter({
  name: "sync_listings_processed_total",
  help: "Listings processed during sync runs",
  labelNames: ["status"] as const,
  registers: [registry],
});

export const upstreamRequestCounter = new Counter({
  name: "insights_api_requests_total",
  help: "Insights API requests, by operation and outcome",
  labelNames: ["operation", "status"] as const,
  registers: [registry],
});

export const upstreamRetryCounter = new Counter({
  name: "insights_api_retries_total",
  help: "Insights API retry attempts",
  labelNames: ["operation"] as const,
  registers: [registry],
});

export const upstreamRequestDuration = new Histogram({
  name: "insights_api_request_duration_seconds",
  help: "Insights API request duration in seconds",
  labelNames: ["operation"] as const,
  registers: [registry],
});

export const metricRowsUpserted = new Counter({
  name: "metric_rows_upserted_total",
  help: "Metric rows written, by record kind",
  labelNames: ["kind"] as const,
  registers: [registry],
});

export const metricFieldCoercionFailures = new Counter({
  name: "metric_field_coercion_failures_total",
  help: "Metric values that could not be coerced to a number and were stored as null",
  labelNames: ["kind"] as const,
  registers: [registry],
});
