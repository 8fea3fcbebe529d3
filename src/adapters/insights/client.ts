/**
 * HTTP client for the insights API with exponential-backoff retry.
 * Implements both ListingClient and MetricsClient for the sync core.
 */

import type { InsightsApiConfig } from "../../core/config/types.js";
import { utcDay, type IsoDate } from "../../core/dates.js";
import { UpstreamError, errorMessage } from "../../core/errors.js";
import { createChildLogger } from "../../core/logger.js";
import { upstreamRequestCounter, upstreamRequestDuration, upstreamRetryCounter } from "../../core/metrics.js";
import { getExtractionSchema } from "../../services/queryKinds.js";
import type {
  Account,
  AccountCredentials,
  ListingClient,
  ListingRef,
  MetricsClient,
  QueryKind,
  RawMetricDocument,
  RawMetricPage,
  SyncWindow,
} from "../../services/types.js";
import { assertAuthenticated, assertEnvelope, parseListings } from "./envelope.js";
import {
  OPERATIONS,
  buildListingsPayload,
  buildMetricPayload,
  sliceWindow,
  type OperationName,
  type PersistedQueryPayload,
} from "./payloads.js";

const log = createChildLogger("insightsClient");

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);
const BASE_BACKOFF_MS = 1000;

export interface InsightsClientOptions {
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Credential bundle keys mapped onto request headers; unknown keys are not sent. */
const CREDENTIAL_HEADERS: Record<string, string> = {
  cookie: "Cookie",
  apiKey: "X-Api-Key",
  clientVersion: "X-Client-Version",
  userAgent: "User-Agent",
};

export function buildHeaders(credentials: AccountCredentials | null): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: "application/json",
    "Content-Type": "application/json",
  };
  for (const [key, value] of Object.entries(credentials ?? {})) {
    const header = CREDENTIAL_HEADERS[key];
    if (header && value) headers[header] = value;
  }
  return headers;
}

/** Thrown inside the retry loop for failures worth another attempt. */
class RetryableFailure extends Error {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = "RetryableFailure";
  }
}

export class InsightsClient implements ListingClient, MetricsClient {
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(
    private readonly config: InsightsApiConfig,
    options: InsightsClientOptions = {}
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? delay;
    this.now = options.now ?? (() => new Date());
  }

  operationUrl(operation: OperationName): string {
    const base = this.config.baseUrl.replace(/\/+$/, "");
    return `${base}/${operation}/${OPERATIONS[operation].hash}`;
  }

  async listListings(account: Account, window: SyncWindow): Promise<ListingRef[]> {
    const body = await this.post(
      "ListingsSectionQuery",
      buildListingsPayload(),
      buildHeaders(account.credentials),
      `ListingsSectionQuery|${account.accountId}`
    );
    const listings = parseListings(body);
    log.info({ accountId: account.accountId, listings: listings.length, window }, "Enumerated listings");
    return listings;
  }

  async fetch(
    account: Account,
    listing: ListingRef,
    queryKind: QueryKind,
    window: SyncWindow,
    scrapeDay: IsoDate = utcDay(this.now())
  ): Promise<RawMetricDocument> {
    const schema = getExtractionSchema(queryKind);
    const headers = buildHeaders(account.credentials);
    const pages: RawMetricPage[] = [];

    for (const slice of sliceWindow(window, schema.sliceDays, scrapeDay)) {
      for (const request of schema.requests) {
        const payload = buildMetricPayload({
          operation: schema.operation,
          listingId: listing.listingId,
          windowStart: slice.startDate,
          windowEnd: slice.endDate,
          scrapeDay,
          request,
          includeComparison: schema.includeComparison,
        });
        const context = `${schema.operation}|${listing.listingId}|${request.groupValues.join(",")}|${slice.startDate}_${slice.endDate}`;
        const body = await this.post(schema.operation, payload, headers, context);
        pages.push({ windowStart: slice.startDate, windowEnd: slice.endDate, request, body });
      }
    }

    return { queryKind, listingId: listing.listingId, pages };
  }

  /**
   * POST with retry on network errors, 429 and 5xx. 401/403, other 4xx,
   * unparseable bodies and auth failures in the body are not retried.
   */
  async post(
    operation: OperationName,
    payload: PersistedQueryPayload,
    headers: Record<string, string>,
    context: string
  ): Promise<unknown> {
    const url = this.operationUrl(operation);
    let lastFailure: RetryableFailure | undefined;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      if (attempt > 0) {
        const backoffMs = BASE_BACKOFF_MS * Math.pow(2, attempt - 1);
        upstreamRetryCounter.inc({ operation });
        log.warn({ context, attempt, backoffMs, err: lastFailure?.message }, "Retrying insights request");
        await this.sleep(backoffMs);
      }

      try {
        const body = await this.attempt(operation, url, payload, headers, context);
        if (this.config.requestDelayMs > 0) await this.sleep(this.config.requestDelayMs);
        return body;
      } catch (err) {
        if (!(err instanceof RetryableFailure)) throw err;
        lastFailure = err;
      }
    }

    throw new UpstreamError(
      `[${context}] Gave up after ${this.config.maxRetries + 1} attempts: ${lastFailure?.message ?? "unknown error"}`,
      "transport",
      lastFailure?.status
    );
  }

  private async attempt(
    operation: OperationName,
    url: string,
    payload: PersistedQueryPayload,
    headers: Record<string, string>,
    context: string
  ): Promise<unknown> {
    const end = upstreamRequestDuration.startTimer({ operation });
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers,
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (err) {
      end();
      upstreamRequestCounter.inc({ operation, status: "error" });
      throw new RetryableFailure(`Request failed: ${errorMessage(err)}`);
    }
    end();
    upstreamRequestCounter.inc({ operation, status: String(response.status) });
    log.debug({ context, status: response.status }, "Insights API call");

    if (response.status === 401 || response.status === 403) {
      throw new UpstreamError(`[${context}] Auth error: ${response.status}`, "auth", response.status);
    }
    if (RETRYABLE_STATUS.has(response.status)) {
      if (response.status === 429) {
        log.warn({ context, retryAfter: response.headers.get("retry-after") }, "Insights API rate limit hit");
      }
      await response.body?.cancel();
      throw new RetryableFailure(`HTTP ${response.status}`, response.status);
    }
    if (!response.ok) {
      throw new UpstreamError(`[${context}] HTTP ${response.status} ${response.statusText}`, "response", response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new UpstreamError(`[${context}] Invalid JSON response: ${errorMessage(err)}`, "response", response.status);
    }
    assertAuthenticated(body);
    return assertEnvelope(body, context);
  }
}
