import type {
  Account,
  AccountProvider,
  ListingClient,
  ListingRef,
  MetricsClient,
  QueryKind,
  RawMetricDocument,
  SyncWindow,
} from "../../../src/services/types.js";

export function makeAccount(overrides: Partial<Account> = {}): Account {
  return {
    accountId: "acc-1",
    customerId: null,
    isActive: true,
    lastSyncAt: null,
    credentials: { cookie: "test-cookie", apiKey: "test-secret" },
    deletedAt: null,
    ...overrides,
  };
}

export function listings(...ids: string[]): ListingRef[] {
  return ids.map((id) => ({ listingId: id, listingName: `Listing ${id}` }));
}

function envelope(component: unknown): unknown {
  return { data: { insights: { getPerformanceComponents: { components: [component] } } } };
}

/** One well-formed page per query kind, each producing exactly one row. */
export function documentFor(listingId: string, kind: QueryKind): RawMetricDocument {
  const request = { metricType: "CONVERSION", groupValues: ["conversion_rate"] };
  switch (kind) {
    case "daily":
      return {
        queryKind: kind,
        listingId,
        pages: [
          {
            windowStart: "2025-11-02",
            windowEnd: "2025-11-29",
            request,
            body: envelope({
              metricLineCharts: [{ label: "Your listing", dataPoints: [{ ds: "2025-11-02", value: 0.5 }] }],
            }),
          },
        ],
      };
    case "weekly_summary":
      return {
        queryKind: kind,
        listingId,
        pages: [
          {
            windowStart: "2025-11-02",
            windowEnd: "2025-11-08",
            request,
            body: envelope({ primaryMetric: { metricName: "conversion_rate", value: 0.02, valueChange: 0.001 } }),
          },
        ],
      };
    case "weekly_visibility":
      return {
        queryKind: kind,
        listingId,
        pages: [
          {
            windowStart: "2025-11-02",
            windowEnd: "2025-11-08",
            request,
            body: envelope({ metrics: [{ metricName: "p3_impressions", value: 310 }] }),
          },
        ],
      };
  }
}

export class FakeMetricsClient implements MetricsClient {
  calls: { listingId: string; kind: QueryKind; window: SyncWindow; scrapeDay?: string }[] = [];
  failures = new Map<string, Error>();
  malformed = new Set<string>();

  async fetch(
    _account: Account,
    listing: ListingRef,
    queryKind: QueryKind,
    window: SyncWindow,
    scrapeDay?: string
  ): Promise<RawMetricDocument> {
    this.calls.push({ listingId: listing.listingId, kind: queryKind, window, scrapeDay });
    const failure = this.failures.get(`${listing.listingId}:${queryKind}`) ?? this.failures.get(listing.listingId);
    if (failure) throw failure;
    if (this.malformed.has(`${listing.listingId}:${queryKind}`)) {
      return {
        queryKind,
        listingId: listing.listingId,
        pages: [{ windowStart: window.startDate, windowEnd: window.endDate, request: { metricType: "CONVERSION", groupValues: [] }, body: { data: {} } }],
      };
    }
    return documentFor(listing.listingId, queryKind);
  }
}

export class FakeListingClient implements ListingClient {
  calls: SyncWindow[] = [];
  constructor(
    private readonly result: ListingRef[] | Error,
    private readonly gate?: Promise<void>
  ) {}

  async listListings(_account: Account, window: SyncWindow): Promise<ListingRef[]> {
    this.calls.push(window);
    if (this.gate) await this.gate;
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

export class FakeAccountProvider implements AccountProvider {
  synced: { accountId: string; at: Date }[] = [];
  markSyncedError: Error | null = null;
  constructor(public accounts: Account[] = []) {}

  async get(accountId: string): Promise<Account | null> {
    return this.accounts.find((a) => a.accountId === accountId) ?? null;
  }

  async list(activeOnly: boolean): Promise<Account[]> {
    return this.accounts.filter((a) => !a.deletedAt && (!activeOnly || a.isActive));
  }

  async markSynced(accountId: string, at: Date): Promise<void> {
    if (this.markSyncedError) throw this.markSyncedError;
    this.synced.push({ accountId, at });
  }
}

/** A promise plus the function that resolves it. */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
