/**
 * Response envelope checks shared by every insights operation.
 */

import { UpstreamError } from "../../core/errors.js";
import type { ListingRef } from "../../services/types.js";

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function graphqlErrors(body: UnknownRecord): UnknownRecord[] {
  return Array.isArray(body.errors) ? body.errors.filter(isRecord) : [];
}

/**
 * Expired credentials show up either as an `authentication_required` GraphQL
 * error or as a null getPerformanceComponents under a present `insights` node.
 */
export function assertAuthenticated(body: unknown): void {
  if (!isRecord(body)) return;
  const errors = graphqlErrors(body);
  const authError = errors.find(
    (e) => isRecord(e.extensions) && e.extensions.errorType === "authentication_required"
  );

  let nullComponents = false;
  const data = body.data;
  if (isRecord(data) && isRecord(data.insights)) {
    nullComponents = "getPerformanceComponents" in data.insights && data.insights.getPerformanceComponents === null;
  }

  if (authError || nullComponents) {
    const first = errors[0];
    const message =
      first && typeof first.message === "string" ? first.message : "Please login to continue (credentials expired)";
    throw new UpstreamError(`Authentication failed: ${message}`, "auth");
  }
}

/** Body must be a JSON object carrying `data`. */
export function assertEnvelope(body: unknown, context: string): UnknownRecord {
  if (!isRecord(body) || !("data" in body)) {
    throw new UpstreamError(`[${context}] Unexpected response structure`, "response");
  }
  return body;
}

/** Listing rows of a ListingsSectionQuery response; no table rows is an empty account. */
export function parseListings(body: unknown): ListingRef[] {
  const envelope = assertEnvelope(body, "ListingsSectionQuery");
  const data = envelope.data;
  const components =
    isRecord(data) && isRecord(data.insights) && isRecord(data.insights.getPerformanceComponents)
      ? data.insights.getPerformanceComponents.components
      : undefined;
  const first: unknown = Array.isArray(components) ? components[0] : undefined;
  if (!isRecord(first) || !Array.isArray(first.tableRows)) return [];

  const listings: ListingRef[] = [];
  for (const row of first.tableRows) {
    if (!isRecord(row)) continue;
    const id = typeof row.id === "string" || typeof row.id === "number" ? String(row.id) : undefined;
    if (!id) {
      throw new UpstreamError("Listing row without an id", "response");
    }
    listings.push({ listingId: id, listingName: typeof row.internalName === "string" ? row.internalName : id });
  }
  return listings;
}
