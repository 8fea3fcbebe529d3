import { describe, expect, it } from "vitest";
import {
  accountToJson,
  createAccountSchema,
  listAccountsQuerySchema,
  updateAccountSchema,
} from "../../../src/admin/routes/accounts.js";
import { metricsQuerySchema, rowToJson, toCsv } from "../../../src/admin/routes/metrics.js";
import { NotFoundError, PreconditionError, UpstreamError, ValidationError, toHttpError } from "../../../src/core/errors.js";
import { parseOrThrow, validateDateRange } from "../../../src/core/validation.js";

describe("toCsv", () => {
  it("writes a snake_case header and quotes cells that need it", () => {
    const csv = toCsv([
      { accountId: "acc-1", listingId: "L1", listingName: 'Loft, "Blue"', conversionRateYour: 0.5, p3ImpressionsYour: null },
      { accountId: "acc-1", listingId: "L2", listingName: "Dune", conversionRateYour: 0.25, p3ImpressionsYour: 12 },
    ]);
    expect(csv).toBe(
      "account_id,listing_id,listing_name,conversion_rate_your,p3_impressions_your\n" +
        'acc-1,L1,"Loft, ""Blue""",0.5,\n' +
        "acc-1,L2,Dune,0.25,12\n"
    );
  });

  it("returns an empty string for no rows", () => {
    expect(toCsv([])).toBe("");
  });
});

describe("rowToJson", () => {
  it("renames keys to snake_case", () => {
    expect(rowToJson({ periodKey: "2025-11-03", p2ImpressionsFirstPageRate: 0.1 })).toEqual({
      period_key: "2025-11-03",
      p2_impressions_first_page_rate: 0.1,
    });
  });
});

describe("metricsQuerySchema", () => {
  it("defaults to json", () => {
    const q = parseOrThrow(metricsQuerySchema, { kind: "daily", start_date: "2025-11-01", end_date: "2025-12-01" });
    expect(q.format).toBe("json");
  });

  it("rejects unknown kinds and malformed dates", () => {
    expect(() =>
      parseOrThrow(metricsQuerySchema, { kind: "monthly", start_date: "2025-11-1", end_date: "2025-12-01" })
    ).toThrow(ValidationError);
  });
});

describe("validateDateRange", () => {
  it("requires the start before the end", () => {
    expect(() => validateDateRange("2025-11-01", "2025-11-01")).toThrow(
      "Start date (2025-11-01) must be before end date (2025-11-01)"
    );
    expect(() => validateDateRange("2025-11-01", "2025-11-02")).not.toThrow();
  });
});

describe("account schemas", () => {
  it("requires non-empty credentials on create", () => {
    expect(() => parseOrThrow(createAccountSchema, { account_id: "acc-1", credentials: {} })).toThrow(ValidationError);
    expect(parseOrThrow(createAccountSchema, { account_id: " acc-1 ", credentials: { cookie: "test-cookie" } })).toEqual({
      account_id: "acc-1",
      credentials: { cookie: "test-cookie" },
    });
  });

  it("requires at least one field on update", () => {
    expect(() => parseOrThrow(updateAccountSchema, {})).toThrow(ValidationError);
    expect(parseOrThrow(updateAccountSchema, { is_active: false })).toEqual({ is_active: false });
  });

  it("parses list query defaults and booleans", () => {
    expect(parseOrThrow(listAccountsQuerySchema, {})).toEqual({
      active_only: false,
      include_deleted: false,
      offset: 0,
      limit: 100,
    });
    expect(parseOrThrow(listAccountsQuerySchema, { active_only: "true", limit: "5" })).toMatchObject({
      active_only: true,
      limit: 5,
    });
  });
});

describe("accountToJson", () => {
  it("exposes credential keys but never values", () => {
    const json = accountToJson({
      accountId: "acc-1",
      customerId: null,
      isActive: true,
      lastSyncAt: new Date("2025-11-10T05:00:00.000Z"),
      credentials: { cookie: "test-cookie", apiKey: "test-secret" },
      deletedAt: null,
      createdAt: new Date("2025-11-01T00:00:00.000Z"),
      updatedAt: new Date("2025-11-10T05:00:00.000Z"),
    });
    expect(json).toEqual({
      account_id: "acc-1",
      customer_id: null,
      is_active: true,
      last_sync_at: "2025-11-10T05:00:00.000Z",
      credential_keys: ["apiKey", "cookie"],
      created_at: "2025-11-01T00:00:00.000Z",
      updated_at: "2025-11-10T05:00:00.000Z",
      deleted_at: null,
    });
  });
});

describe("toHttpError", () => {
  it("maps domain errors to statuses", () => {
    expect(toHttpError(new ValidationError("bad", ["a: b"]))).toEqual({
      status: 422,
      body: { error: "VALIDATION_ERROR", message: "bad", details: ["a: b"] },
    });
    expect(toHttpError(new NotFoundError("Account", "x")).status).toBe(404);
    expect(toHttpError(new PreconditionError("inactive")).status).toBe(409);
    expect(toHttpError(new UpstreamError("down", "transport")).status).toBe(502);
    expect(toHttpError(new Error("boom"))).toEqual({
      status: 500,
      body: { error: "INTERNAL_ERROR", message: "boom" },
    });
  });
});
