import { describe, expect, it } from "vitest";
import { loadConfig } from "../../../src/core/config/configService.js";
import { ValidationError } from "../../../src/core/errors.js";

describe("loadConfig", () => {
  it("fills defaults from an empty environment", () => {
    const config = loadConfig({});
    expect(config.port).toBe(3000);
    expect(config.mode).toBe("hybrid");
    expect(config.dryRun).toBe(false);
    expect(config.window).toEqual({ lookbackWeeks: 25, lookaheadWeeks: 5, maxLookbackDays: 180, weekStartsOn: 0 });
    expect([config.syncHourUtc, config.syncMinuteUtc]).toEqual([5, 0]);
    expect(config.listingConcurrency).toBe(1);
    expect(config.insights).toEqual({
      baseUrl: "https://insights.example.com/api/v3",
      maxRetries: 4,
      requestDelayMs: 0,
      timeoutMs: 10_000,
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      MODE: "worker",
      DRY_RUN: "yes",
      WEEK_STARTS_ON: "1",
      LOOKAHEAD_WEEKS: "25",
      SYNC_CRON_HOUR: "23",
      LISTING_CONCURRENCY: "4",
    });
    expect(config.mode).toBe("worker");
    expect(config.dryRun).toBe(true);
    expect(config.window.weekStartsOn).toBe(1);
    expect(config.window.lookaheadWeeks).toBe(25);
    expect(config.syncHourUtc).toBe(23);
    expect(config.listingConcurrency).toBe(4);
  });

  it("rejects a lookahead past the forward limit", () => {
    expect(() => loadConfig({ LOOKAHEAD_WEEKS: "26" })).toThrow(ValidationError);
  });

  it("lists every invalid variable", () => {
    try {
      loadConfig({ PORT: "0", MODE: "batch", WEEK_STARTS_ON: "7" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      const fields = err instanceof ValidationError ? err.details.map((d) => d.split(":")[0]) : [];
      expect(fields).toEqual(expect.arrayContaining(["PORT", "MODE", "WEEK_STARTS_ON"]));
    }
  });
});
