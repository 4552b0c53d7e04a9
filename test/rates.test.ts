import { describe, it, expect } from "vitest";
import { hourlyRates, normalizeRates, ratePeriodFor, timespanSince } from "../src/analytics/rates.js";
import { emptySideSummary, summaryOf } from "../src/analytics/trades.js";
import { UndefinedRateError } from "../src/analytics/errors.js";

const summary = summaryOf(
  { ...emptySideSummary(), count: 1, notional: 100, fee: 1 },
  { ...emptySideSummary(), count: 1, notional: 60, fee: 0.5 }
);

describe("hourlyRates", () => {
  it("spreads flows over the timespan", () => {
    const r = hourlyRates(summary, 7200);
    expect(r.BUY).toEqual({ notional: 50, orderCount: 0.5, fee: 0.5 });
    expect(r.SELL).toEqual({ notional: 30, orderCount: 0.5, fee: 0.25 });
    expect(r.GLOBAL).toEqual({ notional: 80, orderCount: 1, fee: 0.75 });
  });

  it("throws on a zero, negative or NaN timespan", () => {
    expect(() => hourlyRates(summary, 0)).toThrow(UndefinedRateError);
    expect(() => hourlyRates(summary, -5)).toThrow(UndefinedRateError);
    expect(() => hourlyRates(summary, NaN)).toThrow(UndefinedRateError);
  });
});

describe("normalizeRates", () => {
  const hourly = hourlyRates(summary, 7200);

  it("switches to daily figures when turnover is low", () => {
    const n = normalizeRates(hourly, 1000);
    expect(n.period).toBe("day");
    expect(n.rates.GLOBAL).toEqual({ notional: 1920, orderCount: 24, fee: 18 });
    expect(n.rates.BUY.notional).toBe(1200);
  });

  it("keeps hourly figures otherwise", () => {
    const n = normalizeRates(hourly, 500);
    expect(n.period).toBe("h");
    expect(n.rates).toEqual(hourly);
  });

  it("stays hourly exactly at the threshold", () => {
    expect(ratePeriodFor(80, 800)).toBe("h");
    expect(ratePeriodFor(79.99, 800)).toBe("day");
  });
});

describe("timespanSince", () => {
  it("measures seconds from epoch ms", () => {
    expect(timespanSince(0, 60_000)).toBe(60);
  });

  it("reads ISO strings", () => {
    expect(timespanSince("2026-01-01T00:00:00Z", Date.parse("2026-01-01T01:00:00Z"))).toBe(3600);
  });

  it("is null without a first record", () => {
    expect(timespanSince(null, 60_000)).toBeNull();
    expect(timespanSince("yesterday-ish", 60_000)).toBeNull();
  });
});
