import { describe, it, expect } from "vitest";
import {
  aggregateTrades,
  averageOrderSize,
  combineSides,
  emptySideSummary,
  totalTraded,
  type TradeRecord,
} from "../src/analytics/trades.js";

const trades: TradeRecord[] = [
  { side: "BUY", notional: 100, fee: 1, amount: 1, currentValue: 120 },
  { side: "BUY", notional: 50, fee: 0.5, amount: 0.5, currentValue: 55 },
  { side: "SELL", notional: 60, fee: 0.6, amount: 0.5, currentValue: null },
];

describe("aggregateTrades", () => {
  it("sums each side", () => {
    const s = aggregateTrades(trades);
    expect(s.BUY).toEqual({ count: 2, notional: 150, fee: 1.5, amountValue: 175, amountValueIncomplete: false });
    expect(s.SELL).toEqual({ count: 1, notional: 60, fee: 0.6, amountValue: 0, amountValueIncomplete: true });
  });

  it("TOTAL is BUY + SELL with the incomplete flag carried over", () => {
    const s = aggregateTrades(trades);
    expect(s.TOTAL).toEqual({ count: 3, notional: 210, fee: 2.1, amountValue: 175, amountValueIncomplete: true });
  });

  it("does not depend on record order", () => {
    expect(aggregateTrades([...trades].reverse())).toEqual(aggregateTrades(trades));
  });

  it("returns all three keys for an empty input", () => {
    const s = aggregateTrades([]);
    expect(s.BUY).toEqual(emptySideSummary());
    expect(s.SELL).toEqual(emptySideSummary());
    expect(s.TOTAL).toEqual(emptySideSummary());
  });

  it("sums a buy and a sell", () => {
    const s = aggregateTrades([
      { side: "BUY", notional: 100, fee: 1, amount: 1, currentValue: 100 },
      { side: "SELL", notional: 60, fee: 0.5, amount: 0.5, currentValue: 50 },
    ]);
    expect(s.BUY.count).toBe(1);
    expect(s.SELL.count).toBe(1);
    expect(s.TOTAL.notional).toBe(160);
    expect(s.TOTAL.fee).toBe(1.5);
  });

  it("materialises an untraded side as zeros", () => {
    const s = aggregateTrades(trades.filter((t) => t.side === "BUY"));
    expect(s.SELL).toEqual({ count: 0, notional: 0, fee: 0, amountValue: 0, amountValueIncomplete: false });
    expect(s.BUY.count).toBe(2);
  });

  it("does not reuse summaries between calls", () => {
    expect(aggregateTrades([]).BUY).not.toBe(aggregateTrades([]).BUY);
  });
});

describe("helpers", () => {
  it("combineSides ORs the incomplete flag", () => {
    const a = { ...emptySideSummary(), count: 1, amountValueIncomplete: true };
    const b = { ...emptySideSummary(), count: 2 };
    expect(combineSides(a, b)).toMatchObject({ count: 3, amountValueIncomplete: true });
  });

  it("averageOrderSize", () => {
    const s = aggregateTrades(trades);
    expect(averageOrderSize(s.BUY)).toBe(75);
    expect(averageOrderSize(emptySideSummary())).toBe(0);
  });

  it("totalTraded", () => {
    expect(totalTraded(aggregateTrades(trades))).toBe(210);
  });
});
