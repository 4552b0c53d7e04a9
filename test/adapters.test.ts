import { describe, it, expect } from "vitest";
import { assetsNeedingPrices, detectBalanceShape, normalizeBalance } from "../src/adapters/balance.js";
import { extractPrices, pricesByAsset, tickerSymbols } from "../src/adapters/tickers.js";
import {
  assetsInTradesOverview,
  parseAssetsOverview,
  summarizeTradesOverview,
} from "../src/adapters/overview.js";
import { parseOrders, parseTradeRecords } from "../src/adapters/records.js";
import { PayloadShapeError } from "../src/analytics/errors.js";
import { reconcile } from "../src/analytics/reconcile.js";

/* ============================================================
 *  Balance
 * ============================================================ */

describe("detectBalanceShape", () => {
  it("detects empty payloads", () => {
    expect(detectBalanceShape([])).toEqual({ shape: "empty" });
    expect(detectBalanceShape({})).toEqual({ shape: "empty" });
  });

  it("detects a bare list", () => {
    expect(detectBalanceShape([{ asset: "BTC" }])).toEqual({ shape: "list", entries: [{ asset: "BTC" }] });
  });

  it("detects keyed lists", () => {
    for (const key of ["assets", "data", "balances"] as const) {
      expect(detectBalanceShape({ [key]: [{ asset: "BTC" }] })).toEqual({
        shape: "keyed",
        key,
        entries: [{ asset: "BTC" }],
      });
    }
  });

  it("detects an asset mapping", () => {
    expect(detectBalanceShape({ BTC: { free: 1, total: 1 } })).toEqual({
      shape: "mapping",
      entries: [{ asset: "BTC", free: 1, total: 1 }],
    });
  });

  it("rejects anything else", () => {
    expect(() => detectBalanceShape("nope")).toThrow(PayloadShapeError);
    expect(() => detectBalanceShape({ BTC: 5 })).toThrow(PayloadShapeError);
  });
});

describe("normalizeBalance", () => {
  const raw = [
    { asset: "USDT", free: "100", total: "100" },
    { asset: "BTC", free: 0.5, locked: 0.5 },
    { asset: "XYZ", total: 3 },
  ];
  const prices = new Map([["BTC", 20000]]);

  it("values assets in the quote asset", () => {
    const snap = normalizeBalance(raw, prices, "USDT");
    expect(snap.assets).toEqual([
      { asset: "USDT", free: 100, used: 0, total: 100, quotePrice: 1, value: 100 },
      { asset: "BTC", free: 0.5, used: 0.5, total: 1, quotePrice: 20000, value: 20000 },
      { asset: "XYZ", free: 0, used: 0, total: 3, quotePrice: null, value: null },
    ]);
  });

  it("flags equity incomplete when an asset has no price", () => {
    const snap = normalizeBalance(raw, prices, "USDT");
    expect(snap.equity).toBe(20100);
    expect(snap.equityIncomplete).toBe(true);
  });

  it("prefers an explicit quote price", () => {
    const snap = normalizeBalance({ ETH: { total: 2, quote_price: 1500 } }, new Map(), "USDT");
    expect(snap.assets[0].value).toBe(3000);
    expect(snap.equityIncomplete).toBe(false);
  });

  it("gives an empty snapshot for an empty payload", () => {
    expect(normalizeBalance({ balances: [] }, prices, "USDT")).toEqual({
      quoteAsset: "USDT",
      assets: [],
      equity: 0,
      equityIncomplete: false,
    });
  });

  it("throws when an entry has neither total nor free", () => {
    expect(() => normalizeBalance([{ asset: "BTC", used: 1 }], prices, "USDT")).toThrow(PayloadShapeError);
  });

  it("lists assets still needing a ticker price", () => {
    expect(assetsNeedingPrices(raw, "USDT")).toEqual(["BTC", "XYZ"]);
  });
});

/* ============================================================
 *  Tickers
 * ============================================================ */

describe("tickers", () => {
  it("reads last, then info.price, and skips the rest", () => {
    const prices = extractPrices({
      "BTC/USDT": { symbol: "BTC/USDT", last: 20000 },
      "ETH/USDT": { info: { price: "1500" } },
      "BAD/USDT": {},
    });
    expect([...prices]).toEqual([
      ["BTC/USDT", 20000],
      ["ETH/USDT", 1500],
    ]);
  });

  it("reads a list of tickers", () => {
    expect(extractPrices([{ symbol: "SOL/USDT", last: 20 }]).get("SOL/USDT")).toBe(20);
  });

  it("rejects a scalar payload", () => {
    expect(() => extractPrices(42)).toThrow(PayloadShapeError);
  });

  it("keys prices by base asset for one quote", () => {
    const byAsset = pricesByAsset(
      new Map([
        ["BTC/USDT", 20000],
        ["ETH/BTC", 0.05],
      ]),
      "USDT"
    );
    expect([...byAsset]).toEqual([
      ["BTC", 20000],
      ["USDT", 1],
    ]);
  });

  it("builds pair symbols", () => {
    expect(tickerSymbols(["BTC", "USDT", "BTC", "ETH"], "USDT")).toEqual(["BTC/USDT", "ETH/USDT"]);
  });
});

/* ============================================================
 *  Overviews
 * ============================================================ */

describe("summarizeTradesOverview", () => {
  const raw = {
    BUY: {
      count: { BTC: { USDT: 2, EUR: 5 } },
      amount: { BTC: { USDT: 0.5 } },
      notional: { BTC: { USDT: 9000 } },
      fee: { BTC: { USDT: 9 } },
    },
  };

  it("sums the configured quote and values amounts at current prices", () => {
    const s = summarizeTradesOverview(raw, new Map([["BTC", 20000]]), "USDT");
    expect(s.BUY).toEqual({ count: 2, notional: 9000, fee: 9, amountValue: 10000, amountValueIncomplete: false });
  });

  it("materialises a missing side empty", () => {
    const s = summarizeTradesOverview(raw, new Map([["BTC", 20000]]), "USDT");
    expect(s.SELL).toEqual({ count: 0, notional: 0, fee: 0, amountValue: 0, amountValueIncomplete: false });
    expect(s.TOTAL.count).toBe(2);
  });

  it("marks the side incomplete when a price is missing", () => {
    const s = summarizeTradesOverview(raw, new Map(), "USDT");
    expect(s.BUY.amountValue).toBe(0);
    expect(s.BUY.amountValueIncomplete).toBe(true);
    expect(s.TOTAL.amountValueIncomplete).toBe(true);
  });

  it("lists traded base assets", () => {
    const assets = assetsInTradesOverview({
      BUY: { amount: { ETH: { USDT: 1 } } },
      SELL: { amount: { BTC: { USDT: 1 } } },
    });
    expect(assets).toEqual(["BTC", "ETH"]);
  });
});

describe("parseAssetsOverview", () => {
  it("splits the two sources", () => {
    const o = parseAssetsOverview({
      balance_source: { total_frozen_value: 10 },
      orders_source: { total_frozen_value: "10" },
      misc: { cash_asset: "USDT" },
    });
    expect(o.cashAsset).toBe("USDT");
    expect(o.balance).toEqual({ source: "balance_source", values: { total_frozen_value: 10 } });
    expect(o.orders).toEqual({ source: "orders_source", values: { total_frozen_value: "10" } });
  });

  it("keeps every digit of decimal strings", () => {
    const o = parseAssetsOverview({
      balance_source: { total_frozen_value: "100.00000000000000001" },
      orders_source: { total_frozen_value: "100" },
    });
    expect(reconcile(o.balance, o.orders, ["total_frozen_value"])).toEqual({ total_frozen_value: true });
  });

  it("rejects figures that are not decimal numbers", () => {
    expect(() =>
      parseAssetsOverview({ balance_source: { total_frozen_value: "ten" }, orders_source: {} })
    ).toThrow(PayloadShapeError);
  });

  it("defaults the cash asset", () => {
    expect(parseAssetsOverview({ balance_source: {}, orders_source: {} }).cashAsset).toBe("");
  });
});

/* ============================================================
 *  Records
 * ============================================================ */

describe("records", () => {
  it("parses trades with case-insensitive sides", () => {
    expect(parseTradeRecords([{ side: "buy", notional: "100", amount: 1 }])).toEqual([
      { side: "BUY", notional: 100, fee: 0, amount: 1, currentValue: null },
    ]);
  });

  it("rejects unknown sides and non-lists", () => {
    expect(() => parseTradeRecords([{ side: "hold", notional: 1, amount: 1 }])).toThrow(PayloadShapeError);
    expect(() => parseTradeRecords({})).toThrow(PayloadShapeError);
  });

  it("keeps unreadable order timestamps as null", () => {
    expect(
      parseOrders([
        { id: 7, status: "filled", ts_update: 1000 },
        { id: "a", status: "new", ts_update: { at: 1 } },
        { id: "b", status: "new" },
      ])
    ).toEqual([
      { id: "7", status: "filled", updatedAt: 1000 },
      { id: "a", status: "new", updatedAt: null },
      { id: "b", status: "new", updatedAt: null },
    ]);
  });
});
