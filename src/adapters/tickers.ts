import pino from "pino";
import { PayloadShapeError } from "../analytics/errors.js";
import { TickerSchema, isRecord, parsePayload, type Ticker } from "./schemas.js";

const logger = pino({ name: "TickerAdapter" });

/** Price field of a CCXT ticker (`last`) or of the simplified one (`info.price`). */
function priceOf(t: Ticker): number | null {
  if (t.last !== undefined && t.last !== null) return t.last;
  return t.info?.price ?? null;
}

/**
 * Read a `/tickers` payload, keyed by symbol ("BTC/USDT") or given as a list,
 * into symbol → last price. Tickers without a usable price are skipped.
 */
export function extractPrices(raw: unknown): Map<string, number> {
  let items: [string | undefined, unknown][];
  if (Array.isArray(raw)) items = raw.map((t): [undefined, unknown] => [undefined, t]);
  else if (isRecord(raw)) items = Object.entries(raw);
  else throw new PayloadShapeError("tickers", "expected an object keyed by symbol or a list");

  const prices = new Map<string, number>();
  const skipped: string[] = [];

  for (const [key, item] of items) {
    const ticker = parsePayload(TickerSchema, item, `ticker ${key ?? prices.size}`);
    const symbol = ticker.symbol ?? key;
    const price = priceOf(ticker);
    if (symbol === undefined || price === null) {
      skipped.push(symbol ?? "(no symbol)");
      continue;
    }
    prices.set(symbol, price);
  }

  if (skipped.length > 0) logger.warn({ skipped }, "Tickers without a price were skipped");
  return prices;
}

/**
 * Re-key symbol prices by base asset for one quote: "BTC/USDT" → "BTC".
 * The quote asset itself is priced at 1.
 */
export function pricesByAsset(prices: ReadonlyMap<string, number>, quoteAsset: string): Map<string, number> {
  const out = new Map<string, number>();
  for (const [symbol, price] of prices) {
    const [base, quote] = symbol.split("/");
    if (quote === quoteAsset) out.set(base, price);
  }
  if (!out.has(quoteAsset)) out.set(quoteAsset, 1);
  return out;
}

/** Pair symbols to request prices for, leaving out the quote asset. */
export function tickerSymbols(assets: readonly string[], quoteAsset: string): string[] {
  return [...new Set(assets)].filter((a) => a !== quoteAsset).map((a) => `${a}/${quoteAsset}`);
}
