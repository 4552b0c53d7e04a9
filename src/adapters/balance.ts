import Decimal from "decimal.js";
import pino from "pino";
import { PayloadShapeError } from "../analytics/errors.js";
import type { BalanceAsset, BalanceSnapshot } from "../portfolio/types.js";
import { BalanceEntrySchema, isRecord, parsePayload, type BalanceEntry } from "./schemas.js";

const logger = pino({ name: "BalanceAdapter" });

const LIST_KEYS = ["assets", "data", "balances"] as const;

/**
 * The shapes `/balance` has been seen to answer with:
 *
 *   [ {asset, ...}, ... ]                    → list
 *   { assets | data | balances: [ ... ] }    → keyed
 *   { BTC: {free, total, ...}, ... }         → mapping
 *   [] or {}                                 → empty
 */
export type BalancePayload =
  | { shape: "list"; entries: unknown[] }
  | { shape: "keyed"; key: (typeof LIST_KEYS)[number]; entries: unknown[] }
  | { shape: "mapping"; entries: unknown[] }
  | { shape: "empty" };

export function detectBalanceShape(raw: unknown): BalancePayload {
  if (Array.isArray(raw)) {
    return raw.length === 0 ? { shape: "empty" } : { shape: "list", entries: raw };
  }

  if (isRecord(raw)) {
    const values = Object.values(raw);
    if (values.length === 0) return { shape: "empty" };

    for (const key of LIST_KEYS) {
      const list = raw[key];
      if (Array.isArray(list)) return { shape: "keyed", key, entries: list };
    }

    if (values.every(isRecord)) {
      const entries = Object.entries(raw).map(([asset, v]) => ({ asset, ...(isRecord(v) ? v : {}) }));
      return { shape: "mapping", entries };
    }
  }

  throw new PayloadShapeError("balance", "expected a list of assets, a keyed list or an asset mapping");
}

function entriesOf(payload: BalancePayload): unknown[] {
  return payload.shape === "empty" ? [] : payload.entries;
}

function toAsset(entry: BalanceEntry, prices: ReadonlyMap<string, number>, quoteAsset: string): BalanceAsset {
  let total: number;
  if (entry.total !== undefined) {
    total = entry.total;
  } else if (entry.free !== undefined) {
    total = new Decimal(entry.free).plus(entry.locked ?? 0).toNumber();
  } else {
    throw new PayloadShapeError("balance", `asset ${entry.asset} has neither total nor free`);
  }

  const quotePrice =
    entry.quote_price ?? (entry.asset === quoteAsset ? 1 : prices.get(entry.asset) ?? null);

  return {
    asset: entry.asset,
    free: entry.free ?? 0,
    used: entry.used ?? entry.locked ?? 0,
    total,
    quotePrice,
    value: quotePrice === null ? null : new Decimal(total).times(quotePrice).toNumber(),
  };
}

/**
 * Resolve a raw `/balance` payload into a snapshot valued in `quoteAsset`.
 * Assets without a price keep a null value and flag the equity incomplete.
 */
export function normalizeBalance(
  raw: unknown,
  prices: ReadonlyMap<string, number>,
  quoteAsset: string
): BalanceSnapshot {
  const payload = detectBalanceShape(raw);
  logger.debug({ shape: payload.shape }, "Balance payload detected");

  const assets = entriesOf(payload).map((e, i) =>
    toAsset(parsePayload(BalanceEntrySchema, e, `balance entry ${i}`), prices, quoteAsset)
  );

  let equity = new Decimal(0);
  let equityIncomplete = false;
  for (const a of assets) {
    if (a.value === null) equityIncomplete = true;
    else equity = equity.plus(a.value);
  }

  if (equityIncomplete) {
    const unpriced = assets.filter((a) => a.value === null).map((a) => a.asset);
    logger.warn({ unpriced }, "Equity excludes assets without a price");
  }

  return { quoteAsset, assets, equity: equity.toNumber(), equityIncomplete };
}

/** Assets in the payload that still need a ticker price. */
export function assetsNeedingPrices(raw: unknown, quoteAsset: string): string[] {
  return entriesOf(detectBalanceShape(raw))
    .map((e) => parsePayload(BalanceEntrySchema, e, "balance entry"))
    .filter((e) => e.asset !== quoteAsset && (e.quote_price === undefined || e.quote_price === null))
    .map((e) => e.asset);
}
