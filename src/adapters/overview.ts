import Decimal from "decimal.js";
import pino from "pino";
import { metricSet, type MetricSet } from "../analytics/reconcile.js";
import { emptySideSummary, summaryOf, type SideSummary, type TradesSummary } from "../analytics/trades.js";
import {
  AssetsOverviewSchema,
  TradesOverviewSchema,
  parsePayload,
  type OverviewSide,
} from "./schemas.js";

const logger = pino({ name: "OverviewAdapter" });

export interface AssetsOverview {
  /** Unit the figures are expressed in, e.g. "USDT". */
  cashAsset: string;
  balance: MetricSet;
  orders: MetricSet;
}

/* ------------------------------------------------------------------ */
/*  /overview/trades                                                   */
/* ------------------------------------------------------------------ */

type PerAsset = OverviewSide["count"];

/** Sum one metric over every base asset, keeping only entries quoted in `quoteAsset`. */
function sumQuoted(perAsset: PerAsset, quoteAsset: string): Decimal {
  let total = new Decimal(0);
  for (const byQuote of Object.values(perAsset)) {
    const v = byQuote[quoteAsset];
    if (v !== undefined) total = total.plus(v);
  }
  return total;
}

/** Value traded amounts at current prices; unpriced bases make the side incomplete. */
function amountValue(
  perAsset: PerAsset,
  prices: ReadonlyMap<string, number>,
  quoteAsset: string
): { value: Decimal; incomplete: boolean; unpriced: string[] } {
  let value = new Decimal(0);
  const unpriced: string[] = [];
  for (const [base, byQuote] of Object.entries(perAsset)) {
    const amount = byQuote[quoteAsset];
    if (amount === undefined) continue;
    const price = base === quoteAsset ? 1 : prices.get(base);
    if (price === undefined) {
      unpriced.push(base);
      continue;
    }
    value = value.plus(new Decimal(amount).times(price));
  }
  return { value, incomplete: unpriced.length > 0, unpriced };
}

function overviewSide(
  block: OverviewSide | undefined,
  prices: ReadonlyMap<string, number>,
  quoteAsset: string,
  side: string
): SideSummary {
  if (!block) return emptySideSummary();

  const amounts = amountValue(block.amount, prices, quoteAsset);
  if (amounts.incomplete) {
    logger.warn({ side, unpriced: amounts.unpriced }, "Traded amounts without a price");
  }

  return {
    count: sumQuoted(block.count, quoteAsset).toNumber(),
    notional: sumQuoted(block.notional, quoteAsset).toNumber(),
    fee: sumQuoted(block.fee, quoteAsset).toNumber(),
    amountValue: amounts.value.toNumber(),
    amountValueIncomplete: amounts.incomplete,
  };
}

/**
 * Turn the back end's per-asset trade overview
 * (`{BUY|SELL: {count|amount|notional|fee: {base: {quote: value}}}}`)
 * into a trades summary valued in `quoteAsset`. A side missing from the
 * payload comes back empty.
 */
export function summarizeTradesOverview(
  raw: unknown,
  prices: ReadonlyMap<string, number>,
  quoteAsset: string
): TradesSummary {
  const overview = parsePayload(TradesOverviewSchema, raw, "trades overview");
  return summaryOf(
    overviewSide(overview.BUY, prices, quoteAsset, "BUY"),
    overviewSide(overview.SELL, prices, quoteAsset, "SELL")
  );
}

/** Base assets that appear in the traded amounts; these need prices. */
export function assetsInTradesOverview(raw: unknown): string[] {
  const overview = parsePayload(TradesOverviewSchema, raw, "trades overview");
  const assets = new Set<string>();
  for (const block of [overview.BUY, overview.SELL]) {
    if (!block) continue;
    for (const base of Object.keys(block.amount)) assets.add(base);
  }
  return [...assets].sort();
}

/* ------------------------------------------------------------------ */
/*  /overview/assets                                                   */
/* ------------------------------------------------------------------ */

export const BALANCE_SOURCE = "balance_source";
export const ORDERS_SOURCE = "orders_source";

/** Split the assets overview into the ledger's and the order book's figures. */
export function parseAssetsOverview(raw: unknown): AssetsOverview {
  const overview = parsePayload(AssetsOverviewSchema, raw, "assets overview");
  return {
    cashAsset: overview.misc.cash_asset,
    balance: metricSet(BALANCE_SOURCE, overview.balance_source),
    orders: metricSet(ORDERS_SOURCE, overview.orders_source),
  };
}
