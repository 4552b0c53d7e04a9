import Decimal from "decimal.js";
import pino from "pino";
import { normalizeBalance } from "./adapters/balance.js";
import { parseAssetsOverview, summarizeTradesOverview } from "./adapters/overview.js";
import { parseOrders, parseTradeRecords, type OrderRow } from "./adapters/records.js";
import { SnapshotSchema, parsePayload } from "./adapters/schemas.js";
import { extractPrices, pricesByAsset } from "./adapters/tickers.js";
import { formatMetric, type MetricKind, type Numeric } from "./analytics/format.js";
import {
  capitalFromTrades,
  computeMultiples,
  selectRoiView,
  type CapitalSnapshot,
  type Multiples,
  type RoiView,
} from "./analytics/multiples.js";
import { hourlyRates, normalizeRates, timespanSince, type NormalizedRates } from "./analytics/rates.js";
import {
  mismatchedFields,
  reconcile,
  type MetricSet,
  type MismatchMap,
} from "./analytics/reconcile.js";
import {
  aggregateTrades,
  averageOrderSize,
  totalTraded,
  type TradesSummary,
} from "./analytics/trades.js";
import type { Config } from "./config/schema.js";
import { allocation, groupSmallSlices } from "./portfolio/allocation.js";
import type { AllocationSlice, BalanceSnapshot } from "./portfolio/types.js";
import { nowMs } from "./utils/time.js";
import { buildPalette, statusLight, styleFor, type RowStyle } from "./visual/palette.js";

const logger = pino({ name: "Report" });

/** A figure next to its display string. */
export interface MetricLine {
  label: string;
  value: number | null;
  text: string;
  warning: boolean;
}

function line(
  label: string,
  value: Numeric | null,
  kind: MetricKind,
  unit?: string,
  warning = false
): MetricLine {
  return {
    label,
    value: value === null ? null : new Decimal(value).toNumber(),
    text: formatMetric(value, { kind, unit, warning }),
    warning,
  };
}

/* ------------------------------------------------------------------ */
/*  Performance                                                        */
/* ------------------------------------------------------------------ */

export interface PerformanceInput {
  summary: TradesSummary;
  /** Ledger figures; the trade history stands in for them when absent. */
  capital?: CapitalSnapshot;
  timespanSeconds?: number | null;
  quoteAsset: string;
}

export interface PerformanceReport {
  summary: TradesSummary;
  capital: CapitalSnapshot;
  multiples: Multiples;
  roi: RoiView;
  /** Null until there is a positive timespan to spread the flows over. */
  rates: NormalizedRates | null;
  averageOrderSize: { BUY: number; SELL: number; GLOBAL: number };
  lines: MetricLine[];
}

/** `incomplete` marks the ratios built on equity that misses unpriced amounts. */
function roiLines(roi: RoiView, unit: string, incomplete: boolean): MetricLine[] {
  switch (roi.basis) {
    case "cost":
      return [
        line("Capital at risk", roi.capitalAtRisk, "normal", unit),
        line("ROI on cost", roi.grossRoi, "percent", undefined, incomplete),
        line("Net ROI on cost", roi.netRoi, "percent", undefined, incomplete),
      ];
    case "value":
      return [
        line("Free carry surplus", roi.freeCarrySurplus, "normal", unit),
        line("ROI on value", roi.grossRoi, "percent", undefined, incomplete),
        line("Net ROI on value", roi.netRoi, "percent", undefined, incomplete),
      ];
    case "none":
      return [];
  }
}

function rateLines(rates: NormalizedRates, unit: string): MetricLine[] {
  const g = rates.rates.GLOBAL;
  const per = ` / ${rates.period}`;
  return [
    line(`Volume${per}`, g.notional, "normal", unit),
    line(`Orders${per}`, g.orderCount, "normal"),
    line(`Fees${per}`, g.fee, "normal", unit),
  ];
}

export function buildPerformanceReport(input: PerformanceInput): PerformanceReport {
  const { summary, quoteAsset: unit } = input;
  const capital = input.capital ?? capitalFromTrades(summary);
  const multiples = computeMultiples(
    capital,
    summary.BUY.amountValue,
    summary.SELL.amountValue,
    summary.TOTAL.fee
  );
  const roi = selectRoiView(multiples);

  const timespan = input.timespanSeconds;
  const rates =
    timespan !== null && timespan !== undefined && timespan > 0
      ? normalizeRates(hourlyRates(summary, timespan), capital.equity)
      : null;

  // With ledger capital only the held value depends on trade prices.
  const heldIncomplete = summary.TOTAL.amountValueIncomplete;
  const incomplete = input.capital === undefined && heldIncomplete;
  const lines = [
    line("Trades", summary.TOTAL.count, "integer"),
    line("Volume", totalTraded(summary), "normal", unit),
    line("Fees", summary.TOTAL.fee, "normal", unit),
    line("Assets current value", multiples.assetsCurrentValue, "normal", unit, heldIncomplete),
    line("Net investment", multiples.netInvestment, "normal", unit),
    line("Gross earnings", multiples.grossEarnings, "normal", unit, incomplete),
    line("Net earnings", multiples.netEarnings, "normal", unit, incomplete),
    ...roiLines(roi, unit, incomplete),
    line("RVPI", multiples.rvpi, "percent", undefined, incomplete),
    line("DPI", multiples.dpi, "percent", undefined, incomplete),
    line("TVPI", multiples.tvpi, "percent", undefined, incomplete),
    ...(rates ? rateLines(rates, unit) : []),
  ];

  return {
    summary,
    capital,
    multiples,
    roi,
    rates,
    averageOrderSize: {
      BUY: averageOrderSize(summary.BUY),
      SELL: averageOrderSize(summary.SELL),
      GLOBAL: averageOrderSize(summary.TOTAL),
    },
    lines,
  };
}

/* ------------------------------------------------------------------ */
/*  Portfolio reconciliation                                           */
/* ------------------------------------------------------------------ */

export interface PortfolioInput {
  balance: MetricSet;
  orders: MetricSet;
  fields: readonly string[];
  unit: string;
}

export interface PortfolioReport {
  mismatches: MismatchMap;
  /** One line per field, valued from the balance ledger. */
  lines: MetricLine[];
}

/** "cash_frozen_value" → "Cash frozen value" */
function fieldLabel(field: string): string {
  const words = field.replace(/_/g, " ");
  return words.charAt(0).toUpperCase() + words.slice(1);
}

export function buildPortfolioReport(input: PortfolioInput): PortfolioReport {
  const mismatches = reconcile(input.balance, input.orders, input.fields);
  const differing = mismatchedFields(mismatches);
  if (differing.length > 0) {
    logger.warn(
      { fields: differing, sources: [input.balance.source, input.orders.source] },
      "Sources disagree"
    );
  }

  const lines = input.fields.map((field) =>
    line(fieldLabel(field), new Decimal(input.balance.values[field]), "normal", input.unit, mismatches[field])
  );
  return { mismatches, lines };
}

/* ------------------------------------------------------------------ */
/*  Holdings                                                           */
/* ------------------------------------------------------------------ */

export interface HoldingsReport {
  equity: MetricLine;
  slices: AllocationSlice[];
}

export function buildHoldingsReport(balance: BalanceSnapshot): HoldingsReport {
  return {
    equity: line("Equity", balance.equity, "normal", balance.quoteAsset, balance.equityIncomplete),
    slices: groupSmallSlices(allocation(balance.assets)),
  };
}

/* ------------------------------------------------------------------ */
/*  Order aging                                                        */
/* ------------------------------------------------------------------ */

export interface StyledOrder extends OrderRow {
  light: string;
  style: RowStyle | null;
}

export interface AgingOptions {
  levels: number;
  freshWindowSeconds: number;
}

export function styleOrders(
  orders: readonly OrderRow[],
  opts: AgingOptions,
  atMs: number = nowMs()
): StyledOrder[] {
  const palette = buildPalette(opts.levels);
  return orders.map((o) => ({
    ...o,
    light: statusLight(o.status),
    style: styleFor(o, palette, opts.freshWindowSeconds, atMs),
  }));
}

/* ------------------------------------------------------------------ */
/*  Snapshot                                                           */
/* ------------------------------------------------------------------ */

export interface DashboardReport {
  quoteAsset: string;
  holdings: HoldingsReport | null;
  performance: PerformanceReport;
  portfolio: PortfolioReport | null;
  orders: StyledOrder[];
}

function summaryFrom(
  snapshot: { tradesOverview?: unknown; trades?: unknown },
  prices: ReadonlyMap<string, number>,
  quoteAsset: string
): TradesSummary {
  if (snapshot.tradesOverview !== undefined) {
    return summarizeTradesOverview(snapshot.tradesOverview, prices, quoteAsset);
  }
  if (snapshot.trades !== undefined) return aggregateTrades(parseTradeRecords(snapshot.trades));
  return aggregateTrades([]);
}

/** Everything the dashboard shows, from one set of raw payloads. */
export function buildDashboard(raw: unknown, cfg: Config, atMs: number = nowMs()): DashboardReport {
  const snapshot = parsePayload(SnapshotSchema, raw, "snapshot");
  const quoteAsset = cfg.quoteAsset;

  const prices =
    snapshot.tickers !== undefined
      ? pricesByAsset(extractPrices(snapshot.tickers), quoteAsset)
      : new Map([[quoteAsset, 1]]);

  const holdings =
    snapshot.balance !== undefined
      ? buildHoldingsReport(normalizeBalance(snapshot.balance, prices, quoteAsset))
      : null;

  const performance = buildPerformanceReport({
    summary: summaryFrom(snapshot, prices, quoteAsset),
    capital: snapshot.capital,
    timespanSeconds: timespanSince(snapshot.firstTradeAt, atMs),
    quoteAsset,
  });

  let portfolio: PortfolioReport | null = null;
  if (snapshot.assetsOverview !== undefined) {
    const overview = parseAssetsOverview(snapshot.assetsOverview);
    portfolio = buildPortfolioReport({
      balance: overview.balance,
      orders: overview.orders,
      fields: cfg.reconcileFields,
      unit: overview.cashAsset || quoteAsset,
    });
  }

  const orders =
    snapshot.orders !== undefined
      ? styleOrders(
          parseOrders(snapshot.orders),
          { levels: cfg.visualDegradations, freshWindowSeconds: cfg.freshWindowSeconds },
          atMs
        )
      : [];

  return { quoteAsset, holdings, performance, portfolio, orders };
}
