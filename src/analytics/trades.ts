import Decimal from "decimal.js";

export type Side = "BUY" | "SELL";

export const SIDES: readonly Side[] = ["BUY", "SELL"];

/** One executed trade (or fill), as handed over by the data-retrieval layer. */
export interface TradeRecord {
  readonly side: Side;
  readonly notional: number;
  readonly fee: number;
  readonly amount: number;
  /** Mark-to-market value of `amount`; null when no price could be resolved. */
  readonly currentValue: number | null;
}

export interface SideSummary {
  readonly count: number;
  readonly notional: number;
  readonly fee: number;
  readonly amountValue: number;
  readonly amountValueIncomplete: boolean;
}

export interface TradesSummary {
  readonly BUY: SideSummary;
  readonly SELL: SideSummary;
  readonly TOTAL: SideSummary;
}

/* ------------------------------------------------------------------ */
/*  Side summaries                                                     */
/* ------------------------------------------------------------------ */

export function emptySideSummary(): SideSummary {
  return { count: 0, notional: 0, fee: 0, amountValue: 0, amountValueIncomplete: false };
}

/**
 * Sum two side summaries. The incomplete flag is OR-ed: one side with an
 * unpriced amount makes the combined value incomplete.
 */
export function combineSides(a: SideSummary, b: SideSummary): SideSummary {
  return {
    count: a.count + b.count,
    notional: new Decimal(a.notional).plus(b.notional).toNumber(),
    fee: new Decimal(a.fee).plus(b.fee).toNumber(),
    amountValue: new Decimal(a.amountValue).plus(b.amountValue).toNumber(),
    amountValueIncomplete: a.amountValueIncomplete || b.amountValueIncomplete,
  };
}

/** Build the summary triple from both sides; TOTAL is always derived. */
export function summaryOf(buy: SideSummary, sell: SideSummary): TradesSummary {
  return { BUY: buy, SELL: sell, TOTAL: combineSides(buy, sell) };
}

function summarizeSide(trades: readonly TradeRecord[], side: Side): SideSummary {
  let count = 0;
  let notional = new Decimal(0);
  let fee = new Decimal(0);
  let amountValue = new Decimal(0);
  let incomplete = false;

  for (const t of trades) {
    if (t.side !== side) continue;
    count++;
    notional = notional.plus(t.notional);
    fee = fee.plus(t.fee);
    if (t.currentValue === null) {
      incomplete = true;
    } else {
      amountValue = amountValue.plus(t.currentValue);
    }
  }

  return {
    count,
    notional: notional.toNumber(),
    fee: fee.toNumber(),
    amountValue: amountValue.toNumber(),
    amountValueIncomplete: incomplete,
  };
}

/* ------------------------------------------------------------------ */
/*  Aggregation                                                        */
/* ------------------------------------------------------------------ */

/**
 * Reduce trades into BUY / SELL / TOTAL statistics.
 *
 * Both sides are always present: a side without trades is all zeros and
 * complete. The result does not depend on the order of `trades`.
 */
export function aggregateTrades(trades: readonly TradeRecord[]): TradesSummary {
  return summaryOf(summarizeSide(trades, "BUY"), summarizeSide(trades, "SELL"));
}

/** Mean notional per order, 0 for a side that never traded. */
export function averageOrderSize(side: SideSummary): number {
  if (side.count <= 0) return 0;
  return new Decimal(side.notional).div(side.count).toNumber();
}

/** Gross notional that changed hands in either direction. */
export function totalTraded(summary: TradesSummary): number {
  return new Decimal(summary.BUY.notional).plus(summary.SELL.notional).toNumber();
}
