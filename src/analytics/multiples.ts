import Decimal from "decimal.js";
import type { TradesSummary } from "./trades.js";

/** Capital figures from the ledger, taken as ground truth. */
export interface CapitalSnapshot {
  readonly equity: number;
  readonly paidInCapital: number;
  readonly distributions: number;
}

export interface Multiples {
  /** Value of the positions still held (bought minus sold, at current prices). */
  assetsCurrentValue: number;
  netInvestment: number;
  grossEarnings: number;
  netEarnings: number;
  grossRoiOnCost: number | null;
  netRoiOnCost: number | null;
  grossRoiOnValue: number | null;
  netRoiOnValue: number | null;
  /** Residual Value to Paid-In */
  rvpi: number | null;
  /** Distributions to Paid-In */
  dpi: number | null;
  /** Total Value to Paid-In = DPI + RVPI */
  tvpi: number | null;
  /** Multiple on Invested Capital; same figure as TVPI here. */
  moic: number | null;
}

export type RoiView =
  | { basis: "cost"; capitalAtRisk: number; grossRoi: number | null; netRoi: number | null }
  | { basis: "value"; freeCarrySurplus: number; grossRoi: number | null; netRoi: number | null }
  | { basis: "none" };

/* ------------------------------------------------------------------ */
/*  Guarded arithmetic                                                 */
/* ------------------------------------------------------------------ */

/**
 * numerator / denominator, or null unless the denominator is strictly
 * positive. A multiple over zero or negative invested capital means nothing.
 */
function ratio(numerator: Decimal, denominator: Decimal): number | null {
  if (!denominator.gt(0)) return null;
  return numerator.div(denominator).toNumber();
}

export function netInvestment(capital: CapitalSnapshot): number {
  return new Decimal(capital.paidInCapital).minus(capital.distributions).toNumber();
}

/* ------------------------------------------------------------------ */
/*  Multiples                                                          */
/* ------------------------------------------------------------------ */

/**
 * Derive earnings, ROI and the private-equity style multiples.
 *
 * assetsCurrentValue = buyCurrentValue − sellCurrentValue
 * netInvestment      = paidInCapital − distributions
 * grossEarnings      = equity − netInvestment
 * netEarnings        = grossEarnings − fees
 * ROI on cost        = earnings / netInvestment   (netInvestment > 0)
 * ROI on value       = earnings / equity          (equity > 0)
 * RVPI               = equity / paidInCapital     (paidInCapital > 0)
 * DPI                = distributions / paidInCapital
 * TVPI = MOIC        = DPI + RVPI                 (both defined)
 *
 * Never throws: every undefined ratio is null.
 */
export function computeMultiples(
  capital: CapitalSnapshot,
  buyCurrentValue: number,
  sellCurrentValue: number,
  fees: number
): Multiples {
  const equity = new Decimal(capital.equity);
  const paidIn = new Decimal(capital.paidInCapital);
  const distributions = new Decimal(capital.distributions);

  const assetsCurrentValue = new Decimal(buyCurrentValue).minus(sellCurrentValue);
  const netInv = paidIn.minus(distributions);
  const gross = equity.minus(netInv);
  const net = gross.minus(fees);

  const rvpi = ratio(equity, paidIn);
  const dpi = ratio(distributions, paidIn);
  const tvpi = rvpi !== null && dpi !== null ? new Decimal(dpi).plus(rvpi).toNumber() : null;

  return {
    assetsCurrentValue: assetsCurrentValue.toNumber(),
    netInvestment: netInv.toNumber(),
    grossEarnings: gross.toNumber(),
    netEarnings: net.toNumber(),
    grossRoiOnCost: ratio(gross, netInv),
    netRoiOnCost: ratio(net, netInv),
    grossRoiOnValue: ratio(gross, equity),
    netRoiOnValue: ratio(net, equity),
    rvpi,
    dpi,
    tvpi,
    moic: tvpi,
  };
}

/* ------------------------------------------------------------------ */
/*  Trades-only view                                                   */
/* ------------------------------------------------------------------ */

/**
 * Capital implied by the trade history alone: what was bought is paid in,
 * what was sold is distributed, and equity is what is still held.
 */
export function capitalFromTrades(summary: TradesSummary): CapitalSnapshot {
  return {
    equity: new Decimal(summary.BUY.amountValue).minus(summary.SELL.amountValue).toNumber(),
    paidInCapital: summary.BUY.notional,
    distributions: summary.SELL.notional,
  };
}

export function multiplesFromTrades(summary: TradesSummary): Multiples {
  return computeMultiples(
    capitalFromTrades(summary),
    summary.BUY.amountValue,
    summary.SELL.amountValue,
    summary.TOTAL.fee
  );
}

/**
 * Pick the ROI that means something for the current position: on cost while
 * capital is still at risk, on value once sales have returned more than was
 * put in but positions remain.
 */
export function selectRoiView(m: Multiples): RoiView {
  if (m.netInvestment > 0) {
    return {
      basis: "cost",
      capitalAtRisk: m.netInvestment,
      grossRoi: m.grossRoiOnCost,
      netRoi: m.netRoiOnCost,
    };
  }
  if (m.assetsCurrentValue > 0) {
    return {
      basis: "value",
      freeCarrySurplus: Math.abs(m.netInvestment),
      grossRoi: m.grossRoiOnValue,
      netRoi: m.netRoiOnValue,
    };
  }
  return { basis: "none" };
}
