import Decimal from "decimal.js";
import { UndefinedRateError } from "./errors.js";
import type { SideSummary, TradesSummary } from "./trades.js";
import { ageSeconds, nowMs, type Timestamp } from "../utils/time.js";

export type RatePeriod = "h" | "day";

export type RateScope = "BUY" | "SELL" | "GLOBAL";

export interface ActivityRates {
  notional: number;
  orderCount: number;
  fee: number;
}

export type RateTable = Record<RateScope, ActivityRates>;

export interface NormalizedRates {
  rates: RateTable;
  period: RatePeriod;
}

const SECONDS_PER_HOUR = 3600;
const HOURS_PER_DAY = 24;

/** Hourly notional below equity / EQUITY_TURNOVER_DIVISOR reads better per day. */
const EQUITY_TURNOVER_DIVISOR = 10;

/* ------------------------------------------------------------------ */
/*  Hourly rates                                                       */
/* ------------------------------------------------------------------ */

function perHour(value: number, timespanSeconds: number): number {
  return new Decimal(value).times(SECONDS_PER_HOUR).div(timespanSeconds).toNumber();
}

function sideRates(side: SideSummary, timespanSeconds: number): ActivityRates {
  return {
    notional: perHour(side.notional, timespanSeconds),
    orderCount: perHour(side.count, timespanSeconds),
    fee: perHour(side.fee, timespanSeconds),
  };
}

/**
 * Express the summary's flows per hour over `timespanSeconds`.
 * GLOBAL is the sum of BUY and SELL.
 *
 * @throws UndefinedRateError when the timespan is not strictly positive.
 */
export function hourlyRates(summary: TradesSummary, timespanSeconds: number): RateTable {
  if (!(timespanSeconds > 0)) throw new UndefinedRateError(timespanSeconds);

  const buy = sideRates(summary.BUY, timespanSeconds);
  const sell = sideRates(summary.SELL, timespanSeconds);
  return {
    BUY: buy,
    SELL: sell,
    GLOBAL: {
      notional: new Decimal(buy.notional).plus(sell.notional).toNumber(),
      orderCount: new Decimal(buy.orderCount).plus(sell.orderCount).toNumber(),
      fee: new Decimal(buy.fee).plus(sell.fee).toNumber(),
    },
  };
}

/* ------------------------------------------------------------------ */
/*  Period selection                                                   */
/* ------------------------------------------------------------------ */

/** Low-turnover portfolios are reported per day, the rest per hour. */
export function ratePeriodFor(hourlyNotional: number, equity: number): RatePeriod {
  const threshold = new Decimal(equity).div(EQUITY_TURNOVER_DIVISOR);
  return new Decimal(hourlyNotional).lt(threshold) ? "day" : "h";
}

function scaleRates(rates: ActivityRates, factor: number): ActivityRates {
  return {
    notional: new Decimal(rates.notional).times(factor).toNumber(),
    orderCount: new Decimal(rates.orderCount).times(factor).toNumber(),
    fee: new Decimal(rates.fee).times(factor).toNumber(),
  };
}

export function normalizeRates(hourly: RateTable, equity: number): NormalizedRates {
  const period = ratePeriodFor(hourly.GLOBAL.notional, equity);
  if (period === "h") return { rates: hourly, period };

  return {
    rates: {
      BUY: scaleRates(hourly.BUY, HOURS_PER_DAY),
      SELL: scaleRates(hourly.SELL, HOURS_PER_DAY),
      GLOBAL: scaleRates(hourly.GLOBAL, HOURS_PER_DAY),
    },
    period,
  };
}

/* ------------------------------------------------------------------ */
/*  Timespan                                                           */
/* ------------------------------------------------------------------ */

/**
 * Seconds elapsed since the first record. Callers check the result is
 * positive before asking for rates.
 */
export function timespanSince(
  firstRecordAt: Timestamp | null | undefined,
  atMs: number = nowMs()
): number | null {
  return ageSeconds(firstRecordAt, atMs);
}
