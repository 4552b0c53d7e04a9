import Decimal from "decimal.js";

/** Shown in place of a null, non-finite or exactly-zero figure. */
export const ZERO_DISPLAY = "--";

/** Prefix for figures that are incomplete or disagree with another source. */
export const WARNING_ICON = "⚠️";

const SIGNIFICANT_DIGITS = 2;

/** Below this magnitude a ratio reads as a percentage, above it as a multiple. */
const PERCENT_LIMIT = 2;

export type Numeric = number | Decimal;

export type MetricKind = "integer" | "percent" | "normal";

export interface MetricFormat {
  kind?: MetricKind;
  unit?: string;
  warning?: boolean;
}

/* ------------------------------------------------------------------ */
/*  Internals                                                          */
/* ------------------------------------------------------------------ */

function toDecimal(value: Numeric | null | undefined): Decimal | null {
  if (value === null || value === undefined) return null;
  const d = new Decimal(value);
  return d.isFinite() ? d : null;
}

function groupThousands(fixed: string): string {
  const negative = fixed.startsWith("-");
  const body = negative ? fixed.slice(1) : fixed;
  const [whole, frac] = body.split(".");
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  return (negative ? "-" : "") + (frac === undefined ? grouped : `${grouped}.${frac}`);
}

function fixed(d: Decimal, decimals: number): string {
  return groupThousands(d.toFixed(decimals, Decimal.ROUND_HALF_UP));
}

function withUnit(text: string, unit: string | null | undefined): string {
  return unit ? `${text} ${unit}` : text;
}

/* ------------------------------------------------------------------ */
/*  Adaptive precision                                                 */
/* ------------------------------------------------------------------ */

/**
 * Render a figure with precision adapted to its magnitude.
 *
 *   |v| ≥ 1      → thousands separators, 2 decimals     1234.6565 → "1,234.66"
 *   0 < |v| < 1  → first 2 significant digits           0.06565   → "0.066"
 *   0, null, NaN → ZERO_DISPLAY
 *
 * The sign is applied after the magnitude is formatted; a non-empty unit
 * is appended after a space.
 */
export function formatValue(value: Numeric | null | undefined, unit?: string | null): string {
  const d = toDecimal(value);
  if (d === null || d.isZero()) return ZERO_DISPLAY;

  const abs = d.abs();
  let formatted: string;
  if (abs.gte(1)) {
    formatted = fixed(abs, 2);
  } else {
    // `e` is the base-10 exponent of the leading digit, i.e. floor(log10(abs))
    const decimals = SIGNIFICANT_DIGITS - abs.e - 1;
    formatted = abs.toFixed(decimals, Decimal.ROUND_HALF_UP);
  }

  if (d.isNegative()) formatted = "-" + formatted;
  return withUnit(formatted, unit);
}

/* ------------------------------------------------------------------ */
/*  Metric tiles                                                       */
/* ------------------------------------------------------------------ */

function magnitude(d: Decimal, kind: MetricKind, unit: string | undefined): string {
  switch (kind) {
    case "integer":
      return withUnit(fixed(d, 0), unit);
    case "percent":
      return d.abs().lt(PERCENT_LIMIT) ? `${fixed(d.times(100), 2)}%` : `${fixed(d, 2)}×`;
    case "normal":
      return withUnit(fixed(d, 2), unit);
  }
}

/**
 * Format a dashboard metric. Unlike `formatValue`, zero renders as a number
 * here; only a missing value falls back to the sentinel.
 */
export function formatMetric(value: Numeric | null | undefined, opts: MetricFormat = {}): string {
  const d = toDecimal(value);
  if (d === null) return ZERO_DISPLAY;
  const text = magnitude(d, opts.kind ?? "normal", opts.unit);
  return opts.warning ? `${WARNING_ICON} ${text}` : text;
}

/** Signed change between two readings, or null when either is missing. */
export function formatDelta(
  value: Numeric | null | undefined,
  reference: Numeric | null | undefined,
  kind: MetricKind = "normal",
  unit?: string
): string | null {
  const v = toDecimal(value);
  const r = toDecimal(reference);
  if (v === null || r === null) return null;

  const delta = v.minus(r);
  const sign = delta.isNegative() ? "" : "+";
  const body = kind === "percent" ? `${fixed(delta.times(100), 2)}%` : magnitude(delta, kind, unit);
  return sign + body;
}

/* ------------------------------------------------------------------ */
/*  Labels                                                             */
/* ------------------------------------------------------------------ */

/** "1.230000" → "1.23", "42.000" → "42". Integers pass through untouched. */
export function trimZeros(numStr: string): string {
  if (!numStr.includes(".")) return numStr;
  return numStr.replace(/0+$/, "").replace(/\.$/, "");
}

export function formatSideMarker(side: string): string {
  const upper = side.toUpperCase();
  if (upper === "BUY") return "↗ BUY";
  if (upper === "SELL") return "↘ SELL";
  return upper;
}

/** "partially_filled" → "Partially filled" */
export function formatStatusLabel(status: string): string {
  const words = status.replace(/_/g, " ").toLowerCase();
  return words.charAt(0).toUpperCase() + words.slice(1);
}

/** Time from creation to completion, "" while the order is still open. */
export function formatLatency(
  createdMs: number | null | undefined,
  finishedMs: number | null | undefined
): string {
  if (createdMs === null || createdMs === undefined) return "";
  if (finishedMs === null || finishedMs === undefined) return "";
  return `${fixed(new Decimal(finishedMs).minus(createdMs).div(1000), 2)} s`;
}
