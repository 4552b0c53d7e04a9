import Decimal from "decimal.js";
import { MissingFieldError } from "./errors.js";

/** A JSON number, or a decimal string kept as sent so no digit is lost. */
export type MetricValue = number | string;

/** One source's view of a set of figures, e.g. the balance ledger or the order book. */
export interface MetricSet {
  readonly source: string;
  readonly values: Readonly<Record<string, MetricValue>>;
}

/** field → true when the two sources disagree */
export type MismatchMap = Record<string, boolean>;

/** Frozen amounts are computed independently by the ledger and the order book. */
export const FROZEN_FIELDS = ["total_frozen_value", "cash_frozen_value", "assets_frozen_value"] as const;

export const EQUITY_FIELDS = [
  "total_equity",
  "total_free_value",
  "total_frozen_value",
  "cash_total_value",
  "cash_free_value",
  "cash_frozen_value",
  "assets_total_value",
  "assets_free_value",
  "assets_frozen_value",
] as const;

export function metricSet(source: string, values: Record<string, MetricValue>): MetricSet {
  return { source, values: { ...values } };
}

function valueOf(set: MetricSet, field: string): MetricValue {
  if (!Object.hasOwn(set.values, field)) throw new MissingFieldError(field, set.source);
  return set.values[field];
}

/**
 * Compare two metric sets field by field with exact decimal equality.
 * Both sources derive from the same ledger, so any difference is a real
 * bookkeeping divergence.
 *
 * @throws MissingFieldError if a field is absent from either set.
 */
export function reconcile(a: MetricSet, b: MetricSet, fields: readonly string[]): MismatchMap {
  const out: MismatchMap = {};
  for (const field of fields) {
    out[field] = !new Decimal(valueOf(a, field)).eq(valueOf(b, field));
  }
  return out;
}

export function hasMismatch(map: MismatchMap): boolean {
  return Object.values(map).some(Boolean);
}

export function mismatchedFields(map: MismatchMap): string[] {
  return Object.entries(map)
    .filter(([, differs]) => differs)
    .map(([field]) => field);
}
