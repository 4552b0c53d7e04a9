import { PayloadShapeError } from "../analytics/errors.js";
import type { TradeRecord } from "../analytics/trades.js";
import type { AgingRecord } from "../visual/palette.js";
import type { Timestamp } from "../utils/time.js";
import { OrderRowSchema, TradeRecordSchema, parsePayload } from "./schemas.js";

export interface OrderRow extends AgingRecord {
  id: string;
  status: string;
}

function listOf(raw: unknown, payload: string): unknown[] {
  if (!Array.isArray(raw)) throw new PayloadShapeError(payload, "expected a list");
  return raw;
}

/** Executed trades with case-insensitive sides; a missing `current_value` means unpriced. */
export function parseTradeRecords(raw: unknown): TradeRecord[] {
  return listOf(raw, "trades").map((item, i) => {
    const t = parsePayload(TradeRecordSchema, item, `trade ${i}`);
    return {
      side: t.side,
      notional: t.notional,
      fee: t.fee,
      amount: t.amount,
      currentValue: t.current_value ?? null,
    };
  });
}

function timestampOf(v: unknown): Timestamp | null {
  return typeof v === "number" || typeof v === "string" ? v : null;
}

/**
 * Orders for row styling. A bad `ts_update` is kept as null rather than
 * rejected: the row is then left unstyled.
 */
export function parseOrders(raw: unknown): OrderRow[] {
  return listOf(raw, "orders").map((item, i) => {
    const o = parsePayload(OrderRowSchema, item, `order ${i}`);
    return { id: o.id, status: o.status, updatedAt: timestampOf(o.ts_update) };
  });
}
