import { z } from "zod";
import { PayloadShapeError } from "../analytics/errors.js";

/** The back end sends figures as JSON numbers or as decimal strings. */
export const NumericSchema = z
  .union([z.number(), z.string().trim().min(1)])
  .transform((v) => Number(v))
  .pipe(z.number().finite());

/* ---------- /balance ---------- */

export const BalanceEntrySchema = z.object({
  asset: z.string().min(1),
  free: NumericSchema.optional(),
  used: NumericSchema.optional(),
  locked: NumericSchema.optional(),
  total: NumericSchema.optional(),
  quote_price: NumericSchema.nullable().optional(),
});

export type BalanceEntry = z.infer<typeof BalanceEntrySchema>;

/* ---------- /tickers ---------- */

export const TickerSchema = z
  .object({
    symbol: z.string().min(1).optional(),
    last: NumericSchema.nullable().optional(),
    info: z
      .object({ price: NumericSchema.nullable().optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type Ticker = z.infer<typeof TickerSchema>;

/* ---------- /overview/trades ---------- */

/** base asset → quote asset → value */
export const PerAssetSchema = z.record(z.string(), z.record(z.string(), NumericSchema));

export const OverviewSideSchema = z.object({
  count: PerAssetSchema.default({}),
  amount: PerAssetSchema.default({}),
  notional: PerAssetSchema.default({}),
  fee: PerAssetSchema.default({}),
});

export const TradesOverviewSchema = z
  .object({
    BUY: OverviewSideSchema.optional(),
    SELL: OverviewSideSchema.optional(),
  })
  .passthrough();

export type OverviewSide = z.infer<typeof OverviewSideSchema>;
export type TradesOverview = z.infer<typeof TradesOverviewSchema>;

/* ---------- /overview/assets ---------- */

const DECIMAL_STRING = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/** Decimal strings are kept as sent; reconciliation compares every digit. */
export const MetricValueSchema = z.union([
  z.number().finite(),
  z.string().trim().regex(DECIMAL_STRING, "not a decimal number"),
]);

export const MetricValuesSchema = z.record(z.string(), MetricValueSchema);

export const AssetsOverviewSchema = z.object({
  balance_source: MetricValuesSchema,
  orders_source: MetricValuesSchema,
  misc: z
    .object({ cash_asset: z.string().default("") })
    .passthrough()
    .default({}),
});

/* ---------- trades & orders ---------- */

export const TradeRecordSchema = z.object({
  side: z
    .string()
    .transform((s) => s.toUpperCase())
    .pipe(z.enum(["BUY", "SELL"])),
  notional: NumericSchema,
  fee: NumericSchema.default(0),
  amount: NumericSchema,
  current_value: NumericSchema.nullable().optional(),
});

export const OrderRowSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String),
    status: z.string(),
    ts_update: z.unknown().optional(),
  })
  .passthrough();

/* ---------- dashboard snapshot ---------- */

export const CapitalSchema = z.object({
  equity: NumericSchema,
  paidInCapital: NumericSchema,
  distributions: NumericSchema.default(0),
});

/** Raw payloads captured from the back end, as the CLI reads them from disk. */
export const SnapshotSchema = z.object({
  balance: z.unknown().optional(),
  tickers: z.unknown().optional(),
  tradesOverview: z.unknown().optional(),
  trades: z.unknown().optional(),
  assetsOverview: z.unknown().optional(),
  orders: z.unknown().optional(),
  capital: CapitalSchema.optional(),
  firstTradeAt: z.union([z.number(), z.string()]).optional(),
});

export type Snapshot = z.infer<typeof SnapshotSchema>;

/* ---------- helpers ---------- */

export function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

/** Parse `raw` or throw a PayloadShapeError naming the payload and the failing paths. */
export function parsePayload<S extends z.ZodTypeAny>(schema: S, raw: unknown, payload: string): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) throw new PayloadShapeError(payload, describeIssues(result.error));
  return result.data;
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
