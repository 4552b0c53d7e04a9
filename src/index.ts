export * from "./analytics/errors.js";
export * from "./analytics/format.js";
export * from "./analytics/trades.js";
export * from "./analytics/rates.js";
export * from "./analytics/multiples.js";
export * from "./analytics/reconcile.js";

export * from "./visual/color.js";
export * from "./visual/palette.js";

export * from "./portfolio/types.js";
export * from "./portfolio/allocation.js";

export { detectBalanceShape, normalizeBalance, assetsNeedingPrices, type BalancePayload } from "./adapters/balance.js";
export { extractPrices, pricesByAsset, tickerSymbols } from "./adapters/tickers.js";
export {
  summarizeTradesOverview,
  assetsInTradesOverview,
  parseAssetsOverview,
  type AssetsOverview,
} from "./adapters/overview.js";
export { parseTradeRecords, parseOrders, type OrderRow } from "./adapters/records.js";

export * from "./report.js";

export { loadConfig, loadEnv, applyEnv, loadSettings } from "./config/load.js";
export type { Config, Env } from "./config/schema.js";

export { toEpochMs, ageSeconds, type Timestamp } from "./utils/time.js";
