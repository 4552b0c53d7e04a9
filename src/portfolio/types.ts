export interface BalanceAsset {
  asset: string;
  free: number;
  used: number;
  total: number;
  /** Last price in the quote asset; null when no ticker priced it. */
  quotePrice: number | null;
  /** total × quotePrice, null when the price is unknown */
  value: number | null;
}

export interface BalanceSnapshot {
  quoteAsset: string;
  assets: BalanceAsset[];
  /** Sum of the priced asset values. */
  equity: number;
  /** True when at least one asset could not be priced. */
  equityIncomplete: boolean;
}

export interface AllocationSlice {
  asset: string;
  value: number;
  /** Fraction of the priced portfolio, 0 – 1. */
  share: number;
}
