import Decimal from "decimal.js";
import type { AllocationSlice, BalanceAsset } from "./types.js";

/** Slices under this share are folded into OTHER_LABEL. */
export const MIN_SLICE_SHARE = 0.01;
export const OTHER_LABEL = "Other";

/**
 * Each priced asset's value and share of the total, largest first.
 * Unpriced assets are left out rather than counted as zero.
 */
export function allocation(assets: readonly BalanceAsset[]): AllocationSlice[] {
  const priced = assets.filter(
    (a): a is BalanceAsset & { value: number } => a.value !== null
  );
  const total = priced.reduce((sum, a) => sum.plus(a.value), new Decimal(0));

  return priced
    .map((a) => ({
      asset: a.asset,
      value: a.value,
      share: total.gt(0) ? new Decimal(a.value).div(total).toNumber() : 0,
    }))
    .sort((x, y) => y.value - x.value);
}

/** Fold slices below `minShare` into a single trailing "Other" slice. */
export function groupSmallSlices(
  slices: readonly AllocationSlice[],
  minShare: number = MIN_SLICE_SHARE
): AllocationSlice[] {
  const major = slices.filter((s) => s.share >= minShare);
  const minor = slices.filter((s) => s.share < minShare);

  const otherValue = minor.reduce((sum, s) => sum.plus(s.value), new Decimal(0));
  if (!otherValue.gt(0)) return major;

  const otherShare = minor.reduce((sum, s) => sum.plus(s.share), new Decimal(0));
  return [...major, { asset: OTHER_LABEL, value: otherValue.toNumber(), share: otherShare.toNumber() }];
}
