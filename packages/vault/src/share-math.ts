/**
 * Share pricing.
 *
 * Pure conversions between assets and shares at the vault's current
 * totals. Rounding always favours the vault: shares minted and
 * assets paid out round down, shares burned for a given asset
 * amount round up.
 *
 * An empty vault (no shares) prices 1:1. So does the degenerate
 * state of outstanding shares against zero custodied assets: the
 * next deposit re-initialises pricing instead of dividing by zero.
 */

import { mulDiv } from "@keel/ledger";

export interface VaultTotals {
  readonly totalAssets: bigint;
  readonly totalShares: bigint;
}

function unpriced(totals: VaultTotals): boolean {
  return totals.totalShares === 0n || totals.totalAssets === 0n;
}

/** Shares worth `assets`, rounded down. */
export function convertToShares(totals: VaultTotals, assets: bigint): bigint {
  if (unpriced(totals)) return assets;
  return mulDiv(assets, totals.totalShares, totals.totalAssets, "down");
}

/** Assets worth `shares`, rounded down. */
export function convertToAssets(totals: VaultTotals, shares: bigint): bigint {
  if (totals.totalShares === 0n) return shares;
  return mulDiv(shares, totals.totalAssets, totals.totalShares, "down");
}

/** Shares minted for a net deposit of `assets`. */
export function previewDeposit(totals: VaultTotals, assets: bigint): bigint {
  return convertToShares(totals, assets);
}

/** Shares burned to take `assets` out, rounded up. */
export function previewWithdraw(totals: VaultTotals, assets: bigint): bigint {
  if (unpriced(totals)) return assets;
  return mulDiv(assets, totals.totalShares, totals.totalAssets, "up");
}

/** Assets released by burning `shares`. */
export function previewRedeem(totals: VaultTotals, shares: bigint): bigint {
  return convertToAssets(totals, shares);
}
