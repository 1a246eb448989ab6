/**
 * @wtoken/ledger — Share/asset conversion.
 *
 * Pure functions converting between shares (wrapper balance units) and
 * assets (wrapped-token units) against live vault totals.
 *
 * Conversions carry a virtual offset of one share and one asset:
 *
 *   shares = assets * (totalSupply + 1) / (totalAssets + 1)
 *   assets = shares * (totalAssets + 1) / (totalSupply + 1)
 *
 * An empty vault therefore converts 1:1, and a vault whose assets were
 * drained while shares remain still has a defined rate.
 *
 * Rounding always favors the vault:
 * - previewDeposit / previewRedeem round down (caller receives less)
 * - previewMint / previewWithdraw round up (caller pays more)
 */

import { MAX_UINT256 } from "@wtoken/types";
import type { Rounding, VaultTotals } from "./types.js";
import { LedgerError } from "./types.js";

// ─── uint256 Arithmetic ──────────────────────────────────────────────────

/**
 * Assert a value is a valid uint256 amount.
 * Negative values are invalid input; values above the range are overflow.
 */
export function assertUint256(value: bigint, label = "amount"): bigint {
  if (value < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `${label} must be non-negative, got ${value.toString()}`);
  }
  if (value > MAX_UINT256) {
    throw new LedgerError("ARITHMETIC_OVERFLOW", `${label} exceeds uint256`);
  }
  return value;
}

/** a + b, failing on uint256 overflow. */
export function checkedAdd(a: bigint, b: bigint): bigint {
  return assertUint256(a + b, "sum");
}

/**
 * floor or ceil of (x * y) / denominator, failing if the result does not
 * fit in uint256. Intermediate products are exact.
 */
export function mulDiv(
  x: bigint,
  y: bigint,
  denominator: bigint,
  rounding: Rounding = "floor",
): bigint {
  if (denominator === 0n) {
    throw new LedgerError("DIVISION_BY_ZERO", "mulDiv denominator is zero");
  }
  const product = x * y;
  const quotient = product / denominator;
  const result =
    rounding === "ceil" && product % denominator !== 0n ? quotient + 1n : quotient;
  return assertUint256(result, "mulDiv result");
}

// ─── Conversions ─────────────────────────────────────────────────────────

/**
 * Shares equivalent to `assets` at the current rate.
 */
export function convertToShares(
  assets: bigint,
  totals: VaultTotals,
  rounding: Rounding = "floor",
): bigint {
  assertUint256(assets, "assets");
  return mulDiv(assets, totals.totalSupply + 1n, totals.totalAssets + 1n, rounding);
}

/**
 * Assets equivalent to `shares` at the current rate.
 */
export function convertToAssets(
  shares: bigint,
  totals: VaultTotals,
  rounding: Rounding = "floor",
): bigint {
  assertUint256(shares, "shares");
  return mulDiv(shares, totals.totalAssets + 1n, totals.totalSupply + 1n, rounding);
}

/** Shares minted for depositing `assets`. Rounds down. */
export function previewDeposit(totals: VaultTotals, assets: bigint): bigint {
  return convertToShares(assets, totals, "floor");
}

/** Assets required to mint exactly `shares`. Rounds up. */
export function previewMint(totals: VaultTotals, shares: bigint): bigint {
  return convertToAssets(shares, totals, "ceil");
}

/** Shares burned to withdraw exactly `assets`. Rounds up. */
export function previewWithdraw(totals: VaultTotals, assets: bigint): bigint {
  return convertToShares(assets, totals, "ceil");
}

/** Assets paid out for redeeming `shares`. Rounds down. */
export function previewRedeem(totals: VaultTotals, shares: bigint): bigint {
  return convertToAssets(shares, totals, "floor");
}

// ─── Engine ──────────────────────────────────────────────────────────────

/**
 * Conversion engine bound to a live totals source.
 *
 * The source is read on every call; quotes are never cached, so two
 * consecutive quotes may differ if the wrapped asset rebased in between.
 */
export class ConversionEngine {
  constructor(private readonly totals: () => VaultTotals) {}

  convertToShares(assets: bigint): bigint {
    return convertToShares(assets, this.totals(), "floor");
  }

  convertToAssets(shares: bigint): bigint {
    return convertToAssets(shares, this.totals(), "floor");
  }

  previewDeposit(assets: bigint): bigint {
    return previewDeposit(this.totals(), assets);
  }

  previewMint(shares: bigint): bigint {
    return previewMint(this.totals(), shares);
  }

  previewWithdraw(assets: bigint): bigint {
    return previewWithdraw(this.totals(), assets);
  }

  previewRedeem(shares: bigint): bigint {
    return previewRedeem(this.totals(), shares);
  }
}
