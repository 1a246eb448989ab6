/**
 * RebasingAssetSource — the wrapped asset, as seen by the vault.
 *
 * The vault depends on the asset's live state and never caches it:
 * balances, pause state and ban membership are read on every call.
 * The asset is unaware of the vault; there is no callback registration.
 *
 * Every method is a synchronous sub-call. A throw aborts the whole
 * vault operation that made it.
 */

import type { Address } from "@wtoken/types";

export interface RebasingAssetSource {
  /** Address of the asset contract. */
  readonly address: Address;

  /** Ticker of the asset, e.g. "RUSD". */
  symbol(): string;

  /**
   * Asset balance of `account`, already scaled by the current multiplier.
   * The vault's own balance is its `totalAssets`.
   */
  balanceOf(account: Address): bigint;

  /**
   * Move `amount` from `sender` to `to`. The vault calls this with its
   * own address as `sender` to pay out withdrawals.
   */
  transfer(sender: Address, to: Address, amount: bigint): void;

  /**
   * Move `amount` from `from` to `to` against `spender`'s allowance.
   * The vault calls this with its own address as `spender` to pull deposits.
   */
  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): void;

  /** Whether the asset itself is paused. */
  isPaused(): boolean;

  /** Whether `account` is on the asset's ban list. */
  isBanned(account: Address): boolean;
}
