/**
 * In-memory rebasing asset.
 *
 * A reference RebasingAssetSource that keeps balances as internal shares
 * and scales them by a bonus multiplier (18-decimal fixed point).
 * Raising the multiplier grows every balance without touching shares.
 *
 * Suitable for:
 * - Unit and integration tests
 * - The devnet node
 *
 * Amount → share conversion rounds down, as does share → amount.
 * Addresses are checksummed on the way in, so any casing names the same
 * account. All state is lost on process exit.
 */

import { getAddress } from "viem";
import { ShareLedger, mulDiv } from "@wtoken/ledger";
import type { Address } from "@wtoken/types";
import { MAX_UINT256, WAD } from "@wtoken/types";
import type { RebasingAssetSource } from "./asset-source.js";

// =============================================================================
// Error
// =============================================================================

export type AssetErrorCode =
  | "ASSET_PAUSED"
  | "ASSET_BLOCKED_SENDER"
  | "ASSET_BLOCKED_RECEIVER"
  | "INVALID_MULTIPLIER";

export class AssetError extends Error {
  public readonly code: AssetErrorCode;
  constructor(code: AssetErrorCode, message: string) {
    super(message);
    this.name = "AssetError";
    this.code = code;
  }
}

// =============================================================================
// Asset
// =============================================================================

export interface InMemoryRebasingAssetOptions {
  readonly address: Address;
  readonly name?: string;
  readonly symbol?: string;
  /** Initial multiplier, WAD-scaled. Default: 1.0 */
  readonly multiplier?: bigint;
}

export class InMemoryRebasingAsset implements RebasingAssetSource {
  readonly address: Address;
  readonly name: string;
  private readonly _symbol: string;
  private readonly shares: ShareLedger = new ShareLedger();
  private readonly banned: Set<Address> = new Set();
  private _multiplier: bigint;
  private _paused = false;

  constructor(options: InMemoryRebasingAssetOptions) {
    this.address = getAddress(options.address);
    this.name = options.name ?? "Rebasing USD";
    this._symbol = options.symbol ?? "RUSD";
    this._multiplier = options.multiplier ?? WAD;
    this.assertMultiplier(this._multiplier);
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  symbol(): string {
    return this._symbol;
  }

  get multiplier(): bigint {
    return this._multiplier;
  }

  balanceOf(account: Address): bigint {
    return this.convertToAmount(this.shares.balanceOf(getAddress(account)));
  }

  sharesOf(account: Address): bigint {
    return this.shares.balanceOf(getAddress(account));
  }

  totalSupply(): bigint {
    return this.convertToAmount(this.shares.totalSupply());
  }

  totalShares(): bigint {
    return this.shares.totalSupply();
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.shares.allowance(getAddress(owner), getAddress(spender));
  }

  isPaused(): boolean {
    return this._paused;
  }

  isBanned(account: Address): boolean {
    return this.banned.has(getAddress(account));
  }

  // ─── Holder operations ───────────────────────────────────────────────

  approve(owner: Address, spender: Address, amount: bigint): void {
    this.shares.approve(getAddress(owner), getAddress(spender), amount);
  }

  transfer(sender: Address, to: Address, amount: bigint): void {
    const [from, receiver] = [getAddress(sender), getAddress(to)];
    this.assertTransferable(from, receiver);
    this.shares.transfer(from, receiver, this.convertToShares(amount));
  }

  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): void {
    const [caller, owner, receiver] = [getAddress(spender), getAddress(from), getAddress(to)];
    this.assertTransferable(owner, receiver);
    this.shares.journal.atomically(() => {
      this.shares.spendAllowance(owner, caller, amount);
      this.shares.transfer(owner, receiver, this.convertToShares(amount));
    });
  }

  // ─── Issuer operations ───────────────────────────────────────────────

  mint(to: Address, amount: bigint): void {
    this.shares.mint(getAddress(to), this.convertToShares(amount));
  }

  burn(from: Address, amount: bigint): void {
    this.shares.burn(getAddress(from), this.convertToShares(amount));
  }

  /**
   * Set the bonus multiplier. Balances rescale immediately.
   */
  updateMultiplier(next: bigint): void {
    this.assertMultiplier(next);
    this._multiplier = next;
  }

  pause(): void {
    this._paused = true;
  }

  unpause(): void {
    this._paused = false;
  }

  ban(accounts: readonly Address[]): void {
    for (const account of accounts) {
      this.banned.add(getAddress(account));
    }
  }

  unban(accounts: readonly Address[]): void {
    for (const account of accounts) {
      this.banned.delete(getAddress(account));
    }
  }

  // ─── Private helpers ─────────────────────────────────────────────────

  private convertToShares(amount: bigint): bigint {
    return mulDiv(amount, WAD, this._multiplier);
  }

  private convertToAmount(shares: bigint): bigint {
    return mulDiv(shares, this._multiplier, WAD);
  }

  private assertTransferable(from: Address, to: Address): void {
    if (this._paused) {
      throw new AssetError("ASSET_PAUSED", `${this._symbol} transfers are paused`);
    }
    if (this.banned.has(from)) {
      throw new AssetError("ASSET_BLOCKED_SENDER", `${from} is banned from ${this._symbol}`);
    }
    if (this.banned.has(to)) {
      throw new AssetError("ASSET_BLOCKED_RECEIVER", `${to} is banned from ${this._symbol}`);
    }
  }

  private assertMultiplier(value: bigint): void {
    if (value <= 0n || value > MAX_UINT256) {
      throw new AssetError("INVALID_MULTIPLIER", `Multiplier must be positive, got ${value.toString()}`);
    }
  }
}
