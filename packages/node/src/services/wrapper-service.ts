/**
 * WrapperService — Composition root of the devnet node.
 *
 * Owns the in-memory rebasing asset and the wrapper token bound to it.
 * Route handlers delegate to this service; they never import domain
 * packages directly.
 */

import { InMemoryRebasingAsset, WrappedToken } from "@wtoken/vault";
import type {
  ReadEventsOptions,
  VaultLogger,
  WrappedTokenConfig,
} from "@wtoken/vault";
import type {
  Address,
  RecordedEvent,
  SignatureComponents,
  TokenDomain,
} from "@wtoken/types";
import { PAUSE_ROLE, UPGRADE_ROLE } from "@wtoken/types";
import type { QuoteKind } from "../types/dto.js";

// =============================================================================
// Configuration
// =============================================================================

export interface WrapperServiceConfig {
  readonly token: WrappedTokenConfig;
  readonly asset: {
    readonly address: Address;
    readonly name: string;
    readonly symbol: string;
  };
  /** Receives every role at startup. */
  readonly admin: Address;
}

// =============================================================================
// Views
// =============================================================================

export interface TokenInfo {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly address: Address;
  readonly chainId: number;
  readonly totalSupply: bigint;
  readonly totalAssets: bigint;
  readonly paused: boolean;
  readonly pausedLocally: boolean;
  readonly implementationVersion: number;
  readonly asset: {
    readonly address: Address;
    readonly symbol: string;
    readonly multiplier: bigint;
    readonly paused: boolean;
  };
}

export interface AccountInfo {
  readonly address: Address;
  readonly shares: bigint;
  readonly assetsValue: bigint;
  readonly assetBalance: bigint;
  readonly nonce: bigint;
  readonly maxWithdraw: bigint;
  readonly maxRedeem: bigint;
  readonly banned: boolean;
}

// =============================================================================
// Service
// =============================================================================

export class WrapperService {
  readonly asset: InMemoryRebasingAsset;
  readonly token: WrappedToken;

  private _ready = false;

  constructor(config: WrapperServiceConfig, logger?: VaultLogger) {
    this.asset = new InMemoryRebasingAsset({
      address: config.asset.address,
      name: config.asset.name,
      symbol: config.asset.symbol,
    });
    this.token = new WrappedToken(
      config.token,
      logger !== undefined ? { logger } : {},
    );

    this.token.initialize({ asset: this.asset, admin: config.admin });
    this.token.grantRole(config.admin, PAUSE_ROLE, config.admin);
    this.token.grantRole(config.admin, UPGRADE_ROLE, config.admin);

    this._ready = true;
  }

  isReady(): boolean {
    return this._ready && this.token.initialized;
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  tokenInfo(): TokenInfo {
    const { token, asset } = this;
    return {
      name: token.name(),
      symbol: token.symbol(),
      decimals: token.decimals(),
      address: token.address,
      chainId: token.chainId,
      totalSupply: token.totalSupply(),
      totalAssets: token.totalAssets(),
      paused: token.paused(),
      pausedLocally: token.pausedLocally(),
      implementationVersion: token.implementationVersion(),
      asset: {
        address: asset.address,
        symbol: asset.symbol(),
        multiplier: asset.multiplier,
        paused: asset.isPaused(),
      },
    };
  }

  accountInfo(account: Address): AccountInfo {
    const shares = this.token.balanceOf(account);
    return {
      address: account,
      shares,
      assetsValue: this.token.convertToAssets(shares),
      assetBalance: this.asset.balanceOf(account),
      nonce: this.token.nonces(account),
      maxWithdraw: this.token.maxWithdraw(account),
      maxRedeem: this.token.maxRedeem(account),
      banned: this.asset.isBanned(account),
    };
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.token.allowance(owner, spender);
  }

  quote(kind: QuoteKind, amount: bigint): bigint {
    switch (kind) {
      case "deposit":
        return this.token.previewDeposit(amount);
      case "mint":
        return this.token.previewMint(amount);
      case "withdraw":
        return this.token.previewWithdraw(amount);
      case "redeem":
        return this.token.previewRedeem(amount);
      case "shares":
        return this.token.convertToShares(amount);
      case "assets":
        return this.token.convertToAssets(amount);
    }
  }

  permitDomain(): { domain: TokenDomain; separator: string } {
    return {
      domain: this.token.eip712Domain(),
      separator: this.token.DOMAIN_SEPARATOR(),
    };
  }

  events(options?: ReadEventsOptions): readonly RecordedEvent[] {
    return this.token.events.readAll(options);
  }

  // ─── Token operations ────────────────────────────────────────────────

  deposit(caller: Address, assets: bigint, receiver: Address): bigint {
    return this.token.deposit(caller, assets, receiver);
  }

  mint(caller: Address, shares: bigint, receiver: Address): bigint {
    return this.token.mint(caller, shares, receiver);
  }

  withdraw(caller: Address, assets: bigint, owner: Address, receiver: Address): bigint {
    return this.token.withdraw(caller, assets, owner, receiver);
  }

  redeem(caller: Address, shares: bigint, owner: Address, receiver: Address): bigint {
    return this.token.redeem(caller, shares, owner, receiver);
  }

  transfer(caller: Address, from: Address, to: Address, amount: bigint): void {
    if (from === caller) {
      this.token.transfer(caller, to, amount);
    } else {
      this.token.transferFrom(caller, from, to, amount);
    }
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    this.token.approve(owner, spender, amount);
  }

  async permit(
    owner: Address,
    spender: Address,
    value: bigint,
    deadline: bigint,
    signature: SignatureComponents,
  ): Promise<void> {
    await this.token.permit(owner, spender, value, deadline, signature);
  }

  pause(caller: Address): void {
    this.token.pause(caller);
  }

  unpause(caller: Address): void {
    this.token.unpause(caller);
  }

  // ─── Devnet asset controls ───────────────────────────────────────────

  assetMint(to: Address, amount: bigint): void {
    this.asset.mint(to, amount);
  }

  assetApprove(owner: Address, spender: Address, amount: bigint): void {
    this.asset.approve(owner, spender, amount);
  }

  setMultiplier(multiplier: bigint): void {
    this.asset.updateMultiplier(multiplier);
  }

  pauseAsset(): void {
    this.asset.pause();
  }

  unpauseAsset(): void {
    this.asset.unpause();
  }

  ban(accounts: readonly Address[]): void {
    this.asset.ban(accounts);
  }

  unban(accounts: readonly Address[]): void {
    this.asset.unban(accounts);
  }
}
