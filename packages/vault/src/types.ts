/**
 * Vault Types
 *
 * Configuration, collaborators and errors of the wrapper token.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are bigint; snapshots carry them as base-10 strings
 */

import type { ShareLedgerSnapshot } from "@wtoken/ledger";
import type { Address, RoleId } from "@wtoken/types";
import type { RebasingAssetSource } from "./asset-source.js";

// =============================================================================
// Error
// =============================================================================

export type VaultErrorCode =
  | "TRANSFERS_PAUSED"
  | "BLOCKED_SENDER"
  | "BLOCKED_RECEIVER"
  | "INVALID_SIGNATURE"
  | "EXPIRED_DEADLINE"
  | "UNAUTHORIZED"
  | "ALREADY_INITIALIZED"
  | "NOT_INITIALIZED"
  | "EXCEEDED_MAX_DEPOSIT"
  | "EXCEEDED_MAX_MINT"
  | "EXCEEDED_MAX_WITHDRAW"
  | "EXCEEDED_MAX_REDEEM"
  | "REENTRANT_CALL"
  | "BAD_CONFIRMATION"
  | "INVALID_ADDRESS";

export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  public readonly details?: Readonly<Record<string, string>>;

  constructor(
    code: VaultErrorCode,
    message: string,
    options?: { details?: Readonly<Record<string, string>>; cause?: unknown },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "VaultError";
    this.code = code;
    if (options?.details !== undefined) {
      this.details = options.details;
    }
  }
}

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Structured log sink. pino loggers satisfy this interface.
 */
export interface VaultLogger {
  debug(obj: object, msg: string): void;
  info(obj: object, msg: string): void;
  warn(obj: object, msg: string): void;
  error(obj: object, msg: string): void;
}

/** Current time in unix seconds. */
export type Clock = () => bigint;

export const systemClock: Clock = () => BigInt(Math.floor(Date.now() / 1000));

export const silentLogger: VaultLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

// =============================================================================
// Configuration
// =============================================================================

export interface WrappedTokenConfig {
  readonly name: string;

  /** Defaults to "w" + the wrapped asset's symbol at initialization. */
  readonly symbol?: string | undefined;

  /** Chain id bound into the permit domain. */
  readonly chainId: number;

  /** Address of this token; the permit domain's verifying contract. */
  readonly address: Address;
}

export interface InitializeParams {
  readonly asset: RebasingAssetSource;
  readonly admin: Address;
}

// =============================================================================
// Upgrades
// =============================================================================

/**
 * One entry of the implementation history.
 * The initialized implementation is version 1; upgrades count up from 2.
 */
export interface UpgradeRecord {
  readonly version: number;
  readonly implementation: Address;
  readonly authorizedBy: Address;
}

// =============================================================================
// Snapshot
// =============================================================================

export interface WrappedTokenSnapshot {
  readonly version: 1;
  readonly symbol: string;
  readonly paused: boolean;
  readonly ledger: ShareLedgerSnapshot;
  readonly nonces: readonly { readonly owner: Address; readonly nonce: string }[];
  readonly roles: readonly { readonly role: RoleId; readonly members: readonly Address[] }[];
  readonly upgrades: readonly UpgradeRecord[];
  readonly createdAt: string;
}
