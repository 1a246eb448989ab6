/**
 * @wtoken/ledger — Types for the share ledger.
 *
 * Rules:
 * - Amounts are bigint in the uint256 range
 * - Fail-closed: invalid operations throw, never saturate or wrap
 */

import type { Address } from "@wtoken/types";

// ─── Conversion Types ────────────────────────────────────────────────────

/** Direction of integer division. */
export type Rounding = "floor" | "ceil";

/**
 * Totals a conversion is computed against.
 * `totalAssets` is read live from the wrapped asset; never cached.
 */
export interface VaultTotals {
  readonly totalAssets: bigint;
  readonly totalSupply: bigint;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "ARITHMETIC_OVERFLOW"
  | "DIVISION_BY_ZERO"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "INVALID_SENDER"
  | "INVALID_RECEIVER"
  | "INVALID_APPROVER"
  | "INVALID_SPENDER"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the share ledger.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly details?: Readonly<Record<string, string>>;

  constructor(
    code: LedgerErrorCode,
    message: string,
    details?: Readonly<Record<string, string>>,
  ) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    if (details !== undefined) {
      this.details = details;
    }
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the share ledger.
 * Amounts are base-10 strings so the snapshot survives JSON.
 */
export interface ShareLedgerSnapshot {
  readonly version: 1;
  readonly totalSupply: string;
  readonly balances: readonly { readonly holder: Address; readonly shares: string }[];
  readonly allowances: readonly {
    readonly owner: Address;
    readonly spender: Address;
    readonly amount: string;
  }[];
}
