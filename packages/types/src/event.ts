/**
 * Event Types
 *
 * Observable records emitted by the wrapper token.
 * Every successful state change produces one or more records.
 *
 * Rules:
 * - Records are immutable after creation
 * - Records are emitted only when the whole operation succeeds
 * - Discriminated by `type`
 */

import type { Address, RoleId } from "./primitives.js";

export interface DepositEvent {
  readonly type: "Deposit";
  readonly caller: Address;
  readonly receiver: Address;
  readonly assets: bigint;
  readonly shares: bigint;
}

export interface WithdrawEvent {
  readonly type: "Withdraw";
  readonly caller: Address;
  readonly receiver: Address;
  readonly owner: Address;
  readonly assets: bigint;
  readonly shares: bigint;
}

/** Share movement. `from` is the zero address on mint, `to` on burn. */
export interface TransferEvent {
  readonly type: "Transfer";
  readonly from: Address;
  readonly to: Address;
  readonly value: bigint;
}

export interface ApprovalEvent {
  readonly type: "Approval";
  readonly owner: Address;
  readonly spender: Address;
  readonly value: bigint;
}

export interface PausedEvent {
  readonly type: "Paused";
  readonly account: Address;
}

export interface UnpausedEvent {
  readonly type: "Unpaused";
  readonly account: Address;
}

export interface RoleGrantedEvent {
  readonly type: "RoleGranted";
  readonly role: RoleId;
  readonly account: Address;
  readonly sender: Address;
}

export interface RoleRevokedEvent {
  readonly type: "RoleRevoked";
  readonly role: RoleId;
  readonly account: Address;
  readonly sender: Address;
}

export interface InitializedEvent {
  readonly type: "Initialized";
  readonly version: number;
}

export interface UpgradedEvent {
  readonly type: "Upgraded";
  readonly implementation: Address;
  readonly version: number;
}

export type VaultEvent =
  | DepositEvent
  | WithdrawEvent
  | TransferEvent
  | ApprovalEvent
  | PausedEvent
  | UnpausedEvent
  | RoleGrantedEvent
  | RoleRevokedEvent
  | InitializedEvent
  | UpgradedEvent;

export type VaultEventType = VaultEvent["type"];

/**
 * A record as stored in the event log.
 */
export interface RecordedEvent {
  /** 1-based position in the log */
  readonly sequence: number;

  /** ISO 8601 timestamp of the commit */
  readonly recordedAt: string;

  readonly event: VaultEvent;
}
