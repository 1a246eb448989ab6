/**
 * Runtime Type Guards
 *
 * Narrowing functions for boundary inputs
 * (API payloads, deserialized snapshots, configuration).
 */

import { isAddress } from "viem";
import type { Address, Hex, RoleId } from "./primitives.js";
import { MAX_UINT256 } from "./primitives.js";
import type { VaultEventType } from "./event.js";

const EVENT_TYPES = new Set<string>([
  "Deposit",
  "Withdraw",
  "Transfer",
  "Approval",
  "Paused",
  "Unpaused",
  "RoleGranted",
  "RoleRevoked",
  "Initialized",
  "Upgraded",
]);

/** Accepts any 20-byte hex address, checksummed or not. */
export function isHolderAddress(value: unknown): value is Address {
  return typeof value === "string" && isAddress(value, { strict: false });
}

export function isHex(value: unknown): value is Hex {
  return typeof value === "string" && /^0x[0-9a-fA-F]*$/.test(value);
}

export function isRoleId(value: unknown): value is RoleId {
  return typeof value === "string" && /^0x[0-9a-fA-F]{64}$/.test(value);
}

export function isVaultEventType(value: unknown): value is VaultEventType {
  return typeof value === "string" && EVENT_TYPES.has(value);
}

/**
 * Whether a string is a base-10 uint256 literal ("0", "1337", ...).
 */
export function isUint256String(value: unknown): value is string {
  if (typeof value !== "string" || !/^(0|[1-9]\d*)$/.test(value)) return false;
  return BigInt(value) <= MAX_UINT256;
}
