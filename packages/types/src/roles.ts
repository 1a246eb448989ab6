/**
 * Role identifiers.
 *
 * Ids match the on-chain convention: keccak256 of the role name,
 * with the admin role fixed at bytes32(0).
 */

import { keccak256, toHex } from "viem";
import type { RoleId } from "./primitives.js";

export const DEFAULT_ADMIN_ROLE: RoleId =
  "0x0000000000000000000000000000000000000000000000000000000000000000";

export const PAUSE_ROLE: RoleId = keccak256(toHex("PAUSE_ROLE"));

export const UPGRADE_ROLE: RoleId = keccak256(toHex("UPGRADE_ROLE"));

/** Human-readable names for the known roles, keyed by id. */
export const ROLE_NAMES: Readonly<Record<RoleId, string>> = {
  [DEFAULT_ADMIN_ROLE]: "DEFAULT_ADMIN_ROLE",
  [PAUSE_ROLE]: "PAUSE_ROLE",
  [UPGRADE_ROLE]: "UPGRADE_ROLE",
};

export function roleName(role: RoleId): string {
  return ROLE_NAMES[role] ?? role;
}
