/**
 * @wtoken/types — Shared primitives for the wrapper token stack.
 *
 * Used across all packages:
 * - Addresses, hashes, role ids, signature components
 * - Observable event records
 * - Runtime guards for boundary inputs
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - Amounts are bigint in the uint256 range
 */

export type {
  Address,
  Hex,
  RoleId,
  SignatureComponents,
  TokenDomain,
} from "./primitives.js";
export { MAX_UINT256, ZERO_ADDRESS, WAD } from "./primitives.js";

export {
  DEFAULT_ADMIN_ROLE,
  PAUSE_ROLE,
  UPGRADE_ROLE,
  ROLE_NAMES,
  roleName,
} from "./roles.js";

export type {
  DepositEvent,
  WithdrawEvent,
  TransferEvent,
  ApprovalEvent,
  PausedEvent,
  UnpausedEvent,
  RoleGrantedEvent,
  RoleRevokedEvent,
  InitializedEvent,
  UpgradedEvent,
  VaultEvent,
  VaultEventType,
  RecordedEvent,
} from "./event.js";

export {
  isHolderAddress,
  isHex,
  isRoleId,
  isVaultEventType,
  isUint256String,
} from "./guards.js";
