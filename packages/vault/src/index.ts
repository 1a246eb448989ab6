/**
 * @wtoken/vault — Value-accruing wrapper token.
 *
 * Wraps a rebasing asset into non-rebasing shares:
 * - WrappedToken: deposit/mint/withdraw/redeem, share transfers, permit
 * - TransferGate: live pause and ban checks against the wrapped asset
 * - PermitAuthority: signed approvals with per-owner nonces
 * - RoleTable: pause and upgrade authorization
 *
 * Design rules:
 * - Asset state is read live, never cached
 * - Every mutation is all-or-nothing
 * - Records are published only after a mutation succeeds
 */

// Token
export { WrappedToken } from "./wrapped-token.js";
export type { WrappedTokenOptions } from "./wrapped-token.js";

// Collaborators
export type { RebasingAssetSource } from "./asset-source.js";
export { InMemoryRebasingAsset, AssetError } from "./in-memory-asset.js";
export type { AssetErrorCode, InMemoryRebasingAssetOptions } from "./in-memory-asset.js";

// Policy
export { TransferGate } from "./transfer-gate.js";
export { RoleTable } from "./access-control.js";
export type { AccessController } from "./access-control.js";

// Permit
export {
  PermitAuthority,
  DOMAIN_TYPEHASH,
  PERMIT_TYPEHASH,
  PERMIT_TYPES,
  hashDomain,
  hashPermit,
  permitDigest,
  normalizeSignature,
  recoverWithViem,
} from "./permit.js";
export type { PermitMessage, PermitRequest, RecoverSigner } from "./permit.js";

// Records
export { VaultEventLog } from "./event-log.js";
export type { EventHandler, ReadEventsOptions, Subscription } from "./event-log.js";

// Types
export type {
  Clock,
  InitializeParams,
  UpgradeRecord,
  VaultErrorCode,
  VaultLogger,
  WrappedTokenConfig,
  WrappedTokenSnapshot,
} from "./types.js";

export { VaultError, silentLogger, systemClock } from "./types.js";
