/**
 * Primitive Types
 *
 * Addresses and hashes reuse viem's template-literal types so values
 * flow straight into viem's hashing and recovery helpers.
 *
 * Rules:
 * - Amounts are bigint, bounded to the uint256 range
 * - Addresses compare case-insensitively; store them checksummed
 */

import type { Address, Hex } from "viem";

export type { Address, Hex };

/** 32-byte role identifier (keccak256 of the role name, or zero for admin). */
export type RoleId = Hex;

/** Largest representable amount. Used as "unlimited" for bounds and allowances. */
export const MAX_UINT256: bigint = 2n ** 256n - 1n;

/** The null address. Never a valid holder, sender, or receiver. */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/** Fixed-point scale of share and asset amounts (18 decimals). */
export const WAD: bigint = 10n ** 18n;

/**
 * Signature components of an off-chain permit.
 *
 * Either the split `{ v, r, s }` form or the 65-byte serialized form.
 */
export type SignatureComponents =
  | {
      readonly v: number | bigint;
      readonly r: Hex;
      readonly s: Hex;
    }
  | Hex;

/**
 * EIP-712 domain of the wrapper token.
 *
 * The separator is derived from exactly these four fields.
 */
export interface TokenDomain {
  readonly name: string;
  readonly version: "1";
  readonly chainId: number;
  readonly verifyingContract: Address;
}
