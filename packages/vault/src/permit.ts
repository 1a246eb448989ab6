/**
 * PermitAuthority — off-chain signed approvals (EIP-2612).
 *
 * Per-owner nonce state machine: starts at 0, increases by exactly one
 * per accepted permit, never decreases. The signed digest binds the
 * current nonce, so a replayed signature hashes against the next nonce
 * and no longer recovers to the owner.
 *
 * Verification is split from commitment:
 * - verify() checks deadline and signature, with no state change
 * - useNonce() consumes the nonce inside the caller's unit of work,
 *   rejecting if the nonce moved or the deadline passed while recovery
 *   was in flight
 */

import {
  concat,
  encodeAbiParameters,
  getAddress,
  hexToBigInt,
  isAddressEqual,
  isHex,
  keccak256,
  numberToHex,
  recoverAddress,
  size,
  slice,
  toHex,
} from "viem";
import type { Journal } from "@wtoken/ledger";
import { LedgerError } from "@wtoken/ledger";
import type { Address, Hex, SignatureComponents, TokenDomain } from "@wtoken/types";
import { isHolderAddress, isUint256String } from "@wtoken/types";
import { VaultError } from "./types.js";

// =============================================================================
// Type hashes
// =============================================================================

export const DOMAIN_TYPEHASH: Hex = keccak256(
  toHex("EIP712Domain(string name,string version,uint256 chainId,address verifyingContract)"),
);

export const PERMIT_TYPEHASH: Hex = keccak256(
  toHex("Permit(address owner,address spender,uint256 value,uint256 nonce,uint256 deadline)"),
);

/** EIP-712 types for signers (wallets, viem's signTypedData). */
export const PERMIT_TYPES = {
  Permit: [
    { name: "owner", type: "address" },
    { name: "spender", type: "address" },
    { name: "value", type: "uint256" },
    { name: "nonce", type: "uint256" },
    { name: "deadline", type: "uint256" },
  ],
} as const;

/** Upper bound for `s`; higher values are malleated signatures. */
const SECP256K1_HALF_ORDER =
  0x7fffffffffffffffffffffffffffffff5d576e7357a4501ddfe92f46681b20a0n;

// =============================================================================
// Hashing
// =============================================================================

export interface PermitMessage {
  readonly owner: Address;
  readonly spender: Address;
  readonly value: bigint;
  readonly nonce: bigint;
  readonly deadline: bigint;
}

/**
 * Domain separator from exactly { name, version, chainId, verifyingContract }.
 */
export function hashDomain(domain: TokenDomain): Hex {
  return keccak256(
    encodeAbiParameters(
      [
        { type: "bytes32" },
        { type: "bytes32" },
        { type: "bytes32" },
        { type: "uint256" },
        { type: "address" },
      ],
      [
        DOMAIN_TYPEHASH,
        keccak256(toHex(domain.name)),
        keccak256(toHex(domain.version)),
        BigInt(domain.chainId),
        domain.verifyingContract,
      ],
    ),
  );
}

export function hashPermit(message: PermitMessage): Hex {
  return keccak256(
    encodeAbiParameters(
      [
        { type: "bytes32" },
        { type: "address" },
        { type: "address" },
        { type: "uint256" },
        { type: "uint256" },
        { type: "uint256" },
      ],
      [
        PERMIT_TYPEHASH,
        message.owner,
        message.spender,
        message.value,
        message.nonce,
        message.deadline,
      ],
    ),
  );
}

/** The digest an owner signs: 0x1901 ‖ domainSeparator ‖ structHash. */
export function permitDigest(domainSeparator: Hex, message: PermitMessage): Hex {
  return keccak256(concat(["0x1901", domainSeparator, hashPermit(message)]));
}

// =============================================================================
// Signatures
// =============================================================================

/**
 * Recovers the signer of a digest from a 65-byte signature.
 * Pluggable so hardware or remote verifiers can stand in.
 */
export type RecoverSigner = (digest: Hex, signature: Hex) => Promise<Address>;

export const recoverWithViem: RecoverSigner = (hash, signature) =>
  recoverAddress({ hash, signature });

/**
 * Canonical 65-byte form (r ‖ s ‖ v, v ∈ {27, 28}), or null when the
 * components are malformed or `s` is in the upper half of the curve order.
 */
export function normalizeSignature(signature: SignatureComponents): Hex | null {
  let r: Hex;
  let s: Hex;
  let v: bigint;

  if (typeof signature === "string") {
    if (!isHex(signature) || size(signature) !== 65) return null;
    r = slice(signature, 0, 32);
    s = slice(signature, 32, 64);
    v = hexToBigInt(slice(signature, 64, 65));
  } else {
    if (!isHex(signature.r) || size(signature.r) !== 32) return null;
    if (!isHex(signature.s) || size(signature.s) !== 32) return null;
    if (typeof signature.v === "number" && !Number.isInteger(signature.v)) return null;
    r = signature.r;
    s = signature.s;
    v = BigInt(signature.v);
  }

  if (v === 0n || v === 1n) v += 27n;
  if (v !== 27n && v !== 28n) return null;
  if (hexToBigInt(s) > SECP256K1_HALF_ORDER) return null;

  return concat([r, s, numberToHex(v, { size: 1 })]);
}

// =============================================================================
// Authority
// =============================================================================

export interface PermitRequest {
  readonly owner: Address;
  readonly spender: Address;
  readonly value: bigint;
  readonly deadline: bigint;
  readonly signature: SignatureComponents;
}

export class PermitAuthority {
  private readonly _nonces: Map<Address, bigint> = new Map();

  constructor(
    private readonly domain: () => TokenDomain,
    private readonly journal: Journal,
    private readonly recover: RecoverSigner = recoverWithViem,
  ) {}

  /** Next nonce `owner` must sign over. 0 until the first permit. */
  nonces(owner: Address): bigint {
    return this._nonces.get(owner) ?? 0n;
  }

  domainSeparator(): Hex {
    return hashDomain(this.domain());
  }

  /**
   * Check deadline and signature against the owner's current nonce.
   * Returns the nonce the signature was accepted for. Changes nothing.
   */
  async verify(request: PermitRequest, now: bigint): Promise<bigint> {
    const { owner, spender, value, deadline } = request;
    assertLive(request, now);

    const nonce = this.nonces(owner);
    const digest = permitDigest(this.domainSeparator(), {
      owner,
      spender,
      value,
      nonce,
      deadline,
    });

    const signature = normalizeSignature(request.signature);
    if (signature === null) {
      throw invalidSignature(request);
    }

    let signer: Address;
    try {
      signer = await this.recover(digest, signature);
    } catch (cause) {
      throw invalidSignature(request, cause);
    }

    if (!isAddressEqual(signer, owner)) {
      throw invalidSignature(request);
    }

    return nonce;
  }

  /**
   * Consume `expected` for the request's owner. If another permit consumed
   * it first, the signature is stale and rejected as invalid.
   */
  useNonce(request: PermitRequest, expected: bigint, now: bigint): void {
    assertLive(request, now);
    const current = this.nonces(request.owner);
    if (current !== expected) {
      throw invalidSignature(request);
    }
    this.setNonce(request.owner, current + 1n);
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  entries(): readonly { readonly owner: Address; readonly nonce: string }[] {
    return [...this._nonces].map(([owner, nonce]) => ({ owner, nonce: nonce.toString() }));
  }

  restore(entries: readonly { readonly owner: Address; readonly nonce: string }[]): void {
    for (const { owner, nonce } of entries) {
      if (!isHolderAddress(owner)) {
        throw new LedgerError("INVALID_SNAPSHOT", `Invalid nonce owner: "${owner}"`);
      }
      if (!isUint256String(nonce)) {
        throw new LedgerError("INVALID_SNAPSHOT", `Invalid nonce for ${owner}: "${nonce}"`);
      }
      this._nonces.set(getAddress(owner), BigInt(nonce));
    }
  }

  // ─── Private helpers ─────────────────────────────────────────────────

  private setNonce(owner: Address, value: bigint): void {
    const previous = this._nonces.get(owner);
    this.journal.record(() => {
      if (previous === undefined) {
        this._nonces.delete(owner);
      } else {
        this._nonces.set(owner, previous);
      }
    });
    this._nonces.set(owner, value);
  }
}

function assertLive({ deadline }: PermitRequest, now: bigint): void {
  if (now > deadline) {
    throw new VaultError(
      "EXPIRED_DEADLINE",
      `Permit expired at ${deadline.toString()}, now ${now.toString()}`,
      { details: { deadline: deadline.toString(), now: now.toString() } },
    );
  }
}

function invalidSignature(request: PermitRequest, cause?: unknown): VaultError {
  return new VaultError(
    "INVALID_SIGNATURE",
    `Invalid permit signature for owner ${request.owner} and spender ${request.spender}`,
    {
      details: { owner: request.owner, spender: request.spender },
      ...(cause !== undefined ? { cause } : {}),
    },
  );
}
