/**
 * Shared fixtures for vault tests.
 *
 * Keys are placeholders; accounts are derived with viem so permit
 * signatures are real EIP-712 signatures.
 */

import { privateKeyToAccount } from "viem/accounts";
import type { Address, Hex } from "@wtoken/types";
import { MAX_UINT256, PAUSE_ROLE, UPGRADE_ROLE, WAD } from "@wtoken/types";
import { InMemoryRebasingAsset } from "../src/in-memory-asset.js";
import { WrappedToken } from "../src/wrapped-token.js";
import type { WrappedTokenOptions } from "../src/wrapped-token.js";

export const TOKEN_ADDRESS: Address = "0x7777777777777777777777777777777777777777";
export const ASSET_ADDRESS: Address = "0x8888888888888888888888888888888888888888";
export const TOKEN_NAME = "Wrapped Rebasing USD";
export const CHAIN_ID = 1;
export const NOW = 1_700_000_000n;

export const ownerAccount = privateKeyToAccount(`0x${"11".repeat(32)}` satisfies Hex);
export const acc1Account = privateKeyToAccount(`0x${"22".repeat(32)}` satisfies Hex);
export const acc2Account = privateKeyToAccount(`0x${"33".repeat(32)}` satisfies Hex);

export const OWNER: Address = ownerAccount.address;
export const ACC1: Address = acc1Account.address;
export const ACC2: Address = acc2Account.address;

/** Asset balance minted to OWNER at multiplier 1. */
export const INITIAL_ASSETS = 1337n * WAD;

export function units(whole: bigint): bigint {
  return whole * WAD;
}

/** The same account in all-lowercase form. */
export function lower(address: Address): Address {
  return `0x${address.slice(2).toLowerCase()}`;
}

export interface Deployment {
  readonly token: WrappedToken;
  readonly asset: InMemoryRebasingAsset;
}

/**
 * Asset with INITIAL_ASSETS minted to OWNER, token initialized with OWNER
 * as admin and OWNER holding PAUSE_ROLE and UPGRADE_ROLE.
 */
export function deploy(
  options: WrappedTokenOptions = {},
  asset: InMemoryRebasingAsset = new InMemoryRebasingAsset({ address: ASSET_ADDRESS }),
): Deployment {
  asset.mint(OWNER, INITIAL_ASSETS);

  const token = new WrappedToken(
    { name: TOKEN_NAME, chainId: CHAIN_ID, address: TOKEN_ADDRESS },
    { clock: () => NOW, ...options },
  );
  token.initialize({ asset, admin: OWNER });
  token.grantRole(OWNER, PAUSE_ROLE, OWNER);
  token.grantRole(OWNER, UPGRADE_ROLE, OWNER);

  return { token, asset };
}

/** Deploy and let the vault pull OWNER's assets without limit. */
export function deployApproved(options: WrappedTokenOptions = {}): Deployment {
  const deployment = deploy(options);
  deployment.asset.approve(OWNER, TOKEN_ADDRESS, MAX_UINT256);
  return deployment;
}
