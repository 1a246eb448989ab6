/**
 * Tests for InMemoryRebasingAsset.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Address } from "@wtoken/types";
import { WAD } from "@wtoken/types";
import { LedgerError } from "@wtoken/ledger";
import { AssetError, InMemoryRebasingAsset } from "../src/in-memory-asset.js";
import { ACC1, ACC2, OWNER, lower } from "./fixtures.js";

const ALICE: Address = "0x1111111111111111111111111111111111111111";
const BOB: Address = "0x2222222222222222222222222222222222222222";
const SPENDER: Address = "0x3333333333333333333333333333333333333333";

describe("InMemoryRebasingAsset", () => {
  let asset: InMemoryRebasingAsset;

  beforeEach(() => {
    asset = new InMemoryRebasingAsset({ address: "0x8888888888888888888888888888888888888888" });
    asset.mint(ALICE, 100n * WAD);
  });

  it("defaults its metadata", () => {
    expect(asset.name).toBe("Rebasing USD");
    expect(asset.symbol()).toBe("RUSD");
    expect(asset.multiplier).toBe(WAD);
  });

  it("rescales balances when the multiplier changes", () => {
    asset.updateMultiplier((WAD * 3n) / 2n);

    expect(asset.balanceOf(ALICE)).toBe(150n * WAD);
    expect(asset.sharesOf(ALICE)).toBe(100n * WAD);
    expect(asset.totalSupply()).toBe(150n * WAD);
    expect(asset.totalShares()).toBe(100n * WAD);
  });

  it("moves the share equivalent of an amount, rounding down", () => {
    asset.updateMultiplier((WAD * 3n) / 2n);
    asset.transfer(ALICE, BOB, 2n);

    // 2 / 1.5 = 1.33 shares, floored to 1; worth floor(1 * 1.5) = 1
    expect(asset.sharesOf(BOB)).toBe(1n);
    expect(asset.balanceOf(BOB)).toBe(1n);
  });

  it("spends allowances on transferFrom", () => {
    asset.approve(ALICE, SPENDER, 10n);
    asset.transferFrom(SPENDER, ALICE, BOB, 4n);

    expect(asset.balanceOf(BOB)).toBe(4n);
    expect(asset.allowance(ALICE, SPENDER)).toBe(6n);
    expect(() => asset.transferFrom(SPENDER, ALICE, BOB, 7n)).toThrow(LedgerError);
    expect(asset.balanceOf(BOB)).toBe(4n);
  });

  it("blocks transfers while paused", () => {
    asset.pause();
    expect(asset.isPaused()).toBe(true);
    expect(() => asset.transfer(ALICE, BOB, 1n)).toThrow(AssetError);

    asset.unpause();
    asset.transfer(ALICE, BOB, 1n);
    expect(asset.balanceOf(BOB)).toBe(1n);
  });

  it("blocks banned senders and receivers", () => {
    asset.ban([BOB]);
    expect(asset.isBanned(BOB)).toBe(true);
    expect(() => asset.transfer(ALICE, BOB, 1n)).toThrow(/banned/);

    asset.unban([BOB]);
    expect(asset.isBanned(BOB)).toBe(false);
    asset.transfer(ALICE, BOB, 1n);
    expect(asset.balanceOf(BOB)).toBe(1n);
  });

  it("rejects a zero multiplier", () => {
    expect(() => asset.updateMultiplier(0n)).toThrow(AssetError);
    expect(asset.multiplier).toBe(WAD);
  });

  it("burns holder balances", () => {
    asset.burn(ALICE, 40n * WAD);
    expect(asset.balanceOf(ALICE)).toBe(60n * WAD);
  });

  it("treats any casing of an address as the same account", () => {
    asset.mint(lower(OWNER), 5n);
    asset.ban([lower(ACC1)]);
    asset.approve(lower(OWNER), lower(ACC2), 3n);

    expect(asset.balanceOf(OWNER)).toBe(5n);
    expect(asset.isBanned(ACC1)).toBe(true);
    expect(asset.allowance(OWNER, ACC2)).toBe(3n);
    expect(() => asset.transfer(ACC1, OWNER, 0n)).toThrow(AssetError);

    asset.transferFrom(ACC2, OWNER, lower(ALICE), 2n);
    expect(asset.allowance(lower(OWNER), lower(ACC2))).toBe(1n);
    expect(asset.balanceOf(OWNER)).toBe(3n);

    asset.unban([ACC1]);
    expect(asset.isBanned(lower(ACC1))).toBe(false);
  });

  it("checksums its own address", () => {
    const mixed = new InMemoryRebasingAsset({ address: lower(OWNER) });
    expect(mixed.address).toBe(OWNER);
  });
});
