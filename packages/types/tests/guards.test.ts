/**
 * Runtime type guard tests for @wtoken/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isHolderAddress,
  isHex,
  isRoleId,
  isVaultEventType,
  isUint256String,
} from "../src/guards.js";
import { MAX_UINT256 } from "../src/primitives.js";

describe("isHolderAddress", () => {
  it("accepts lowercase and checksummed addresses", () => {
    expect(isHolderAddress("0x1111111111111111111111111111111111111111")).toBe(true);
    expect(isHolderAddress("0xAbCdEf0123456789abcdef0123456789ABCDEF01")).toBe(true);
  });

  it("rejects wrong lengths and non-hex", () => {
    expect(isHolderAddress("0x1234")).toBe(false);
    expect(isHolderAddress("1111111111111111111111111111111111111111")).toBe(false);
    expect(isHolderAddress("0xzz11111111111111111111111111111111111111")).toBe(false);
    expect(isHolderAddress(42)).toBe(false);
  });
});

describe("isHex", () => {
  it("accepts prefixed hex", () => {
    expect(isHex("0x")).toBe(true);
    expect(isHex("0xdeadBEEF")).toBe(true);
  });

  it("rejects unprefixed or non-hex strings", () => {
    expect(isHex("deadbeef")).toBe(false);
    expect(isHex("0xg1")).toBe(false);
    expect(isHex(null)).toBe(false);
  });
});

describe("isRoleId", () => {
  it("accepts 32-byte hex", () => {
    expect(isRoleId(`0x${"00".repeat(32)}`)).toBe(true);
  });

  it("rejects other lengths", () => {
    expect(isRoleId(`0x${"00".repeat(31)}`)).toBe(false);
    expect(isRoleId("PAUSE_ROLE")).toBe(false);
  });
});

describe("isVaultEventType", () => {
  it("accepts known record types", () => {
    expect(isVaultEventType("Deposit")).toBe(true);
    expect(isVaultEventType("Upgraded")).toBe(true);
  });

  it("rejects unknown names", () => {
    expect(isVaultEventType("deposit")).toBe(false);
    expect(isVaultEventType("Mint")).toBe(false);
  });
});

describe("isUint256String", () => {
  it("accepts canonical decimal literals", () => {
    expect(isUint256String("0")).toBe(true);
    expect(isUint256String("1337000000000000000000")).toBe(true);
    expect(isUint256String(MAX_UINT256.toString())).toBe(true);
  });

  it("rejects leading zeros, signs, decimals and overflow", () => {
    expect(isUint256String("01")).toBe(false);
    expect(isUint256String("-1")).toBe(false);
    expect(isUint256String("1.5")).toBe(false);
    expect(isUint256String("")).toBe(false);
    expect(isUint256String((MAX_UINT256 + 1n).toString())).toBe(false);
  });
});
