/**
 * Tests for ShareLedger.
 *
 * Covers:
 * - Mint / burn / transfer bookkeeping
 * - Zero-address and shortfall rejections
 * - Allowances, including the unlimited allowance
 * - Journal rollback
 * - Snapshot/restore
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Address } from "@wtoken/types";
import { MAX_UINT256, ZERO_ADDRESS } from "@wtoken/types";
import { ShareLedger } from "../src/share-ledger.js";
import { LedgerError } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const ALICE: Address = "0x1111111111111111111111111111111111111111";
const BOB: Address = "0x2222222222222222222222222222222222222222";
const CAROL: Address = "0x3333333333333333333333333333333333333333";

function expectCode(fn: () => unknown, code: string): void {
  try {
    fn();
    expect.unreachable("expected LedgerError");
  } catch (err) {
    expect(err).toBeInstanceOf(LedgerError);
    expect(err).toMatchObject({ code });
  }
}

function sumOfBalances(ledger: ShareLedger): bigint {
  return ledger.snapshot().balances.reduce((acc, b) => acc + BigInt(b.shares), 0n);
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("ShareLedger", () => {
  let ledger: ShareLedger;

  beforeEach(() => {
    ledger = new ShareLedger();
  });

  describe("supply", () => {
    it("starts empty", () => {
      expect(ledger.totalSupply()).toBe(0n);
      expect(ledger.balanceOf(ALICE)).toBe(0n);
      expect(ledger.snapshot().balances).toEqual([]);
    });

    it("mints and burns", () => {
      ledger.mint(ALICE, 100n);
      ledger.mint(BOB, 50n);
      ledger.burn(ALICE, 30n);

      expect(ledger.balanceOf(ALICE)).toBe(70n);
      expect(ledger.balanceOf(BOB)).toBe(50n);
      expect(ledger.totalSupply()).toBe(120n);
    });

    it("keeps holders at zero balance", () => {
      ledger.mint(ALICE, 10n);
      ledger.burn(ALICE, 10n);

      expect(ledger.snapshot().balances).toEqual([{ holder: ALICE, shares: "0" }]);
      expect(ledger.balanceOf(ALICE)).toBe(0n);
    });

    it("rejects minting to the zero address", () => {
      expectCode(() => ledger.mint(ZERO_ADDRESS, 1n), "INVALID_RECEIVER");
    });

    it("rejects burning from the zero address", () => {
      expectCode(() => ledger.burn(ZERO_ADDRESS, 1n), "INVALID_SENDER");
    });

    it("rejects burning more than the balance", () => {
      ledger.mint(ALICE, 5n);
      expectCode(() => ledger.burn(ALICE, 6n), "INSUFFICIENT_BALANCE");
      expect(ledger.balanceOf(ALICE)).toBe(5n);
    });

    it("rejects supply overflow without changing state", () => {
      ledger.mint(ALICE, MAX_UINT256);
      expectCode(() => ledger.mint(BOB, 1n), "ARITHMETIC_OVERFLOW");
      expect(ledger.totalSupply()).toBe(MAX_UINT256);
      expect(ledger.balanceOf(BOB)).toBe(0n);
    });

    it("rejects negative amounts", () => {
      expectCode(() => ledger.mint(ALICE, -1n), "INVALID_AMOUNT");
    });
  });

  describe("transfer", () => {
    beforeEach(() => {
      ledger.mint(ALICE, 100n);
    });

    it("moves shares 1:1", () => {
      ledger.transfer(ALICE, BOB, 40n);

      expect(ledger.balanceOf(ALICE)).toBe(60n);
      expect(ledger.balanceOf(BOB)).toBe(40n);
      expect(ledger.totalSupply()).toBe(100n);
    });

    it("allows self-transfer", () => {
      ledger.transfer(ALICE, ALICE, 100n);
      expect(ledger.balanceOf(ALICE)).toBe(100n);
    });

    it("rejects insufficient balance with details", () => {
      try {
        ledger.transfer(ALICE, BOB, 101n);
        expect.unreachable("expected LedgerError");
      } catch (err) {
        expect(err).toBeInstanceOf(LedgerError);
        expect(err).toMatchObject({
          details: { account: ALICE, balance: "100", needed: "101" },
        });
      }
    });

    it("rejects zero-address endpoints", () => {
      expectCode(() => ledger.transfer(ZERO_ADDRESS, BOB, 1n), "INVALID_SENDER");
      expectCode(() => ledger.transfer(ALICE, ZERO_ADDRESS, 1n), "INVALID_RECEIVER");
    });

    it("preserves sum of balances == totalSupply", () => {
      ledger.mint(BOB, 7n);
      ledger.transfer(ALICE, CAROL, 33n);
      ledger.transfer(BOB, ALICE, 7n);
      ledger.burn(CAROL, 3n);

      expect(sumOfBalances(ledger)).toBe(ledger.totalSupply());
    });
  });

  describe("allowances", () => {
    it("approve overwrites", () => {
      ledger.approve(ALICE, BOB, 10n);
      ledger.approve(ALICE, BOB, 3n);
      expect(ledger.allowance(ALICE, BOB)).toBe(3n);
      expect(ledger.allowance(BOB, ALICE)).toBe(0n);
    });

    it("spendAllowance decrements", () => {
      ledger.approve(ALICE, BOB, 10n);
      ledger.spendAllowance(ALICE, BOB, 4n);
      expect(ledger.allowance(ALICE, BOB)).toBe(6n);
    });

    it("treats MAX_UINT256 as unlimited", () => {
      ledger.approve(ALICE, BOB, MAX_UINT256);
      ledger.spendAllowance(ALICE, BOB, 1_000n);
      expect(ledger.allowance(ALICE, BOB)).toBe(MAX_UINT256);
    });

    it("rejects spending beyond the allowance", () => {
      ledger.approve(ALICE, BOB, 2n);
      expectCode(() => ledger.spendAllowance(ALICE, BOB, 3n), "INSUFFICIENT_ALLOWANCE");
      expect(ledger.allowance(ALICE, BOB)).toBe(2n);
    });

    it("rejects zero-address approver and spender", () => {
      expectCode(() => ledger.approve(ZERO_ADDRESS, BOB, 1n), "INVALID_APPROVER");
      expectCode(() => ledger.approve(ALICE, ZERO_ADDRESS, 1n), "INVALID_SPENDER");
    });
  });

  describe("journal", () => {
    it("reverts every write of a failed unit", () => {
      ledger.mint(ALICE, 100n);
      ledger.approve(ALICE, BOB, 50n);

      expect(() =>
        ledger.journal.atomically(() => {
          ledger.spendAllowance(ALICE, BOB, 20n);
          ledger.transfer(ALICE, CAROL, 20n);
          ledger.mint(BOB, 5n);
          ledger.burn(CAROL, 21n);
        }),
      ).toThrow(LedgerError);

      expect(ledger.balanceOf(ALICE)).toBe(100n);
      expect(ledger.balanceOf(BOB)).toBe(0n);
      expect(ledger.balanceOf(CAROL)).toBe(0n);
      expect(ledger.allowance(ALICE, BOB)).toBe(50n);
      expect(ledger.totalSupply()).toBe(100n);
      expect(ledger.snapshot().balances).toEqual([{ holder: ALICE, shares: "100" }]);
    });

    it("keeps writes of a successful unit", () => {
      ledger.journal.atomically(() => {
        ledger.mint(ALICE, 10n);
        ledger.transfer(ALICE, BOB, 4n);
      });

      expect(ledger.balanceOf(ALICE)).toBe(6n);
      expect(ledger.balanceOf(BOB)).toBe(4n);
    });
  });

  describe("snapshot", () => {
    it("round-trips balances, supply and allowances", () => {
      ledger.mint(ALICE, 100n);
      ledger.transfer(ALICE, BOB, 25n);
      ledger.approve(BOB, CAROL, MAX_UINT256);

      const snap = ledger.snapshot();
      expect(snap.totalSupply).toBe("100");
      expect(snap.balances).toEqual([
        { holder: ALICE, shares: "75" },
        { holder: BOB, shares: "25" },
      ]);

      const restored = ShareLedger.fromSnapshot(JSON.parse(JSON.stringify(snap)));
      expect(restored.balanceOf(ALICE)).toBe(75n);
      expect(restored.balanceOf(BOB)).toBe(25n);
      expect(restored.totalSupply()).toBe(100n);
      expect(restored.allowance(BOB, CAROL)).toBe(MAX_UINT256);
      expect(restored.snapshot()).toEqual(snap);
    });

    it("rejects snapshots whose balances do not match supply", () => {
      expectCode(
        () =>
          ShareLedger.fromSnapshot({
            version: 1,
            totalSupply: "10",
            balances: [{ holder: ALICE, shares: "9" }],
            allowances: [],
          }),
        "INVALID_SNAPSHOT",
      );
    });

    it("rejects malformed amounts", () => {
      expectCode(
        () =>
          ShareLedger.fromSnapshot({
            version: 1,
            totalSupply: "1e3",
            balances: [],
            allowances: [],
          }),
        "INVALID_SNAPSHOT",
      );
    });
  });
});
