/**
 * @wtoken/ledger — Share balances, supply and allowances.
 *
 * API surface:
 * - balanceOf() / totalSupply() / allowance() — reads
 * - mint() / burn() — supply changes (deposit and withdraw legs)
 * - transfer() — 1:1 share movement between holders
 * - approve() / spendAllowance() — delegated spending
 * - snapshot() / fromSnapshot() — persistence
 *
 * Invariant: the sum of all balances equals totalSupply.
 *
 * Holder addresses are opaque keys here; callers pass them in one
 * canonical form. Every write goes through the journal so an enclosing
 * unit of work can revert it.
 */

import type { Address } from "@wtoken/types";
import { MAX_UINT256, ZERO_ADDRESS } from "@wtoken/types";
import { Journal } from "./journal.js";
import { assertUint256, checkedAdd } from "./share-math.js";
import type { ShareLedgerSnapshot } from "./types.js";
import { LedgerError } from "./types.js";

export class ShareLedger {
  private readonly _balances: Map<Address, bigint> = new Map();
  private readonly _allowances: Map<Address, Map<Address, bigint>> = new Map();
  private _totalSupply = 0n;

  constructor(readonly journal: Journal = new Journal()) {}

  // ─── Reads ───────────────────────────────────────────────────────────

  balanceOf(holder: Address): bigint {
    return this._balances.get(holder) ?? 0n;
  }

  totalSupply(): bigint {
    return this._totalSupply;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this._allowances.get(owner)?.get(spender) ?? 0n;
  }

  // ─── Supply ──────────────────────────────────────────────────────────

  /**
   * Create `amount` shares for `to`.
   */
  mint(to: Address, amount: bigint): void {
    assertUint256(amount);
    if (to === ZERO_ADDRESS) {
      throw new LedgerError("INVALID_RECEIVER", "Cannot mint to the zero address", {
        account: to,
      });
    }

    const supply = checkedAdd(this._totalSupply, amount);
    const balance = this.balanceOf(to) + amount;
    this.setSupply(supply);
    this.setBalance(to, balance);
  }

  /**
   * Destroy `amount` shares held by `from`.
   */
  burn(from: Address, amount: bigint): void {
    assertUint256(amount);
    if (from === ZERO_ADDRESS) {
      throw new LedgerError("INVALID_SENDER", "Cannot burn from the zero address", {
        account: from,
      });
    }

    const balance = this.requireBalance(from, amount);
    this.setBalance(from, balance - amount);
    this.setSupply(this._totalSupply - amount);
  }

  // ─── Transfers ───────────────────────────────────────────────────────

  /**
   * Move `amount` shares from one holder to another.
   * Self-transfers are permitted and leave balances unchanged.
   */
  transfer(from: Address, to: Address, amount: bigint): void {
    assertUint256(amount);
    if (from === ZERO_ADDRESS) {
      throw new LedgerError("INVALID_SENDER", "Cannot transfer from the zero address", {
        account: from,
      });
    }
    if (to === ZERO_ADDRESS) {
      throw new LedgerError("INVALID_RECEIVER", "Cannot transfer to the zero address", {
        account: to,
      });
    }

    const fromBalance = this.requireBalance(from, amount);
    this.setBalance(from, fromBalance - amount);
    this.setBalance(to, this.balanceOf(to) + amount);
  }

  // ─── Allowances ──────────────────────────────────────────────────────

  /**
   * Set the allowance of `spender` over `owner`'s shares. Overwrites.
   */
  approve(owner: Address, spender: Address, amount: bigint): void {
    assertUint256(amount);
    if (owner === ZERO_ADDRESS) {
      throw new LedgerError("INVALID_APPROVER", "Approver cannot be the zero address", {
        account: owner,
      });
    }
    if (spender === ZERO_ADDRESS) {
      throw new LedgerError("INVALID_SPENDER", "Spender cannot be the zero address", {
        account: spender,
      });
    }

    this.setAllowance(owner, spender, amount);
  }

  /**
   * Consume `amount` of `spender`'s allowance over `owner`.
   * An allowance of MAX_UINT256 is unlimited and never decremented.
   */
  spendAllowance(owner: Address, spender: Address, amount: bigint): void {
    assertUint256(amount);
    const current = this.allowance(owner, spender);
    if (current === MAX_UINT256) {
      return;
    }
    if (current < amount) {
      throw new LedgerError(
        "INSUFFICIENT_ALLOWANCE",
        `Allowance of ${spender} over ${owner} is ${current.toString()}, needed ${amount.toString()}`,
        { spender, allowance: current.toString(), needed: amount.toString() },
      );
    }
    this.setAllowance(owner, spender, current - amount);
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  /**
   * Create a serializable snapshot of the ledger.
   * Can be restored with ShareLedger.fromSnapshot().
   */
  snapshot(): ShareLedgerSnapshot {
    const allowances: { owner: Address; spender: Address; amount: string }[] = [];
    for (const [owner, spenders] of this._allowances) {
      for (const [spender, amount] of spenders) {
        allowances.push({ owner, spender, amount: amount.toString() });
      }
    }

    return {
      version: 1,
      totalSupply: this._totalSupply.toString(),
      balances: [...this._balances].map(([holder, shares]) => ({
        holder,
        shares: shares.toString(),
      })),
      allowances,
    };
  }

  /**
   * Restore a ledger from a snapshot.
   * Rejects snapshots whose balances do not sum to the recorded supply.
   */
  static fromSnapshot(snapshot: ShareLedgerSnapshot, journal?: Journal): ShareLedger {
    const ledger = new ShareLedger(journal);

    let sum = 0n;
    for (const { holder, shares } of snapshot.balances) {
      const amount = assertUint256(parseSnapshotAmount(shares));
      ledger._balances.set(holder, amount);
      sum += amount;
    }

    for (const { owner, spender, amount } of snapshot.allowances) {
      let spenders = ledger._allowances.get(owner);
      if (spenders === undefined) {
        spenders = new Map();
        ledger._allowances.set(owner, spenders);
      }
      spenders.set(spender, assertUint256(parseSnapshotAmount(amount)));
    }

    const supply = assertUint256(parseSnapshotAmount(snapshot.totalSupply));
    if (sum !== supply) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Balances sum to ${sum.toString()} but totalSupply is ${supply.toString()}`,
      );
    }
    ledger._totalSupply = supply;

    return ledger;
  }

  // ─── Private helpers ─────────────────────────────────────────────────

  private requireBalance(holder: Address, needed: bigint): bigint {
    const balance = this.balanceOf(holder);
    if (balance < needed) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Balance of ${holder} is ${balance.toString()}, needed ${needed.toString()}`,
        { account: holder, balance: balance.toString(), needed: needed.toString() },
      );
    }
    return balance;
  }

  private setBalance(holder: Address, value: bigint): void {
    const previous = this._balances.get(holder);
    this.journal.record(() => {
      if (previous === undefined) {
        this._balances.delete(holder);
      } else {
        this._balances.set(holder, previous);
      }
    });
    this._balances.set(holder, value);
  }

  private setSupply(value: bigint): void {
    const previous = this._totalSupply;
    this.journal.record(() => {
      this._totalSupply = previous;
    });
    this._totalSupply = value;
  }

  private setAllowance(owner: Address, spender: Address, value: bigint): void {
    let spenders = this._allowances.get(owner);
    if (spenders === undefined) {
      spenders = new Map();
      this._allowances.set(owner, spenders);
    }
    const previous = spenders.get(spender);
    const target = spenders;
    this.journal.record(() => {
      if (previous === undefined) {
        target.delete(spender);
      } else {
        target.set(spender, previous);
      }
    });
    target.set(spender, value);
  }
}

function parseSnapshotAmount(value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new LedgerError("INVALID_SNAPSHOT", `Invalid snapshot amount: "${value}"`);
  }
  return BigInt(value);
}
