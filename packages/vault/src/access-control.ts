/**
 * AccessController — role checks for administrative transitions.
 *
 * The wrapper depends only on the AccessController interface
 * (hasRole / requireRole). RoleTable is the in-process implementation:
 * holders of DEFAULT_ADMIN_ROLE grant and revoke every role.
 *
 * Writes go through the journal; grant/revoke report whether anything
 * changed so callers emit records only for real transitions.
 */

import { getAddress } from "viem";
import type { Journal } from "@wtoken/ledger";
import { LedgerError } from "@wtoken/ledger";
import type { Address, RoleId } from "@wtoken/types";
import { DEFAULT_ADMIN_ROLE, isHolderAddress, isRoleId, roleName } from "@wtoken/types";
import type { VaultLogger } from "./types.js";
import { VaultError, silentLogger } from "./types.js";

export interface AccessController {
  hasRole(role: RoleId, account: Address): boolean;

  /** Throws UNAUTHORIZED carrying (account, role) when the role is missing. */
  requireRole(role: RoleId, account: Address): void;
}

export class RoleTable implements AccessController {
  private readonly _members: Map<RoleId, Set<Address>> = new Map();

  constructor(
    private readonly journal: Journal,
    private readonly logger: VaultLogger = silentLogger,
  ) {}

  hasRole(role: RoleId, account: Address): boolean {
    return this._members.get(role)?.has(account) ?? false;
  }

  requireRole(role: RoleId, account: Address): void {
    if (!this.hasRole(role, account)) {
      this.logger.debug({ account, role: roleName(role) }, "Call rejected: missing role");
      throw new VaultError(
        "UNAUTHORIZED",
        `Account ${account} is missing role ${roleName(role)}`,
        { details: { account, role } },
      );
    }
  }

  /** Every role is administered by DEFAULT_ADMIN_ROLE, including itself. */
  getRoleAdmin(_role: RoleId): RoleId {
    return DEFAULT_ADMIN_ROLE;
  }

  // ─── Administration ──────────────────────────────────────────────────

  /** `sender` must hold the role's admin role. Returns true if granted now. */
  grantRole(sender: Address, role: RoleId, account: Address): boolean {
    this.requireRole(this.getRoleAdmin(role), sender);
    return this.setMember(role, account, true);
  }

  /** `sender` must hold the role's admin role. Returns true if revoked now. */
  revokeRole(sender: Address, role: RoleId, account: Address): boolean {
    this.requireRole(this.getRoleAdmin(role), sender);
    return this.setMember(role, account, false);
  }

  /** Give up a role held by `sender`. `account` must equal `sender`. */
  renounceRole(sender: Address, role: RoleId, account: Address): boolean {
    if (account !== sender) {
      throw new VaultError("BAD_CONFIRMATION", "Roles can only be renounced for oneself", {
        details: { account, sender },
      });
    }
    return this.setMember(role, account, false);
  }

  /** Unchecked grant, used once by the initializer. */
  grantInitial(role: RoleId, account: Address): boolean {
    return this.setMember(role, account, true);
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  entries(): readonly { readonly role: RoleId; readonly members: readonly Address[] }[] {
    return [...this._members]
      .filter(([, members]) => members.size > 0)
      .map(([role, members]) => ({ role, members: [...members] }));
  }

  restore(entries: readonly { readonly role: RoleId; readonly members: readonly Address[] }[]): void {
    for (const { role, members } of entries) {
      if (!isRoleId(role)) {
        throw new LedgerError("INVALID_SNAPSHOT", `Invalid role id: "${role}"`);
      }
      const accounts = new Set<Address>();
      for (const member of members) {
        if (!isHolderAddress(member)) {
          throw new LedgerError("INVALID_SNAPSHOT", `Invalid member of ${roleName(role)}: "${member}"`);
        }
        accounts.add(getAddress(member));
      }
      this._members.set(role, accounts);
    }
  }

  // ─── Private helpers ─────────────────────────────────────────────────

  private setMember(role: RoleId, account: Address, member: boolean): boolean {
    if (this.hasRole(role, account) === member) {
      return false;
    }

    let members = this._members.get(role);
    if (members === undefined) {
      members = new Set();
      this._members.set(role, members);
    }
    const target = members;

    if (member) {
      target.add(account);
      this.journal.record(() => target.delete(account));
    } else {
      target.delete(account);
      this.journal.record(() => target.add(account));
    }
    return true;
  }
}
