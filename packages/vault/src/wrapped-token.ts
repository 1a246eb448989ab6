/**
 * WrappedToken — value-accruing, non-rebasing wrapper over a rebasing asset.
 *
 * Holders deposit the rebasing asset and receive shares; share balances
 * never change on their own, while the rate between shares and assets
 * follows the asset balance the vault holds.
 *
 * Every mutating call runs as one guarded unit:
 * 1. Re-entry is rejected (REENTRANT_CALL)
 * 2. Local writes (shares, allowances, nonces, roles, pause) are journaled
 * 3. Local state is committed before the final call into the asset
 * 4. Any throw reverts the journal; records are published only on success
 *
 * The asset's pause flag and ban list are read live on every gated call.
 */

import type { Address, Hex, RoleId, SignatureComponents, TokenDomain, VaultEvent } from "@wtoken/types";
import {
  DEFAULT_ADMIN_ROLE,
  MAX_UINT256,
  PAUSE_ROLE,
  UPGRADE_ROLE,
  ZERO_ADDRESS,
  isHolderAddress,
  roleName,
} from "@wtoken/types";
import {
  ConversionEngine,
  Journal,
  LedgerError,
  ShareLedger,
  assertUint256,
  checkedAdd,
} from "@wtoken/ledger";
import { getAddress } from "viem";
import type { RebasingAssetSource } from "./asset-source.js";
import { RoleTable } from "./access-control.js";
import { VaultEventLog } from "./event-log.js";
import type { PermitRequest, RecoverSigner } from "./permit.js";
import { PermitAuthority, recoverWithViem } from "./permit.js";
import { TransferGate } from "./transfer-gate.js";
import type {
  Clock,
  InitializeParams,
  UpgradeRecord,
  VaultErrorCode,
  VaultLogger,
  WrappedTokenConfig,
  WrappedTokenSnapshot,
} from "./types.js";
import { VaultError, silentLogger, systemClock } from "./types.js";

export interface WrappedTokenOptions {
  readonly logger?: VaultLogger;
  readonly clock?: Clock;
  readonly recoverSigner?: RecoverSigner;
  readonly events?: VaultEventLog;
}

interface Binding {
  readonly asset: RebasingAssetSource;
  readonly gate: TransferGate;
}

export class WrappedToken {
  readonly address: Address;
  readonly chainId: number;
  readonly events: VaultEventLog;

  private readonly _name: string;
  private readonly _configuredSymbol: string | undefined;
  private readonly logger: VaultLogger;
  private readonly clock: Clock;
  private readonly journal = new Journal();
  private readonly roles: RoleTable;
  private readonly permits: PermitAuthority;
  private readonly conversion: ConversionEngine;
  private ledger: ShareLedger;

  private _binding: Binding | null = null;
  private _symbol = "";
  private _paused = false;
  private _upgrades: UpgradeRecord[] = [];
  private _entered = false;
  private _pending: VaultEvent[] = [];

  constructor(config: WrappedTokenConfig, options: WrappedTokenOptions = {}) {
    this.address = canonical(config.address);
    this.chainId = config.chainId;
    this._name = config.name;
    this._configuredSymbol = config.symbol;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
    this.events = options.events ?? new VaultEventLog(this.logger);

    this.ledger = new ShareLedger(this.journal);
    this.roles = new RoleTable(this.journal, this.logger);
    this.permits = new PermitAuthority(
      () => this.eip712Domain(),
      this.journal,
      options.recoverSigner ?? recoverWithViem,
    );
    this.conversion = new ConversionEngine(() => ({
      totalAssets: this.totalAssets(),
      totalSupply: this.ledger.totalSupply(),
    }));
  }

  // ─── Initialization ──────────────────────────────────────────────────

  /**
   * Bind the wrapped asset and grant DEFAULT_ADMIN_ROLE to `admin`.
   * Allowed exactly once per instance.
   */
  initialize(params: InitializeParams): void {
    if (this._binding !== null) {
      throw new VaultError("ALREADY_INITIALIZED", "Token is already initialized");
    }
    const admin = canonical(params.admin);

    this.guarded(() => {
      this.bind(params.asset);
      this._symbol = this._configuredSymbol ?? `w${params.asset.symbol()}`;
      this.roles.grantInitial(DEFAULT_ADMIN_ROLE, admin);
      this.emit({ type: "RoleGranted", role: DEFAULT_ADMIN_ROLE, account: admin, sender: admin });
      this.emit({ type: "Initialized", version: 1 });
    });

    this.logger.info(
      { token: this.address, asset: params.asset.address, admin },
      "Wrapped token initialized",
    );
  }

  get initialized(): boolean {
    return this._binding !== null;
  }

  // ─── Metadata ────────────────────────────────────────────────────────

  name(): string {
    return this._name;
  }

  symbol(): string {
    this.binding();
    return this._symbol;
  }

  decimals(): number {
    return 18;
  }

  /** Address of the wrapped asset. */
  asset(): Address {
    return this.binding().asset.address;
  }

  /** Asset balance held by the vault, read live. */
  totalAssets(): bigint {
    return this.binding().asset.balanceOf(this.address);
  }

  totalSupply(): bigint {
    return this.ledger.totalSupply();
  }

  balanceOf(account: Address): bigint {
    return this.ledger.balanceOf(canonical(account));
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.ledger.allowance(canonical(owner), canonical(spender));
  }

  // ─── Conversions and quotes ──────────────────────────────────────────

  convertToShares(assets: bigint): bigint {
    return this.conversion.convertToShares(assets);
  }

  convertToAssets(shares: bigint): bigint {
    return this.conversion.convertToAssets(shares);
  }

  previewDeposit(assets: bigint): bigint {
    return this.conversion.previewDeposit(assets);
  }

  previewMint(shares: bigint): bigint {
    return this.conversion.previewMint(shares);
  }

  previewWithdraw(assets: bigint): bigint {
    return this.conversion.previewWithdraw(assets);
  }

  previewRedeem(shares: bigint): bigint {
    return this.conversion.previewRedeem(shares);
  }

  // ─── Bounds ──────────────────────────────────────────────────────────

  maxDeposit(_receiver: Address): bigint {
    return this.paused() ? 0n : MAX_UINT256;
  }

  maxMint(_receiver: Address): bigint {
    return this.paused() ? 0n : MAX_UINT256;
  }

  maxWithdraw(owner: Address): bigint {
    if (this.paused()) return 0n;
    return this.conversion.convertToAssets(this.balanceOf(owner));
  }

  maxRedeem(owner: Address): bigint {
    if (this.paused()) return 0n;
    return this.balanceOf(owner);
  }

  // ─── Vault operations ────────────────────────────────────────────────

  /** Pull `assets` from `caller`, credit the resulting shares to `receiver`. */
  deposit(caller: Address, assets: bigint, receiver: Address): bigint {
    const from = canonical(caller);
    const to = canonical(receiver);
    return this.execute(() => {
      this.assertWithinMax("EXCEEDED_MAX_DEPOSIT", to, assets, this.maxDeposit(to));
      const shares = this.previewDeposit(assets);
      this.enter(from, to, assets, shares);
      return shares;
    });
  }

  /** Credit exactly `shares` to `receiver`, pulling the required assets from `caller`. */
  mint(caller: Address, shares: bigint, receiver: Address): bigint {
    const from = canonical(caller);
    const to = canonical(receiver);
    return this.execute(() => {
      this.assertWithinMax("EXCEEDED_MAX_MINT", to, shares, this.maxMint(to));
      const assets = this.previewMint(shares);
      this.enter(from, to, assets, shares);
      return assets;
    });
  }

  /** Burn the shares worth exactly `assets` from `owner`, paying `receiver`. */
  withdraw(caller: Address, assets: bigint, owner: Address, receiver: Address): bigint {
    const by = canonical(caller);
    const from = canonical(owner);
    const to = canonical(receiver);
    return this.execute(() => {
      this.assertWithinMax("EXCEEDED_MAX_WITHDRAW", from, assets, this.maxWithdraw(from));
      const shares = this.previewWithdraw(assets);
      this.exit(by, to, from, assets, shares);
      return shares;
    });
  }

  /** Burn exactly `shares` from `owner`, paying their asset value to `receiver`. */
  redeem(caller: Address, shares: bigint, owner: Address, receiver: Address): bigint {
    const by = canonical(caller);
    const from = canonical(owner);
    const to = canonical(receiver);
    return this.execute(() => {
      this.assertWithinMax("EXCEEDED_MAX_REDEEM", from, shares, this.maxRedeem(from));
      const assets = this.previewRedeem(shares);
      this.exit(by, to, from, assets, shares);
      return assets;
    });
  }

  // ─── Share transfers ─────────────────────────────────────────────────

  transfer(sender: Address, to: Address, value: bigint): true {
    const from = canonical(sender);
    const recipient = canonical(to);
    this.execute(() => {
      this.move(from, recipient, value);
    });
    return true;
  }

  transferFrom(spender: Address, from: Address, to: Address, value: bigint): true {
    const by = canonical(spender);
    const owner = canonical(from);
    const recipient = canonical(to);
    this.execute(() => {
      this.spendAllowance(owner, by, value);
      this.move(owner, recipient, value);
    });
    return true;
  }

  approve(owner: Address, spender: Address, value: bigint): true {
    const o = canonical(owner);
    const s = canonical(spender);
    this.execute(() => {
      this.setAllowance(o, s, value);
    });
    return true;
  }

  increaseAllowance(owner: Address, spender: Address, added: bigint): true {
    const o = canonical(owner);
    const s = canonical(spender);
    this.execute(() => {
      assertUint256(added);
      this.setAllowance(o, s, checkedAdd(this.ledger.allowance(o, s), added));
    });
    return true;
  }

  decreaseAllowance(owner: Address, spender: Address, subtracted: bigint): true {
    const o = canonical(owner);
    const s = canonical(spender);
    this.execute(() => {
      assertUint256(subtracted);
      const current = this.ledger.allowance(o, s);
      if (current < subtracted) {
        throw new LedgerError(
          "INSUFFICIENT_ALLOWANCE",
          `Allowance of ${s} over ${o} is ${current.toString()}, cannot decrease by ${subtracted.toString()}`,
          { spender: s, allowance: current.toString(), needed: subtracted.toString() },
        );
      }
      this.setAllowance(o, s, current - subtracted);
    });
    return true;
  }

  // ─── Permit ──────────────────────────────────────────────────────────

  /**
   * Approve `spender` from an owner-signed message.
   *
   * The signature is recovered first; the nonce is then consumed and the
   * allowance set in one guarded unit. A permit that raced another permit
   * for the same owner fails as an invalid signature; one whose deadline
   * passed during recovery fails as expired.
   */
  async permit(
    owner: Address,
    spender: Address,
    value: bigint,
    deadline: bigint,
    signature: SignatureComponents,
  ): Promise<void> {
    this.binding();
    const request: PermitRequest = {
      owner: canonical(owner),
      spender: canonical(spender),
      value: assertUint256(value),
      deadline: assertUint256(deadline, "deadline"),
      signature,
    };

    const nonce = await this.permits.verify(request, this.clock());

    this.execute(() => {
      this.permits.useNonce(request, nonce, this.clock());
      this.setAllowance(request.owner, request.spender, request.value);
    });
  }

  nonces(owner: Address): bigint {
    return this.permits.nonces(canonical(owner));
  }

  DOMAIN_SEPARATOR(): Hex {
    return this.permits.domainSeparator();
  }

  eip712Domain(): TokenDomain {
    return {
      name: this._name,
      version: "1",
      chainId: this.chainId,
      verifyingContract: this.address,
    };
  }

  // ─── Pause ───────────────────────────────────────────────────────────

  /** Local flag OR the wrapped asset's flag, read live. */
  paused(): boolean {
    return this.binding().gate.paused();
  }

  /** Whether the local flag alone is set. */
  pausedLocally(): boolean {
    return this._paused;
  }

  pause(caller: Address): void {
    this.setPaused(canonical(caller), true);
  }

  unpause(caller: Address): void {
    this.setPaused(canonical(caller), false);
  }

  // ─── Roles ───────────────────────────────────────────────────────────

  hasRole(role: RoleId, account: Address): boolean {
    return this.roles.hasRole(role, canonical(account));
  }

  getRoleAdmin(role: RoleId): RoleId {
    return this.roles.getRoleAdmin(role);
  }

  grantRole(caller: Address, role: RoleId, account: Address): void {
    const sender = canonical(caller);
    const target = canonical(account);
    const changed = this.execute(() => {
      const granted = this.roles.grantRole(sender, role, target);
      if (granted) this.emit({ type: "RoleGranted", role, account: target, sender });
      return granted;
    });
    if (changed) {
      this.logger.info({ role: roleName(role), account: target, sender }, "Role granted");
    }
  }

  revokeRole(caller: Address, role: RoleId, account: Address): void {
    const sender = canonical(caller);
    const target = canonical(account);
    const changed = this.execute(() => {
      const revoked = this.roles.revokeRole(sender, role, target);
      if (revoked) this.emit({ type: "RoleRevoked", role, account: target, sender });
      return revoked;
    });
    if (changed) {
      this.logger.info({ role: roleName(role), account: target, sender }, "Role revoked");
    }
  }

  renounceRole(caller: Address, role: RoleId, account: Address): void {
    const sender = canonical(caller);
    const target = canonical(account);
    const changed = this.execute(() => {
      const revoked = this.roles.renounceRole(sender, role, target);
      if (revoked) this.emit({ type: "RoleRevoked", role, account: target, sender });
      return revoked;
    });
    if (changed) {
      this.logger.info({ role: roleName(role), account: target }, "Role renounced");
    }
  }

  // ─── Upgrades ────────────────────────────────────────────────────────

  /** Hook an external upgrade orchestrator calls before switching logic. */
  authorizeUpgrade(caller: Address): void {
    this.binding();
    this.roles.requireRole(UPGRADE_ROLE, canonical(caller));
  }

  /**
   * Authorize and record a new implementation. Returns its version.
   */
  upgradeTo(caller: Address, implementation: Address): number {
    const by = canonical(caller);
    const target = canonical(implementation);
    const version = this.execute(() => {
      this.authorizeUpgrade(by);
      const record: UpgradeRecord = {
        version: this.implementationVersion() + 1,
        implementation: target,
        authorizedBy: by,
      };
      this.setUpgrades([...this._upgrades, record]);
      this.emit({ type: "Upgraded", implementation: target, version: record.version });
      return record.version;
    });
    this.logger.info({ implementation: target, version, authorizedBy: by }, "Upgrade authorized");
    return version;
  }

  /** 1 for the initialized implementation, then one more per upgrade. */
  implementationVersion(): number {
    return 1 + this._upgrades.length;
  }

  upgradeHistory(): readonly UpgradeRecord[] {
    return [...this._upgrades];
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  /**
   * Serializable local state. The wrapped asset is not included; its
   * state is owned elsewhere.
   */
  snapshot(): WrappedTokenSnapshot {
    this.binding();
    return {
      version: 1,
      symbol: this._symbol,
      paused: this._paused,
      ledger: this.ledger.snapshot(),
      nonces: this.permits.entries(),
      roles: this.roles.entries(),
      upgrades: [...this._upgrades],
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Rebuild an initialized token from a snapshot, bound to `asset`.
   */
  static fromSnapshot(
    config: WrappedTokenConfig,
    snapshot: WrappedTokenSnapshot,
    asset: RebasingAssetSource,
    options: WrappedTokenOptions = {},
  ): WrappedToken {
    if (snapshot.version !== 1) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Unsupported snapshot version: ${String(snapshot.version)}`,
      );
    }

    const token = new WrappedToken(config, options);
    token.ledger = ShareLedger.fromSnapshot(snapshot.ledger, token.journal);
    token.permits.restore(snapshot.nonces);
    token.roles.restore(snapshot.roles);
    token._upgrades = [...snapshot.upgrades];
    token._paused = snapshot.paused;
    token._symbol = snapshot.symbol;
    token.bind(asset);
    return token;
  }

  // ─── Private: units of work ──────────────────────────────────────────

  private execute<T>(fn: () => T): T {
    this.binding();
    return this.guarded(fn);
  }

  private guarded<T>(fn: () => T): T {
    if (this._entered) {
      throw new VaultError("REENTRANT_CALL", "Re-entrant call into the wrapped token");
    }

    this._entered = true;
    this._pending = [];
    let committed: { result: T; events: readonly VaultEvent[] };
    try {
      committed = this.journal.atomically(() => ({ result: fn(), events: this._pending }));
    } finally {
      this._entered = false;
      this._pending = [];
    }

    this.events.append(committed.events);
    return committed.result;
  }

  private emit(event: VaultEvent): void {
    this._pending.push(event);
  }

  // ─── Private: legs ───────────────────────────────────────────────────

  private enter(caller: Address, receiver: Address, assets: bigint, shares: bigint): void {
    const { asset, gate } = this.binding();
    gate.assertTransferAllowed(ZERO_ADDRESS, receiver);
    this.ledger.mint(receiver, shares);
    asset.transferFrom(this.address, caller, this.address, assets);
    this.emit({ type: "Transfer", from: ZERO_ADDRESS, to: receiver, value: shares });
    this.emit({ type: "Deposit", caller, receiver, assets, shares });
  }

  private exit(
    caller: Address,
    receiver: Address,
    owner: Address,
    assets: bigint,
    shares: bigint,
  ): void {
    const { asset, gate } = this.binding();
    if (caller !== owner) {
      this.spendAllowance(owner, caller, shares);
    }
    gate.assertTransferAllowed(owner, ZERO_ADDRESS);
    this.ledger.burn(owner, shares);
    asset.transfer(this.address, receiver, assets);
    this.emit({ type: "Transfer", from: owner, to: ZERO_ADDRESS, value: shares });
    this.emit({ type: "Withdraw", caller, receiver, owner, assets, shares });
  }

  private move(from: Address, to: Address, value: bigint): void {
    this.binding().gate.assertTransferAllowed(from, to);
    this.ledger.transfer(from, to, value);
    this.emit({ type: "Transfer", from, to, value });
  }

  private setAllowance(owner: Address, spender: Address, value: bigint): void {
    this.ledger.approve(owner, spender, value);
    this.emit({ type: "Approval", owner, spender, value });
  }

  private spendAllowance(owner: Address, spender: Address, amount: bigint): void {
    const before = this.ledger.allowance(owner, spender);
    this.ledger.spendAllowance(owner, spender, amount);
    const after = this.ledger.allowance(owner, spender);
    if (after !== before) {
      this.emit({ type: "Approval", owner, spender, value: after });
    }
  }

  private assertWithinMax(
    code: Extract<VaultErrorCode, `EXCEEDED_MAX_${string}`>,
    account: Address,
    amount: bigint,
    max: bigint,
  ): void {
    assertUint256(amount);
    if (amount > max) {
      this.logger.debug({ code, account, amount: amount.toString(), max: max.toString() }, "Bound exceeded");
      throw new VaultError(
        code,
        `Amount ${amount.toString()} exceeds maximum ${max.toString()} for ${account}`,
        { details: { account, amount: amount.toString(), max: max.toString() } },
      );
    }
  }

  // ─── Private: state ──────────────────────────────────────────────────

  private binding(): Binding {
    if (this._binding === null) {
      throw new VaultError("NOT_INITIALIZED", "Token is not initialized");
    }
    return this._binding;
  }

  private bind(asset: RebasingAssetSource): void {
    const binding: Binding = {
      asset,
      gate: new TransferGate(asset, () => this._paused, this.logger),
    };
    this.journal.record(() => {
      this._binding = null;
    });
    this._binding = binding;
  }

  private setPaused(caller: Address, value: boolean): void {
    const changed = this.execute(() => {
      this.roles.requireRole(PAUSE_ROLE, caller);
      if (this._paused === value) return false;

      const previous = this._paused;
      this.journal.record(() => {
        this._paused = previous;
      });
      this._paused = value;
      this.emit({ type: value ? "Paused" : "Unpaused", account: caller });
      return true;
    });
    if (changed) {
      this.logger.info({ account: caller }, value ? "Token paused" : "Token unpaused");
    }
  }

  private setUpgrades(next: UpgradeRecord[]): void {
    const previous = this._upgrades;
    this.journal.record(() => {
      this._upgrades = previous;
    });
    this._upgrades = next;
  }
}

/**
 * Validate and checksum an address. Every holder key in the ledger is
 * in checksummed form.
 */
function canonical(address: string): Address {
  if (!isHolderAddress(address)) {
    throw new VaultError("INVALID_ADDRESS", `Invalid address: "${address}"`, {
      details: { address },
    });
  }
  return getAddress(address);
}
