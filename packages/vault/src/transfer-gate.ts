/**
 * TransferGate — policy check before every share movement.
 *
 * Combines the local pause flag with the wrapped asset's own pause flag,
 * and consults the asset's ban list for both endpoints. Asset state is
 * read fresh on every call; nothing is cached.
 *
 * Mints (from = zero address) skip the sender check; burns
 * (to = zero address) skip the receiver check.
 */

import type { Address } from "@wtoken/types";
import { ZERO_ADDRESS } from "@wtoken/types";
import type { RebasingAssetSource } from "./asset-source.js";
import type { VaultLogger } from "./types.js";
import { VaultError } from "./types.js";

export class TransferGate {
  constructor(
    private readonly asset: RebasingAssetSource,
    private readonly localPaused: () => boolean,
    private readonly logger: VaultLogger,
  ) {}

  /**
   * Local flag OR the asset's flag.
   */
  paused(): boolean {
    return this.localPaused() || this.asset.isPaused();
  }

  /**
   * Throw unless a share movement from `from` to `to` is currently allowed.
   */
  assertTransferAllowed(from: Address, to: Address): void {
    if (this.paused()) {
      this.logger.debug({ from, to }, "Transfer rejected: paused");
      throw new VaultError("TRANSFERS_PAUSED", "Share transfers are paused");
    }

    if (from !== ZERO_ADDRESS && this.asset.isBanned(from)) {
      this.logger.debug({ account: from }, "Transfer rejected: banned sender");
      throw new VaultError("BLOCKED_SENDER", `Sender ${from} is banned by the wrapped asset`, {
        details: { account: from },
      });
    }

    if (to !== ZERO_ADDRESS && this.asset.isBanned(to)) {
      this.logger.debug({ account: to }, "Transfer rejected: banned receiver");
      throw new VaultError("BLOCKED_RECEIVER", `Receiver ${to} is banned by the wrapped asset`, {
        details: { account: to },
      });
    }
  }
}
