/**
 * WalletService — the node's single development network.
 *
 * Owns one {@link LocalNetwork} and the {@link WalletFactory} deployed on
 * it. Every wallet the service hands out is subscribed to `onEvent`, so the
 * node can log wallet activity without the engine knowing about logging.
 */

import {
  LocalNetwork,
  WalletFactory,
  normalizeAddress,
} from "@quorumsafe/wallet";
import type { MultisigWallet, WalletSettings } from "@quorumsafe/wallet";
import type { Address, Hex, WalletEvent } from "@quorumsafe/types";

export interface WalletServiceConfig {
  readonly chainId?: number | undefined;

  /** Initial network clock in unix seconds. Default: wall clock */
  readonly genesisTimestamp?: number | undefined;

  /** Applied to every wallet the factory deploys */
  readonly walletDefaults?: WalletSettings | undefined;

  /** Receives every event of every wallet the service has handed out */
  readonly onEvent?: ((event: WalletEvent) => void) | undefined;
}

export interface NetworkInfo {
  readonly chainId: number;
  readonly timestamp: number;
  readonly factory: Address;
  readonly walletCount: number;
}

export class NotFoundError extends Error {
  public readonly code = "NOT_FOUND";
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class WalletService {
  readonly network: LocalNetwork;
  readonly factory: WalletFactory;
  private readonly onEvent: ((event: WalletEvent) => void) | undefined;
  private readonly observed = new Set<Address>();

  constructor(config: WalletServiceConfig = {}) {
    this.network = new LocalNetwork({
      chainId: config.chainId,
      timestamp: config.genesisTimestamp,
    });
    this.factory = new WalletFactory(this.network, {
      defaults: config.walletDefaults,
    });
    this.onEvent = config.onEvent;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Network
  // ───────────────────────────────────────────────────────────────────────

  networkInfo(): NetworkInfo {
    return {
      chainId: this.network.chainId,
      timestamp: this.network.now(),
      factory: this.factory.address,
      walletCount: this.factory.walletCount,
    };
  }

  balanceOf(address: string): bigint {
    return this.network.balanceOf(normalizeAddress(address, "Address"));
  }

  /** Credit `amount` to `address`. Returns the new balance. */
  fund(address: string, amount: bigint): bigint {
    const account = normalizeAddress(address, "Address");
    this.network.setBalance(account, this.network.balanceOf(account) + amount);
    return this.network.balanceOf(account);
  }

  setTime(timestamp: number): number {
    this.network.setTime(timestamp);
    return this.network.now();
  }

  advanceTime(seconds: number): number {
    return this.network.advanceTime(seconds);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Wallets
  // ───────────────────────────────────────────────────────────────────────

  createWallet(signers: readonly string[], salt?: Hex): MultisigWallet {
    const wallet = this.factory.deploy(signers, salt !== undefined ? { salt } : {});
    return this.observe(wallet);
  }

  listWallets(offset: number, limit: number): readonly Address[] {
    return this.factory.getWallets(offset, limit);
  }

  /**
   * @throws NotFoundError if the factory never deployed a wallet there
   */
  wallet(address: string): MultisigWallet {
    const wallet = this.factory.getWallet(address);
    if (wallet === undefined) {
      throw new NotFoundError(`No wallet at ${normalizeAddress(address, "Wallet address")}`);
    }
    return this.observe(wallet);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  /** Wallets deployed by a proposal are picked up on first lookup. */
  private observe(wallet: MultisigWallet): MultisigWallet {
    const handler = this.onEvent;
    if (handler !== undefined && !this.observed.has(wallet.address)) {
      this.observed.add(wallet.address);
      wallet.subscribe(handler);
    }
    return wallet;
  }
}
