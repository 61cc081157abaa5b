/**
 * LocalNetwork — single-process execution host.
 *
 * Holds the chain id, a settable clock, native balances and deployed
 * contracts. Every call runs to completion before the next one starts.
 *
 * Properties:
 * - Calls are atomic: a throwing call restores balances, the contract
 *   table and the state of every deployed contract
 * - Nested calls nest their atomic sections, like EVM sub-calls
 * - Calls to addresses without a contract only move value
 * - The clock never moves backwards
 */

import { getAddress } from "viem";
import type { Address, Hex } from "@quorumsafe/types";
import type { CallRequest, Contract } from "./types.js";
import { NetworkError } from "./types.js";

export const DEFAULT_CHAIN_ID = 31337;

export interface LocalNetworkConfig {
  /** EIP-155 chain id. Default: 31337 */
  readonly chainId?: number;

  /** Initial clock in unix seconds. Default: wall clock */
  readonly timestamp?: number;
}

export class LocalNetwork {
  readonly chainId: number;
  private time: number;
  private balances = new Map<Address, bigint>();
  private contracts = new Map<Address, Contract>();

  constructor(config: LocalNetworkConfig = {}) {
    const chainId = config.chainId ?? DEFAULT_CHAIN_ID;
    if (!Number.isSafeInteger(chainId) || chainId < 1) {
      throw new NetworkError("INVALID_CHAIN_ID", `Invalid chain id: ${chainId}`);
    }
    this.chainId = chainId;
    this.time = config.timestamp ?? Math.floor(Date.now() / 1000);
    this.requireTime(this.time);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Clock
  // ───────────────────────────────────────────────────────────────────────

  /** Current unix time in seconds. */
  now(): number {
    return this.time;
  }

  setTime(timestamp: number): void {
    this.requireTime(timestamp);
    if (timestamp < this.time) {
      throw new NetworkError(
        "INVALID_TIME",
        `Clock cannot move backwards: ${timestamp} < ${this.time}`,
      );
    }
    this.time = timestamp;
  }

  advanceTime(seconds: number): number {
    this.requireTime(seconds);
    this.setTime(this.time + seconds);
    return this.time;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Accounts
  // ───────────────────────────────────────────────────────────────────────

  balanceOf(address: Address): bigint {
    return this.balances.get(getAddress(address)) ?? 0n;
  }

  setBalance(address: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new NetworkError("INVALID_AMOUNT", `Balance cannot be negative: ${amount}`);
    }
    this.balances.set(getAddress(address), amount);
  }

  deploy(address: Address, contract: Contract): Address {
    const key = getAddress(address);
    if (this.contracts.has(key)) {
      throw new NetworkError("ADDRESS_IN_USE", `A contract already exists at ${key}`);
    }
    this.contracts.set(key, contract);
    return key;
  }

  contractAt(address: Address): Contract | undefined {
    return this.contracts.get(getAddress(address));
  }

  hasCode(address: Address): boolean {
    return this.contracts.has(getAddress(address));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Execution
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Move `value` from `from` to `to`, then dispatch `data` to the contract at
   * `to` if there is one. Returns the contract's return data, or "0x".
   */
  call(request: CallRequest): Hex {
    const from = getAddress(request.from);
    const to = getAddress(request.to);

    return this.atomically(() => {
      this.transfer(from, to, request.value);

      const contract = this.contracts.get(to);
      if (contract === undefined) {
        return "0x";
      }
      return contract.call({ ...request, from, to, network: this });
    });
  }

  /**
   * Run `fn`; if it throws, restore every balance, the contract table and
   * each deployed contract's state, then rethrow.
   */
  atomically<T>(fn: () => T): T {
    const restore = this.checkpoint();
    try {
      return fn();
    } catch (err) {
      restore();
      throw err;
    }
  }

  /**
   * Run `fn` and always restore afterwards. Used for view calls that must
   * not leave effects behind.
   */
  readOnly<T>(fn: () => T): T {
    const restore = this.checkpoint();
    try {
      return fn();
    } finally {
      restore();
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private checkpoint(): () => void {
    const balances = new Map(this.balances);
    const contracts = new Map(this.contracts);
    const restores = [...contracts.values()].map((c) => c.checkpoint());

    return () => {
      this.balances = balances;
      this.contracts = contracts;
      for (const restore of restores) {
        restore();
      }
    };
  }

  private transfer(from: Address, to: Address, value: bigint): void {
    if (value < 0n) {
      throw new NetworkError("INVALID_AMOUNT", `Call value cannot be negative: ${value}`);
    }
    if (value === 0n || from === to) {
      return;
    }

    const available = this.balances.get(from) ?? 0n;
    if (available < value) {
      throw new NetworkError(
        "INSUFFICIENT_BALANCE",
        `${from} holds ${available}, needs ${value}`,
      );
    }
    this.balances.set(from, available - value);
    this.balances.set(to, (this.balances.get(to) ?? 0n) + value);
  }

  private requireTime(value: number): void {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new NetworkError("INVALID_TIME", `Invalid time value: ${value}`);
    }
  }
}
