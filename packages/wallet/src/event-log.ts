/**
 * Wallet Event Log — append-only, hash-chained event history.
 *
 * Each entry is hashed with RFC 8785 (JCS) canonicalization + SHA-256 and
 * linked to its predecessor:
 *
 *   entry[0].hash = sha256(canonicalize(event[0]) + "genesis")
 *   entry[n].hash = sha256(canonicalize(event[n]) + entry[n-1].hash)
 *
 * Subscribers are dispatched synchronously on append, except inside
 * {@link WalletEventLog.deferred}, where dispatch waits until the section
 * returns and is dropped if it throws.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { Address, WalletEvent, WalletEventBody } from "@quorumsafe/types";
import type { Checkpointable } from "./network/types.js";

export const GENESIS_HASH = "genesis";

export interface LoggedEvent {
  readonly event: WalletEvent;
  readonly hash: string;
  readonly previousHash: string;
}

export type WalletEventHandler = (event: WalletEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

export interface IntegrityError {
  readonly sequence: number;
  readonly reason: string;
}

export interface IntegrityResult {
  readonly valid: boolean;
  readonly length: number;
  readonly errors: readonly IntegrityError[];
}

export function computeEventHash(event: WalletEvent, previousHash: string): string {
  return createHash("sha256")
    .update(canonicalize(event) + previousHash)
    .digest("hex");
}

/**
 * Recompute the chain over `entries` and report every break.
 */
export function verifyEventChain(entries: readonly LoggedEvent[]): IntegrityResult {
  const errors: IntegrityError[] = [];
  let previousHash = GENESIS_HASH;

  entries.forEach((entry, i) => {
    if (entry.event.sequence !== i) {
      errors.push({
        sequence: i,
        reason: `Sequence gap: expected ${i}, got ${entry.event.sequence}`,
      });
    }
    if (entry.previousHash !== previousHash) {
      errors.push({
        sequence: i,
        reason: `previousHash mismatch at ${i}`,
      });
    }
    if (entry.hash !== computeEventHash(entry.event, entry.previousHash)) {
      errors.push({ sequence: i, reason: `Hash mismatch at ${i}` });
    }
    previousHash = entry.hash;
  });

  return { valid: errors.length === 0, length: entries.length, errors };
}

export class WalletEventLog implements Checkpointable {
  private entries: LoggedEvent[] = [];
  private readonly subscribers = new Set<WalletEventHandler>();
  private pendingFrom: number | null = null;

  constructor(
    private readonly wallet: Address,
    private readonly clock: () => number,
  ) {}

  append(body: WalletEventBody): WalletEvent {
    const event: WalletEvent = {
      ...body,
      wallet: this.wallet,
      sequence: this.entries.length,
      timestamp: this.clock(),
    };
    const previousHash = this.entries[this.entries.length - 1]?.hash ?? GENESIS_HASH;
    this.entries.push({
      event,
      hash: computeEventHash(event, previousHash),
      previousHash,
    });

    if (this.pendingFrom === null) {
      this.dispatch([event]);
    }
    return event;
  }

  /**
   * Hold dispatch until `fn` returns, then publish whatever entries survived
   * it. Nested sections join the outer one.
   */
  deferred<T>(fn: () => T): T {
    if (this.pendingFrom !== null) {
      return fn();
    }

    const from = this.entries.length;
    this.pendingFrom = from;
    let result: T;
    try {
      result = fn();
    } catch (err) {
      this.pendingFrom = null;
      throw err;
    }
    this.pendingFrom = null;
    this.dispatch(this.entries.slice(from).map((e) => e.event));
    return result;
  }

  subscribe(handler: WalletEventHandler): Subscription {
    this.subscribers.add(handler);
    return {
      unsubscribe: () => {
        this.subscribers.delete(handler);
      },
    };
  }

  history(): readonly WalletEvent[] {
    return this.entries.map((e) => e.event);
  }

  chain(): readonly LoggedEvent[] {
    return [...this.entries];
  }

  get length(): number {
    return this.entries.length;
  }

  verifyIntegrity(): IntegrityResult {
    return verifyEventChain(this.entries);
  }

  checkpoint(): () => void {
    const length = this.entries.length;
    return () => {
      this.entries = this.entries.slice(0, length);
    };
  }

  private dispatch(events: readonly WalletEvent[]): void {
    for (const handler of this.subscribers) {
      for (const event of events) {
        handler(event);
      }
    }
  }
}
