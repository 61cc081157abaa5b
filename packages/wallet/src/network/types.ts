/**
 * In-process host types.
 *
 * A contract is any object the network can dispatch a call to. Contracts
 * take part in atomic sections through {@link Checkpointable}: the network
 * collects a restore function from each one before a section and runs them
 * all if the section throws.
 */

import type { Address, Hex } from "@quorumsafe/types";
import type { LocalNetwork } from "./local-network.js";

export interface Checkpointable {
  /** Capture current state; the returned function puts it back. */
  checkpoint(): () => void;
}

export interface CallRequest {
  readonly from: Address;
  readonly to: Address;
  readonly value: bigint;
  readonly data: Hex;
}

export interface CallContext extends CallRequest {
  /** The network dispatching the call, for nested calls */
  readonly network: LocalNetwork;
}

export interface Contract extends Checkpointable {
  /** Handle a call. Throwing reverts the call and everything it did. */
  call(ctx: CallContext): Hex;

  /**
   * ERC-1271-style validation: return `0x1626ba7e` to accept `signature`
   * over `hash` on behalf of this contract's address.
   */
  isValidSignature?(hash: Hex, signature: Hex): Hex;
}

export type NetworkErrorCode =
  | "INSUFFICIENT_BALANCE"
  | "INVALID_AMOUNT"
  | "INVALID_TIME"
  | "INVALID_CHAIN_ID"
  | "ADDRESS_IN_USE";

export class NetworkError extends Error {
  constructor(
    public readonly code: NetworkErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "NetworkError";
  }
}
