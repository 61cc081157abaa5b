/**
 * Proposal Types
 *
 * A proposal is a batch of operations awaiting a strict majority of the
 * current signers.
 *
 * Lifecycle:
 *   not-started → proposed → executed
 *                          ↘ cancelled
 *
 * `executed` and `cancelled` are terminal. Expiration never transitions a
 * proposal; it is checked on every vote and execute call.
 */

import type { Address, Hex } from "./chain.js";

export type ProposalStatus = "not-started" | "proposed" | "executed" | "cancelled";

/**
 * One call in a batch.
 */
export interface Operation {
  /** Account or contract receiving the call */
  readonly target: Address;

  /** Native value sent with the call (wei) */
  readonly value: bigint;

  /** Opaque calldata */
  readonly data: Hex;
}

/**
 * Read-only view of a proposal.
 */
export interface ProposalView {
  readonly id: number;
  readonly proposer: Address;

  /** Unix seconds on the network clock */
  readonly expiration: number;

  readonly status: ProposalStatus;
  readonly operations: readonly Operation[];
}
