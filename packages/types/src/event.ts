/**
 * Wallet Events
 *
 * Every state change of a wallet is published as one of these events.
 * Events are appended to a hash-chained log in the order they occur;
 * events of a failed execution are discarded with the rest of its state.
 */

import type { Address } from "./chain.js";

/**
 * Fields stamped on every event by the log.
 */
export interface WalletEventBase {
  /** Wallet that emitted the event */
  readonly wallet: Address;

  /** Position in the wallet's log (0-based) */
  readonly sequence: number;

  /** Network clock at emission (unix seconds) */
  readonly timestamp: number;
}

export interface SignerAddedBody {
  readonly type: "signer_added";
  readonly signer: Address;
}

export interface SignerRemovedBody {
  readonly type: "signer_removed";
  readonly signer: Address;
}

export interface ProposalCreatedBody {
  readonly type: "proposal_created";
  readonly proposalId: number;
  readonly proposer: Address;
  readonly expiration: number;
  readonly operationCount: number;
}

export interface VoteCastBody {
  readonly type: "vote_cast";
  readonly proposalId: number;
  readonly voter: Address;
}

export interface VoteRetractedBody {
  readonly type: "vote_retracted";
  readonly proposalId: number;
  readonly voter: Address;
}

export interface ProposalCancelledBody {
  readonly type: "proposal_cancelled";
  readonly proposalId: number;

  /** The proposer, or "governance" when cancelled by an executed proposal */
  readonly cancelledBy: Address | "governance";
}

export interface ProposalExecutedBody {
  readonly type: "proposal_executed";
  readonly proposalId: number;
  readonly executor: Address;

  /** Valid yes-votes counted at execution */
  readonly validVotes: number;

  /** Signer count the threshold was evaluated against */
  readonly signerCount: number;
}

/**
 * What an emitter supplies; the log adds {@link WalletEventBase}.
 */
export type WalletEventBody =
  | SignerAddedBody
  | SignerRemovedBody
  | ProposalCreatedBody
  | VoteCastBody
  | VoteRetractedBody
  | ProposalCancelledBody
  | ProposalExecutedBody;

export type WalletEvent = WalletEventBody & WalletEventBase;

export type WalletEventType = WalletEvent["type"];
