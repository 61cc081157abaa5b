/**
 * @quorumsafe/types — Shared domain types for the QuorumSafe stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Chain primitives
export type { Address, Hex, ChainId, DomainInfo } from "./chain.js";

// Proposals
export type { ProposalStatus, Operation, ProposalView } from "./proposal.js";

// Events
export type {
  WalletEvent,
  WalletEventBase,
  WalletEventBody,
  WalletEventType,
  SignerAddedBody,
  SignerRemovedBody,
  ProposalCreatedBody,
  VoteCastBody,
  VoteRetractedBody,
  ProposalCancelledBody,
  ProposalExecutedBody,
} from "./event.js";

// Runtime type guards
export {
  isHex,
  isAddressLike,
  isProposalStatus,
  isOperation,
  isWalletEventType,
  isWalletEvent,
  isSignerChangeEvent,
  isVoteEvent,
} from "./guards.js";
