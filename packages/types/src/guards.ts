/**
 * Runtime Type Guards
 *
 * Narrowing functions for QuorumSafe domain types, used at system
 * boundaries (HTTP bodies, deserialized logs, external integrations).
 */

import type { Address, Hex } from "./chain.js";
import type { Operation, ProposalStatus } from "./proposal.js";
import type { WalletEvent, WalletEventType } from "./event.js";

// =============================================================================
// Chain guards
// =============================================================================

const HEX_PATTERN = /^0x(?:[0-9a-fA-F]{2})*$/;
const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

/**
 * Even-length 0x-prefixed hex. Checksums are not verified here.
 */
export function isHex(value: unknown): value is Hex {
  return typeof value === "string" && HEX_PATTERN.test(value);
}

export function isAddressLike(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

// =============================================================================
// Proposal guards
// =============================================================================

const PROPOSAL_STATUSES = new Set<string>([
  "not-started",
  "proposed",
  "executed",
  "cancelled",
]);

export function isProposalStatus(value: unknown): value is ProposalStatus {
  return typeof value === "string" && PROPOSAL_STATUSES.has(value);
}

export function isOperation(value: unknown): value is Operation {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isAddressLike(v.target) &&
    typeof v.value === "bigint" &&
    v.value >= 0n &&
    isHex(v.data)
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_TYPES = new Set<string>([
  "signer_added",
  "signer_removed",
  "proposal_created",
  "vote_cast",
  "vote_retracted",
  "proposal_cancelled",
  "proposal_executed",
]);

export function isWalletEventType(value: unknown): value is WalletEventType {
  return typeof value === "string" && EVENT_TYPES.has(value);
}

export function isWalletEvent(value: unknown): value is WalletEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isWalletEventType(v.type) &&
    isAddressLike(v.wallet) &&
    typeof v.sequence === "number" &&
    Number.isInteger(v.sequence) &&
    v.sequence >= 0 &&
    typeof v.timestamp === "number"
  );
}

export function isSignerChangeEvent(
  e: WalletEvent,
): e is Extract<WalletEvent, { type: "signer_added" | "signer_removed" }> {
  return e.type === "signer_added" || e.type === "signer_removed";
}

export function isVoteEvent(
  e: WalletEvent,
): e is Extract<WalletEvent, { type: "vote_cast" | "vote_retracted" }> {
  return e.type === "vote_cast" || e.type === "vote_retracted";
}
