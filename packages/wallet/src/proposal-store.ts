/**
 * Proposal Store — proposal records and their lifecycle.
 *
 * Rules:
 * - Ids start at 0 and only grow; cancelled ids are never reused
 * - Records are immutable; a transition replaces the record
 * - Creating a proposal records the proposer's yes-vote
 * - Only the proposer (while still a signer) or an executed proposal
 *   can cancel
 */

import { zeroAddress } from "viem";
import type { Address, Operation, ProposalStatus, ProposalView } from "@quorumsafe/types";
import { normalizeOperations } from "./address.js";
import { AuthorizationError, StateError, ValidationError } from "./errors.js";
import type { GovernanceGuard, GovernanceProof } from "./governance-guard.js";
import type { SignerRegistry } from "./signer-registry.js";
import type { VoteLedger } from "./vote-ledger.js";
import type { WalletEventLog } from "./event-log.js";
import type { Checkpointable } from "./network/types.js";

// =============================================================================
// Valid Transitions
// =============================================================================

const VALID_TRANSITIONS: Record<ProposalStatus, readonly ProposalStatus[]> = {
  "not-started": ["proposed"],
  proposed: ["executed", "cancelled"],
  executed: [],
  cancelled: [],
};

/**
 * Who is asking to cancel.
 */
export type Canceller =
  | { readonly kind: "proposer"; readonly caller: Address }
  | { readonly kind: "governance"; readonly proof: GovernanceProof };

export interface ProposalStoreDeps {
  readonly registry: SignerRegistry;
  readonly ledger: VoteLedger;
  readonly guard: GovernanceGuard;
  readonly events: WalletEventLog;
  readonly clock: () => number;
}

// =============================================================================
// Proposal Store
// =============================================================================

export class ProposalStore implements Checkpointable {
  private proposals = new Map<number, ProposalView>();
  private nextId = 0;

  constructor(private readonly deps: ProposalStoreDeps) {}

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  create(
    proposer: Address,
    operations: readonly Operation[],
    expiration: number,
  ): number {
    if (!this.deps.registry.isSigner(proposer)) {
      throw new AuthorizationError("NOT_SIGNER", `${proposer} is not a signer`);
    }

    const batch = normalizeOperations(operations);

    const now = this.deps.clock();
    if (!Number.isSafeInteger(expiration) || expiration <= now) {
      throw new ValidationError(
        "INVALID_EXPIRATION",
        `Expiration must be after the current time (${now}), got ${expiration}`,
      );
    }

    const id = this.nextId++;
    const proposal: ProposalView = {
      id,
      proposer,
      expiration,
      status: "proposed",
      operations: batch,
    };
    this.proposals.set(id, proposal);

    this.deps.events.append({
      type: "proposal_created",
      proposalId: id,
      proposer,
      expiration,
      operationCount: batch.length,
    });
    this.deps.ledger.castYes(proposal, proposer);

    return id;
  }

  cancel(id: number, canceller: Canceller): ProposalView {
    const proposal = this.get(id);
    this.requireTransition(proposal, "cancelled");

    if (canceller.kind === "governance") {
      this.deps.guard.assert(canceller.proof, "Governance cancellation");
    } else if (
      canceller.caller !== proposal.proposer ||
      !this.deps.registry.isSigner(canceller.caller)
    ) {
      throw new AuthorizationError(
        "NOT_CANCELLER",
        `${canceller.caller} cannot cancel proposal ${id}: ` +
          "only its proposer, while still a signer, may cancel",
      );
    }

    const cancelled = this.replace(proposal, "cancelled");
    this.deps.events.append({
      type: "proposal_cancelled",
      proposalId: id,
      cancelledBy: canceller.kind === "governance" ? "governance" : canceller.caller,
    });
    return cancelled;
  }

  /**
   * Commit `executed`. Called by the execution engine before the batch runs.
   */
  markExecuted(id: number): ProposalView {
    const proposal = this.get(id);
    this.requireTransition(proposal, "executed");
    return this.replace(proposal, "executed");
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  /** Unknown ids read as `not-started`. */
  get(id: number): ProposalView {
    return (
      this.proposals.get(id) ?? {
        id,
        proposer: zeroAddress,
        expiration: 0,
        status: "not-started",
        operations: [],
      }
    );
  }

  get proposalCount(): number {
    return this.nextId;
  }

  checkpoint(): () => void {
    const proposals = new Map(this.proposals);
    const nextId = this.nextId;
    return () => {
      this.proposals = proposals;
      this.nextId = nextId;
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private requireTransition(proposal: ProposalView, to: ProposalStatus): void {
    if (!VALID_TRANSITIONS[proposal.status].includes(to)) {
      throw new StateError(
        "INVALID_STATUS",
        `Cannot move proposal ${proposal.id} from '${proposal.status}' to '${to}'`,
      );
    }
  }

  private replace(proposal: ProposalView, status: ProposalStatus): ProposalView {
    const updated: ProposalView = { ...proposal, status };
    this.proposals.set(proposal.id, updated);
    return updated;
  }
}
