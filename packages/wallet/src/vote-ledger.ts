/**
 * Vote Ledger — per-proposal yes-voter history.
 *
 * "Who said yes" is recorded once and kept, even after the voter stops
 * being a signer. "Whose yes counts" is derived on every read by filtering
 * that history through the live signer set, so a removed-then-re-added
 * signer gets their vote back without a new call.
 *
 * Rules:
 * - Votes only while the proposal is `proposed` and unexpired
 * - One yes per voter per proposal
 * - Retraction is the voter's own edit of history (swap-remove)
 * - Nothing is cached: `validYesCount` is recomputed every call
 */

import type { Address, ProposalView } from "@quorumsafe/types";
import { StateError } from "./errors.js";
import type { SignerRegistry } from "./signer-registry.js";
import type { WalletEventLog } from "./event-log.js";
import type { Checkpointable } from "./network/types.js";

interface Ballot {
  voters: Address[];
  flags: Set<Address>;
}

export class VoteLedger implements Checkpointable {
  private ballots = new Map<number, Ballot>();

  constructor(
    private readonly registry: SignerRegistry,
    private readonly events: WalletEventLog,
    private readonly clock: () => number,
  ) {}

  castYes(proposal: ProposalView, voter: Address): void {
    this.requireOpen(proposal, "vote on");
    if (this.clock() > proposal.expiration) {
      throw new StateError(
        "EXPIRED",
        `Proposal ${proposal.id} expired at ${proposal.expiration}`,
      );
    }

    const ballot = this.ballotFor(proposal.id);
    if (ballot.flags.has(voter)) {
      throw new StateError(
        "ALREADY_VOTED",
        `${voter} has already voted yes on proposal ${proposal.id}`,
      );
    }

    ballot.voters.push(voter);
    ballot.flags.add(voter);
    this.events.append({ type: "vote_cast", proposalId: proposal.id, voter });
  }

  retractYes(proposal: ProposalView, voter: Address): void {
    this.requireOpen(proposal, "retract a vote on");

    const ballot = this.ballots.get(proposal.id);
    if (ballot === undefined || !ballot.flags.has(voter)) {
      throw new StateError(
        "NOT_VOTED",
        `${voter} has no yes-vote on proposal ${proposal.id}`,
      );
    }

    const index = ballot.voters.indexOf(voter);
    const moved = ballot.voters.pop();
    if (moved !== undefined && moved !== voter) {
      ballot.voters[index] = moved;
    }
    ballot.flags.delete(voter);
    this.events.append({ type: "vote_retracted", proposalId: proposal.id, voter });
  }

  hasVotedYes(proposalId: number, voter: Address): boolean {
    return this.ballots.get(proposalId)?.flags.has(voter) ?? false;
  }

  /** Every standing yes-vote, including those of former signers. */
  yesVoterHistory(proposalId: number): readonly Address[] {
    return [...(this.ballots.get(proposalId)?.voters ?? [])];
  }

  /** Standing yes-votes whose voter is a signer right now. */
  validYesCount(proposalId: number): number {
    const voters = this.ballots.get(proposalId)?.voters ?? [];
    return voters.reduce(
      (count, voter) => (this.registry.isSigner(voter) ? count + 1 : count),
      0,
    );
  }

  checkpoint(): () => void {
    const saved = new Map<number, Address[]>();
    for (const [id, ballot] of this.ballots) {
      saved.set(id, [...ballot.voters]);
    }
    return () => {
      this.ballots = new Map(
        [...saved].map(([id, voters]) => [id, { voters, flags: new Set(voters) }]),
      );
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private requireOpen(proposal: ProposalView, action: string): void {
    if (proposal.status !== "proposed") {
      throw new StateError(
        "INVALID_STATUS",
        `Cannot ${action} proposal ${proposal.id} in status '${proposal.status}'`,
      );
    }
  }

  private ballotFor(proposalId: number): Ballot {
    let ballot = this.ballots.get(proposalId);
    if (ballot === undefined) {
      ballot = { voters: [], flags: new Set() };
      this.ballots.set(proposalId, ballot);
    }
    return ballot;
  }
}
