/**
 * Execution Engine — majority check and atomic batch execution.
 *
 * Steps:
 * 1. Proposal must be `proposed` and unexpired
 * 2. Valid yes-votes are recounted against the signer set as it is now
 * 3. Strict majority: valid > floor(signerCount / 2)
 * 4. `executed` is committed before the first operation runs, so a
 *    reentrant execute of the same proposal is rejected
 * 5. Operations run in order inside one atomic network section; the first
 *    failure rolls back everything the call did, the status flip included
 * 6. `proposal_executed` is emitted last, and subscribers only hear about
 *    an execution once it has committed
 *
 * Operations aimed at the wallet itself are governance calls and run with
 * the guard's proof. Everything else goes through the network.
 */

import type { Address, Hex, Operation } from "@quorumsafe/types";
import { ExecutionError, StateError } from "./errors.js";
import type { GovernanceGuard, GovernanceProof } from "./governance-guard.js";
import type { ProposalStore } from "./proposal-store.js";
import type { SignerRegistry } from "./signer-registry.js";
import type { VoteLedger } from "./vote-ledger.js";
import type { WalletEventLog } from "./event-log.js";
import type { LocalNetwork } from "./network/local-network.js";

export interface ExecutionReceipt {
  readonly proposalId: number;
  readonly executor: Address;
  readonly validVotes: number;
  readonly signerCount: number;

  /** Return data of each operation, in order */
  readonly results: readonly Hex[];
}

export interface ExecutionEngineDeps {
  /** The wallet's own address */
  readonly self: Address;
  readonly network: LocalNetwork;
  readonly registry: SignerRegistry;
  readonly proposals: ProposalStore;
  readonly ledger: VoteLedger;
  readonly guard: GovernanceGuard;
  readonly events: WalletEventLog;

  /** Governance dispatch for operations targeting the wallet itself */
  readonly governanceCall: (data: Hex, proof: GovernanceProof) => Hex;
}

/**
 * Strict majority of the current signer count.
 */
export function hasMajority(validVotes: number, signerCount: number): boolean {
  return validVotes > Math.floor(signerCount / 2);
}

export class ExecutionEngine {
  constructor(private readonly deps: ExecutionEngineDeps) {}

  execute(proposalId: number, executor: Address): ExecutionReceipt {
    const { proposals, ledger, registry, network, events } = this.deps;

    const proposal = proposals.get(proposalId);
    if (proposal.status !== "proposed") {
      throw new StateError(
        "INVALID_STATUS",
        `Cannot execute proposal ${proposalId} in status '${proposal.status}'`,
      );
    }
    if (network.now() > proposal.expiration) {
      throw new StateError(
        "EXPIRED",
        `Proposal ${proposalId} expired at ${proposal.expiration}`,
      );
    }

    const validVotes = ledger.validYesCount(proposalId);
    const signerCount = registry.count();
    if (!hasMajority(validVotes, signerCount)) {
      throw new StateError(
        "INSUFFICIENT_VOTES",
        `Proposal ${proposalId} has ${validVotes} valid votes; ` +
          `more than ${Math.floor(signerCount / 2)} of ${signerCount} signers required`,
      );
    }

    return events.deferred(() =>
      network.atomically(() => {
        proposals.markExecuted(proposalId);

        const results = this.deps.guard.withAuthority((proof) =>
          proposal.operations.map((op, index) => this.runOperation(op, index, proof)),
        );

        events.append({
          type: "proposal_executed",
          proposalId,
          executor,
          validVotes,
          signerCount,
        });

        return { proposalId, executor, validVotes, signerCount, results };
      }),
    );
  }

  private runOperation(op: Operation, index: number, proof: GovernanceProof): Hex {
    try {
      if (op.target === this.deps.self) {
        return this.deps.governanceCall(op.data, proof);
      }
      return this.deps.network.call({
        from: this.deps.self,
        to: op.target,
        value: op.value,
        data: op.data,
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ExecutionError(
        "OPERATION_FAILED",
        `Operation ${index} (target ${op.target}) failed: ${reason}`,
        index,
        err,
      );
    }
  }
}
