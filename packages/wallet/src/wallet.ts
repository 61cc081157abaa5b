/**
 * MultisigWallet — self-governed k-of-n majority wallet.
 *
 * Composes:
 * - SignerRegistry: who may propose, vote and be counted
 * - ProposalStore + VoteLedger: proposal lifecycle and yes-vote history
 * - SignatureAuthorizer: votes submitted on a signer's behalf
 * - ExecutionEngine: majority check and atomic batch execution
 * - GovernanceGuard: the only source of authority over the signer set
 *
 * The wallet deploys itself onto its {@link LocalNetwork} when constructed.
 * Other contracts reach it through `call`, and batch operations targeting
 * its own address are its governance calls.
 */

import { decodeFunctionData, encodeFunctionResult, isAddress, getAddress } from "viem";
import type {
  Address,
  DomainInfo,
  Hex,
  Operation,
  ProposalView,
  WalletEvent,
} from "@quorumsafe/types";
import { WALLET_ABI } from "./abi.js";
import {
  normalizeAddress,
  requireProposalId,
  requireSignature,
  zipOperations,
} from "./address.js";
import { AuthorizationError, ValidationError } from "./errors.js";
import { WalletEventLog } from "./event-log.js";
import type {
  IntegrityResult,
  LoggedEvent,
  Subscription,
  WalletEventHandler,
} from "./event-log.js";
import { ExecutionEngine } from "./execution-engine.js";
import type { ExecutionReceipt } from "./execution-engine.js";
import { GovernanceGuard } from "./governance-guard.js";
import type { GovernanceProof } from "./governance-guard.js";
import { ProposalStore } from "./proposal-store.js";
import { SignatureAuthorizer } from "./signature-authorizer.js";
import type { AuthorizedVote } from "./signature-authorizer.js";
import { DEFAULT_MAX_SIGNERS, SignerRegistry } from "./signer-registry.js";
import { DEFAULT_DOMAIN_NAME, DEFAULT_DOMAIN_VERSION } from "./typed-data.js";
import { VoteLedger } from "./vote-ledger.js";
import type { LocalNetwork } from "./network/local-network.js";
import type { CallContext, Contract } from "./network/types.js";

// =============================================================================
// Config
// =============================================================================

export interface WalletSettings {
  /** Upper bound on the signer set. Default: 50 */
  readonly maxSigners?: number;

  /** EIP-712 domain name. Default: "QuorumSafe" */
  readonly domainName?: string;

  /** EIP-712 domain version. Default: "1" */
  readonly domainVersion?: string;
}

export interface MultisigWalletConfig extends WalletSettings {
  readonly address: Address;
  readonly network: LocalNetwork;
  readonly signers: readonly string[];
}

// =============================================================================
// Wallet
// =============================================================================

export class MultisigWallet implements Contract {
  readonly address: Address;
  readonly network: LocalNetwork;

  private readonly domain: DomainInfo;
  private readonly guard = new GovernanceGuard();
  private readonly events: WalletEventLog;
  private readonly registry: SignerRegistry;
  private readonly ledger: VoteLedger;
  private readonly proposals: ProposalStore;
  private readonly authorizer: SignatureAuthorizer;
  private readonly engine: ExecutionEngine;

  constructor(config: MultisigWalletConfig) {
    this.address = normalizeAddress(config.address, "Wallet address");
    this.network = config.network;

    const clock = (): number => this.network.now();

    this.domain = {
      name: config.domainName ?? DEFAULT_DOMAIN_NAME,
      version: config.domainVersion ?? DEFAULT_DOMAIN_VERSION,
      chainId: this.network.chainId,
      verifyingContract: this.address,
    };

    this.events = new WalletEventLog(this.address, clock);
    this.registry = new SignerRegistry(
      config.signers,
      config.maxSigners ?? DEFAULT_MAX_SIGNERS,
      this.guard,
      this.events,
    );
    this.ledger = new VoteLedger(this.registry, this.events, clock);
    this.proposals = new ProposalStore({
      registry: this.registry,
      ledger: this.ledger,
      guard: this.guard,
      events: this.events,
      clock,
    });
    this.authorizer = new SignatureAuthorizer({
      registry: this.registry,
      network: this.network,
      domain: this.domain,
    });
    this.engine = new ExecutionEngine({
      self: this.address,
      network: this.network,
      registry: this.registry,
      proposals: this.proposals,
      ledger: this.ledger,
      guard: this.guard,
      events: this.events,
      governanceCall: (data, proof) =>
        data === "0x" ? "0x" : this.dispatch(this.address, data, proof),
    });

    this.network.deploy(this.address, this);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Proposals and votes
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create a proposal and record the proposer's yes-vote.
   *
   * @param expiration Unix seconds, strictly after the network clock
   * @returns The new proposal id
   */
  propose(caller: string, operations: readonly Operation[], expiration: number): number {
    const proposer = normalizeAddress(caller, "Caller");
    return this.events.deferred(() => this.proposals.create(proposer, operations, expiration));
  }

  voteFor(caller: string, proposalId: number): void {
    const id = requireProposalId(proposalId);
    const voter = this.requireSigner(caller);
    this.events.deferred(() => this.ledger.castYes(this.proposals.get(id), voter));
  }

  cancelVoteFor(caller: string, proposalId: number): void {
    const id = requireProposalId(proposalId);
    const voter = this.requireSigner(caller);
    this.events.deferred(() => this.ledger.retractYes(this.proposals.get(id), voter));
  }

  /**
   * Cast (`support = true`) or retract (`support = false`) a yes-vote for
   * `voter` with their signature over Vote(proposalId, support, nonce).
   * Anyone may submit.
   */
  voteOnBehalfOf(
    proposalId: number,
    voter: string,
    support: boolean,
    signature: string,
  ): AuthorizedVote {
    const id = requireProposalId(proposalId);
    const signer = normalizeAddress(voter, "Voter");
    const sig = requireSignature(signature);

    return this.events.deferred(() =>
      this.authorizer.authorize(
        { proposalId: id, voter: signer, support, signature: sig },
        (vote) => {
          const proposal = this.proposals.get(vote.proposalId);
          if (vote.support) {
            this.ledger.castYes(proposal, vote.voter);
          } else {
            this.ledger.retractYes(proposal, vote.voter);
          }
        },
      ),
    );
  }

  /**
   * Run a proposal's batch if a strict majority of the current signers
   * stands behind it. Anyone may call.
   */
  execute(caller: string, proposalId: number): ExecutionReceipt {
    const id = requireProposalId(proposalId);
    const executor = normalizeAddress(caller, "Caller");
    return this.engine.execute(id, executor);
  }

  cancelProposal(caller: string, proposalId: number): ProposalView {
    const id = requireProposalId(proposalId);
    const canceller = normalizeAddress(caller, "Caller");
    return this.events.deferred(() =>
      this.proposals.cancel(id, { kind: "proposer", caller: canceller }),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  getSigners(): readonly Address[] {
    return this.registry.list();
  }

  getSignerCount(): number {
    return this.registry.count();
  }

  isSigner(address: string): boolean {
    return isAddress(address, { strict: false }) && this.registry.isSigner(getAddress(address));
  }

  get maxSigners(): number {
    return this.registry.maxSigners;
  }

  getProposal(proposalId: number): ProposalView {
    return this.proposals.get(requireProposalId(proposalId));
  }

  get proposalCount(): number {
    return this.proposals.proposalCount;
  }

  hasVoted(proposalId: number, voter: string): boolean {
    return this.ledger.hasVotedYes(
      requireProposalId(proposalId),
      normalizeAddress(voter, "Voter"),
    );
  }

  getYesVoterHistory(proposalId: number): readonly Address[] {
    return this.ledger.yesVoterHistory(requireProposalId(proposalId));
  }

  getValidYesCount(proposalId: number): number {
    return this.ledger.validYesCount(requireProposalId(proposalId));
  }

  getNonce(identity: string): number {
    return this.authorizer.nonceOf(normalizeAddress(identity, "Identity"));
  }

  /** Digest a signer signs for Vote(proposalId, support, current nonce). */
  getVoteDigest(proposalId: number, voter: string, support: boolean): Hex {
    const id = requireProposalId(proposalId);
    return this.authorizer.digest(id, support, this.getNonce(voter));
  }

  getDomainInfo(): DomainInfo {
    return { ...this.domain };
  }

  getEvents(): readonly WalletEvent[] {
    return this.events.history();
  }

  getEventChain(): readonly LoggedEvent[] {
    return this.events.chain();
  }

  verifyEventLog(): IntegrityResult {
    return this.events.verifyIntegrity();
  }

  subscribe(handler: WalletEventHandler): Subscription {
    return this.events.subscribe(handler);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Contract
  // ───────────────────────────────────────────────────────────────────────

  /**
   * ABI entry point for calls arriving through the network. Empty calldata
   * just receives value.
   */
  call(ctx: CallContext): Hex {
    if (ctx.data === "0x") {
      return "0x";
    }
    return this.dispatch(ctx.from, ctx.data);
  }

  checkpoint(): () => void {
    const restores = [
      this.registry.checkpoint(),
      this.ledger.checkpoint(),
      this.proposals.checkpoint(),
      this.authorizer.checkpoint(),
      this.events.checkpoint(),
    ];
    return () => {
      for (const restore of restores) {
        restore();
      }
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private requireSigner(caller: string): Address {
    const address = normalizeAddress(caller, "Caller");
    if (!this.registry.isSigner(address)) {
      throw new AuthorizationError("NOT_SIGNER", `${address} is not a signer`);
    }
    return address;
  }

  /**
   * Decode and run a wallet ABI call from `from`. `proof` is present only
   * for operations of an executing proposal aimed at this wallet.
   */
  private dispatch(from: Address, data: Hex, proof?: GovernanceProof): Hex {
    const decoded = decodeWalletCall(data);

    switch (decoded.functionName) {
      case "propose": {
        const [targets, values, payloads, expiration] = decoded.args;
        const id = this.propose(
          from,
          zipOperations(targets, values, payloads),
          toSeconds(expiration),
        );
        return encodeFunctionResult({
          abi: WALLET_ABI,
          functionName: "propose",
          result: BigInt(id),
        });
      }
      case "voteFor":
        this.voteFor(from, requireProposalId(decoded.args[0]));
        return "0x";
      case "cancelVoteFor":
        this.cancelVoteFor(from, requireProposalId(decoded.args[0]));
        return "0x";
      case "voteOnBehalfOf": {
        const [proposalId, voter, support, signature] = decoded.args;
        this.voteOnBehalfOf(requireProposalId(proposalId), voter, support, signature);
        return "0x";
      }
      case "execute":
        this.execute(from, requireProposalId(decoded.args[0]));
        return "0x";
      case "cancelProposal": {
        const id = requireProposalId(decoded.args[0]);
        if (proof !== undefined) {
          this.proposals.cancel(id, { kind: "governance", proof });
        } else {
          this.cancelProposal(from, id);
        }
        return "0x";
      }
      case "addSigner":
        this.registry.addSigner(decoded.args[0], proof);
        return "0x";
      case "removeSigner":
        this.registry.removeSigner(decoded.args[0], proof);
        return "0x";
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function decodeWalletCall(data: Hex) {
  try {
    return decodeFunctionData({ abi: WALLET_ABI, data });
  } catch (err) {
    const reason = err instanceof Error ? err.message.split("\n")[0] : String(err);
    throw new ValidationError("UNSUPPORTED_CALL", `Unrecognized wallet call: ${reason}`);
  }
}

function toSeconds(value: bigint): number {
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new ValidationError("INVALID_EXPIRATION", `Expiration out of range: ${value}`);
  }
  return Number(value);
}
