/**
 * Signer Registry — the current authorized-signer set.
 *
 * Rules:
 * - Never empty, never larger than `maxSigners`
 * - No duplicates, no zero address
 * - O(1) membership through a Set kept beside the list
 * - Removal swaps the last signer into the hole; order carries no meaning
 * - Mutations require a live governance proof
 */

import type { Address } from "@quorumsafe/types";
import { isZeroAddress, normalizeAddress } from "./address.js";
import { ValidationError } from "./errors.js";
import type { GovernanceGuard, GovernanceProof } from "./governance-guard.js";
import type { WalletEventLog } from "./event-log.js";
import type { Checkpointable } from "./network/types.js";

export const DEFAULT_MAX_SIGNERS = 50;

export class SignerRegistry implements Checkpointable {
  private signers: Address[] = [];
  private members = new Set<Address>();

  constructor(
    genesis: readonly string[],
    readonly maxSigners: number,
    private readonly guard: GovernanceGuard,
    private readonly events: WalletEventLog,
  ) {
    if (!Number.isSafeInteger(maxSigners) || maxSigners < 1) {
      throw new ValidationError("INVALID_CONFIG", `maxSigners must be a positive integer, got ${maxSigners}`);
    }
    if (genesis.length === 0) {
      throw new ValidationError("INVALID_CONFIG", "At least one signer is required");
    }
    if (genesis.length > maxSigners) {
      throw new ValidationError(
        "SIGNER_LIMIT",
        `${genesis.length} signers exceed the limit of ${maxSigners}`,
      );
    }

    for (const raw of genesis) {
      this.insert(normalizeAddress(raw, "Signer"));
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  isSigner(address: Address): boolean {
    return this.members.has(address);
  }

  list(): readonly Address[] {
    return [...this.signers];
  }

  count(): number {
    return this.signers.length;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Governance mutations
  // ───────────────────────────────────────────────────────────────────────

  addSigner(raw: string, proof: GovernanceProof | undefined): void {
    this.guard.assert(proof, "addSigner");
    const signer = normalizeAddress(raw, "Signer");

    if (this.signers.length >= this.maxSigners) {
      throw new ValidationError(
        "SIGNER_LIMIT",
        `Signer limit of ${this.maxSigners} reached`,
      );
    }
    this.insert(signer);
  }

  removeSigner(raw: string, proof: GovernanceProof | undefined): void {
    this.guard.assert(proof, "removeSigner");
    const signer = normalizeAddress(raw, "Signer");

    if (!this.members.has(signer)) {
      throw new ValidationError("UNKNOWN_SIGNER", `Not a signer: ${signer}`);
    }
    if (this.signers.length === 1) {
      throw new ValidationError("LAST_SIGNER", "Cannot remove the last signer");
    }

    const index = this.signers.indexOf(signer);
    const moved = this.signers.pop();
    if (moved !== undefined && moved !== signer) {
      this.signers[index] = moved;
    }
    this.members.delete(signer);

    this.events.append({ type: "signer_removed", signer });
  }

  checkpoint(): () => void {
    const signers = [...this.signers];
    return () => {
      this.signers = signers;
      this.members = new Set(signers);
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private insert(signer: Address): void {
    if (isZeroAddress(signer)) {
      throw new ValidationError("INVALID_ADDRESS", "The zero address cannot be a signer");
    }
    if (this.members.has(signer)) {
      throw new ValidationError("DUPLICATE_SIGNER", `Signer already exists: ${signer}`);
    }

    this.signers.push(signer);
    this.members.add(signer);
    this.events.append({ type: "signer_added", signer });
  }
}
