/**
 * Governance Guard — capability for self-governance.
 *
 * Signer-set mutations and governance cancellations require a proof that
 * only exists while an approved proposal's batch is running. The guard is
 * held privately by the wallet and handed to the execution engine alone;
 * nothing else can mint a live proof.
 */

import { AuthorizationError } from "./errors.js";

/**
 * Token passed down the execution path. Only meaningful while live.
 */
export class GovernanceProof {
  constructor(readonly serial: number) {}
}

export class GovernanceGuard {
  private readonly live = new Set<GovernanceProof>();
  private issued = 0;

  /**
   * Run `fn` with a proof that stays live until `fn` returns or throws.
   */
  withAuthority<T>(fn: (proof: GovernanceProof) => T): T {
    const proof = new GovernanceProof(this.issued++);
    this.live.add(proof);
    try {
      return fn(proof);
    } finally {
      this.live.delete(proof);
    }
  }

  isLive(proof: GovernanceProof | undefined): boolean {
    return proof !== undefined && this.live.has(proof);
  }

  assert(proof: GovernanceProof | undefined, action: string): void {
    if (!this.isLive(proof)) {
      throw new AuthorizationError(
        "NOT_GOVERNANCE",
        `${action} is only callable by an executed proposal`,
      );
    }
  }
}
