/**
 * Signature Authorizer — votes submitted on a signer's behalf.
 *
 * Two ways to authenticate a vote digest:
 * 1. ECDSA recovery: the recovered address is the claimed voter
 * 2. Delegated validation: the contract deployed at the voter's address
 *    answers `isValidSignature(digest, signature)` with the ERC-1271 magic
 *    value. Any failure of that call is a plain "no".
 *
 * Nonces: one counter per identity, bumped by exactly one per accepted
 * signature, before the vote is applied. A vote that then fails in the
 * ledger still consumes the nonce, so its signature can never be retried.
 *
 * Authorization never yields: recovery, the nonce bump and `apply` run as
 * one synchronous step.
 */

import { secp256k1 } from "@noble/curves/secp256k1";
import { hexToNumber, size, slice } from "viem";
import { publicKeyToAddress } from "viem/accounts";
import type { Address, DomainInfo, Hex } from "@quorumsafe/types";
import { AuthorizationError, SignatureError } from "./errors.js";
import { hashVote } from "./typed-data.js";
import type { SignerRegistry } from "./signer-registry.js";
import type { LocalNetwork } from "./network/local-network.js";
import type { Checkpointable } from "./network/types.js";

export const ERC1271_MAGIC_VALUE = "0x1626ba7e";

export interface VoteAuthorization {
  readonly proposalId: number;
  readonly voter: Address;
  readonly support: boolean;
  readonly signature: Hex;
}

export type AuthorizationMethod = "ecdsa" | "delegated";

export interface AuthorizedVote extends VoteAuthorization {
  /** Nonce the signature was bound to (consumed) */
  readonly nonce: number;
  readonly digest: Hex;
  readonly method: AuthorizationMethod;
}

/**
 * Outcome of the external validator call. Failures never escape as errors.
 */
export type DelegatedValidation =
  | { readonly ok: true; readonly valid: boolean }
  | { readonly ok: false; readonly reason: string };

export interface SignatureAuthorizerDeps {
  readonly registry: SignerRegistry;
  readonly network: LocalNetwork;
  readonly domain: DomainInfo;
}

export class SignatureAuthorizer implements Checkpointable {
  private nonces = new Map<Address, number>();

  constructor(private readonly deps: SignatureAuthorizerDeps) {}

  nonceOf(identity: Address): number {
    return this.nonces.get(identity) ?? 0;
  }

  digest(proposalId: number, support: boolean, nonce: number): Hex {
    return hashVote(this.deps.domain, { proposalId, support, nonce });
  }

  /**
   * Authenticate `request`, consume the voter's nonce, then run `apply` in
   * the same synchronous step.
   *
   * @throws AuthorizationError if the voter is not a current signer
   * @throws SignatureError if neither path accepts the signature
   */
  authorize(
    request: VoteAuthorization,
    apply: (vote: AuthorizedVote) => void,
  ): AuthorizedVote {
    this.requireSigner(request.voter);

    const nonce = this.nonceOf(request.voter);
    const digest = this.digest(request.proposalId, request.support, nonce);
    const recovered = recoverSigner(digest, request.signature);

    let method: AuthorizationMethod;
    if (recovered === request.voter) {
      method = "ecdsa";
    } else {
      const delegated = this.validateDelegated(request.voter, digest, request.signature);
      if (!(delegated.ok && delegated.valid)) {
        throw new SignatureError(
          "INVALID_SIGNATURE",
          `Signature does not authenticate ${request.voter} for proposal ` +
            `${request.proposalId} (support=${request.support}, nonce=${nonce})`,
        );
      }
      method = "delegated";
    }

    this.nonces.set(request.voter, nonce + 1);

    const vote: AuthorizedVote = { ...request, nonce, digest, method };
    apply(vote);
    return vote;
  }

  /**
   * Ask the contract at `signer` whether it accepts `signature` over
   * `digest`. Runs as a view: any state it touches is rolled back.
   */
  validateDelegated(signer: Address, digest: Hex, signature: Hex): DelegatedValidation {
    const validator = this.deps.network.contractAt(signer);
    if (validator?.isValidSignature === undefined) {
      return { ok: false, reason: `No signature validator at ${signer}` };
    }

    try {
      const magic = this.deps.network.readOnly(() =>
        validator.isValidSignature?.(digest, signature),
      );
      return { ok: true, valid: magic?.toLowerCase() === ERC1271_MAGIC_VALUE };
    } catch (err) {
      return {
        ok: false,
        reason: err instanceof Error ? err.message : String(err),
      };
    }
  }

  checkpoint(): () => void {
    const nonces = new Map(this.nonces);
    return () => {
      this.nonces = nonces;
    };
  }

  private requireSigner(voter: Address): void {
    if (!this.deps.registry.isSigner(voter)) {
      throw new AuthorizationError("NOT_SIGNER", `${voter} is not a signer`);
    }
  }
}

/**
 * ECDSA recovery over a 65-byte r || s || v signature, or null when the
 * bytes are not a recoverable signature (for example a contract signer's
 * opaque blob).
 */
export function recoverSigner(hash: Hex, signature: Hex): Address | null {
  if (size(signature) !== 65) {
    return null;
  }
  const v = hexToNumber(slice(signature, 64));
  const recoveryBit = v >= 27 ? v - 27 : v;
  if (recoveryBit !== 0 && recoveryBit !== 1) {
    return null;
  }

  try {
    const point = secp256k1.Signature.fromCompact(slice(signature, 0, 64).slice(2))
      .addRecoveryBit(recoveryBit)
      .recoverPublicKey(hash.slice(2));
    return publicKeyToAddress(`0x${point.toHex(false)}`);
  } catch (err) {
    if (err instanceof Error) {
      return null;
    }
    throw err;
  }
}
