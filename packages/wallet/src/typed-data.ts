/**
 * EIP-712 vote payload.
 *
 * Signed message: Vote(uint256 proposalId, bool support, uint256 nonce)
 * Domain: { name, version, chainId, verifyingContract }
 *
 * The support bit is part of the payload, so an approval can never be
 * replayed as a retraction, and the nonce makes every signature single-use.
 */

import { hashTypedData } from "viem";
import type { TypedDataDefinition } from "viem";
import type { DomainInfo, Hex } from "@quorumsafe/types";

export const DEFAULT_DOMAIN_NAME = "QuorumSafe";
export const DEFAULT_DOMAIN_VERSION = "1";

export const VOTE_TYPES = {
  Vote: [
    { name: "proposalId", type: "uint256" },
    { name: "support", type: "bool" },
    { name: "nonce", type: "uint256" },
  ],
} as const;

export interface VoteMessage {
  readonly proposalId: number;
  readonly support: boolean;
  readonly nonce: number;
}

export function buildVoteTypedData(
  domain: DomainInfo,
  vote: VoteMessage,
): TypedDataDefinition<typeof VOTE_TYPES, "Vote"> {
  return {
    domain: {
      name: domain.name,
      version: domain.version,
      chainId: domain.chainId,
      verifyingContract: domain.verifyingContract,
    },
    types: VOTE_TYPES,
    primaryType: "Vote",
    message: {
      proposalId: BigInt(vote.proposalId),
      support: vote.support,
      nonce: BigInt(vote.nonce),
    },
  };
}

export function hashVote(domain: DomainInfo, vote: VoteMessage): Hex {
  return hashTypedData(buildVoteTypedData(domain, vote));
}
