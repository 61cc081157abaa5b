/**
 * Offline vote signing for key-holding signers.
 *
 * Produces the signature `voteOnBehalfOf` expects. The nonce must be the
 * signer's current nonce on the target wallet (`getNonce`).
 */

import type { LocalAccount } from "viem";
import type { DomainInfo, Hex } from "@quorumsafe/types";
import { buildVoteTypedData } from "./typed-data.js";
import type { VoteMessage } from "./typed-data.js";

export async function signVote(
  account: LocalAccount,
  domain: DomainInfo,
  vote: VoteMessage,
): Promise<Hex> {
  return account.signTypedData(buildVoteTypedData(domain, vote));
}
