/**
 * Call surfaces exposed on the network.
 */

import { parseAbi } from "viem";

/**
 * Wallet entry points. `addSigner`, `removeSigner` and (as governance)
 * `cancelProposal` take effect only as operations of an executed proposal
 * targeting the wallet itself.
 */
export const WALLET_ABI = parseAbi([
  "function propose(address[] targets, uint256[] values, bytes[] payloads, uint256 expiration) returns (uint256)",
  "function voteFor(uint256 proposalId)",
  "function cancelVoteFor(uint256 proposalId)",
  "function voteOnBehalfOf(uint256 proposalId, address voter, bool support, bytes signature)",
  "function execute(uint256 proposalId)",
  "function cancelProposal(uint256 proposalId)",
  "function addSigner(address signer)",
  "function removeSigner(address signer)",
]);

export const FACTORY_ABI = parseAbi([
  "function deploy(address[] signers) returns (address)",
  "function deployDeterministic(address[] signers, bytes32 salt) returns (address)",
]);
