/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each request DTO has a Zod schema and a derived TypeScript type. Bigints
 * travel as decimal strings in both directions.
 */

import { z } from "zod";
import { getAddress, isAddress } from "viem";
import { isHex } from "@quorumsafe/types";
import type {
  Address,
  DomainInfo,
  Hex,
  ProposalStatus,
  ProposalView,
} from "@quorumsafe/types";
import type { AuthorizedVote, MultisigWallet } from "@quorumsafe/wallet";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Any letter case in, checksummed out. */
export const AddressSchema = z
  .custom<Address>(
    (v) => typeof v === "string" && isAddress(v, { strict: false }),
    "Expected a 20-byte 0x-prefixed address",
  )
  .transform((v) => getAddress(v));

export const HexSchema = z.custom<Hex>(
  (v) => isHex(v),
  "Expected even-length 0x-prefixed hex",
);

export const Bytes32Schema = z.custom<Hex>(
  (v) => isHex(v) && v.length === 66,
  "Expected 32 bytes of 0x-prefixed hex",
);

/** Decimal string → bigint */
export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "Expected a non-negative decimal integer string")
  .transform((v) => BigInt(v));

export const TimestampSchema = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER);

export const OffsetQuerySchema = z.object({
  offset: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type OffsetQuery = z.infer<typeof OffsetQuerySchema>;

// =============================================================================
// Path Params
// =============================================================================

export const ProposalIdParamSchema = z.coerce
  .number()
  .int()
  .min(0)
  .max(Number.MAX_SAFE_INTEGER);

// =============================================================================
// Network DTOs
// =============================================================================

export const FundSchema = z.object({
  address: AddressSchema,
  amount: AmountSchema,
});

export type FundDto = z.infer<typeof FundSchema>;

export const SetTimeSchema = z.union([
  z.object({ timestamp: TimestampSchema }).strict(),
  z.object({ advance: z.number().int().min(0) }).strict(),
]);

export type SetTimeDto = z.infer<typeof SetTimeSchema>;

// =============================================================================
// Wallet DTOs
// =============================================================================

export const CreateWalletSchema = z.object({
  signers: z.array(AddressSchema).min(1),
  salt: Bytes32Schema.optional(),
});

export type CreateWalletDto = z.infer<typeof CreateWalletSchema>;

export const OperationSchema = z.object({
  target: AddressSchema,
  value: AmountSchema.default("0"),
  data: HexSchema.default("0x"),
});

export const ProposeSchema = z.object({
  from: AddressSchema,
  operations: z.array(OperationSchema).min(1),
  expiration: TimestampSchema,
});

export type ProposeDto = z.infer<typeof ProposeSchema>;

/** Body of vote, retract, execute and cancel: just the sender. */
export const SenderSchema = z.object({
  from: AddressSchema,
});

export type SenderDto = z.infer<typeof SenderSchema>;

export const SignedVoteSchema = z.object({
  voter: AddressSchema,
  support: z.boolean(),
  signature: HexSchema,
});

export type SignedVoteDto = z.infer<typeof SignedVoteSchema>;

export const ListEventsQuerySchema = OffsetQuerySchema.extend({
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

// =============================================================================
// Responses
// =============================================================================

export interface WalletResponse {
  readonly address: Address;
  readonly signers: readonly Address[];
  readonly signerCount: number;
  readonly maxSigners: number;
  readonly proposalCount: number;
  readonly balance: string;
  readonly domain: DomainInfo;
}

export interface OperationResponse {
  readonly target: Address;
  readonly value: string;
  readonly data: Hex;
}

export interface ProposalResponse {
  readonly id: number;
  readonly proposer: Address;
  readonly expiration: number;
  readonly status: ProposalStatus;
  readonly operations: readonly OperationResponse[];
  readonly yesVoters: readonly Address[];
  readonly validYesCount: number;
  readonly signerCount: number;
}

export interface SignedVoteResponse {
  readonly proposalId: number;
  readonly voter: Address;
  readonly support: boolean;
  readonly nonce: number;
  readonly digest: Hex;
  readonly method: AuthorizedVote["method"];
}

export function toWalletResponse(wallet: MultisigWallet): WalletResponse {
  return {
    address: wallet.address,
    signers: wallet.getSigners(),
    signerCount: wallet.getSignerCount(),
    maxSigners: wallet.maxSigners,
    proposalCount: wallet.proposalCount,
    balance: wallet.network.balanceOf(wallet.address).toString(),
    domain: wallet.getDomainInfo(),
  };
}

export function toProposalResponse(
  wallet: MultisigWallet,
  proposal: ProposalView,
): ProposalResponse {
  return {
    id: proposal.id,
    proposer: proposal.proposer,
    expiration: proposal.expiration,
    status: proposal.status,
    operations: proposal.operations.map((op) => ({
      target: op.target,
      value: op.value.toString(),
      data: op.data,
    })),
    yesVoters: wallet.getYesVoterHistory(proposal.id),
    validYesCount: wallet.getValidYesCount(proposal.id),
    signerCount: wallet.getSignerCount(),
  };
}

export function toSignedVoteResponse(vote: AuthorizedVote): SignedVoteResponse {
  return {
    proposalId: vote.proposalId,
    voter: vote.voter,
    support: vote.support,
    nonce: vote.nonce,
    digest: vote.digest,
    method: vote.method,
  };
}
