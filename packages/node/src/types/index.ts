/**
 * Type barrel — re-exports all public types of the node.
 */

// DTOs
export {
  AddressSchema,
  HexSchema,
  Bytes32Schema,
  AmountSchema,
  TimestampSchema,
  OffsetQuerySchema,
  ProposalIdParamSchema,
  FundSchema,
  SetTimeSchema,
  CreateWalletSchema,
  OperationSchema,
  ProposeSchema,
  SenderSchema,
  SignedVoteSchema,
  ListEventsQuerySchema,
  toWalletResponse,
  toProposalResponse,
  toSignedVoteResponse,
} from "./dto.js";
export type {
  OffsetQuery,
  FundDto,
  SetTimeDto,
  CreateWalletDto,
  ProposeDto,
  SenderDto,
  SignedVoteDto,
  ListEventsQuery,
  WalletResponse,
  OperationResponse,
  ProposalResponse,
  SignedVoteResponse,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { pageMeta, paginate } from "./pagination.js";
export type { PaginationMeta, PaginatedResponse } from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";
