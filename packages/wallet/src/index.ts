/**
 * @quorumsafe/wallet — self-governed majority multisig.
 *
 * A wallet holds a set of signers. Any signer can propose a batch of calls;
 * the batch runs once a strict majority of the signers as they stand at
 * execution time has voted yes. Changes to the signer set are themselves
 * proposals aimed at the wallet.
 *
 * Pipeline:
 * 1. Propose — batch + expiration, proposer votes yes
 * 2. Vote — directly, or with an EIP-712 signature (ECDSA or ERC-1271)
 * 3. Execute — recount, then run the batch atomically
 */

// Wallet (top-level coordinator)
export { MultisigWallet } from "./wallet.js";
export type { MultisigWalletConfig, WalletSettings } from "./wallet.js";

// Factory
export { WalletFactory, FactoryError, DEFAULT_FACTORY_ADDRESS } from "./factory.js";
export type {
  WalletFactoryConfig,
  DeployOptions,
  FactoryErrorCode,
} from "./factory.js";

// Components
export { SignerRegistry, DEFAULT_MAX_SIGNERS } from "./signer-registry.js";
export { ProposalStore } from "./proposal-store.js";
export type { Canceller, ProposalStoreDeps } from "./proposal-store.js";
export { VoteLedger } from "./vote-ledger.js";
export { SignatureAuthorizer, ERC1271_MAGIC_VALUE } from "./signature-authorizer.js";
export type {
  VoteAuthorization,
  AuthorizedVote,
  AuthorizationMethod,
  DelegatedValidation,
  SignatureAuthorizerDeps,
} from "./signature-authorizer.js";
export { ExecutionEngine, hasMajority } from "./execution-engine.js";
export type { ExecutionReceipt, ExecutionEngineDeps } from "./execution-engine.js";
export { GovernanceGuard, GovernanceProof } from "./governance-guard.js";

// Event log
export {
  WalletEventLog,
  computeEventHash,
  verifyEventChain,
  GENESIS_HASH,
} from "./event-log.js";
export type {
  LoggedEvent,
  WalletEventHandler,
  Subscription,
  IntegrityError,
  IntegrityResult,
} from "./event-log.js";

// Typed data & signing
export {
  buildVoteTypedData,
  hashVote,
  VOTE_TYPES,
  DEFAULT_DOMAIN_NAME,
  DEFAULT_DOMAIN_VERSION,
} from "./typed-data.js";
export type { VoteMessage } from "./typed-data.js";
export { signVote } from "./signing.js";

// ABI
export { WALLET_ABI, FACTORY_ABI } from "./abi.js";

// Boundary helpers
export {
  normalizeAddress,
  normalizeOperations,
  zipOperations,
  requireProposalId,
  requireSignature,
} from "./address.js";

// Network
export { LocalNetwork, DEFAULT_CHAIN_ID } from "./network/local-network.js";
export type { LocalNetworkConfig } from "./network/local-network.js";
export { NetworkError } from "./network/types.js";
export type {
  CallContext,
  CallRequest,
  Checkpointable,
  Contract,
  NetworkErrorCode,
} from "./network/types.js";

// Errors
export {
  WalletError,
  AuthorizationError,
  StateError,
  ValidationError,
  SignatureError,
  ExecutionError,
  isWalletError,
} from "./errors.js";
export type {
  WalletErrorCode,
  WalletErrorCategory,
  AuthorizationErrorCode,
  StateErrorCode,
  ValidationErrorCode,
  SignatureErrorCode,
  ExecutionErrorCode,
} from "./errors.js";
