/**
 * Wallet Errors
 *
 * Every rejection carries a category (the class) and a machine-readable code.
 * All of them are raised before any state is written, except
 * {@link ExecutionError}, whose call is rolled back in full.
 */

export type AuthorizationErrorCode =
  | "NOT_SIGNER"
  | "NOT_GOVERNANCE"
  | "NOT_CANCELLER";

export type StateErrorCode =
  | "INVALID_STATUS"
  | "EXPIRED"
  | "ALREADY_VOTED"
  | "NOT_VOTED"
  | "INSUFFICIENT_VOTES";

export type ValidationErrorCode =
  | "EMPTY_BATCH"
  | "LENGTH_MISMATCH"
  | "INVALID_ADDRESS"
  | "INVALID_OPERATION"
  | "INVALID_EXPIRATION"
  | "INVALID_PROPOSAL_ID"
  | "INVALID_SIGNATURE_FORMAT"
  | "DUPLICATE_SIGNER"
  | "UNKNOWN_SIGNER"
  | "SIGNER_LIMIT"
  | "LAST_SIGNER"
  | "INVALID_CONFIG"
  | "UNSUPPORTED_CALL";

export type SignatureErrorCode = "INVALID_SIGNATURE";

export type ExecutionErrorCode = "OPERATION_FAILED";

export type WalletErrorCode =
  | AuthorizationErrorCode
  | StateErrorCode
  | ValidationErrorCode
  | SignatureErrorCode
  | ExecutionErrorCode;

export type WalletErrorCategory =
  | "authorization"
  | "state"
  | "validation"
  | "signature"
  | "execution";

// =============================================================================
// Base
// =============================================================================

export abstract class WalletError extends Error {
  public readonly code: WalletErrorCode;
  public abstract readonly category: WalletErrorCategory;

  protected constructor(code: WalletErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
  }
}

// =============================================================================
// Categories
// =============================================================================

/** Caller is not a current signer, not the governance path, or not a valid canceller. */
export class AuthorizationError extends WalletError {
  public readonly category = "authorization";
  constructor(code: AuthorizationErrorCode, message: string) {
    super(code, message);
    this.name = "AuthorizationError";
  }
}

/** Wrong proposal status for the action, or the proposal has expired. */
export class StateError extends WalletError {
  public readonly category = "state";
  constructor(code: StateErrorCode, message: string) {
    super(code, message);
    this.name = "StateError";
  }
}

/** Malformed input or a signer-set bound violation. */
export class ValidationError extends WalletError {
  public readonly category = "validation";
  constructor(code: ValidationErrorCode, message: string) {
    super(code, message);
    this.name = "ValidationError";
  }
}

/** Neither key recovery nor delegated validation accepted the signature. */
export class SignatureError extends WalletError {
  public readonly category = "signature";
  constructor(code: SignatureErrorCode, message: string) {
    super(code, message);
    this.name = "SignatureError";
  }
}

/** A batched operation failed; the whole execution was rolled back. */
export class ExecutionError extends WalletError {
  public readonly category = "execution";
  public readonly operationIndex: number;

  constructor(
    code: ExecutionErrorCode,
    message: string,
    operationIndex: number,
    cause: unknown,
  ) {
    super(code, message, { cause });
    this.name = "ExecutionError";
    this.operationIndex = operationIndex;
  }
}

export function isWalletError(err: unknown): err is WalletError {
  return err instanceof WalletError;
}
