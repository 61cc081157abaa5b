/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces a consistent
 * error envelope response. Wallet errors map by category, so every
 * rejection of one kind gets the same status:
 *
 *   validation → 400, signature → 401, authorization → 403,
 *   state → 409, execution → 422
 *
 * Anything unrecognized is a 500 with a generic message.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import {
  ExecutionError,
  FactoryError,
  NetworkError,
  isWalletError,
} from "@quorumsafe/wallet";
import type {
  FactoryErrorCode,
  NetworkErrorCode,
  WalletErrorCategory,
} from "@quorumsafe/wallet";
import { NotFoundError } from "../services/wallet-service.js";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import { RequestValidationError } from "./validate.js";

// =============================================================================
// Error → HTTP Status Mapping
// =============================================================================

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 422 | 500;

const CATEGORY_STATUS: Record<WalletErrorCategory, ErrorStatus> = {
  validation: 400,
  signature: 401,
  authorization: 403,
  state: 409,
  execution: 422,
};

const FACTORY_STATUS: Record<FactoryErrorCode, ErrorStatus> = {
  ADDRESS_IN_USE: 409,
  INVALID_SALT: 400,
  INVALID_PAGE: 400,
  UNSUPPORTED_CALL: 400,
};

const NETWORK_STATUS: Record<NetworkErrorCode, ErrorStatus> = {
  ADDRESS_IN_USE: 409,
  INSUFFICIENT_BALANCE: 422,
  INVALID_AMOUNT: 400,
  INVALID_TIME: 400,
  INVALID_CHAIN_ID: 400,
};

export interface ResolvedError {
  readonly status: ErrorStatus;
  readonly code: string;
  readonly message: string;
  readonly details?: Record<string, unknown> | undefined;
}

export function resolveError(err: unknown): ResolvedError {
  if (isWalletError(err)) {
    return {
      status: CATEGORY_STATUS[err.category],
      code: err.code,
      message: err.message,
      details:
        err instanceof ExecutionError ? { operationIndex: err.operationIndex } : undefined,
    };
  }
  if (err instanceof RequestValidationError) {
    return { status: 400, code: err.code, message: err.message, details: { issues: err.issues } };
  }
  if (err instanceof NotFoundError) {
    return { status: 404, code: err.code, message: err.message };
  }
  if (err instanceof FactoryError) {
    return { status: FACTORY_STATUS[err.code], code: err.code, message: err.message };
  }
  if (err instanceof NetworkError) {
    return { status: NETWORK_STATUS[err.code], code: err.code, message: err.message };
  }
  return { status: 500, code: "INTERNAL_ERROR", message: "Internal server error" };
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Build the handler registered with Hono's `onError`. `report` sees every
 * error that resolves to a 500.
 */
export function createErrorHandler(
  report?: (err: Error, c: Context<AppEnv>) => void,
): (err: Error, c: Context<AppEnv>) => Response {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    const resolved = resolveError(err);
    if (resolved.status === 500) {
      report?.(err, c);
    }

    return c.json(
      createErrorEnvelope(resolved.code, resolved.message, resolved.details),
      resolved.status,
    );
  };
}
