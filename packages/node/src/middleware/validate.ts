/**
 * Zod request parsing.
 *
 * Route handlers parse their own body, query and params through these
 * helpers and get typed values back. Failures throw
 * {@link RequestValidationError}, which the error handler turns into a
 * 400 envelope listing every issue.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export class RequestValidationError extends Error {
  public readonly code = "VALIDATION_ERROR";
  constructor(
    message: string,
    public readonly issues: readonly ValidationIssue[],
  ) {
    super(message);
    this.name = "RequestValidationError";
  }
}

/**
 * Parse `value` with `schema` or throw with the formatted issues.
 */
export function parseWith<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown,
  message: string,
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new RequestValidationError(message, formatZodErrors(result.error));
  }
  return result.data;
}

/**
 * Read and validate the JSON request body.
 */
export async function parseJsonBody<T>(
  c: Context,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new RequestValidationError("Invalid JSON in request body", []);
  }
  return parseWith(schema, body, "Request body validation failed");
}

export function parseQuery<T>(c: Context, schema: ZodType<T, ZodTypeDef, unknown>): T {
  return parseWith(schema, c.req.query(), "Invalid query parameters");
}

function formatZodErrors(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
