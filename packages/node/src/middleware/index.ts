/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, resolveError } from "./error-handler.js";
export type { ErrorStatus, ResolvedError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware, levelForStatus } from "./logger.js";
export type { RequestLogEntry, RequestLogLevel } from "./logger.js";
export {
  parseJsonBody,
  parseQuery,
  parseWith,
  RequestValidationError,
} from "./validate.js";
export type { ValidationIssue } from "./validate.js";
