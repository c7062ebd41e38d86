/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, statusForCode } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody } from "./validate.js";
export type { FieldProblem } from "./validate.js";
export {
  idempotencyMiddleware,
  fingerprintRequest,
  InMemoryIdempotencyStore,
  IDEMPOTENCY_HEADER,
  DEFAULT_MAX_ENTRIES,
} from "./idempotency.js";
export type {
  IdempotencyStore,
  IdempotencyEntry,
  IdempotencyRecord,
  IdempotencyOptions,
  StoredResponse,
} from "./idempotency.js";
