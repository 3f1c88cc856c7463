/**
 * @fauxtime/errors
 *
 * Shared error taxonomy for the fauxtime packages.
 *
 * Every error carries a `.code` from the catalog that discriminates the
 * specific condition, and a `_tag` naming its behavioral base type
 * (ValidationError, NotFoundError, ConflictError, RateLimitError,
 * TimeoutError, InternalError). Use `error.code === "XXX"` for fine-grained
 * matching, or the `is*Error` guards for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, FauxtimeError, isFauxtimeError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  isValidErrorCode,
  validateCatalog,
} from "./utils.js";

// ============================================================================
// TYPE INFRASTRUCTURE
// ============================================================================

export type {
  ConflictCodes,
  InternalCodes,
  NotFoundCodes,
  RateLimitCodes,
  TimeoutCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isConflictError,
  isExpectedError,
  isInternalError,
  isNotFoundError,
  isRateLimitError,
  isTimeoutError,
  isValidationError,
} from "./guards.js";

// ============================================================================
// FAKE ASYNC ERRORS
// ============================================================================

export {
  CaptureScopeMissingError,
  ElapseInProgressError,
  FakeAsyncConfigurationError,
  FakeAsyncError,
  FlushTimeoutError,
  InvalidDurationError,
  TimerFiringLimitError,
  TimerTickUnsupportedError,
} from "./fake-async.js";

export const PACKAGE_NAME = "@fauxtime/errors";
