/**
 * Type guards for the behavioral base types + code-level discrimination.
 *
 * Base types are matched on `_tag`, so domain errors (which extend their
 * domain's abstract class) are matched alongside the concrete base classes.
 */

import { FauxtimeError } from "./base.js";
import type { BaseErrorType, ErrorCode } from "./catalog.js";

function hasBaseType(error: unknown, base: BaseErrorType): error is FauxtimeError {
  return error instanceof FauxtimeError && error._tag === base;
}

/** Check if an error is a ValidationError (bad input, config) */
export function isValidationError(error: unknown): error is FauxtimeError {
  return hasBaseType(error, "ValidationError");
}

/** Check if an error is a NotFoundError (missing scope or resource) */
export function isNotFoundError(error: unknown): error is FauxtimeError {
  return hasBaseType(error, "NotFoundError");
}

/** Check if an error is a ConflictError (state conflict) */
export function isConflictError(error: unknown): error is FauxtimeError {
  return hasBaseType(error, "ConflictError");
}

/** Check if an error is a RateLimitError (resource exhaustion) */
export function isRateLimitError(error: unknown): error is FauxtimeError {
  return hasBaseType(error, "RateLimitError");
}

/** Check if an error is a TimeoutError (deadline exceeded) */
export function isTimeoutError(error: unknown): error is FauxtimeError {
  return hasBaseType(error, "TimeoutError");
}

/** Check if an error is an InternalError (bug/unsupported) */
export function isInternalError(error: unknown): error is FauxtimeError {
  return hasBaseType(error, "InternalError");
}

/**
 * Check if a FauxtimeError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: FauxtimeError,
  code: C,
): error is FauxtimeError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected condition (caller misuse rather
 * than a bug). Returns false for non-FauxtimeError values.
 */
export function isExpectedError(error: unknown): boolean {
  return error instanceof FauxtimeError && error.isExpected;
}
