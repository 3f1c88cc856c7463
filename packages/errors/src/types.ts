/**
 * Type infrastructure shared by the error classes.
 */

import type { BaseErrorType, CodesForBase } from "./catalog.js";

// ============================================================================
// VALIDATION ISSUE
// ============================================================================

/**
 * Structured validation issue (field-level detail)
 */
export interface ValidationIssue {
  field: string;
  message: string;
  code: string;
}

export type { BaseErrorType, CodesForBase };

/**
 * Union of error codes for each base type (convenience aliases)
 */
export type ValidationCodes = CodesForBase<"ValidationError">;
export type NotFoundCodes = CodesForBase<"NotFoundError">;
export type ConflictCodes = CodesForBase<"ConflictError">;
export type RateLimitCodes = CodesForBase<"RateLimitError">;
export type TimeoutCodes = CodesForBase<"TimeoutError">;
export type InternalCodes = CodesForBase<"InternalError">;
