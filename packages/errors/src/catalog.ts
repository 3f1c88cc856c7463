/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the fauxtime packages. Each code maps to a
 * domain and to one of the behavioral base types the guards match on.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: fake-async
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "ConflictError"
  | "RateLimitError"
  | "TimeoutError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // FAKE ASYNC ERRORS - Virtual-time engine
  // ============================================================================
  FAKE_ASYNC_INVALID_DURATION: {
    domain: "fake-async",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid duration",
    description: "A duration passed to elapse or elapseBlocking was negative or not finite",
  },
  FAKE_ASYNC_CONFIGURATION_INVALID: {
    domain: "fake-async",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid fake async configuration",
    description: "Engine or flush options failed schema validation",
  },
  FAKE_ASYNC_ELAPSE_IN_PROGRESS: {
    domain: "fake-async",
    baseType: "ConflictError" as const,
    isExpected: true,
    title: "Elapse already in progress",
    description: "Time cannot be advanced while a previous elapse call is still running",
  },
  FAKE_ASYNC_FLUSH_TIMEOUT: {
    domain: "fake-async",
    baseType: "TimeoutError" as const,
    isExpected: true,
    title: "Flush timeout exceeded",
    description: "Flushing timers would need to advance past the configured timeout",
  },
  FAKE_ASYNC_FIRING_LIMIT: {
    domain: "fake-async",
    baseType: "RateLimitError" as const,
    isExpected: true,
    title: "Timer firing limit exceeded",
    description: "Timers kept firing at one virtual instant past the configured limit",
  },
  FAKE_ASYNC_TICK_UNSUPPORTED: {
    domain: "fake-async",
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Timer tick unsupported",
    description: "Timer handles do not track a tick count",
  },
  FAKE_ASYNC_CAPTURE_SCOPE_MISSING: {
    domain: "fake-async",
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Capture scope missing",
    description: "No capture scope is active on the current async call chain",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
