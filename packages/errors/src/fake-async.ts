/**
 * Fake async errors — virtual-time engine
 *
 * Abstract base: FakeAsyncError
 * Concrete:
 *   - InvalidDurationError (FAKE_ASYNC_INVALID_DURATION)
 *   - FakeAsyncConfigurationError (FAKE_ASYNC_CONFIGURATION_INVALID)
 *   - ElapseInProgressError (FAKE_ASYNC_ELAPSE_IN_PROGRESS)
 *   - FlushTimeoutError (FAKE_ASYNC_FLUSH_TIMEOUT)
 *   - TimerFiringLimitError (FAKE_ASYNC_FIRING_LIMIT)
 *   - TimerTickUnsupportedError (FAKE_ASYNC_TICK_UNSUPPORTED)
 *   - CaptureScopeMissingError (FAKE_ASYNC_CAPTURE_SCOPE_MISSING)
 */

import { FauxtimeError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain } from "./catalog.js";
import type { ValidationIssue } from "./types.js";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

/**
 * Abstract base class for virtual-time engine errors.
 *
 * Enables generic catch: `if (e instanceof FakeAsyncError)`
 * while specific subclasses allow precise handling.
 */
export abstract class FakeAsyncError extends FauxtimeError {}

// ---------------------------------------------------------------------------
// Invalid duration
// ---------------------------------------------------------------------------

/**
 * Thrown when `elapse` or `elapseBlocking` receives a negative or
 * non-finite duration.
 */
export class InvalidDurationError extends FakeAsyncError {
  readonly _tag = "ValidationError" as const;
  readonly code = "FAKE_ASYNC_INVALID_DURATION" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly operation: string;
  readonly durationMs: number;

  constructor(operation: string, durationMs: number) {
    super(`${operation}() duration must be a finite non-negative number, got ${durationMs}`);
    const entry = ERROR_CATALOG.FAKE_ASYNC_INVALID_DURATION;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.operation = operation;
    this.durationMs = durationMs;
  }
}

// ---------------------------------------------------------------------------
// Configuration invalid
// ---------------------------------------------------------------------------

export class FakeAsyncConfigurationError extends FakeAsyncError {
  readonly _tag = "ValidationError" as const;
  readonly code = "FAKE_ASYNC_CONFIGURATION_INVALID" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super(`Invalid fake async configuration: ${message}`);
    const entry = ERROR_CATALOG.FAKE_ASYNC_CONFIGURATION_INVALID;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Elapse in progress
// ---------------------------------------------------------------------------

/**
 * Thrown when time is advanced while a previous `elapse` call is still
 * running (for example from inside a timer callback).
 */
export class ElapseInProgressError extends FakeAsyncError {
  readonly _tag = "ConflictError" as const;
  readonly code = "FAKE_ASYNC_ELAPSE_IN_PROGRESS" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  /** Horizon of the elapse call that is still running */
  readonly targetMs: number;

  constructor(operation: string, targetMs: number) {
    super(`Cannot ${operation}() until the elapse to ${targetMs}ms is complete`);
    const entry = ERROR_CATALOG.FAKE_ASYNC_ELAPSE_IN_PROGRESS;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.targetMs = targetMs;
  }
}

// ---------------------------------------------------------------------------
// Flush timeout
// ---------------------------------------------------------------------------

/**
 * Thrown when `flushTimers` would have to advance past its timeout for the
 * next pending timer to become due.
 */
export class FlushTimeoutError extends FakeAsyncError {
  readonly _tag = "TimeoutError" as const;
  readonly code = "FAKE_ASYNC_FLUSH_TIMEOUT" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly timeoutMs: number;
  readonly nextFireMs: number;

  constructor(timeoutMs: number, nextFireMs: number) {
    super(
      `Exceeded timeout of ${timeoutMs}ms while flushing timers (next timer due at ${nextFireMs}ms)`,
    );
    const entry = ERROR_CATALOG.FAKE_ASYNC_FLUSH_TIMEOUT;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.timeoutMs = timeoutMs;
    this.nextFireMs = nextFireMs;
  }
}

// ---------------------------------------------------------------------------
// Firing limit
// ---------------------------------------------------------------------------

/**
 * Thrown when timers keep firing at one virtual instant without time moving
 * forward, which usually means a zero-period periodic timer.
 */
export class TimerFiringLimitError extends FakeAsyncError {
  readonly _tag = "RateLimitError" as const;
  readonly code = "FAKE_ASYNC_FIRING_LIMIT" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly firings: number;
  readonly maxFirings: number;
  /** Virtual time the firings were stuck at */
  readonly atMs: number;

  constructor(firings: number, maxFirings: number, atMs: number) {
    super(
      `Timer firing limit exceeded: ${firings}/${maxFirings} firings at ${atMs}ms without time advancing`,
    );
    const entry = ERROR_CATALOG.FAKE_ASYNC_FIRING_LIMIT;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.firings = firings;
    this.maxFirings = maxFirings;
    this.atMs = atMs;
  }
}

// ---------------------------------------------------------------------------
// Tick unsupported
// ---------------------------------------------------------------------------

export class TimerTickUnsupportedError extends FakeAsyncError {
  readonly _tag = "InternalError" as const;
  readonly code = "FAKE_ASYNC_TICK_UNSUPPORTED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor() {
    super("Timer tick count is not supported");
    const entry = ERROR_CATALOG.FAKE_ASYNC_TICK_UNSUPPORTED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}

// ---------------------------------------------------------------------------
// Capture scope missing
// ---------------------------------------------------------------------------

/**
 * Thrown by `getCaptureScope()` outside any `runWithCapture` /
 * `FakeAsync.run` call.
 */
export class CaptureScopeMissingError extends FakeAsyncError {
  readonly _tag = "NotFoundError" as const;
  readonly code = "FAKE_ASYNC_CAPTURE_SCOPE_MISSING" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor() {
    super(
      "No capture scope is active: getCaptureScope() was called outside runWithCapture(). " +
        "Wrap the code under test with FakeAsync.run() or runWithCapture().",
    );
    const entry = ERROR_CATALOG.FAKE_ASYNC_CAPTURE_SCOPE_MISSING;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
