import { describe, expect, it } from "vitest";
import {
  CaptureScopeMissingError,
  ElapseInProgressError,
  FlushTimeoutError,
  hasCode,
  InvalidDurationError,
  isConflictError,
  isExpectedError,
  isInternalError,
  isNotFoundError,
  isRateLimitError,
  isTimeoutError,
  isValidationError,
  TimerFiringLimitError,
  TimerTickUnsupportedError,
} from "../../index.js";

describe("Type guards", () => {
  it("should match errors on their base type", () => {
    expect(isValidationError(new InvalidDurationError("elapse", -1))).toBe(true);
    expect(isNotFoundError(new CaptureScopeMissingError())).toBe(true);
    expect(isConflictError(new ElapseInProgressError("elapse", 10))).toBe(true);
    expect(isRateLimitError(new TimerFiringLimitError(2, 1, 0))).toBe(true);
    expect(isTimeoutError(new FlushTimeoutError(10, 20))).toBe(true);
    expect(isInternalError(new TimerTickUnsupportedError())).toBe(true);
  });

  it("should not match other base types", () => {
    const error = new FlushTimeoutError(10, 20);
    expect(isValidationError(error)).toBe(false);
    expect(isConflictError(error)).toBe(false);
    expect(isInternalError(error)).toBe(false);
  });

  it("should reject non-fauxtime values", () => {
    expect(isTimeoutError(new Error("timeout"))).toBe(false);
    expect(isValidationError({ _tag: "ValidationError" })).toBe(false);
    expect(isInternalError(undefined)).toBe(false);
  });

  it("should narrow by code", () => {
    const error = new ElapseInProgressError("elapse", 10);
    expect(hasCode(error, "FAKE_ASYNC_ELAPSE_IN_PROGRESS")).toBe(true);
    expect(hasCode(error, "FAKE_ASYNC_FLUSH_TIMEOUT")).toBe(false);
  });

  it("should report expected conditions", () => {
    expect(isExpectedError(new FlushTimeoutError(10, 20))).toBe(true);
    expect(isExpectedError(new TimerTickUnsupportedError())).toBe(false);
    expect(isExpectedError(new Error("plain"))).toBe(false);
  });
});
