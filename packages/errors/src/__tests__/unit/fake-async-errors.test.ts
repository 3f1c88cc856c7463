import { describe, expect, it } from "vitest";
import {
  CaptureScopeMissingError,
  ElapseInProgressError,
  FakeAsyncConfigurationError,
  FakeAsyncError,
  FauxtimeError,
  FlushTimeoutError,
  InvalidDurationError,
  TimerFiringLimitError,
  TimerTickUnsupportedError,
} from "../../index.js";

describe("Fake async errors", () => {
  describe("InvalidDurationError", () => {
    it("should carry the operation and duration", () => {
      const error = new InvalidDurationError("elapse", -5);

      expect(error).toBeInstanceOf(FakeAsyncError);
      expect(error).toBeInstanceOf(FauxtimeError);
      expect(error._tag).toBe("ValidationError");
      expect(error.code).toBe("FAKE_ASYNC_INVALID_DURATION");
      expect(error.domain).toBe("fake-async");
      expect(error.isExpected).toBe(true);
      expect(error.operation).toBe("elapse");
      expect(error.durationMs).toBe(-5);
      expect(error.message).toBe("elapse() duration must be a finite non-negative number, got -5");
    });
  });

  describe("FakeAsyncConfigurationError", () => {
    it("should carry validation issues", () => {
      const issues = [{ field: "timeout", message: "timeout must be >= 0", code: "too_small" }];
      const error = new FakeAsyncConfigurationError("timeout: timeout must be >= 0", issues);

      expect(error._tag).toBe("ValidationError");
      expect(error.code).toBe("FAKE_ASYNC_CONFIGURATION_INVALID");
      expect(error.issues).toEqual(issues);
      expect(error.message).toBe(
        "Invalid fake async configuration: timeout: timeout must be >= 0",
      );
    });

    it("should default to no issues", () => {
      expect(new FakeAsyncConfigurationError("bad").issues).toEqual([]);
    });
  });

  describe("ElapseInProgressError", () => {
    it("should name the rejected operation and running horizon", () => {
      const error = new ElapseInProgressError("flushTimers", 250);

      expect(error._tag).toBe("ConflictError");
      expect(error.code).toBe("FAKE_ASYNC_ELAPSE_IN_PROGRESS");
      expect(error.targetMs).toBe(250);
      expect(error.message).toBe("Cannot flushTimers() until the elapse to 250ms is complete");
    });
  });

  describe("FlushTimeoutError", () => {
    it("should report the timeout and next due time", () => {
      const error = new FlushTimeoutError(3_600_000, 7_200_000);

      expect(error._tag).toBe("TimeoutError");
      expect(error.code).toBe("FAKE_ASYNC_FLUSH_TIMEOUT");
      expect(error.timeoutMs).toBe(3_600_000);
      expect(error.nextFireMs).toBe(7_200_000);
      expect(error.message).toBe(
        "Exceeded timeout of 3600000ms while flushing timers (next timer due at 7200000ms)",
      );
    });
  });

  describe("TimerFiringLimitError", () => {
    it("should report firings against the limit", () => {
      const error = new TimerFiringLimitError(11, 10, 500);

      expect(error._tag).toBe("RateLimitError");
      expect(error.code).toBe("FAKE_ASYNC_FIRING_LIMIT");
      expect(error.firings).toBe(11);
      expect(error.maxFirings).toBe(10);
      expect(error.atMs).toBe(500);
      expect(error.message).toBe(
        "Timer firing limit exceeded: 11/10 firings at 500ms without time advancing",
      );
    });
  });

  describe("TimerTickUnsupportedError", () => {
    it("should be an unexpected internal error", () => {
      const error = new TimerTickUnsupportedError();

      expect(error._tag).toBe("InternalError");
      expect(error.code).toBe("FAKE_ASYNC_TICK_UNSUPPORTED");
      expect(error.isExpected).toBe(false);
      expect(error.message).toBe("Timer tick count is not supported");
    });
  });

  describe("CaptureScopeMissingError", () => {
    it("should be a not-found error", () => {
      const error = new CaptureScopeMissingError();

      expect(error._tag).toBe("NotFoundError");
      expect(error.code).toBe("FAKE_ASYNC_CAPTURE_SCOPE_MISSING");
      expect(error.name).toBe("CaptureScopeMissingError");
      expect(error.message).toContain("runWithCapture()");
    });
  });
});
