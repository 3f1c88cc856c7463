import { FakeAsyncConfigurationError } from "@fauxtime/errors";
import { describe, expect, it, vi } from "vitest";
import {
  consoleWarningSink,
  resolveFakeAsyncOptions,
  resolveFlushTimersOptions,
} from "../../config.js";
import {
  DEFAULT_FLUSH_TIMEOUT_MS,
  DEFAULT_MAX_TIMER_FIRINGS,
  DEFAULT_START_TIME,
} from "../../constants.js";

describe("resolveFakeAsyncOptions", () => {
  it("should resolve with all defaults when given no options", () => {
    const options = resolveFakeAsyncOptions();
    expect(options.startTime).toBe(DEFAULT_START_TIME);
    expect(options.maxTimerFirings).toBe(DEFAULT_MAX_TIMER_FIRINGS);
    expect(options.onWarning).toBe(consoleWarningSink);
  });

  it("should accept a numeric startTime", () => {
    expect(resolveFakeAsyncOptions({ startTime: 1_700_000_000_000 }).startTime).toBe(
      1_700_000_000_000,
    );
  });

  it("should convert a Date startTime to epoch milliseconds", () => {
    const options = resolveFakeAsyncOptions({ startTime: new Date("2024-01-01T00:00:00.000Z") });
    expect(options.startTime).toBe(Date.UTC(2024, 0, 1));
  });

  it("should pass through onWarning", () => {
    const onWarning = () => {};
    expect(resolveFakeAsyncOptions({ onWarning }).onWarning).toBe(onWarning);
  });

  it("should throw on a non-finite startTime", () => {
    expect(() => resolveFakeAsyncOptions({ startTime: Number.POSITIVE_INFINITY })).toThrow(
      FakeAsyncConfigurationError,
    );
  });

  it("should throw on maxTimerFirings < 1", () => {
    expect(() => resolveFakeAsyncOptions({ maxTimerFirings: 0 })).toThrow(
      FakeAsyncConfigurationError,
    );
  });

  it("should report structured issues", () => {
    try {
      resolveFakeAsyncOptions({ maxTimerFirings: 2.5 });
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(FakeAsyncConfigurationError);
      const err = error as FakeAsyncConfigurationError;
      expect(err.issues).toHaveLength(1);
      expect(err.issues[0]?.field).toBe("maxTimerFirings");
      expect(err.issues[0]?.message).toBe("maxTimerFirings must be an integer");
      expect(err.message).toBe(
        "Invalid fake async configuration: maxTimerFirings: maxTimerFirings must be an integer",
      );
    }
  });

  it("should reject a non-function onWarning", () => {
    expect(() => resolveFakeAsyncOptions({ onWarning: "loud" } as never)).toThrow(
      "onWarning must be a function",
    );
  });
});

describe("resolveFlushTimersOptions", () => {
  it("should default to a one hour timeout and periodic flushing", () => {
    const options = resolveFlushTimersOptions();
    expect(options.timeout).toBe(DEFAULT_FLUSH_TIMEOUT_MS);
    expect(options.timeout).toBe(3_600_000);
    expect(options.flushPeriodicTimers).toBe(true);
  });

  it("should accept explicit values", () => {
    expect(resolveFlushTimersOptions({ timeout: 0, flushPeriodicTimers: false })).toEqual({
      timeout: 0,
      flushPeriodicTimers: false,
    });
  });

  it("should throw on a negative timeout", () => {
    expect(() => resolveFlushTimersOptions({ timeout: -1 })).toThrow(FakeAsyncConfigurationError);
  });

  it("should throw on NaN timeout", () => {
    expect(() => resolveFlushTimersOptions({ timeout: Number.NaN })).toThrow(
      FakeAsyncConfigurationError,
    );
  });
});

describe("consoleWarningSink", () => {
  it("should prefix messages with the component tag", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    try {
      consoleWarningSink("something odd");
      expect(warn).toHaveBeenCalledWith("[FakeAsync] something odd");
    } finally {
      warn.mockRestore();
    }
  });
});
