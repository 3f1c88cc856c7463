/**
 * Option validation and resolution.
 */

import { FakeAsyncConfigurationError, type ValidationIssue } from "@fauxtime/errors";
import { type ZodError, z } from "zod";
import {
  DEFAULT_FLUSH_TIMEOUT_MS,
  DEFAULT_MAX_TIMER_FIRINGS,
  DEFAULT_START_TIME,
  WARNING_TAG,
} from "./constants.js";
import type {
  FakeAsyncOptions,
  FlushTimersOptions,
  ResolvedFakeAsyncOptions,
  ResolvedFlushTimersOptions,
  WarningSink,
} from "./types.js";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const FakeAsyncOptionsSchema = z
  .object({
    startTime: z.union([z.number().finite("startTime must be finite"), z.date()]).optional(),
    maxTimerFirings: z
      .number()
      .int("maxTimerFirings must be an integer")
      .min(1, "maxTimerFirings must be >= 1")
      .optional(),
    onWarning: z
      .custom<WarningSink>((value) => typeof value === "function", "onWarning must be a function")
      .optional(),
  })
  .strict();

export const FlushTimersOptionsSchema = z
  .object({
    timeout: z
      .number()
      .finite("timeout must be finite")
      .min(0, "timeout must be >= 0")
      .optional(),
    flushPeriodicTimers: z.boolean().optional(),
  })
  .strict();

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

function toIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
    code: issue.code,
  }));
}

function toConfigurationError(error: ZodError): FakeAsyncConfigurationError {
  const issues = toIssues(error);
  const summary = issues
    .map((issue) => (issue.field === "" ? issue.message : `${issue.field}: ${issue.message}`))
    .join("; ");
  return new FakeAsyncConfigurationError(summary, issues);
}

/** Default warning sink */
export const consoleWarningSink: WarningSink = (message) => {
  console.warn(`[${WARNING_TAG}] ${message}`);
};

/**
 * Validates and resolves {@link FakeAsyncOptions} with all defaults applied.
 *
 * @throws {FakeAsyncConfigurationError} on invalid input
 */
export function resolveFakeAsyncOptions(options: FakeAsyncOptions = {}): ResolvedFakeAsyncOptions {
  const result = FakeAsyncOptionsSchema.safeParse(options);
  if (!result.success) {
    throw toConfigurationError(result.error);
  }

  const { startTime, maxTimerFirings, onWarning } = result.data;
  return {
    startTime: startTime instanceof Date ? startTime.getTime() : (startTime ?? DEFAULT_START_TIME),
    maxTimerFirings: maxTimerFirings ?? DEFAULT_MAX_TIMER_FIRINGS,
    onWarning: onWarning ?? consoleWarningSink,
  };
}

/**
 * Validates and resolves {@link FlushTimersOptions} with all defaults applied.
 *
 * @throws {FakeAsyncConfigurationError} on invalid input
 */
export function resolveFlushTimersOptions(
  options: FlushTimersOptions = {},
): ResolvedFlushTimersOptions {
  const result = FlushTimersOptionsSchema.safeParse(options);
  if (!result.success) {
    throw toConfigurationError(result.error);
  }

  return {
    timeout: result.data.timeout ?? DEFAULT_FLUSH_TIMEOUT_MS,
    flushPeriodicTimers: result.data.flushPeriodicTimers ?? true,
  };
}
