/**
 * @fauxtime/fake-async
 *
 * Deterministic virtual time for tests.
 *
 * Provides:
 * - FakeAsync engine: elapse, elapseBlocking, flushMicrotasks, flushTimers, run
 * - CaptureBoundary injection points (one-shot timer, periodic timer, microtask)
 * - Ambient capture scope via AsyncLocalStorage
 * - TimerClock facades over the system timers, an engine, or the ambient scope
 */

// Capture context
export { getCaptureScope, runWithCapture, tryGetCaptureScope } from "./capture-context.js";
// Config
export {
  consoleWarningSink,
  FakeAsyncOptionsSchema,
  FlushTimersOptionsSchema,
  resolveFakeAsyncOptions,
  resolveFlushTimersOptions,
} from "./config.js";
// Constants
export {
  DEFAULT_FLUSH_TIMEOUT_MS,
  DEFAULT_MAX_TIMER_FIRINGS,
  DEFAULT_START_TIME,
  PACKAGE_NAME,
} from "./constants.js";
// Engine
export { FakeAsync, fakeAsync } from "./fake-async.js";
// System boundary
export { systemBoundary } from "./system-boundary.js";
// Timer clocks
export { ambientTimerClock, createTimerClock, systemTimerClock } from "./timer-clock.js";
// Types
export type {
  CaptureBoundary,
  CaptureScope,
  ClockReader,
  FakeAsyncOptions,
  FlushTimersOptions,
  PendingTimer,
  ResolvedFakeAsyncOptions,
  ResolvedFlushTimersOptions,
  TimerClock,
  TimerHandle,
  TimerKind,
  WarningSink,
} from "./types.js";
