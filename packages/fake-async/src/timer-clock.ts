/**
 * TimerClock implementations (Node-style setTimeout/setInterval facade).
 *
 * - createTimerClock(scope): bound to one scope
 * - systemTimerClock: real timers and Date.now()
 * - ambientTimerClock: resolves the active capture scope on every call,
 *   falling back to the system clock outside one
 */

import { tryGetCaptureScope } from "./capture-context.js";
import { systemBoundary } from "./system-boundary.js";
import type { CaptureScope, TimerClock, TimerHandle } from "./types.js";

function cancel(handle: TimerHandle | undefined): void {
  handle?.cancel();
}

export function createTimerClock(scope: CaptureScope): TimerClock {
  const { boundary } = scope;
  return {
    now: () => scope.now(),
    setTimeout: (fn, ms) => boundary.createOneShotTimer(ms, fn),
    clearTimeout: cancel,
    setInterval: (fn, ms) => boundary.createPeriodicTimer(ms, () => fn()),
    clearInterval: cancel,
    queueMicrotask: (fn) => boundary.scheduleMicrotask(fn),
  };
}

const SYSTEM_SCOPE: CaptureScope = Object.freeze({
  boundary: systemBoundary,
  now: () => Date.now(),
});

export const systemTimerClock: TimerClock = createTimerClock(SYSTEM_SCOPE);

function currentScope(): CaptureScope {
  return tryGetCaptureScope() ?? SYSTEM_SCOPE;
}

export const ambientTimerClock: TimerClock = {
  now: () => currentScope().now(),
  setTimeout: (fn, ms) => currentScope().boundary.createOneShotTimer(ms, fn),
  clearTimeout: cancel,
  setInterval: (fn, ms) => currentScope().boundary.createPeriodicTimer(ms, () => fn()),
  clearInterval: cancel,
  queueMicrotask: (fn) => currentScope().boundary.scheduleMicrotask(fn),
};
