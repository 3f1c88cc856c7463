/**
 * Capture boundary backed by the host's real timers.
 *
 * Used when no capture scope is active, so code written against a
 * boundary or a TimerClock behaves normally outside tests.
 */

import { TimerTickUnsupportedError } from "@fauxtime/errors";
import type { CaptureBoundary, TimerHandle } from "./types.js";

let nextSystemTimerId = 1;

class SystemTimerHandle implements TimerHandle {
  readonly id = nextSystemTimerId++;
  private native: ReturnType<typeof globalThis.setTimeout> | undefined;
  private readonly periodic: boolean;

  constructor(periodic: boolean) {
    this.periodic = periodic;
  }

  get isActive(): boolean {
    return this.native !== undefined;
  }

  get tick(): number {
    throw new TimerTickUnsupportedError();
  }

  attach(native: ReturnType<typeof globalThis.setTimeout>): void {
    this.native = native;
  }

  /** Mark a fired one-shot as done without clearing anything */
  settle(): void {
    this.native = undefined;
  }

  cancel(): void {
    if (this.native === undefined) return;
    if (this.periodic) {
      globalThis.clearInterval(this.native);
    } else {
      globalThis.clearTimeout(this.native);
    }
    this.native = undefined;
  }
}

function clampDelay(ms: number): number {
  return Number.isNaN(ms) || ms < 0 ? 0 : ms;
}

export const systemBoundary: CaptureBoundary = {
  createOneShotTimer(delay, callback) {
    const handle = new SystemTimerHandle(false);
    handle.attach(
      globalThis.setTimeout(() => {
        handle.settle();
        callback();
      }, clampDelay(delay)),
    );
    return handle;
  },

  createPeriodicTimer(period, callback) {
    const handle = new SystemTimerHandle(true);
    handle.attach(globalThis.setInterval(() => callback(handle), clampDelay(period)));
    return handle;
  },

  scheduleMicrotask(callback) {
    globalThis.queueMicrotask(callback);
  },
};
