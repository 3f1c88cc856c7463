/**
 * FakeAsync — deterministic virtual-time scheduler.
 *
 * Timers and microtasks created through the engine's boundary are captured
 * instead of scheduled for real, and fire only when the test advances time
 * with elapse() or flushTimers(). Microtasks are drained before any timer
 * work and after every single firing; timers fire in nextFire order with
 * ties broken by creation order.
 */

import {
  ElapseInProgressError,
  FlushTimeoutError,
  InvalidDurationError,
} from "@fauxtime/errors";
import { runWithCapture } from "./capture-context.js";
import { resolveFakeAsyncOptions, resolveFlushTimersOptions } from "./config.js";
import { FiringGuard } from "./firing-guard.js";
import { MicrotaskQueue } from "./microtask-queue.js";
import { createTimerClock } from "./timer-clock.js";
import { TimerEntry, TimerRegistry } from "./timer-registry.js";
import type {
  CaptureBoundary,
  CaptureScope,
  ClockReader,
  FakeAsyncOptions,
  FlushTimersOptions,
  PendingTimer,
  ResolvedFakeAsyncOptions,
  TimerClock,
  TimerHandle,
  TimerKind,
} from "./types.js";
import { VirtualClock } from "./virtual-clock.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Negative and NaN delays are clamped to zero rather than rejected */
function clampDelay(ms: number): number {
  return Number.isNaN(ms) || ms < 0 ? 0 : ms;
}

function isValidDuration(ms: number): boolean {
  return Number.isFinite(ms) && ms >= 0;
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class FakeAsync {
  /** Boundary to inject into code under test */
  readonly boundary: CaptureBoundary;
  /** TimerClock bound to this engine */
  readonly timerClock: TimerClock;

  private readonly options: ResolvedFakeAsyncOptions;
  private readonly clock = new VirtualClock();
  private readonly microtasks = new MicrotaskQueue();
  private readonly timers = new TimerRegistry();
  private readonly scope: CaptureScope;
  private nextTimerId = 1;

  /**
   * Virtual time at which the current elapse() call finishes, or
   * `undefined` when no elapse() is running.
   */
  private elapsingTo: number | undefined;

  constructor(options?: FakeAsyncOptions) {
    this.options = resolveFakeAsyncOptions(options);
    this.boundary = {
      createOneShotTimer: (delay, callback) =>
        this.createTimer(delay, { kind: "one-shot", callback }),
      createPeriodicTimer: (period, callback) =>
        this.createTimer(period, { kind: "periodic", period: clampDelay(period), callback }),
      scheduleMicrotask: (callback) => {
        this.microtasks.enqueue(callback);
      },
    };
    this.scope = Object.freeze({
      boundary: this.boundary,
      now: () => this.clock.now(this.options.startTime),
    });
    this.timerClock = createTimerClock(this.scope);
  }

  // -------------------------------------------------------------------------
  // Introspection
  // -------------------------------------------------------------------------

  /** Virtual milliseconds elapsed since this engine was created */
  get elapsed(): number {
    return this.clock.elapsed;
  }

  /** Active periodic timers */
  get periodicTimerCount(): number {
    return this.timers.count("periodic");
  }

  /** Active one-shot timers */
  get nonPeriodicTimerCount(): number {
    return this.timers.count("one-shot");
  }

  /** Pending microtasks */
  get microtaskCount(): number {
    return this.microtasks.size;
  }

  /** Snapshot of active timers in firing order */
  get pendingTimers(): readonly PendingTimer[] {
    return this.timers.snapshot();
  }

  /**
   * A clock reading `initialTime` plus the virtual time elapsed so far.
   * The reader tracks later elapse()/elapseBlocking() calls.
   */
  getClock(initialTime: Date | number): ClockReader {
    const base = initialTime instanceof Date ? initialTime.getTime() : initialTime;
    return () => new Date(this.clock.now(base));
  }

  // -------------------------------------------------------------------------
  // Time control
  // -------------------------------------------------------------------------

  /**
   * Simulate the asynchronous passage of `duration` ms, firing every timer
   * due within the new horizon.
   *
   * @throws {InvalidDurationError} if `duration` is negative or not finite
   * @throws {ElapseInProgressError} if a previous elapse() is still running
   */
  elapse(duration: number): void {
    if (!isValidDuration(duration)) {
      throw new InvalidDurationError("elapse", duration);
    }
    if (this.elapsingTo !== undefined) {
      throw new ElapseInProgressError("elapse", this.elapsingTo);
    }

    const target = this.clock.elapsed + duration;
    this.elapsingTo = target;
    try {
      // elapseBlocking() may stretch elapsingTo while timers run
      this.fireTimersWhile((next) => next.nextFire <= (this.elapsingTo ?? target));
      this.clock.advanceTo(this.elapsingTo ?? target);
    } finally {
      this.elapsingTo = undefined;
    }
  }

  /**
   * Simulate the synchronous passage of `duration` ms (a blocking or
   * expensive call). Nothing runs; inside elapse() the horizon stretches so
   * timers due in the extra time still fire during that call.
   *
   * @throws {InvalidDurationError} if `duration` is negative or not finite
   */
  elapseBlocking(duration: number): void {
    if (!isValidDuration(duration)) {
      throw new InvalidDurationError("elapseBlocking", duration);
    }

    this.clock.advanceBy(duration);
    if (this.elapsingTo !== undefined && this.clock.elapsed > this.elapsingTo) {
      this.elapsingTo = this.clock.elapsed;
    }
  }

  /** Run pending microtasks until none are left. Does not fire timers. */
  flushMicrotasks(): void {
    runWithCapture(this.scope, () => {
      this.microtasks.drainAll();
    });
  }

  /**
   * Advance time until no timers remain active.
   *
   * With `flushPeriodicTimers: false`, stops once only periodic timers are
   * left and each has had a chance to fire at the final elapsed value.
   *
   * Allowed from inside a timer callback; the nested flush fires onward and
   * the surrounding elapse() never moves time back.
   *
   * @throws {FlushTimeoutError} if the next timer is due after `elapsed + timeout`
   */
  flushTimers(options?: FlushTimersOptions): void {
    const { timeout, flushPeriodicTimers } = resolveFlushTimersOptions(options);
    const absoluteTimeout = this.clock.elapsed + timeout;
    this.fireTimersWhile((next) => {
      if (next.nextFire > absoluteTimeout) {
        throw new FlushTimeoutError(timeout, next.nextFire);
      }
      if (flushPeriodicTimers) return true;

      return this.timers.some(
        (entry) => !entry.isPeriodic || entry.nextFire <= this.clock.elapsed,
      );
    });
  }

  /**
   * Run `callback` with this engine as the active capture scope and return
   * its result.
   */
  run<T>(callback: (self: FakeAsync) => T): T {
    const result = runWithCapture(this.scope, () => callback(this));
    if (isThenable(result)) {
      this.options.onWarning(
        "run() callback returned a Promise. Native promise continuations are not captured; " +
          "advance time with elapse() or flushTimers() inside the callback.",
      );
    }
    return result;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private createTimer(delay: number, timer: TimerKind): TimerHandle {
    const entry = new TimerEntry(
      this.nextTimerId++,
      timer,
      this.clock.elapsed + clampDelay(delay),
      this.timers,
    );
    this.timers.insert(entry);
    return entry;
  }

  /**
   * Fire the earliest timer while `predicate` accepts it, draining
   * microtasks before the first timer and after every firing. The guard
   * only trips when firings stop moving their due time forward.
   */
  private fireTimersWhile(predicate: (next: TimerEntry) => boolean): void {
    const guard = new FiringGuard(this.options.maxTimerFirings);
    runWithCapture(this.scope, () => {
      this.microtasks.drainAll();
      for (;;) {
        const next = this.timers.earliest();
        if (next === undefined || !predicate(next)) break;

        guard.check(next.nextFire);
        this.clock.advanceTo(next.nextFire);
        this.fire(next);
        this.microtasks.drainAll();
      }
    });
  }

  private fire(entry: TimerEntry): void {
    const { timer } = entry;
    if (timer.kind === "periodic") {
      timer.callback(entry);
      if (entry.isActive) {
        entry.nextFire += timer.period;
      }
    } else {
      // Deactivate first so the callback sees its own timer as inactive
      entry.cancel();
      timer.callback();
    }
  }
}

/**
 * Create a FakeAsync engine and run `callback` inside it.
 */
export function fakeAsync<T>(callback: (self: FakeAsync) => T, options?: FakeAsyncOptions): T {
  return new FakeAsync(options).run(callback);
}
