/**
 * Public types for the virtual-time engine and its capture boundary.
 */

// ---------------------------------------------------------------------------
// Timers
// ---------------------------------------------------------------------------

/** Handle returned for every captured timer, one-shot or periodic. */
export interface TimerHandle {
  /** Creation sequence number, unique per boundary */
  readonly id: number;
  /** Whether the timer is still pending */
  readonly isActive: boolean;
  /** Not tracked; reading it throws TimerTickUnsupportedError */
  readonly tick: number;
  /** Cancel the timer. Idempotent. */
  cancel(): void;
}

/** Callback shapes, tagged so dispatch at fire time is explicit. */
export type TimerKind =
  | { readonly kind: "one-shot"; readonly callback: () => void }
  | {
      readonly kind: "periodic";
      readonly period: number;
      readonly callback: (timer: TimerHandle) => void;
    };

/** Read-only description of a pending timer, for debugging and assertions. */
export interface PendingTimer {
  readonly id: number;
  readonly kind: TimerKind["kind"];
  /** Virtual time (ms since engine creation) of the next firing */
  readonly nextFire: number;
  readonly period?: number;
}

// ---------------------------------------------------------------------------
// Capture boundary
// ---------------------------------------------------------------------------

/**
 * The three injection points an async runtime calls instead of its native
 * timer and microtask primitives.
 */
export interface CaptureBoundary {
  createOneShotTimer(delay: number, callback: () => void): TimerHandle;
  createPeriodicTimer(period: number, callback: (timer: TimerHandle) => void): TimerHandle;
  scheduleMicrotask(callback: () => void): void;
}

/** A boundary plus the time source that goes with it. */
export interface CaptureScope {
  readonly boundary: CaptureBoundary;
  /** Current time in epoch milliseconds */
  readonly now: () => number;
}

// ---------------------------------------------------------------------------
// Timer clock
// ---------------------------------------------------------------------------

/**
 * Node-flavoured timer facade. Code written against it runs on real timers
 * by default and on virtual time inside a capture scope.
 */
export interface TimerClock {
  readonly now: () => number;
  readonly setTimeout: (fn: () => void, ms: number) => TimerHandle;
  readonly clearTimeout: (handle: TimerHandle | undefined) => void;
  readonly setInterval: (fn: () => void, ms: number) => TimerHandle;
  readonly clearInterval: (handle: TimerHandle | undefined) => void;
  readonly queueMicrotask: (fn: () => void) => void;
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

/** Reads `initialTime + elapsed` from a live engine. */
export type ClockReader = () => Date;

export type WarningSink = (message: string) => void;

export interface FakeAsyncOptions {
  /** Epoch-ms base for the ambient `now()` inside run() (default: 0) */
  readonly startTime?: number | Date;
  /** Max consecutive firings at one virtual instant before an advance aborts (default: 1_000_000) */
  readonly maxTimerFirings?: number;
  /** Receives engine warnings (default: console.warn with a [FakeAsync] tag) */
  readonly onWarning?: WarningSink;
}

/** Fully resolved engine options (no optionals) */
export interface ResolvedFakeAsyncOptions {
  readonly startTime: number;
  readonly maxTimerFirings: number;
  readonly onWarning: WarningSink;
}

export interface FlushTimersOptions {
  /** How much virtual time the flush may cover, in ms (default: 1 hour) */
  readonly timeout?: number;
  /** Keep firing periodic timers until canceled (default: true) */
  readonly flushPeriodicTimers?: boolean;
}

export interface ResolvedFlushTimersOptions {
  readonly timeout: number;
  readonly flushPeriodicTimers: boolean;
}
