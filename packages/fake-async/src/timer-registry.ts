/**
 * Pending-timer registry.
 *
 * Entries are keyed by id. Ids are handed out in creation order and entries
 * are inserted once, so Map iteration order is creation order; earliest()
 * relies on that for its tie-break.
 */

import { TimerTickUnsupportedError } from "@fauxtime/errors";
import type { PendingTimer, TimerHandle, TimerKind } from "./types.js";

export class TimerEntry implements TimerHandle {
  readonly id: number;
  readonly timer: TimerKind;
  /** Virtual time of the next firing */
  nextFire: number;

  private readonly registry: TimerRegistry;

  constructor(id: number, timer: TimerKind, nextFire: number, registry: TimerRegistry) {
    this.id = id;
    this.timer = timer;
    this.nextFire = nextFire;
    this.registry = registry;
  }

  get isPeriodic(): boolean {
    return this.timer.kind === "periodic";
  }

  get isActive(): boolean {
    return this.registry.has(this);
  }

  get tick(): number {
    throw new TimerTickUnsupportedError();
  }

  cancel(): void {
    this.registry.remove(this);
  }

  describe(): PendingTimer {
    return this.timer.kind === "periodic"
      ? { id: this.id, kind: "periodic", nextFire: this.nextFire, period: this.timer.period }
      : { id: this.id, kind: "one-shot", nextFire: this.nextFire };
  }
}

export class TimerRegistry {
  private readonly _entries = new Map<number, TimerEntry>();

  get size(): number {
    return this._entries.size;
  }

  insert(entry: TimerEntry): void {
    this._entries.set(entry.id, entry);
  }

  /** Idempotent: removing an absent entry is a no-op. */
  remove(entry: TimerEntry): void {
    if (this._entries.get(entry.id) === entry) {
      this._entries.delete(entry.id);
    }
  }

  has(entry: TimerEntry): boolean {
    return this._entries.get(entry.id) === entry;
  }

  isEmpty(): boolean {
    return this._entries.size === 0;
  }

  /** Smallest nextFire; ties go to the earliest-created entry. */
  earliest(): TimerEntry | undefined {
    let best: TimerEntry | undefined;
    for (const entry of this._entries.values()) {
      if (best === undefined || entry.nextFire < best.nextFire) {
        best = entry;
      }
    }
    return best;
  }

  some(predicate: (entry: TimerEntry) => boolean): boolean {
    for (const entry of this._entries.values()) {
      if (predicate(entry)) return true;
    }
    return false;
  }

  count(kind: TimerKind["kind"]): number {
    let n = 0;
    for (const entry of this._entries.values()) {
      if (entry.timer.kind === kind) n++;
    }
    return n;
  }

  /** Pending timers in firing order */
  snapshot(): readonly PendingTimer[] {
    return Object.freeze(
      [...this._entries.values()]
        .sort((a, b) => a.nextFire - b.nextFire || a.id - b.id)
        .map((entry) => entry.describe()),
    );
  }
}
