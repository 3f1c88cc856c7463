/**
 * Elapsed virtual time since engine creation, in milliseconds.
 *
 * Never decreases. Only the engine mutates it.
 */
export class VirtualClock {
  private _elapsed = 0;

  get elapsed(): number {
    return this._elapsed;
  }

  /** `base + elapsed`, with `base` in epoch milliseconds */
  now(base: number): number {
    return base + this._elapsed;
  }

  /** Move forward to `target`; a no-op when `target` is not ahead. */
  advanceTo(target: number): void {
    if (target > this._elapsed) {
      this._elapsed = target;
    }
  }

  /** Move forward by `delta`. Callers validate `delta >= 0`. */
  advanceBy(delta: number): void {
    this._elapsed += delta;
  }
}
