import { TimerFiringLimitError } from "@fauxtime/errors";

/**
 * Caps consecutive timer firings that leave virtual time where it was.
 *
 * Create one per elapse/flushTimers call and call `check(at)` with the due
 * time of each timer before firing it. The count restarts whenever `at`
 * moves past the previous firing, so only work that never advances the
 * clock (a zero-period periodic timer) can trip the limit.
 */
export class FiringGuard {
  private readonly maxFirings: number;
  private firings = 0;
  private at: number | undefined;

  constructor(maxFirings: number) {
    this.maxFirings = maxFirings;
  }

  check(at: number): void {
    if (this.at === undefined || at > this.at) {
      this.at = at;
      this.firings = 0;
    }
    this.firings++;
    if (this.firings > this.maxFirings) {
      throw new TimerFiringLimitError(this.firings, this.maxFirings, at);
    }
  }
}
