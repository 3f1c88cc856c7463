/**
 * Strict FIFO of zero-argument callbacks.
 *
 * Unbounded: a callback that keeps re-enqueueing itself makes drainAll()
 * spin, the same way it would starve a real event loop.
 */
export class MicrotaskQueue {
  private readonly _items: (() => void)[] = [];
  private _head = 0;

  get size(): number {
    return this._items.length - this._head;
  }

  enqueue(callback: () => void): void {
    this._items.push(callback);
  }

  /**
   * Run callbacks front-to-back until the queue is empty, including any
   * enqueued while draining. A throwing callback propagates; the rest stay
   * queued.
   */
  drainAll(): void {
    while (this._head < this._items.length) {
      const callback = this._items[this._head];
      this._items[this._head] = noop;
      this._head++;
      if (this._head === this._items.length) {
        this._items.length = 0;
        this._head = 0;
      }
      callback?.();
    }
  }
}

function noop(): void {}
