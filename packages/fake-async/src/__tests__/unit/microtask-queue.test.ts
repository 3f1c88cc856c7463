import { describe, expect, it } from "vitest";
import { MicrotaskQueue } from "../../microtask-queue.js";

describe("MicrotaskQueue", () => {
  it("should run callbacks in insertion order", () => {
    const queue = new MicrotaskQueue();
    const log: string[] = [];
    queue.enqueue(() => log.push("a"));
    queue.enqueue(() => log.push("b"));
    queue.enqueue(() => log.push("c"));
    expect(queue.size).toBe(3);

    queue.drainAll();

    expect(log).toEqual(["a", "b", "c"]);
    expect(queue.size).toBe(0);
  });

  it("should run microtasks enqueued while draining before returning", () => {
    const queue = new MicrotaskQueue();
    const log: string[] = [];
    queue.enqueue(() => {
      log.push("first");
      queue.enqueue(() => {
        log.push("nested");
        queue.enqueue(() => log.push("deeply nested"));
      });
    });
    queue.enqueue(() => log.push("second"));

    queue.drainAll();

    expect(log).toEqual(["first", "second", "nested", "deeply nested"]);
    expect(queue.size).toBe(0);
  });

  it("should be a no-op when empty", () => {
    const queue = new MicrotaskQueue();
    expect(() => queue.drainAll()).not.toThrow();
    expect(queue.size).toBe(0);
  });

  it("should propagate a throwing callback and keep the rest queued", () => {
    const queue = new MicrotaskQueue();
    const log: string[] = [];
    queue.enqueue(() => log.push("before"));
    queue.enqueue(() => {
      throw new Error("boom");
    });
    queue.enqueue(() => log.push("after"));

    expect(() => queue.drainAll()).toThrow("boom");
    expect(log).toEqual(["before"]);
    expect(queue.size).toBe(1);

    queue.drainAll();
    expect(log).toEqual(["before", "after"]);
    expect(queue.size).toBe(0);
  });
});
