import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { EventQueue } from "../../src/core/event-queue";

describe("EventQueue", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("dequeues in FIFO order", async () => {
    const queue = new EventQueue<number>();
    queue.enqueue(1);
    queue.enqueue(2);
    queue.enqueue(3);

    expect(queue.size()).toBe(3);
    await expect(queue.dequeue(100)).resolves.toBe(1);
    await expect(queue.dequeue(100)).resolves.toBe(2);
    await expect(queue.dequeue(100)).resolves.toBe(3);
    expect(queue.size()).toBe(0);
  });

  it("resolves null after the timeout when nothing arrives", async () => {
    const queue = new EventQueue<number>();
    let settled: number | null | undefined;
    void queue.dequeue(1000).then((value) => {
      settled = value;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(settled).toBeUndefined();

    await vi.advanceTimersByTimeAsync(1);
    expect(settled).toBeNull();
  });

  it("hands an item straight to a waiting consumer", async () => {
    const queue = new EventQueue<string>();
    const waiting = queue.dequeue(5000);

    await vi.advanceTimersByTimeAsync(100);
    queue.enqueue("late");

    await expect(waiting).resolves.toBe("late");
    expect(queue.size()).toBe(0);
  });

  it("returns null immediately for a non-positive timeout on an empty queue", async () => {
    const queue = new EventQueue<number>();
    await expect(queue.dequeue(0)).resolves.toBeNull();
  });

  it("does not deliver to a waiter that already timed out", async () => {
    const queue = new EventQueue<number>();
    const expired = queue.dequeue(10);
    await vi.advanceTimersByTimeAsync(10);
    await expect(expired).resolves.toBeNull();

    queue.enqueue(7);
    expect(queue.size()).toBe(1);
  });

  it("drain empties the buffer in order", () => {
    const queue = new EventQueue<number>();
    queue.enqueue(1);
    queue.enqueue(2);

    expect(queue.drain()).toEqual([1, 2]);
    expect(queue.size()).toBe(0);
  });
});
