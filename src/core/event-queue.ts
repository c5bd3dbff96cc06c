type WaitTimer = ReturnType<typeof setTimeout>;

interface Waiter<T> {
  resolve: (value: T | null) => void;
  timer: WaitTimer;
}

/**
 * FIFO buffer between intake and the dispatch worker.
 *
 * `enqueue` never blocks or rejects; capacity is enforced by the caller
 * against `size()`. `dequeue` resolves with the oldest item, or `null` once
 * `timeoutMs` passes without one arriving.
 */
export class EventQueue<T> {
  private items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];

  size(): number {
    return this.items.length;
  }

  enqueue(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(item);
      return;
    }
    this.items.push(item);
  }

  dequeue(timeoutMs: number): Promise<T | null> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift() ?? null);
    }
    if (timeoutMs <= 0) {
      return Promise.resolve(null);
    }

    return new Promise<T | null>((resolve) => {
      const waiter: Waiter<T> = {
        resolve,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) {
            this.waiters.splice(index, 1);
          }
          resolve(null);
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  /** Removes and returns everything still buffered, oldest first. */
  drain(): T[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }
}
