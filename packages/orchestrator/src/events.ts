/**
 * Unbounded multi-producer, single-consumer queue. Workers push, the status aggregator
 * iterates until the queue is closed and drained.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly items: Array<{ value: T }> = [];
  private readonly waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  push(value: T): void {
    if (this.closed) {
      throw new Error('Cannot push to a closed queue');
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value, done: false });
      return;
    }
    this.items.push({ value });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => {
        const head = this.items.shift();
        if (head) return Promise.resolve({ value: head.value, done: false });
        if (this.closed) return Promise.resolve({ value: undefined, done: true });
        return new Promise((resolve) => this.waiters.push(resolve));
      },
    };
  }
}
