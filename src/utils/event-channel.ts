/**
 * Event Channel
 * Unbounded, ordered single-producer/single-consumer queue of values
 */

export class EventChannel<T> implements AsyncIterable<T> {
  private readonly queue: T[] = [];
  private readonly waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.queue.length;
  }

  send(value: T): void {
    if (this.closed) {
      throw new Error("Cannot send on a closed channel");
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value, done: false });
    } else {
      this.queue.push(value);
    }
  }

  /**
   * No more values will be sent; queued values can still be received
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  /**
   * Take everything queued right now without waiting
   */
  drain(): T[] {
    return this.queue.splice(0);
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.queue.length > 0) {
      const [value] = this.queue.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.receive() };
  }
}
