/**
 * Async FIFO with a fixed capacity. `push` waits while the queue is full,
 * `take` waits while it is empty. After `close`, takers drain what is left and
 * then see `done`.
 */
export class BoundedQueue<T> {
  private readonly items: Array<{ value: T }> = [];
  private readonly takers: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private readonly putters: Array<() => void> = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async push(item: T): Promise<void> {
    for (;;) {
      if (this.closed) throw new Error('push on a closed queue');

      const taker = this.takers.shift();
      if (taker) {
        taker({ value: item, done: false });
        return;
      }
      if (this.items.length < this.capacity) {
        this.items.push({ value: item });
        return;
      }
      await new Promise<void>((resolve) => this.putters.push(resolve));
    }
  }

  take(): Promise<IteratorResult<T, undefined>> {
    const entry = this.items.shift();
    if (entry) {
      this.putters.shift()?.();
      return Promise.resolve({ value: entry.value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => this.takers.push(resolve));
  }

  /** Stops accepting items. Waiting takers finish; waiting pushers throw. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const taker of this.takers.splice(0)) {
      taker({ value: undefined, done: true });
    }
    for (const putter of this.putters.splice(0)) {
      putter();
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    for (;;) {
      const next = await this.take();
      if (next.done) return;
      yield next.value;
    }
  }
}
