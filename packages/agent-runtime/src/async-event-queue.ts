interface Waiter<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (err: Error) => void;
}

/**
 * Bridges push-based callbacks (a handler reporting progress) into a
 * pull-based async iterable. Buffered items are still delivered after
 * `complete()` or `error()`; the error surfaces once the buffer is drained.
 */
export class AsyncEventQueue<T> implements AsyncIterable<T> {
  private readonly buffer: Array<{ item: T }> = [];
  private waiting: Waiter<T> | null = null;
  private closed = false;
  private failure: Error | null = null;

  /** Producer: enqueue an item (or hand it straight to a waiting consumer). */
  push(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.takeWaiter();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
    } else {
      this.buffer.push({ item });
    }
    return true;
  }

  /** Signal end of stream. */
  complete(): void {
    if (this.closed) return;
    this.closed = true;
    this.takeWaiter()?.resolve({ value: undefined, done: true });
  }

  /** Signal an error. */
  error(err: Error): void {
    if (this.closed) return;
    this.closed = true;
    const waiter = this.takeWaiter();
    if (waiter) {
      waiter.reject(err);
    } else {
      this.failure = err;
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get pending(): number {
    return this.buffer.length;
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: () => {
        this.closed = true;
        this.buffer.length = 0;
        this.failure = null;
        this.takeWaiter()?.resolve({ value: undefined, done: true });
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }

  private next(): Promise<IteratorResult<T, undefined>> {
    const head = this.buffer.shift();
    if (head) {
      return Promise.resolve({ value: head.item, done: false });
    }

    if (this.failure) {
      const err = this.failure;
      this.failure = null;
      return Promise.reject(err);
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve, reject) => {
      this.waiting = { resolve, reject };
    });
  }

  private takeWaiter(): Waiter<T> | null {
    const waiter = this.waiting;
    this.waiting = null;
    return waiter;
  }
}
