/**
 * Single-consumer async queue. Producers push from event-emitter callbacks; the consumer
 * iterates with `for await`. Values pushed before anyone waits are buffered in order.
 */
export class EventQueue<T> implements AsyncIterable<T> {
  private readonly queue: T[] = [];
  private pending: {
    resolve: (value: IteratorResult<T, undefined>) => void;
    reject: (error: Error) => void;
  } | null = null;
  private closed = false;
  private failure: Error | null = null;

  get isClosed(): boolean {
    return this.closed;
  }

  push(value: T): void {
    if (this.closed) {
      return;
    }
    if (this.pending) {
      const { resolve } = this.pending;
      this.pending = null;
      resolve({ value, done: false });
    } else {
      this.queue.push(value);
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.pending) {
      const { resolve } = this.pending;
      this.pending = null;
      resolve({ value: undefined, done: true });
    }
  }

  /** Ends the sequence with an error once buffered values have been consumed. */
  fail(error: Error): void {
    if (this.closed) {
      return;
    }
    this.failure = error;
    this.closed = true;
    if (this.pending) {
      const { reject } = this.pending;
      this.pending = null;
      reject(error);
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const value = this.queue.shift();
    if (value !== undefined) {
      return Promise.resolve({ value, done: false });
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    try {
      while (true) {
        const result = await this.next();
        if (result.done) {
          return;
        }
        yield result.value;
      }
    } finally {
      this.close();
    }
  }
}
