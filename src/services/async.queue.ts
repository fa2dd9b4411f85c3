// src/services/async.queue.ts

type Waiter<T> = {
  resolve: (result: IteratorResult<T>) => void;
  reject: (err: Error) => void;
};

/**
 * Single-consumer async sequence fed by push(). Items are delivered in push
 * order. With a finite capacity, push() refuses items once that many are
 * waiting to be read.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  private ended = false;
  private failure: Error | null = null;

  constructor(private readonly capacity = Number.POSITIVE_INFINITY) {}

  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this.ended;
  }

  /** Returns false when the queue is closed or full. */
  push(item: T): boolean {
    if (this.ended) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
      return true;
    }

    if (this.items.length >= this.capacity) return false;
    this.items.push(item);
    return true;
  }

  /** Ends the sequence once buffered items have been read. */
  end(): void {
    if (this.ended) return;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  /** Ends the sequence with an error, raised after buffered items have been read. */
  fail(err: Error): void {
    if (this.ended) return;
    this.ended = true;
    this.failure = err;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(err);
    }
  }

  next(): Promise<IteratorResult<T>> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.failure) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve({ value: undefined, done: true });

    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.items = [];
        this.end();
        return { value: undefined, done: true };
      },
    };
  }
}
