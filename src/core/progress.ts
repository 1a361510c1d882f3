/**
 * Single-consumer async channel for handing progress from the scan loop to a
 * consumer that runs on its own schedule.
 *
 * `push` never blocks: when `capacity` items are queued the oldest is dropped.
 * `latest()` always answers with the last pushed item, dropped or not.
 */
export class ProgressChannel<T> implements AsyncIterable<T> {
  private readonly queue: T[] = [];
  private waiting: ((result: IteratorResult<T>) => void) | null = null;
  private last: T | undefined;
  private closed = false;
  private droppedCount = 0;

  constructor(private readonly capacity: number = 100) {
    if (capacity < 1) {
      throw new RangeError(`ProgressChannel capacity must be at least 1, got ${capacity}`);
    }
  }

  /**
   * Queue an item. Returns false once the channel is closed.
   */
  push(item: T): boolean {
    if (this.closed) return false;
    this.last = item;

    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: item, done: false });
      return true;
    }

    if (this.queue.length >= this.capacity) {
      this.queue.shift();
      this.droppedCount++;
    }
    this.queue.push(item);
    return true;
  }

  /**
   * Stop accepting items. Queued items are still delivered.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: undefined, done: true });
    }
  }

  latest(): T | undefined {
    return this.last;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  next(): Promise<IteratorResult<T>> {
    const item = this.queue.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.waiting) {
      return Promise.reject(new Error('ProgressChannel supports a single consumer'));
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }
}
