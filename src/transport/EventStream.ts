/**
 * Event Stream
 *
 * Push-based async iterable bridging callback-style transports to a
 * consumer loop. Single consumer, not restartable. After close() the
 * buffered events are still delivered, then iteration ends.
 */

export class EventStream<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private waiting: ((result: IteratorResult<T>) => void) | null = null;
  private closed = false;
  private consumed = false;

  /**
   * Returns false if the stream is already closed
   */
  public push(item: T): boolean {
    if (this.closed) return false;

    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: item, done: false });
    } else {
      this.buffer.push(item);
    }
    return true;
  }

  public close(): void {
    if (this.closed) return;
    this.closed = true;

    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: undefined, done: true });
    }
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  public get pending(): number {
    return this.buffer.length;
  }

  public [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.consumed) {
      throw new Error('EventStream can only be consumed once');
    }
    this.consumed = true;

    return {
      next: () => this.next(),
      return: () => {
        this.close();
        this.buffer.length = 0;
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }

  private next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }
}
