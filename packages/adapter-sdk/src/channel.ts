/**
 * Unbounded single-consumer message queue. Producers `send` without waiting;
 * one consumer drains it with `for await`. Once closed, or once its iterator
 * has been taken, it cannot be restarted.
 */
export class NotificationChannel<T> implements AsyncIterable<T> {
  private queue: T[] = [];
  private waiting: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private closed = false;
  private consumed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of messages waiting to be consumed. */
  get pending(): number {
    return this.queue.length;
  }

  /** Returns false when the channel is already closed and the message was dropped. */
  send(message: T): boolean {
    if (this.closed) return false;

    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: message, done: false });
      return true;
    }

    this.queue.push(message);
    return true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    if (this.consumed) {
      throw new Error("NotificationChannel already has a consumer");
    }
    this.consumed = true;

    return {
      next: (): Promise<IteratorResult<T, undefined>> => {
        const message = this.queue.shift();
        if (message !== undefined) {
          return Promise.resolve({ value: message, done: false });
        }
        if (this.closed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
          this.waiting = resolve;
        });
      },
      return: (): Promise<IteratorResult<T, undefined>> => {
        this.close();
        this.queue = [];
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
