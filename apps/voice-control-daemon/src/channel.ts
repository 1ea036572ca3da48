interface Waiter<T> {
  resolve: (message: T | undefined) => void;
  timer: NodeJS.Timeout;
}

/**
 * Bounded FIFO between two stages. Senders never block: `trySend` reports
 * whether the message was taken. Receivers wait at most `timeoutMs`.
 */
export class Channel<T> {
  private readonly queue: T[] = [];
  private waiters: Array<Waiter<T>> = [];
  private isClosed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.queue.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** False when the channel is full or closed */
  trySend(message: T): boolean {
    if (this.isClosed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(message);
      return true;
    }

    if (this.queue.length >= this.capacity) return false;
    this.queue.push(message);
    return true;
  }

  tryReceive(): T | undefined {
    return this.queue.shift();
  }

  /** Everything queued right now, oldest first */
  drain(): T[] {
    return this.queue.splice(0, this.queue.length);
  }

  /**
   * Next message, or undefined once `timeoutMs` passes or the channel closes.
   * Messages queued before close are still delivered.
   */
  receive(timeoutMs: number): Promise<T | undefined> {
    const queued = this.queue.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.isClosed) return Promise.resolve(undefined);

    return new Promise<T | undefined>((resolve) => {
      const waiter: Waiter<T> = {
        resolve,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          resolve(undefined);
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const waiter of this.waiters) {
      clearTimeout(waiter.timer);
      waiter.resolve(undefined);
    }
    this.waiters = [];
  }
}
