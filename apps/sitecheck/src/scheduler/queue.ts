type Waiter<T> = (item: T | null) => void;

/**
 * Unbounded FIFO shared between producers and waiting consumers. Each pushed item is handed to
 * exactly one `take()` caller.
 */
export class AsyncQueue<T extends object> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(item: T): void {
    if (this.closed) {
      throw new Error('Cannot push to a closed queue');
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return;
    }
    this.items.push(item);
  }

  /**
   * Next item in FIFO order. Resolves `null` once the queue is closed and empty, or when `signal`
   * aborts before an item arrives; an already-aborted signal yields `null` even if items remain.
   */
  take(signal?: AbortSignal): Promise<T | null> {
    if (signal?.aborted) return Promise.resolve(null);

    const head = this.items.shift();
    if (head !== undefined) return Promise.resolve(head);
    if (this.closed) return Promise.resolve(null);

    return new Promise((resolve) => {
      const onAbort = () => {
        const idx = this.waiters.indexOf(waiter);
        if (idx !== -1) this.waiters.splice(idx, 1);
        resolve(null);
      };
      const waiter: Waiter<T> = (item) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(item);
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Removes and returns everything still queued. */
  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0, this.waiters.length)) {
      waiter(null);
    }
  }
}
