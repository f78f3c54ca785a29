type Waiter<T> = {
  resolve: (item: T) => void;
  reject: (reason: unknown) => void;
};

/**
 * Unbounded FIFO with an awaitable `get()`.
 *
 * `put()` never suspends. `get()` hands out items in insertion order and
 * waiters are served in the order they called. Once `fail()` is called the
 * remaining items are still delivered, after which every `get()` rejects with
 * the failure.
 */
export class AsyncQueue<T> {
  private readonly items: Array<{ value: T }> = [];
  private readonly waiters: Waiter<T>[] = [];
  private failure: { reason: unknown } | null = null;

  get size(): number { return this.items.length; }

  put(item: T): void {
    if (this.failure) return;
    const waiter = this.waiters.shift();
    if (waiter) waiter.resolve(item);
    else this.items.push({ value: item });
  }

  get(signal?: AbortSignal): Promise<T> {
    const next = this.items.shift();
    if (next) return Promise.resolve(next.value);
    if (this.failure) return Promise.reject(this.failure.reason);
    if (signal?.aborted) return Promise.reject(signal.reason);

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        const idx = this.waiters.indexOf(waiter);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(signal?.reason);
      };
      const waiter: Waiter<T> = {
        resolve: (item) => { signal?.removeEventListener('abort', onAbort); resolve(item); },
        reject: (reason) => { signal?.removeEventListener('abort', onAbort); reject(reason); },
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Stop accepting items and reject current and future waiters once drained. */
  fail(reason: unknown): void {
    if (this.failure) return;
    this.failure = { reason };
    for (const waiter of this.waiters.splice(0)) waiter.reject(reason);
  }
}
