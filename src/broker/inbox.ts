type Waiter<T> = {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (err: unknown) => void;
};

const DONE = { done: true, value: undefined } as const;

/**
 * Buffer between a push-style transport callback and a pull-style consumer.
 * `fail` discards anything buffered: those deliveries belong to a session
 * that no longer exists.
 */
export class Inbox<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;
  private failure: { error: unknown } | null = null;

  get size(): number {
    return this.items.length;
  }

  get isOpen(): boolean {
    return !this.closed && this.failure === null;
  }

  push(item: T): boolean {
    if (!this.isOpen) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ done: false, value: item });
      return true;
    }
    this.items.push(item);
    return true;
  }

  close(): void {
    if (!this.isOpen) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter.resolve(DONE);
  }

  fail(error: unknown): void {
    if (!this.isOpen) return;
    this.failure = { error };
    this.items = [];
    for (const waiter of this.waiters.splice(0)) waiter.reject(error);
  }

  take(signal?: AbortSignal): Promise<IteratorResult<T, undefined>> {
    if (signal?.aborted) return Promise.resolve(DONE);
    if (this.failure) return Promise.reject(this.failure.error);

    const item = this.items.shift();
    if (item !== undefined) return Promise.resolve({ done: false, value: item });
    if (this.closed) return Promise.resolve(DONE);

    return new Promise<IteratorResult<T, undefined>>((resolve, reject) => {
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve(DONE);
      };
      const waiter: Waiter<T> = {
        resolve: (result) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(result);
        },
        reject: (err) => {
          signal?.removeEventListener("abort", onAbort);
          reject(err);
        },
      };
      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
