/**
 * Bounded FIFO with a non-blocking producer side. `offer` never waits: when
 * the queue is full it returns false and the caller decides what to drop.
 * Producers that would rather wait use `whenBelow` first.
 */
export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(item: T | undefined) => void> = [];
  private readonly roomWaiters: Array<{ limit: number; wake: () => void }> = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  public offer(item: T): boolean {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return true;
    }

    if (this.items.length >= this.capacity) {
      return false;
    }

    this.items.push(item);
    return true;
  }

  /** Resolves with the next item, or undefined once `signal` aborts. */
  public take(signal?: AbortSignal): Promise<T | undefined> {
    const next = this.items.shift();
    if (next !== undefined) {
      this.wakeRoomWaiters();
      return Promise.resolve(next);
    }
    if (signal?.aborted) {
      return Promise.resolve(undefined);
    }

    return new Promise((resolve) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        resolve(undefined);
      };
      const waiter = (item: T | undefined): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve(item);
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Resolves once fewer than `limit` items are queued, or when `signal`
   * aborts. Callers re-check `size()` to tell the two apart.
   */
  public whenBelow(limit: number, signal?: AbortSignal): Promise<void> {
    if (this.items.length < limit || signal?.aborted) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const onAbort = (): void => {
        const index = this.roomWaiters.indexOf(waiter);
        if (index !== -1) {
          this.roomWaiters.splice(index, 1);
        }
        resolve();
      };
      const waiter = {
        limit,
        wake: (): void => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
      };
      this.roomWaiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  public size(): number {
    return this.items.length;
  }

  private wakeRoomWaiters(): void {
    for (let i = this.roomWaiters.length - 1; i >= 0; i -= 1) {
      const waiter = this.roomWaiters[i];
      if (waiter && this.items.length < waiter.limit) {
        this.roomWaiters.splice(i, 1);
        waiter.wake();
      }
    }
  }
}
