/**
 * Counting semaphore with FIFO waiters. A released permit is handed straight
 * to the oldest waiter.
 */
export class Semaphore {
  private permits: number;
  private waitQueue: Array<() => void> = [];

  constructor(maxPermits: number) {
    if (!Number.isInteger(maxPermits) || maxPermits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${maxPermits}`);
    }
    this.permits = maxPermits;
  }

  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waitQueue.push(resolve);
    });
  }

  release(): void {
    const waiter = this.waitQueue.shift();
    if (waiter) {
      waiter();
    } else {
      this.permits++;
    }
  }

  get available(): number {
    return this.permits;
  }

  get waiting(): number {
    return this.waitQueue.length;
  }
}

/**
 * Runs `worker` over `items` with at most `limit` in flight. A permit is
 * acquired before each dispatch and released when that item settles, so a
 * failing item never holds a slot. Failures go through `onError` and do not
 * stop the other items. Results keep the input order.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  onError: (item: T, error: unknown) => R
): Promise<R[]> {
  const semaphore = new Semaphore(limit);
  const running: Array<Promise<R>> = [];

  for (const [index, item] of items.entries()) {
    await semaphore.acquire();
    running.push(
      (async () => {
        try {
          return await worker(item, index);
        } catch (error) {
          return onError(item, error);
        } finally {
          semaphore.release();
        }
      })()
    );
  }

  return await Promise.all(running);
}
