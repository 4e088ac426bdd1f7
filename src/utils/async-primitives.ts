/**
 * Promise-based coordination primitives for the single event loop:
 * a counting semaphore, a mutex built on it, and a one-shot event.
 */

/**
 * Counting semaphore for limiting concurrent operations
 *
 * @example
 * const semaphore = new Semaphore(3); // Allow max 3 concurrent operations
 * await semaphore.acquire();
 * try {
 *   await doWork();
 * } finally {
 *   semaphore.release();
 * }
 */
export class Semaphore {
  private activeCount = 0;
  private readonly queue: Array<() => void> = [];

  constructor(readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`Semaphore size must be a positive integer, got ${maxConcurrent}`);
    }
  }

  /**
   * Acquire a slot, waiting while all of them are taken
   */
  async acquire(): Promise<void> {
    if (this.activeCount < this.maxConcurrent) {
      this.activeCount++;
      return;
    }

    await new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * Release a slot. The next waiter, if any, takes it over directly.
   */
  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else if (this.activeCount > 0) {
      this.activeCount--;
    }
  }

  getActiveCount(): number {
    return this.activeCount;
  }

  getQueueLength(): number {
    return this.queue.length;
  }
}

/**
 * Mutual exclusion lock
 */
export class Mutex {
  private readonly semaphore = new Semaphore(1);

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.semaphore.acquire();
    try {
      return await fn();
    } finally {
      this.semaphore.release();
    }
  }

  isLocked(): boolean {
    return this.semaphore.getActiveCount() > 0;
  }
}

/**
 * One-shot event: once set, every current and future waiter resolves.
 */
export class AsyncEvent {
  private flag = false;
  private readonly waiters: Array<() => void> = [];

  set(): void {
    if (this.flag) {
      return;
    }
    this.flag = true;
    for (const resolve of this.waiters.splice(0)) {
      resolve();
    }
  }

  isSet(): boolean {
    return this.flag;
  }

  wait(): Promise<void> {
    if (this.flag) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Wait at most `timeoutMs`. Resolves true if the event was set in time.
   */
  async waitFor(timeoutMs: number): Promise<boolean> {
    if (this.flag) {
      return true;
    }
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([this.wait().then(() => true), expired]);
    } finally {
      clearTimeout(timer);
    }
  }
}
