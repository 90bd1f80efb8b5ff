/**
 * CountdownLatch: one-shot gate for async tasks.
 *
 * Tasks `wait()` until the count reaches zero; every waiter is then released
 * in the same turn of the event loop, in the order it started waiting. Once
 * open the latch stays open.
 */

import { UsageError } from '../core/errors.js';

export class CountdownLatch {
  private remaining: number;
  private waiters: Array<() => void> = [];

  constructor(count: number) {
    if (!Number.isInteger(count) || count < 0) {
      throw new UsageError(`latch count must be a non-negative integer, got ${count}`);
    }
    this.remaining = count;
  }

  /**
   * Decrement the count. Reaching zero releases all waiters; further calls
   * are no-ops.
   */
  countDown(): void {
    if (this.remaining === 0) return;
    this.remaining--;
    if (this.remaining === 0) {
      const released = this.waiters;
      this.waiters = [];
      for (const release of released) release();
    }
  }

  /**
   * Resolve once the count is zero. Resolves immediately on an open latch.
   */
  wait(): Promise<void> {
    if (this.remaining === 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  get count(): number {
    return this.remaining;
  }

  /** Tasks currently blocked in `wait()`. */
  get waiting(): number {
    return this.waiters.length;
  }
}
