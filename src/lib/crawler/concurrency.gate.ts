/**
 * Concurrency Gate
 * Counting admission control bounding the number of in-flight requests
 */

import { CrawlError, CrawlErrorKind } from './crawler.errors';

export type Release = () => void;

interface Waiter {
  grant: () => void;
}

export class ConcurrencyGate {
  readonly capacity: number;
  private active = 0;
  private waiters: Waiter[] = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Concurrency gate capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get inFlight(): number {
    return this.active;
  }

  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Take one unit. The returned release function is idempotent.
   */
  acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) {
      return Promise.reject(cancelled());
    }

    if (this.active < this.capacity) {
      this.active++;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<Release>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(cancelled());
      };

      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve(this.createRelease());
        },
      };

      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Run `task` while holding one unit; the unit is returned on every exit path.
   */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;

      // Hand the unit straight to the next waiter, keeping `active` unchanged
      const next = this.waiters.shift();
      if (next) {
        next.grant();
      } else {
        this.active--;
      }
    };
  }
}

function cancelled(): CrawlError {
  return new CrawlError(CrawlErrorKind.CANCELLED, 'Cancelled while waiting for a concurrency slot');
}
