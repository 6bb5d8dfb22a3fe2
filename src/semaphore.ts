/**
 * Counting semaphore bounding how many sandboxed processes run at once
 * across all sessions. Waiters are served first come, first served.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.available = capacity;
  }

  /**
   * Wait for a slot. Resolves with a release function that must be called
   * exactly once. Rejects if `signal` aborts while waiting.
   */
  acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      return Promise.reject(new Error('Aborted while waiting for an execution slot'));
    }

    if (this.available > 0) {
      this.available--;
      return Promise.resolve(this.releaser());
    }

    return new Promise((resolve, reject) => {
      const grant = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve(this.releaser());
      };
      const onAbort = (): void => {
        const index = this.waiters.indexOf(grant);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(new Error('Aborted while waiting for an execution slot'));
      };

      this.waiters.push(grant);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Slots currently free */
  get free(): number {
    return this.available;
  }

  /** Callers waiting for a slot */
  get pending(): number {
    return this.waiters.length;
  }

  get size(): number {
    return this.capacity;
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // Hand the slot straight to the next waiter
        next();
      } else {
        this.available++;
      }
    };
  }
}
