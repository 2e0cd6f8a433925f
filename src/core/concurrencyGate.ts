/**
 * @file concurrencyGate.ts
 * @description Counting gate that bounds how many executions run at once
 */

import { PoolError, PoolErrorCode } from "../errors/poolError";

interface Waiter {
  grant: (acquired: boolean) => void;
}

/**
 * @class ConcurrencyGate
 * @description Semaphore with FIFO waiters. A released slot is handed straight
 * to the oldest waiter so a late acquirer can never overtake it.
 */
export class ConcurrencyGate {
  private available: number;
  private waiters: Waiter[] = [];
  private disposed = false;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new PoolError(
        PoolErrorCode.INVALID_CONFIG,
        `Gate capacity must be a positive integer (got ${capacity})`
      );
    }
    this.available = capacity;
  }

  public get availableSlots(): number {
    return this.available;
  }

  public get waiting(): number {
    return this.waiters.length;
  }

  /**
   * @method acquire
   * @description Waits for a free slot. Resolves `false` without taking a slot
   * when the signal aborts first or the gate has been disposed.
   */
  public acquire(signal?: AbortSignal): Promise<boolean> {
    if (this.disposed || signal?.aborted) {
      return Promise.resolve(false);
    }
    if (this.available > 0) {
      this.available--;
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const waiter: Waiter = {
        grant: (acquired) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(acquired);
        },
      };
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve(false);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /**
   * @method release
   * @description Returns one slot. Releasing more than was acquired is a bug
   * in the caller and throws.
   */
  public release(): void {
    const next = this.waiters.shift();
    if (next) {
      next.grant(true);
      return;
    }
    if (this.available >= this.capacity) {
      throw new PoolError(
        PoolErrorCode.GATE_IMBALANCE,
        "Gate released more times than it was acquired"
      );
    }
    this.available++;
  }

  /**
   * @method dispose
   * @description Fails every pending acquire; later acquires resolve false
   */
  public dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    const pending = this.waiters;
    this.waiters = [];
    pending.forEach((waiter) => waiter.grant(false));
  }
}
