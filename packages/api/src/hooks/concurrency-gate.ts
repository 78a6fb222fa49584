/**
 * FIFO counting semaphore.
 *
 * `acquire()` resolves with a release function once a slot is free. A
 * released slot passes straight to the oldest waiter, so the in-flight
 * count never dips between hand-offs. Release functions are idempotent.
 */

export type Release = () => void;

export class ConcurrencyGate {
  readonly limit: number;
  private active = 0;
  private queue: Array<() => void> = [];

  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
  }

  /** Slots currently held */
  get inFlight(): number {
    return this.active;
  }

  /** Callers queued for a slot */
  get waiting(): number {
    return this.queue.length;
  }

  acquire(): Promise<Release> {
    if (this.active < this.limit) {
      this.active++;
      return Promise.resolve(this.releaser());
    }
    return new Promise((resolve) => {
      this.queue.push(() => resolve(this.releaser()));
    });
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.queue.shift();
      if (next) {
        next();
      } else {
        this.active--;
      }
    };
  }
}
