/**
 * Counting semaphore with a FIFO wait queue.
 *
 * Permits are handed directly to the next waiter on release, so a waiter
 * that has been granted a permit cannot be overtaken by a later acquire().
 */
export class Semaphore {
  private queue: Array<() => void> = [];
  private current = 0;

  constructor(private readonly max: number) {
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${max}`);
    }
  }

  /** Permits currently held */
  get inUse(): number {
    return this.current;
  }

  /** Callers suspended in acquire() */
  get pending(): number {
    return this.queue.length;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    if (this.current < this.max) {
      this.current++;
      return;
    }
    return new Promise<void>((resolve, reject) => {
      const waiter = () => {
        signal?.removeEventListener("abort", onAbort);
        this.current++;
        resolve();
      };
      const onAbort = () => {
        const idx = this.queue.indexOf(waiter);
        if (idx !== -1) this.queue.splice(idx, 1);
        reject(signal?.reason);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.queue.push(waiter);
    });
  }

  release(): void {
    if (this.current === 0) {
      throw new Error("Semaphore released more times than acquired");
    }
    this.current--;
    const next = this.queue.shift();
    if (next) next();
  }
}
