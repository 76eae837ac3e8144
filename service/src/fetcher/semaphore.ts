import { FetchCancelledError } from "./errors.js";

/** Counting admission gate. Permits pass straight to the next waiter on release. */
export class Semaphore {
  readonly capacity: number;
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(capacity: number) {
    this.capacity = capacity;
    this.available = capacity;
  }

  get activeCount(): number {
    return this.capacity - this.available;
  }

  get queuedCount(): number {
    return this.waiters.length;
  }

  /** Resolves with a release function once a permit is held. */
  acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      return Promise.reject(new FetchCancelledError("Slot acquisition"));
    }
    if (this.available > 0) {
      this.available--;
      return Promise.resolve(this.releaser());
    }

    return new Promise<() => void>((resolve, reject) => {
      const grant = (): void => {
        signal?.removeEventListener("abort", onAbort);
        resolve(this.releaser());
      };
      const onAbort = (): void => {
        const idx = this.waiters.indexOf(grant);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(new FetchCancelledError("Slot acquisition"));
      };
      this.waiters.push(grant);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next();
      } else {
        this.available++;
      }
    };
  }
}
