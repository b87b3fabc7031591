import { PoolTimeoutError, RequestAbortedError } from '../errors.js';

export type Release = () => void;

type Waiter = {
  grant: () => void;
};

export type AcquireOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
};

/**
 * Bounded pool of transaction slots. Callers beyond `capacity` queue in FIFO
 * order and give up with PoolTimeoutError after `timeoutMs`.
 */
export class Semaphore {
  private active = 0;
  private readonly waiters: Waiter[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer: ${capacity}`);
    }
  }

  get inUse(): number {
    return this.active;
  }

  get pending(): number {
    return this.waiters.length;
  }

  acquire(options: AcquireOptions): Promise<Release> {
    const { timeoutMs, signal } = options;
    if (signal?.aborted) return Promise.reject(new RequestAbortedError());

    if (this.active < this.capacity) {
      this.active++;
      return Promise.resolve(this.releaser());
    }

    return new Promise<Release>((resolve, reject) => {
      const waiter: Waiter = {
        grant: () => {
          cleanup();
          this.active++;
          resolve(this.releaser());
        }
      };

      const drop = () => {
        const idx = this.waiters.indexOf(waiter);
        if (idx >= 0) this.waiters.splice(idx, 1);
      };
      const onTimeout = () => {
        drop();
        cleanup();
        reject(new PoolTimeoutError(timeoutMs));
      };
      const onAbort = () => {
        drop();
        cleanup();
        reject(new RequestAbortedError());
      };

      const timer = setTimeout(onTimeout, timeoutMs);
      signal?.addEventListener('abort', onAbort, { once: true });
      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      this.waiters.push(waiter);
    });
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.active--;
      this.waiters.shift()?.grant();
    };
  }
}
