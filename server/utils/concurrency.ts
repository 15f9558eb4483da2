export class Semaphore {
  private readonly waiters: Array<() => void> = [];
  private available: number;
  readonly capacity: number;

  constructor(capacity: number) {
    this.capacity = Math.max(1, Math.floor(capacity));
    this.available = this.capacity;
  }

  get inUse(): number {
    return this.capacity - this.available;
  }

  get pending(): number {
    return this.waiters.length;
  }

  async acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      throw new Error('Aborted');
    }

    if (this.available > 0) {
      this.available -= 1;
      return this.releaseOnce();
    }

    return await new Promise<() => void>((resolve, reject) => {
      const onAbort = () => {
        this.removeWaiter(notify);
        reject(new Error('Aborted'));
      };

      const notify = () => {
        signal?.removeEventListener('abort', onAbort);
        this.available -= 1;
        resolve(this.releaseOnce());
      };

      signal?.addEventListener('abort', onAbort, { once: true });

      this.waiters.push(notify);
    });
  }

  /** Runs `task` while holding one slot; the slot is returned whatever the outcome. */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private releaseOnce(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private removeWaiter(waiter: () => void) {
    const idx = this.waiters.indexOf(waiter);
    if (idx >= 0) {
      this.waiters.splice(idx, 1);
    }
  }

  private release() {
    this.available += 1;
    const next = this.waiters.shift();
    if (next) {
      next();
    }
  }
}
