/**
 * Limits how many async functions run at once. Callers beyond the limit wait in FIFO order.
 */
export class Semaphore {
  private _available: number;
  private readonly _waiters: (() => void)[] = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Semaphore capacity must be a positive integer, found ${capacity}`);
    }

    this._available = capacity;
  }

  get available(): number {
    return this._available;
  }

  async run<T>(func: () => Promise<T>): Promise<T> {
    await this._acquire();
    try {
      return await func();
    } finally {
      this._release();
    }
  }

  private _acquire(): Promise<void> {
    if (this._available > 0) {
      this._available--;
      return Promise.resolve();
    }

    return new Promise<void>(resolve => this._waiters.push(resolve));
  }

  private _release() {
    const next = this._waiters.shift();
    if (next !== undefined) {
      // Hand the slot straight to the next waiter
      next();
    } else {
      this._available++;
    }
  }
}
