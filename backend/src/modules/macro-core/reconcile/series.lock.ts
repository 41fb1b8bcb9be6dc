/**
 * Per-series mutual exclusion.
 *
 * Holders of the same key run one at a time in arrival order; different
 * keys never wait on each other. Entries are dropped once a key is idle.
 */

class Mutex {
  private locked = false;
  private waiting: Array<() => void> = [];

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }
    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  get idle(): boolean {
    return !this.locked && this.waiting.length === 0;
  }
}

export class SeriesLock {
  private readonly mutexes = new Map<string, Mutex>();

  async withLock<T>(seriesKey: string, fn: () => Promise<T>): Promise<T> {
    let mutex = this.mutexes.get(seriesKey);
    if (!mutex) {
      mutex = new Mutex();
      this.mutexes.set(seriesKey, mutex);
    }

    await mutex.acquire();
    try {
      return await fn();
    } finally {
      mutex.release();
      if (mutex.idle) this.mutexes.delete(seriesKey);
    }
  }

  isHeld(seriesKey: string): boolean {
    return this.mutexes.has(seriesKey);
  }
}
