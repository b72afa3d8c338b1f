/**
 * Counting semaphore with first-come first-served waiters. Nothing is ever
 * rejected; callers wait as long as it takes for a permit.
 */
export class Semaphore {
  private available: number;
  private waiters: Array<() => void> = [];

  constructor(private readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new Error(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.available = permits;
  }

  get activeCount(): number {
    return this.permits - this.available;
  }

  get pendingCount(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return;
    }
    await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // permit handed straight to the next waiter
      next();
      return;
    }
    this.available = Math.min(this.available + 1, this.permits);
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}

/** Serializes async critical sections. */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}

/**
 * Map of key to the promise currently computing its value. The first caller
 * for a key starts the work; callers arriving before it settles share the
 * same promise. The entry is dropped once the promise settles.
 */
export class InFlightRegistry<K, V> {
  private readonly inFlight = new Map<K, Promise<V>>();

  get size(): number {
    return this.inFlight.size;
  }

  has(key: K): boolean {
    return this.inFlight.has(key);
  }

  /**
   * Returns the shared promise for `key` and whether this caller started it.
   */
  join(key: K, start: () => Promise<V>): { promise: Promise<V>; leader: boolean } {
    const existing = this.inFlight.get(key);
    if (existing) {
      return { promise: existing, leader: false };
    }

    const promise = start();
    this.inFlight.set(key, promise);
    const clear = () => {
      if (this.inFlight.get(key) === promise) {
        this.inFlight.delete(key);
      }
    };
    void promise.then(clear, clear);
    return { promise, leader: true };
  }
}
