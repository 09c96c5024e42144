/**
 * Per-instrument work lanes sharing a bounded pool of cycle slots
 */

/**
 * Counting semaphore. Waiters are served in arrival order.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore permits must be a positive integer, got ${permits}`);
    }
    this.available = permits;
  }

  acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }
    return new Promise(resolve => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Permit passes straight to the next waiter
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

  getAvailable(): number {
    return this.available;
  }

  getWaiting(): number {
    return this.waiters.length;
  }
}

/**
 * FIFO chain of tasks for one instrument: a task starts only after the
 * previous one settled, so two cycles of the same instrument never overlap.
 */
export class InstrumentLane {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(
    readonly instrument: string,
    private readonly slots: Semaphore
  ) {}

  enqueue<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(() => this.slots.run(task));
    this.tail = run.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      }
    );
    return run;
  }

  /**
   * Resolves once every task enqueued so far, and any enqueued meanwhile, has settled.
   */
  async idle(): Promise<void> {
    while (this.pending > 0) {
      await this.tail;
    }
  }

  getPending(): number {
    return this.pending;
  }
}
