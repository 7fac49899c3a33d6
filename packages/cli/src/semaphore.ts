export class Semaphore {
  private inFlightCount = 0;
  private readonly waiters: Array<(release: () => void) => void> = [];

  constructor(private readonly maxConcurrency: number) {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new Error(`Semaphore maxConcurrency must be >= 1 (got ${maxConcurrency})`);
    }
  }

  get inFlight(): number {
    return this.inFlightCount;
  }

  get queueDepth(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<() => void> {
    if (this.inFlightCount < this.maxConcurrency) {
      this.inFlightCount++;
      return this.createRelease();
    }

    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Run fn once a slot is free, releasing it when fn settles */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      // hand the slot straight to the next waiter
      const next = this.waiters.shift();
      if (next) {
        next(this.createRelease());
      } else {
        this.inFlightCount--;
      }
    };
  }
}
