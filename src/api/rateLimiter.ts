function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Fixed-delay spacing between request starts. Every task scheduled on the
 * same limiter waits its turn, so one instance can be shared by several
 * clients and the spacing still holds across all of them.
 */
export class RateLimiter {
  readonly minIntervalMs: number;
  private lastStart = Number.NEGATIVE_INFINITY;
  private tail: Promise<void> = Promise.resolve();

  constructor(minIntervalMs: number) {
    this.minIntervalMs = minIntervalMs;
  }

  schedule<T>(task: () => Promise<T>): Promise<T> {
    const turn = this.tail.then(() => this.waitTurn());
    this.tail = turn;
    return turn.then(task);
  }

  private async waitTurn(): Promise<void> {
    const remaining = this.lastStart + this.minIntervalMs - Date.now();
    if (remaining > 0) {
      await sleep(remaining);
    }
    this.lastStart = Date.now();
  }
}
