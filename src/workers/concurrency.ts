/**
 * Concurrency control for per-record enrichment.
 *
 * @module workers/concurrency
 */

/**
 * Runs async tasks with at most `limit` in flight; waiting tasks start in
 * the order they were submitted.
 *
 * The orchestrator wraps each record's enrichment in `run`, which bounds
 * simultaneous transcript, media and model calls.
 *
 * @example
 * ```typescript
 * const limiter = new ConcurrencyLimiter(3);
 * const outcomes = await Promise.all(
 *   records.map((record) => limiter.run(() => extractText(record, strategies, logger)))
 * );
 * ```
 */
export class ConcurrencyLimiter {
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  /**
   * @throws RangeError unless limit is a positive integer
   */
  constructor(private readonly limit: number = 1) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
    }
  }

  /**
   * Run `task` once a slot is free. The slot is handed on when the task
   * settles, whether it resolves or throws.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.active < this.limit) {
      this.active++;
    } else {
      // The releasing task keeps `active` unchanged and passes its slot here
      await new Promise<void>((resolve) => this.waiting.push(resolve));
    }

    try {
      return await task();
    } finally {
      const next = this.waiting.shift();
      if (next) {
        next();
      } else {
        this.active--;
      }
    }
  }
}
