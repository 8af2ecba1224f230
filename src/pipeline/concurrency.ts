/**
 * Bounds how many stages of one topological level run at once
 *
 * @module pipeline/concurrency
 */

export class ConcurrencyLimiter {
  private readonly limit: number;
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
  }

  /**
   * Run a task once a slot is free. Waiting tasks start in call order.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.active < this.limit) {
      this.active++;
    } else {
      // a finishing task hands its slot over without freeing it
      await new Promise<void>((resume) => this.waiting.push(resume));
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
