/**
 * Rate limiter for API calls with lambda-based execution.
 * Ensures a minimum interval between requests; concurrent callers each
 * reserve the next free slot, so bursts are spread out rather than released together.
 *
 * @example
 * ```typescript
 * const rateLimiter = new RateLimiter(10); // 10 requests per second
 *
 * const response = await rateLimiter.execute(() =>
 *   fetch('https://status.example.com/api/components')
 * );
 * ```
 */
export class RateLimiter {
  private nextSlot: number = 0;
  private readonly minInterval: number;

  constructor(requestsPerSecond: number = 10) {
    this.minInterval = 1000 / requestsPerSecond; // milliseconds between requests
  }

  /**
   * Execute a function with rate limiting applied
   * @param fn Function to execute (can be sync or async)
   */
  async execute<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.waitIfNeeded();
    return await fn();
  }

  private async waitIfNeeded(): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minInterval;

    if (slot > now) {
      await new Promise(resolve => setTimeout(resolve, slot - now));
    }
  }
}
