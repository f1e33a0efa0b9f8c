/**
 * Rate Limiter - Token bucket implementation for API rate limiting
 *
 * The retrieval API accepts roughly one request every few seconds per key, so the
 * download client uses a bucket of capacity 1 refilled once per request interval.
 */

export interface RateLimiterOptions {
  /** Current time in milliseconds (default: Date.now) */
  now?: () => number;
  /** Waits the given milliseconds (default: setTimeout) */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Token bucket rate limiter
 */
export class RateLimiter {
  private tokens: number;
  private readonly capacity: number;
  private readonly refillRate: number; // tokens per second
  private lastRefill: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  /**
   * @param capacity - Maximum tokens (burst capacity)
   * @param refillRate - Tokens per second; 0 or less disables limiting
   */
  constructor(capacity: number, refillRate: number, options: RateLimiterOptions = {}) {
    this.capacity = capacity;
    this.refillRate = refillRate;
    this.tokens = capacity;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
    this.lastRefill = this.now();
  }

  /**
   * One request every `intervalMs` milliseconds; an interval of 0 never waits
   */
  static fromInterval(intervalMs: number, options: RateLimiterOptions = {}): RateLimiter {
    return new RateLimiter(1, intervalMs > 0 ? 1000 / intervalMs : 0, options);
  }

  /**
   * Acquire a token (wait if necessary)
   *
   * @returns Promise that resolves when token is acquired
   */
  async acquire(): Promise<void> {
    if (this.refillRate <= 0) {
      return;
    }

    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return;
    }

    // Need to wait for token
    const waitTime = Math.ceil(((1 - this.tokens) / this.refillRate) * 1000);
    await this.sleep(waitTime);

    // Refill again after waiting
    this.refill();
    this.tokens = Math.max(0, this.tokens - 1);
  }

  /**
   * Refill tokens based on elapsed time
   */
  private refill(): void {
    const now = this.now();
    const elapsed = (now - this.lastRefill) / 1000; // seconds
    const tokensToAdd = elapsed * this.refillRate;

    this.tokens = Math.min(this.capacity, this.tokens + tokensToAdd);
    this.lastRefill = now;
  }
}
