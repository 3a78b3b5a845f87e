import { logger } from './logger.js';
import { sleep } from './helpers.js';

/**
 * Token bucket shared by every request to one upstream API.
 *
 * A caller that finds the bucket short takes its tokens anyway and sleeps off
 * the deficit, so the balance can go negative and later callers queue behind it.
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill = Date.now();

  constructor(
    readonly name: string,
    private readonly capacity: number,
    private readonly perSecond: number,
  ) {
    if (!(capacity > 0 && perSecond > 0)) {
      throw new RangeError(`[${name}] rate limit must be positive, got ${capacity}/${perSecond}`);
    }
    this.tokens = capacity;
  }

  async acquire(count = 1): Promise<void> {
    this.refill();
    this.tokens -= count;
    if (this.tokens >= 0) return;

    const waitMs = (-this.tokens / this.perSecond) * 1000;
    logger.debug(`[${this.name}] rate limited, waiting ${Math.round(waitMs)}ms`);
    await sleep(waitMs);
  }

  /** Whole tokens available right now. */
  get available(): number {
    this.refill();
    return Math.max(0, Math.floor(this.tokens));
  }

  private refill(): void {
    const now = Date.now();
    this.tokens = Math.min(this.capacity, this.tokens + ((now - this.lastRefill) / 1000) * this.perSecond);
    this.lastRefill = now;
  }
}
