import { setTimeout as sleep } from 'timers/promises';
import type { RateLimiter } from './types';

/** Spaces requests at least `1000 / maxPerSecond` ms apart within this process. */
export class IntervalRateLimiter implements RateLimiter {
  private readonly minIntervalMs: number;
  private nextSlot = 0;

  constructor(
    maxPerSecond: number,
    private readonly now: () => number = Date.now,
  ) {
    if (maxPerSecond <= 0) {
      throw new Error('maxPerSecond must be > 0');
    }
    this.minIntervalMs = 1000 / maxPerSecond;
  }

  async throttle(): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;
    const waitMs = slot - now;
    if (waitMs > 0) {
      await sleep(waitMs);
    }
  }
}
