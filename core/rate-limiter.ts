/**
 * Client-side request spacing.
 *
 * Keeps at least `60 / requestsPerMinute` seconds between physical requests
 * and adds a uniform random jitter on top so calls do not land on a fixed
 * cadence. Single-flight: one crawler owns one limiter.
 */

import { createEnhancedLogger } from '../utils/logger';
import { sleep as defaultSleep } from '../utils/retry';
import type { SleepFn } from '../utils/retry';

const logger = createEnhancedLogger('RateLimiter');

export interface RateLimiterOptions {
  requestsPerMinute: number;
  jitterRatio: number;
  now?: () => number;
  sleep?: SleepFn;
  random?: () => number;
}

export class RequestRateLimiter {
  private readonly intervalMs: number;
  private readonly jitterRatio: number;
  private readonly now: () => number;
  private readonly sleep: SleepFn;
  private readonly random: () => number;
  private lastRequestAt = 0;

  constructor(options: RateLimiterOptions) {
    const rpm = options.requestsPerMinute;
    this.intervalMs = rpm > 0 ? 60000 / rpm : 0;
    this.jitterRatio = Math.max(0, Math.min(options.jitterRatio, 1));
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  isEnabled(): boolean {
    return this.intervalMs > 0;
  }

  /**
   * Resolves once the next request may be sent
   */
  async waitForSlot(): Promise<void> {
    if (!this.isEnabled()) {
      return;
    }

    const elapsed = this.now() - this.lastRequestAt;
    if (elapsed < this.intervalMs) {
      const wait = this.intervalMs - elapsed;
      logger.debug(`Waiting ${Math.round(wait)}ms for rate limit slot`);
      await this.sleep(wait);
    }

    const jitter = this.random() * this.intervalMs * this.jitterRatio;
    if (jitter > 0) {
      await this.sleep(jitter);
    }

    this.lastRequestAt = this.now();
  }
}
