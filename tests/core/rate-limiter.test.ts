import { describe, expect, test, vi } from 'vitest';
import { RequestRateLimiter } from '../../core/rate-limiter';

function fakeClock(start: number = 1_000_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
    sleep: vi.fn(async (ms: number) => {
      current += ms;
    }),
  };
}

describe('RequestRateLimiter', () => {
  test('should be disabled when requests per minute is not positive', async () => {
    const clock = fakeClock();
    const limiter = new RequestRateLimiter({ requestsPerMinute: 0, jitterRatio: 0.2, ...clock });

    await limiter.waitForSlot();
    await limiter.waitForSlot();

    expect(limiter.isEnabled()).toBe(false);
    expect(clock.sleep).not.toHaveBeenCalled();
  });

  test('should space requests by the interval plus jitter', async () => {
    const clock = fakeClock();
    const limiter = new RequestRateLimiter({ requestsPerMinute: 30, jitterRatio: 0.2, random: () => 0.5, ...clock });

    await limiter.waitForSlot();
    expect(clock.sleep.mock.calls).toEqual([[200]]);

    await limiter.waitForSlot();
    expect(clock.sleep.mock.calls).toEqual([[200], [2000], [200]]);
  });

  test('should only wait for the remainder of the interval', async () => {
    const clock = fakeClock();
    const limiter = new RequestRateLimiter({ requestsPerMinute: 30, jitterRatio: 0, ...clock });

    await limiter.waitForSlot();
    clock.advance(1500);
    await limiter.waitForSlot();

    expect(clock.sleep.mock.calls).toEqual([[500]]);
  });

  test('should not wait once the interval has passed', async () => {
    const clock = fakeClock();
    const limiter = new RequestRateLimiter({ requestsPerMinute: 30, jitterRatio: 0, ...clock });

    await limiter.waitForSlot();
    clock.advance(5000);
    await limiter.waitForSlot();

    expect(clock.sleep).not.toHaveBeenCalled();
  });

  test('should clamp the jitter ratio to 1', async () => {
    const clock = fakeClock();
    const limiter = new RequestRateLimiter({ requestsPerMinute: 30, jitterRatio: 5, random: () => 0.25, ...clock });

    await limiter.waitForSlot();

    expect(clock.sleep.mock.calls).toEqual([[500]]);
  });
});
