import { afterEach, describe, expect, test, vi } from 'vitest';
import { linearBackoffMs, sleep } from '../../utils/retry';

describe('retry helpers', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  test('linearBackoffMs should grow with the attempt number', () => {
    expect(linearBackoffMs(5, 1)).toBe(5000);
    expect(linearBackoffMs(5, 2)).toBe(10000);
    expect(linearBackoffMs(0.5, 3)).toBe(1500);
  });

  test('linearBackoffMs should never go negative', () => {
    expect(linearBackoffMs(-1, 2)).toBe(0);
  });

  test('sleep should resolve after the delay', async () => {
    vi.useFakeTimers();
    let resolved = false;

    const pending = sleep(1000).then(() => {
      resolved = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(resolved).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(resolved).toBe(true);
  });
});
