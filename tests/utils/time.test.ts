import { describe, expect, test } from 'vitest';
import { fileTimestamp, formatDuration, formatUnixSeconds, nowIso } from '../../utils/time';

describe('time', () => {
  describe('formatUnixSeconds', () => {
    test('should format whole seconds in UTC', () => {
      expect(formatUnixSeconds(1700000000)).toBe('2023-11-14T22:13:20Z');
      expect(formatUnixSeconds(0)).toBe('1970-01-01T00:00:00Z');
    });

    test('should drop fractional seconds', () => {
      expect(formatUnixSeconds(1700000000.75)).toBe('2023-11-14T22:13:20Z');
    });

    test('should return null for non-finite input', () => {
      expect(formatUnixSeconds(Number.NaN)).toBeNull();
      expect(formatUnixSeconds(Number.POSITIVE_INFINITY)).toBeNull();
    });
  });

  describe('fileTimestamp', () => {
    const date = new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 6));

    test('should build a sortable UTC stamp', () => {
      expect(fileTimestamp(date)).toBe('20240102_030405');
    });

    test('should append milliseconds when asked', () => {
      expect(fileTimestamp(date, true)).toBe('20240102_030405_006');
    });
  });

  test('nowIso should use ISO-8601', () => {
    expect(nowIso(new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 6)))).toBe('2024-01-02T03:04:05.006Z');
  });

  test('formatDuration should print seconds with two decimals', () => {
    expect(formatDuration(1500)).toBe('1.50s');
    expect(formatDuration(0)).toBe('0.00s');
  });
});
