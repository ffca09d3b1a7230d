import { describe, expect, test } from 'vitest';
import { ErrorClassifier, ErrorCode, ScraperError, ScraperErrors } from '../../core/errors';

describe('ScraperError', () => {
  describe('constructor', () => {
    test('should create error with code and message', () => {
      const error = new ScraperError(ErrorCode.RATE_LIMIT_EXCEEDED, 'Rate limit exceeded');

      expect(error.code).toBe(ErrorCode.RATE_LIMIT_EXCEEDED);
      expect(error.message).toBe('Rate limit exceeded');
      expect(error.name).toBe('ScraperError');
      expect(error.retryable).toBe(false);
      expect(error.context).toEqual({});
    });

    test('should accept retryable and context options', () => {
      const error = new ScraperError(ErrorCode.RATE_LIMIT_EXCEEDED, 'Rate limit exceeded', {
        retryable: true,
        context: { shortcode: 'ABC123', attempt: 3 },
      });

      expect(error.retryable).toBe(true);
      expect(error.context).toEqual({ shortcode: 'ABC123', attempt: 3 });
    });

    test('should have timestamp', () => {
      const before = new Date();
      const error = new ScraperError(ErrorCode.UNKNOWN_ERROR, 'Test');
      const after = new Date();

      expect(error.timestamp.getTime()).toBeGreaterThanOrEqual(before.getTime());
      expect(error.timestamp.getTime()).toBeLessThanOrEqual(after.getTime());
    });
  });

  describe('fromHttpResponse', () => {
    test('should create RATE_LIMIT_EXCEEDED for 429', () => {
      const error = ScraperError.fromHttpResponse({ status: 429 }, { operation: 'comments' });

      expect(error.code).toBe(ErrorCode.RATE_LIMIT_EXCEEDED);
      expect(error.retryable).toBe(true);
      expect(error.statusCode).toBe(429);
      expect(error.message).toBe('Rate limit exceeded: 429');
      expect(error.context).toEqual({ operation: 'comments' });
    });

    test('should create AUTH_FAILED for 401 and 403', () => {
      for (const status of [401, 403]) {
        const error = ScraperError.fromHttpResponse({ status, statusText: 'Forbidden' });
        expect(error.code).toBe(ErrorCode.AUTH_FAILED);
        expect(error.retryable).toBe(false);
        expect(error.message).toBe('Authentication failed: Forbidden');
      }
    });

    test('should create NOT_FOUND for 404', () => {
      const error = ScraperError.fromHttpResponse({ status: 404 });
      expect(error.code).toBe(ErrorCode.NOT_FOUND);
      expect(error.retryable).toBe(false);
    });

    test('should mark 500, 502, 503 and 504 as retryable server errors', () => {
      for (const status of [500, 502, 503, 504]) {
        const error = ScraperError.fromHttpResponse({ status });
        expect(error.code).toBe(ErrorCode.SERVER_ERROR);
        expect(error.retryable).toBe(true);
      }
    });

    test('should not retry 501', () => {
      const error = ScraperError.fromHttpResponse({ status: 501 });
      expect(error.code).toBe(ErrorCode.SERVER_ERROR);
      expect(error.retryable).toBe(false);
    });

    test('should fall back to API_ERROR for other statuses', () => {
      const error = ScraperError.fromHttpResponse({ status: 400 });
      expect(error.code).toBe(ErrorCode.API_ERROR);
      expect(error.message).toBe('HTTP 400: 400');
      expect(error.retryable).toBe(false);
    });
  });
});

describe('ScraperErrors', () => {
  test('invalidPostUrl should be a non-retryable input error', () => {
    const error = ScraperErrors.invalidPostUrl('not-a-url');
    expect(error.code).toBe(ErrorCode.INVALID_INPUT);
    expect(error.retryable).toBe(false);
    expect(error.context).toEqual({ url: 'not-a-url' });
  });

  test('invalidConfiguration should carry CONFIG_ERROR', () => {
    const error = ScraperErrors.invalidConfiguration('Endpoint URL missing');
    expect(error.code).toBe(ErrorCode.CONFIG_ERROR);
    expect(error.message).toBe('Endpoint URL missing');
  });

  test('fileSystemError should keep the underlying error', () => {
    const cause = new Error('ENOSPC');
    const error = ScraperErrors.fileSystemError('disk full', cause, { shortcode: 'ABC' });
    expect(error.code).toBe(ErrorCode.FILE_SYSTEM_ERROR);
    expect(error.originalError).toBe(cause);
    expect(error.context).toEqual({ shortcode: 'ABC' });
  });

  test('interrupted should be recognised as a cooperative stop', () => {
    const error = ScraperErrors.interrupted({ shortcode: 'ABC', page: 2 });
    expect(error.code).toBe(ErrorCode.INTERRUPTED);
    expect(ErrorClassifier.isInterruption(error)).toBe(true);
    expect(ErrorClassifier.isInterruption(new Error('Crawl interrupted by stop signal'))).toBe(false);
  });
});

describe('ErrorClassifier', () => {
  test('should return ScraperError unchanged and merge context', () => {
    const original = ScraperErrors.invalidConfiguration('bad', { configFile: 'config.json' });
    const classified = ErrorClassifier.classify(original, { attempt: 2 });

    expect(classified).toBe(original);
    expect(classified.context).toEqual({ configFile: 'config.json', attempt: 2 });
  });

  test('should classify errno codes', () => {
    const cases: Array<[string, ErrorCode]> = [
      ['ECONNREFUSED', ErrorCode.CONNECTION_REFUSED],
      ['ENOTFOUND', ErrorCode.DNS_ERROR],
      ['EAI_AGAIN', ErrorCode.DNS_ERROR],
      ['ECONNABORTED', ErrorCode.TIMEOUT],
      ['ETIMEDOUT', ErrorCode.TIMEOUT],
      ['ECONNRESET', ErrorCode.NETWORK_ERROR],
    ];
    for (const [code, expected] of cases) {
      const classified = ErrorClassifier.classify(Object.assign(new Error('request failed'), { code }));
      expect(classified.code).toBe(expected);
      expect(classified.retryable).toBe(true);
    }
  });

  test('should classify by message', () => {
    expect(ErrorClassifier.classify(new Error('timeout of 30000ms exceeded')).code).toBe(ErrorCode.TIMEOUT);
    expect(ErrorClassifier.classify(new Error('Too Many Requests')).code).toBe(ErrorCode.RATE_LIMIT_EXCEEDED);
    expect(ErrorClassifier.classify(new Error('Unauthorized')).code).toBe(ErrorCode.AUTH_FAILED);
  });

  test('should keep the original error and default to UNKNOWN_ERROR', () => {
    const original = new Error('something odd');
    const classified = ErrorClassifier.classify(original, { url: 'https://www.instagram.com/' });

    expect(classified.code).toBe(ErrorCode.UNKNOWN_ERROR);
    expect(classified.retryable).toBe(false);
    expect(classified.originalError).toBe(original);
    expect(classified.context).toEqual({ url: 'https://www.instagram.com/' });
  });

  test('should handle non-Error values', () => {
    const classified = ErrorClassifier.classify('plain string');
    expect(classified.code).toBe(ErrorCode.UNKNOWN_ERROR);
    expect(classified.message).toBe('plain string');
    expect(classified.originalError).toBeUndefined();
  });
});
