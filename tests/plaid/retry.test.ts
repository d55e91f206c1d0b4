import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  ProviderError,
  withRetry,
  retryWhenNotReady,
  isRetryableError,
  calculateDelay,
} from '@banksync/plaid-bridge';

describe('Retry Logic', () => {
  describe('isRetryableError', () => {
    it('should return true for listed error codes', () => {
      expect(isRetryableError({ error_code: 'RATE_LIMIT_EXCEEDED' }, ['RATE_LIMIT_EXCEEDED'])).toBe(true);
      expect(
        isRetryableError(new ProviderError('down', { code: 'INSTITUTION_DOWN' }), ['INSTITUTION_DOWN'])
      ).toBe(true);
    });

    it('should return true for HTTP 429 and 5xx status', () => {
      expect(isRetryableError({ status: 429 }, [])).toBe(true);
      expect(isRetryableError({ status: 503 }, [])).toBe(true);
      expect(isRetryableError(new ProviderError('x', { status: 500 }), [])).toBe(true);
    });

    it('should return false for non-retryable errors', () => {
      expect(isRetryableError({ error_code: 'INVALID_REQUEST' }, ['RATE_LIMIT_EXCEEDED'])).toBe(false);
      expect(isRetryableError({ status: 404 }, [])).toBe(false);
    });

    it('should return false for null and non-objects', () => {
      expect(isRetryableError(null, [])).toBe(false);
      expect(isRetryableError(undefined, [])).toBe(false);
      expect(isRetryableError('error', [])).toBe(false);
    });
  });

  describe('calculateDelay', () => {
    it('should grow exponentially without jitter', () => {
      expect(calculateDelay(1, 1000, 30000, 2, false)).toBe(1000);
      expect(calculateDelay(3, 1000, 30000, 2, false)).toBe(4000);
    });

    it('should cap at the maximum delay', () => {
      expect(calculateDelay(10, 1000, 30000, 2, false)).toBe(30000);
    });

    it('should add at most 30% jitter', () => {
      const delay = calculateDelay(1, 1000, 30000, 2);
      expect(delay).toBeGreaterThanOrEqual(1000);
      expect(delay).toBeLessThanOrEqual(1300);
    });
  });

  describe('withRetry', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should retry a retryable failure and return the result', async () => {
      const fn = vi.fn().mockRejectedValueOnce({ error_code: 'RATE_LIMIT_EXCEEDED' }).mockResolvedValue('ok');
      const onRetry = vi.fn();

      const promise = withRetry(fn, { initialDelayMs: 100, jitter: false, onRetry });
      await vi.advanceTimersByTimeAsync(100);

      await expect(promise).resolves.toBe('ok');
      expect(fn).toHaveBeenCalledTimes(2);
      expect(onRetry).toHaveBeenCalledWith(1, expect.any(Error), 100);
    });

    it('should not retry other failures', async () => {
      const fn = vi.fn().mockRejectedValue(new ProviderError('bad request', { code: 'INVALID_REQUEST' }));

      await expect(withRetry(fn)).rejects.toThrow('bad request');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should give up after maxRetries', async () => {
      const fn = vi.fn().mockRejectedValue(new ProviderError('unavailable', { status: 503 }));

      const promise = withRetry(fn, { maxRetries: 2, initialDelayMs: 100, jitter: false });
      const assertion = expect(promise).rejects.toThrow('unavailable');
      await vi.advanceTimersByTimeAsync(300);

      await assertion;
      expect(fn).toHaveBeenCalledTimes(3);
    });
  });

  describe('retryWhenNotReady', () => {
    const notReady = (): ProviderError =>
      new ProviderError('the requested product is not yet ready', { code: 'PRODUCT_NOT_READY' });

    it('should retry while the product is not ready', async () => {
      const fn = vi.fn().mockRejectedValueOnce(notReady()).mockRejectedValueOnce(notReady()).mockResolvedValue('ready');
      const onRetry = vi.fn();

      await expect(retryWhenNotReady(fn, { attempts: 3, delayMs: 0, onRetry })).resolves.toBe('ready');
      expect(fn).toHaveBeenCalledTimes(3);
      expect(onRetry).toHaveBeenCalledTimes(2);
      expect(onRetry).toHaveBeenNthCalledWith(1, 1, expect.any(ProviderError), 0);
    });

    it('should stop after the configured attempts', async () => {
      const fn = vi.fn().mockRejectedValue(notReady());

      await expect(retryWhenNotReady(fn, { attempts: 3, delayMs: 0 })).rejects.toThrow(
        'the requested product is not yet ready'
      );
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should rethrow other errors immediately', async () => {
      const fn = vi.fn().mockRejectedValue(new ProviderError('login required', { code: 'ITEM_LOGIN_REQUIRED' }));

      await expect(retryWhenNotReady(fn, { attempts: 3, delayMs: 0 })).rejects.toThrow('login required');
      expect(fn).toHaveBeenCalledTimes(1);
    });
  });
});
