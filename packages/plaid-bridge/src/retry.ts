/**
 * Retry helpers for Plaid API calls. The bridge itself never retries;
 * callers wrap calls with `withRetry` (exponential backoff) or
 * `retryWhenNotReady` (fixed delay, only for freshly linked items).
 */

import { NOT_READY_RETRY } from '@banksync/types';
import { ProviderError, isNotReadyError } from './errors.js';

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Add 0-30% random jitter to each delay. */
  jitter?: boolean;
  retryableErrors?: string[];
  /** Overrides the error-code check when given. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'onRetry' | 'shouldRetry'>> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
  retryableErrors: [
    'RATE_LIMIT_EXCEEDED',
    'INTERNAL_SERVER_ERROR',
    'INSTITUTION_DOWN',
    'INSTITUTION_NOT_RESPONDING',
    'PLANNED_MAINTENANCE',
  ],
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Check if an error is retryable based on Plaid error codes, falling back to
 * the HTTP status (429 and 5xx).
 */
export function isRetryableError(error: unknown, retryableErrors: string[]): boolean {
  if (error === null || typeof error !== 'object') {
    return false;
  }

  let code: string | undefined;
  let status: number | undefined;

  if (error instanceof ProviderError) {
    code = error.code;
    status = error.status;
  } else {
    if ('error_code' in error && typeof error.error_code === 'string') code = error.error_code;
    if ('status' in error && typeof error.status === 'number') status = error.status;
  }

  if (code !== undefined) {
    return retryableErrors.includes(code);
  }

  if (status !== undefined) {
    return status === 429 || (status >= 500 && status < 600);
  }

  return false;
}

/**
 * Delay for the given attempt (1-based) with exponential backoff and
 * optional jitter, capped at `maxDelayMs`.
 */
export function calculateDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number,
  jitter: boolean = true
): number {
  const exponentialDelay = initialDelayMs * Math.pow(backoffMultiplier, attempt - 1);
  const extra = jitter ? Math.random() * 0.3 * exponentialDelay : 0;
  return Math.min(exponentialDelay + extra, maxDelayMs);
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const shouldRetry =
    options.shouldRetry ?? ((error: unknown): boolean => isRetryableError(error, opts.retryableErrors));
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= opts.maxRetries + 1; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt > opts.maxRetries || !shouldRetry(error)) {
        throw lastError;
      }

      const delayMs = calculateDelay(
        attempt,
        opts.initialDelayMs,
        opts.maxDelayMs,
        opts.backoffMultiplier,
        opts.jitter
      );

      if (options.onRetry !== undefined) {
        options.onRetry(attempt, lastError, delayMs);
      }

      await sleep(delayMs);
    }
  }

  throw lastError ?? new Error('Retry failed');
}

export interface NotReadyRetryOptions {
  attempts?: number;
  delayMs?: number;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * Retry a call while Plaid reports PRODUCT_NOT_READY, with a fixed delay
 * between a small number of attempts. Any other error is rethrown at once.
 */
export function retryWhenNotReady<T>(fn: () => Promise<T>, options: NotReadyRetryOptions = {}): Promise<T> {
  const attempts = options.attempts ?? NOT_READY_RETRY.ATTEMPTS;
  const delayMs = options.delayMs ?? NOT_READY_RETRY.DELAY_MS;

  return withRetry(fn, {
    maxRetries: Math.max(attempts - 1, 0),
    initialDelayMs: delayMs,
    maxDelayMs: delayMs,
    backoffMultiplier: 1,
    jitter: false,
    shouldRetry: isNotReadyError,
    ...(options.onRetry !== undefined ? { onRetry: options.onRetry } : {}),
  });
}
