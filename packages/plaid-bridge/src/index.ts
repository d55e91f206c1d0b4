/**
 * Plaid integration module.
 * Provider client, transform layer, error normalization and retry helpers.
 */

// Client
export { createPlaidClient } from './client.js';

// Provider
export { PlaidProvider, type PlaidProviderOptions } from './provider.js';

// Transform
export {
  transformTransaction,
  transformTransactions,
  transformAccount,
  transformAccounts,
} from './transform.js';

// Category Mapper
export {
  mapCategory,
  mapTransactionMethod,
  type CategoryResult,
  type MethodSignals,
} from './category-mapper.js';

// Errors
export {
  ProviderError,
  toProviderError,
  redactSecrets,
  isReauthRequiredError,
  isReauthErrorCode,
  isNotReadyError,
  isSyncMutationError,
  REAUTH_ERROR_CODES,
  NOT_READY_ERROR_CODES,
  SYNC_MUTATION_ERROR_CODE,
  type ProviderErrorDetails,
} from './errors.js';

// Retry
export {
  withRetry,
  retryWhenNotReady,
  isRetryableError,
  calculateDelay,
  type RetryOptions,
  type NotReadyRetryOptions,
} from './retry.js';

// Types
export type { PlaidConfig, PlaidEnvironment, PlaidTransport } from './types.js';
