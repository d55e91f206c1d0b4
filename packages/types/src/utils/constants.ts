export const ENGINE_VERSION = '0.1.0';

export const DEFAULT_CURRENCY = 'USD';

export const UNKNOWN_INSTITUTION_NAME = 'Unknown Institution';
export const UNKNOWN_INSTITUTION_ID = 'unknown';

export const TRANSACTION_WINDOWS = {
  /** Default look-back for date-range queries. */
  DEFAULT_DAYS: 90,
  /** Look-back for a quick `latest` refresh. */
  LATEST_DAYS: 5,
  /** History requested when a new item is linked. */
  LINK_HISTORY_DAYS: 730,
} as const;

export const DEFAULT_TRANSACTION_LIMIT = 100;

export const NOT_READY_RETRY = {
  ATTEMPTS: 3,
  DELAY_MS: 3000,
} as const;
