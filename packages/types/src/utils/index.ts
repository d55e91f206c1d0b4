export {
  ENGINE_VERSION,
  DEFAULT_CURRENCY,
  UNKNOWN_INSTITUTION_NAME,
  UNKNOWN_INSTITUTION_ID,
  TRANSACTION_WINDOWS,
  DEFAULT_TRANSACTION_LIMIT,
  NOT_READY_RETRY,
} from './constants.js';
export { isValidISODate, toISODate, daysAgo, compareDates } from './date.js';
export { roundToTwoDecimals, invertAmount, toNullableNumber } from './money.js';
export {
  createConsoleLogger,
  formatLogLine,
  silentLogger,
  type Logger,
  type LogLevel,
  type ConsoleLoggerOptions,
} from './logger.js';
