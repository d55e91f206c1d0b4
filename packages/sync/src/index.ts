/**
 * Reconciliation of provider data into the ledger store.
 */

export { ReconciliationService, type ReconciliationServiceConfig } from './reconciliation-service.js';
export {
  SyncScheduler,
  type SyncRunner,
  type ScheduledSyncConfig,
  type ScheduledSyncStatus,
} from './scheduler.js';
export { ConnectionNotFoundError, AccountNotFoundError } from './errors.js';
export type {
  AccountSyncFailure,
  SyncTransactionsResult,
  ConnectionSyncSummary,
  ConnectionStatusResult,
  RegisterConnectionInput,
  RegisterConnectionResult,
} from './types.js';
