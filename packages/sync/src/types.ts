import type { BankAccount, ConnectionHealth } from '@banksync/types';

export interface AccountSyncFailure {
  /** Internal account id. */
  accountId: string;
  accountName: string;
  message: string;
  /** Provider error code, when the provider supplied one. */
  code?: string | undefined;
}

export interface SyncTransactionsResult {
  added: number;
  updated: number;
  removed: number;
  failures: AccountSyncFailure[];
}

export interface ConnectionSyncSummary {
  connectionId: string;
  name: string;
  skipped: boolean;
  result?: SyncTransactionsResult;
  error?: string;
}

export interface RegisterConnectionInput {
  accessToken: string;
  itemId: string;
}

export interface RegisterConnectionResult {
  connectionId: string;
  accounts: BankAccount[];
  sync: SyncTransactionsResult;
}

export interface ConnectionStatusResult extends ConnectionHealth {
  connectionId: string;
  status: 'connected' | 'disconnected';
}
