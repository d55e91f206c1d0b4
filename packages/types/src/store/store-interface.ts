/**
 * LedgerStore interface. Lives in @banksync/types so that the sync
 * package can depend on it without pulling in a storage backend.
 */

import type {
  AccountUpdate,
  BankAccount,
  BankConnection,
  ConnectionUpdate,
  ConnectionWithAccounts,
  LedgerTransaction,
  NewConnection,
  TransformedAccount,
  TransformedTransaction,
} from '../schemas/ledger.js';

export interface UpsertTransactionsResult {
  inserted: number;
  updated: number;
}

export interface LedgerStore {
  /** Fails with a unique violation when the item id is already linked. */
  createConnection(input: NewConnection): Promise<BankConnection>;
  getConnection(connectionId: string): Promise<BankConnection | null>;
  listConnections(): Promise<ConnectionWithAccounts[]>;
  updateConnection(connectionId: string, updates: ConnectionUpdate): Promise<void>;
  /** Cascades to the connection's accounts and their transactions. */
  deleteConnection(connectionId: string): Promise<void>;

  /** Plain insert: an external account id that already exists is an error. */
  createAccounts(connectionId: string, accounts: TransformedAccount[]): Promise<BankAccount[]>;
  getAccount(accountId: string): Promise<BankAccount | null>;
  listAccounts(connectionId: string): Promise<BankAccount[]>;
  updateAccount(accountId: string, updates: AccountUpdate): Promise<void>;

  /**
   * Insert-or-update keyed on the provider transaction id. Existing rows keep
   * their internal id and owning account.
   */
  upsertTransactions(
    bankAccountId: string,
    transactions: TransformedTransaction[]
  ): Promise<UpsertTransactionsResult>;
  /** Returns the number of rows actually deleted. */
  deleteTransactions(plaidTransactionIds: string[]): Promise<number>;
  /** Newest first. */
  listTransactions(bankAccountId: string, limit: number): Promise<LedgerTransaction[]>;
}
