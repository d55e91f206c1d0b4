/**
 * In-memory LedgerStore for tests and local runs without a database.
 * Enforces the same unique keys and cascades as the SQL schema.
 */

import { randomUUID } from 'crypto';
import type {
  AccountUpdate,
  BankAccount,
  BankConnection,
  ConnectionUpdate,
  ConnectionWithAccounts,
  LedgerStore,
  LedgerTransaction,
  NewConnection,
  TransformedAccount,
  TransformedTransaction,
  UpsertTransactionsResult,
} from '@banksync/types';
import { StoreError, UniqueViolationError } from './errors.js';

export interface InMemoryLedgerStoreOptions {
  now?: () => Date;
  generateId?: () => string;
}

export class InMemoryLedgerStore implements LedgerStore {
  private readonly connections = new Map<string, BankConnection>();
  private readonly accounts = new Map<string, BankAccount>();
  private readonly transactions = new Map<string, LedgerTransaction>();
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: InMemoryLedgerStoreOptions = {}) {
    this.now = options.now ?? ((): Date => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async createConnection(input: NewConnection): Promise<BankConnection> {
    for (const existing of this.connections.values()) {
      if (existing.itemId === input.itemId) {
        throw new UniqueViolationError(`Failed to create connection: item ${input.itemId} is already linked`);
      }
    }

    const timestamp = this.timestamp();
    const connection: BankConnection = {
      id: this.generateId(),
      institutionId: input.institutionId,
      itemId: input.itemId,
      accessToken: input.accessToken,
      name: input.institutionName,
      logoUrl: input.logoUrl ?? null,
      status: 'connected',
      lastSyncedAt: null,
      errorDetails: null,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.connections.set(connection.id, connection);
    return { ...connection };
  }

  async getConnection(connectionId: string): Promise<BankConnection | null> {
    const connection = this.connections.get(connectionId);
    return connection !== undefined ? { ...connection } : null;
  }

  async listConnections(): Promise<ConnectionWithAccounts[]> {
    const result: ConnectionWithAccounts[] = [];
    for (const connection of this.connections.values()) {
      result.push({ ...connection, accounts: await this.listAccounts(connection.id) });
    }
    return result;
  }

  async updateConnection(connectionId: string, updates: ConnectionUpdate): Promise<void> {
    const connection = this.connections.get(connectionId);
    if (connection === undefined) {
      return;
    }
    this.connections.set(connectionId, { ...connection, ...updates, updatedAt: this.timestamp() });
  }

  async deleteConnection(connectionId: string): Promise<void> {
    for (const account of this.accounts.values()) {
      if (account.connectionId === connectionId) {
        this.deleteAccount(account.id);
      }
    }
    this.connections.delete(connectionId);
  }

  async createAccounts(connectionId: string, accounts: TransformedAccount[]): Promise<BankAccount[]> {
    if (!this.connections.has(connectionId)) {
      throw new StoreError(`Failed to create accounts: connection ${connectionId} does not exist`, '23503');
    }

    const seen = new Set<string>();
    for (const existing of this.accounts.values()) {
      seen.add(existing.accountId);
    }
    // All-or-nothing, like a single multi-row INSERT.
    for (const account of accounts) {
      if (seen.has(account.accountId)) {
        throw new UniqueViolationError(`Failed to create accounts: account ${account.accountId} already exists`);
      }
      seen.add(account.accountId);
    }

    const timestamp = this.timestamp();
    const created = accounts.map((account): BankAccount => ({
      id: this.generateId(),
      connectionId,
      accountId: account.accountId,
      name: account.name,
      officialName: account.officialName,
      type: account.type,
      subtype: account.subtype,
      mask: account.mask,
      currency: account.currency,
      currentBalance: account.currentBalance,
      availableBalance: account.availableBalance,
      enabled: true,
      syncCursor: null,
      createdAt: timestamp,
      updatedAt: timestamp,
    }));

    for (const account of created) {
      this.accounts.set(account.id, account);
    }
    return created.map((account) => ({ ...account }));
  }

  async getAccount(accountId: string): Promise<BankAccount | null> {
    const account = this.accounts.get(accountId);
    return account !== undefined ? { ...account } : null;
  }

  async listAccounts(connectionId: string): Promise<BankAccount[]> {
    return [...this.accounts.values()]
      .filter((account) => account.connectionId === connectionId)
      .map((account) => ({ ...account }));
  }

  async updateAccount(accountId: string, updates: AccountUpdate): Promise<void> {
    const account = this.accounts.get(accountId);
    if (account === undefined) {
      return;
    }
    this.accounts.set(accountId, { ...account, ...updates, updatedAt: this.timestamp() });
  }

  async upsertTransactions(
    bankAccountId: string,
    transactions: TransformedTransaction[]
  ): Promise<UpsertTransactionsResult> {
    if (transactions.length > 0 && !this.accounts.has(bankAccountId)) {
      throw new StoreError(`Failed to upsert transactions: account ${bankAccountId} does not exist`, '23503');
    }

    const byPlaidId = this.indexByPlaidId();
    const touched = new Set<string>();
    let inserted = 0;
    let updated = 0;
    const timestamp = this.timestamp();

    for (const tx of transactions) {
      const existing = byPlaidId.get(tx.plaidTransactionId);
      const fields = {
        plaidTransactionId: tx.plaidTransactionId,
        date: tx.date,
        name: tx.name,
        description: tx.description,
        merchantName: tx.merchantName,
        amount: tx.amount,
        currency: tx.currency,
        category: tx.category,
        categoryDetailed: tx.categoryDetailed,
        method: tx.method,
        status: tx.status,
        updatedAt: timestamp,
      };

      if (existing !== undefined) {
        const next: LedgerTransaction = { ...existing, ...fields };
        this.transactions.set(existing.id, next);
        byPlaidId.set(tx.plaidTransactionId, next);
        if (!touched.has(tx.plaidTransactionId)) updated++;
      } else {
        const created: LedgerTransaction = {
          id: this.generateId(),
          bankAccountId,
          ...fields,
          createdAt: timestamp,
        };
        this.transactions.set(created.id, created);
        byPlaidId.set(tx.plaidTransactionId, created);
        inserted++;
      }
      touched.add(tx.plaidTransactionId);
    }

    return { inserted, updated };
  }

  async deleteTransactions(plaidTransactionIds: string[]): Promise<number> {
    const wanted = new Set(plaidTransactionIds);
    let deleted = 0;
    for (const [id, tx] of this.transactions) {
      if (wanted.has(tx.plaidTransactionId)) {
        this.transactions.delete(id);
        deleted++;
      }
    }
    return deleted;
  }

  async listTransactions(bankAccountId: string, limit: number): Promise<LedgerTransaction[]> {
    return [...this.transactions.values()]
      .filter((tx) => tx.bankAccountId === bankAccountId)
      .sort((a, b) => b.date.localeCompare(a.date) || b.createdAt.localeCompare(a.createdAt))
      .slice(0, limit)
      .map((tx) => ({ ...tx }));
  }

  /** Number of stored transactions across all accounts. */
  get transactionCount(): number {
    return this.transactions.size;
  }

  private deleteAccount(accountId: string): void {
    for (const [id, tx] of this.transactions) {
      if (tx.bankAccountId === accountId) {
        this.transactions.delete(id);
      }
    }
    this.accounts.delete(accountId);
  }

  private indexByPlaidId(): Map<string, LedgerTransaction> {
    const index = new Map<string, LedgerTransaction>();
    for (const tx of this.transactions.values()) {
      index.set(tx.plaidTransactionId, tx);
    }
    return index;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
