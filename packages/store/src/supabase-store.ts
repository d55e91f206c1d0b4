/**
 * LedgerStore backed by Supabase (PostgREST over Postgres).
 * Access tokens are encrypted before they are written and decrypted on read.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
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
import type { CredentialCipher } from './cipher.js';
import { toStoreError } from './errors.js';
import {
  AccountRowSchema,
  ConnectionRowSchema,
  ConnectionWithAccountsRowSchema,
  TransactionRowSchema,
  rowToAccount,
  rowToConnection,
  rowToTransaction,
  type ConnectionRow,
} from './rows.js';

/** Only the table API is used. */
export type SupabaseTableClient = Pick<SupabaseClient, 'from'>;

export interface SupabaseLedgerStoreOptions {
  client: SupabaseTableClient;
  cipher: CredentialCipher;
  now?: () => Date;
}

const TABLES = {
  connections: 'bank_connections',
  accounts: 'bank_accounts',
  transactions: 'transactions',
} as const;

const ExistingTransactionSchema = z.object({
  plaid_transaction_id: z.string(),
  bank_account_id: z.string(),
});

export class SupabaseLedgerStore implements LedgerStore {
  private readonly client: SupabaseTableClient;
  private readonly cipher: CredentialCipher;
  private readonly now: () => Date;

  constructor(options: SupabaseLedgerStoreOptions) {
    this.client = options.client;
    this.cipher = options.cipher;
    this.now = options.now ?? ((): Date => new Date());
  }

  async createConnection(input: NewConnection): Promise<BankConnection> {
    const { data, error } = await this.client
      .from(TABLES.connections)
      .insert({
        institution_id: input.institutionId,
        item_id: input.itemId,
        access_token: this.cipher.encrypt(input.accessToken),
        name: input.institutionName,
        logo_url: input.logoUrl ?? null,
        status: 'connected',
      })
      .select('*')
      .single();

    if (error !== null) {
      throw toStoreError(error, 'create connection');
    }

    return this.toConnection(ConnectionRowSchema.parse(data));
  }

  async getConnection(connectionId: string): Promise<BankConnection | null> {
    const { data, error } = await this.client
      .from(TABLES.connections)
      .select('*')
      .eq('id', connectionId)
      .maybeSingle();

    if (error !== null) {
      throw toStoreError(error, 'get connection');
    }
    if (data === null) {
      return null;
    }

    return this.toConnection(ConnectionRowSchema.parse(data));
  }

  async listConnections(): Promise<ConnectionWithAccounts[]> {
    const { data, error } = await this.client
      .from(TABLES.connections)
      .select(`*, ${TABLES.accounts}(*)`)
      .order('created_at', { ascending: true });

    if (error !== null) {
      throw toStoreError(error, 'list connections');
    }

    return z
      .array(ConnectionWithAccountsRowSchema)
      .parse(data ?? [])
      .map((row) => {
        const { bank_accounts: accounts, ...connection } = row;
        return {
          ...this.toConnection(connection),
          accounts: (accounts ?? []).map(rowToAccount).sort((a, b) => a.createdAt.localeCompare(b.createdAt)),
        };
      });
  }

  async updateConnection(connectionId: string, updates: ConnectionUpdate): Promise<void> {
    const patch: Record<string, unknown> = { updated_at: this.now().toISOString() };
    if (updates.accessToken !== undefined) patch['access_token'] = this.cipher.encrypt(updates.accessToken);
    if (updates.name !== undefined) patch['name'] = updates.name;
    if (updates.logoUrl !== undefined) patch['logo_url'] = updates.logoUrl;
    if (updates.status !== undefined) patch['status'] = updates.status;
    if (updates.lastSyncedAt !== undefined) patch['last_synced_at'] = updates.lastSyncedAt;
    if (updates.errorDetails !== undefined) patch['error_details'] = updates.errorDetails;

    const { error } = await this.client.from(TABLES.connections).update(patch).eq('id', connectionId);

    if (error !== null) {
      throw toStoreError(error, 'update connection');
    }
  }

  async deleteConnection(connectionId: string): Promise<void> {
    const { error } = await this.client.from(TABLES.connections).delete().eq('id', connectionId);

    if (error !== null) {
      throw toStoreError(error, 'delete connection');
    }
  }

  async createAccounts(connectionId: string, accounts: TransformedAccount[]): Promise<BankAccount[]> {
    if (accounts.length === 0) {
      return [];
    }

    const rows = accounts.map((account) => ({
      bank_connection_id: connectionId,
      account_id: account.accountId,
      name: account.name,
      official_name: account.officialName,
      type: account.type,
      subtype: account.subtype,
      mask: account.mask,
      currency: account.currency,
      current_balance: account.currentBalance,
      available_balance: account.availableBalance,
    }));

    const { data, error } = await this.client.from(TABLES.accounts).insert(rows).select('*');

    if (error !== null) {
      throw toStoreError(error, 'create accounts');
    }

    return z.array(AccountRowSchema).parse(data ?? []).map(rowToAccount);
  }

  async getAccount(accountId: string): Promise<BankAccount | null> {
    const { data, error } = await this.client
      .from(TABLES.accounts)
      .select('*')
      .eq('id', accountId)
      .maybeSingle();

    if (error !== null) {
      throw toStoreError(error, 'get account');
    }

    return data === null ? null : rowToAccount(AccountRowSchema.parse(data));
  }

  async listAccounts(connectionId: string): Promise<BankAccount[]> {
    const { data, error } = await this.client
      .from(TABLES.accounts)
      .select('*')
      .eq('bank_connection_id', connectionId)
      .order('created_at', { ascending: true });

    if (error !== null) {
      throw toStoreError(error, 'list accounts');
    }

    return z.array(AccountRowSchema).parse(data ?? []).map(rowToAccount);
  }

  async updateAccount(accountId: string, updates: AccountUpdate): Promise<void> {
    const patch: Record<string, unknown> = { updated_at: this.now().toISOString() };
    if (updates.currentBalance !== undefined) patch['current_balance'] = updates.currentBalance;
    if (updates.availableBalance !== undefined) patch['available_balance'] = updates.availableBalance;
    if (updates.enabled !== undefined) patch['enabled'] = updates.enabled;
    if (updates.syncCursor !== undefined) patch['sync_cursor'] = updates.syncCursor;
    if (updates.name !== undefined) patch['name'] = updates.name;
    if (updates.officialName !== undefined) patch['official_name'] = updates.officialName;

    const { error } = await this.client.from(TABLES.accounts).update(patch).eq('id', accountId);

    if (error !== null) {
      throw toStoreError(error, 'update account');
    }
  }

  /**
   * Insert-or-update on `plaid_transaction_id`. Existing rows are looked up
   * first so they keep their owning account and so the result can tell
   * inserts from updates.
   */
  async upsertTransactions(
    bankAccountId: string,
    transactions: TransformedTransaction[]
  ): Promise<UpsertTransactionsResult> {
    if (transactions.length === 0) {
      return { inserted: 0, updated: 0 };
    }

    // Postgres rejects an upsert that touches the same key twice.
    const byId = new Map<string, TransformedTransaction>();
    for (const tx of transactions) {
      byId.set(tx.plaidTransactionId, tx);
    }
    const ids = [...byId.keys()];

    const { data: existingData, error: selectError } = await this.client
      .from(TABLES.transactions)
      .select('plaid_transaction_id, bank_account_id')
      .in('plaid_transaction_id', ids);

    if (selectError !== null) {
      throw toStoreError(selectError, 'check existing transactions');
    }

    const owners = new Map<string, string>();
    for (const row of z.array(ExistingTransactionSchema).parse(existingData ?? [])) {
      owners.set(row.plaid_transaction_id, row.bank_account_id);
    }

    const timestamp = this.now().toISOString();
    const rows = [...byId.values()].map((tx) => ({
      bank_account_id: owners.get(tx.plaidTransactionId) ?? bankAccountId,
      plaid_transaction_id: tx.plaidTransactionId,
      date: tx.date,
      name: tx.name,
      description: tx.description,
      merchant_name: tx.merchantName,
      amount: tx.amount,
      currency: tx.currency,
      category: tx.category,
      category_detailed: tx.categoryDetailed,
      method: tx.method,
      status: tx.status,
      updated_at: timestamp,
    }));

    const { error } = await this.client
      .from(TABLES.transactions)
      .upsert(rows, { onConflict: 'plaid_transaction_id' });

    if (error !== null) {
      throw toStoreError(error, 'upsert transactions');
    }

    const updated = ids.filter((id) => owners.has(id)).length;
    return { inserted: ids.length - updated, updated };
  }

  async deleteTransactions(plaidTransactionIds: string[]): Promise<number> {
    if (plaidTransactionIds.length === 0) {
      return 0;
    }

    const { count, error } = await this.client
      .from(TABLES.transactions)
      .delete({ count: 'exact' })
      .in('plaid_transaction_id', plaidTransactionIds);

    if (error !== null) {
      throw toStoreError(error, 'delete transactions');
    }

    return count ?? 0;
  }

  async listTransactions(bankAccountId: string, limit: number): Promise<LedgerTransaction[]> {
    const { data, error } = await this.client
      .from(TABLES.transactions)
      .select('*')
      .eq('bank_account_id', bankAccountId)
      .order('date', { ascending: false })
      .order('created_at', { ascending: false })
      .limit(limit);

    if (error !== null) {
      throw toStoreError(error, 'list transactions');
    }

    return z.array(TransactionRowSchema).parse(data ?? []).map(rowToTransaction);
  }

  private toConnection(row: ConnectionRow): BankConnection {
    return rowToConnection(row, this.cipher.decrypt(row.access_token));
  }
}
