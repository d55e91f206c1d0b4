/**
 * Row shapes of the ledger tables and their mapping to the domain model.
 * Postgres `numeric` columns may arrive as strings, so balances and amounts
 * go through toNullableNumber.
 */

import { z } from 'zod';
import {
  AccountTypeSchema,
  ConnectionStatusSchema,
  TransactionMethodSchema,
  TransactionStatusSchema,
  toNullableNumber,
  type BankAccount,
  type BankConnection,
  type LedgerTransaction,
} from '@banksync/types';

const numeric = z.union([z.number(), z.string()]);

export const ConnectionRowSchema = z.object({
  id: z.string(),
  institution_id: z.string(),
  item_id: z.string(),
  access_token: z.string(),
  name: z.string(),
  logo_url: z.string().nullable(),
  status: ConnectionStatusSchema,
  last_synced_at: z.string().nullable(),
  error_details: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});
export type ConnectionRow = z.infer<typeof ConnectionRowSchema>;

export const AccountRowSchema = z.object({
  id: z.string(),
  bank_connection_id: z.string(),
  account_id: z.string(),
  name: z.string(),
  official_name: z.string().nullable(),
  type: AccountTypeSchema,
  subtype: z.string().nullable(),
  mask: z.string().nullable(),
  currency: z.string(),
  current_balance: numeric.nullable(),
  available_balance: numeric.nullable(),
  enabled: z.boolean(),
  sync_cursor: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});
export type AccountRow = z.infer<typeof AccountRowSchema>;

export const ConnectionWithAccountsRowSchema = ConnectionRowSchema.extend({
  bank_accounts: z.array(AccountRowSchema).nullable().default([]),
});

export const TransactionRowSchema = z.object({
  id: z.string(),
  bank_account_id: z.string(),
  plaid_transaction_id: z.string(),
  date: z.string(),
  name: z.string(),
  description: z.string().nullable(),
  merchant_name: z.string().nullable(),
  amount: numeric,
  currency: z.string(),
  category: z.string().nullable(),
  category_detailed: z.string().nullable(),
  method: TransactionMethodSchema,
  status: TransactionStatusSchema,
  created_at: z.string(),
  updated_at: z.string(),
});
export type TransactionRow = z.infer<typeof TransactionRowSchema>;

export function rowToConnection(row: ConnectionRow, accessToken: string): BankConnection {
  return {
    id: row.id,
    institutionId: row.institution_id,
    itemId: row.item_id,
    accessToken,
    name: row.name,
    logoUrl: row.logo_url,
    status: row.status,
    lastSyncedAt: row.last_synced_at,
    errorDetails: row.error_details,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function rowToAccount(row: AccountRow): BankAccount {
  return {
    id: row.id,
    connectionId: row.bank_connection_id,
    accountId: row.account_id,
    name: row.name,
    officialName: row.official_name,
    type: row.type,
    subtype: row.subtype,
    mask: row.mask,
    currency: row.currency,
    currentBalance: toNullableNumber(row.current_balance),
    availableBalance: toNullableNumber(row.available_balance),
    enabled: row.enabled,
    syncCursor: row.sync_cursor,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function rowToTransaction(row: TransactionRow): LedgerTransaction {
  return {
    id: row.id,
    bankAccountId: row.bank_account_id,
    plaidTransactionId: row.plaid_transaction_id,
    date: row.date,
    name: row.name,
    description: row.description,
    merchantName: row.merchant_name,
    amount: toNullableNumber(row.amount) ?? 0,
    currency: row.currency,
    category: row.category,
    categoryDetailed: row.category_detailed,
    method: row.method,
    status: row.status,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
