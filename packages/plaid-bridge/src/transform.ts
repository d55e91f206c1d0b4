/**
 * Plaid records to canonical ledger shapes. Pure; no I/O.
 */

import {
  DEFAULT_CURRENCY,
  invertAmount,
  toAccountType,
  type PlaidAccountRecord,
  type PlaidTransactionRecord,
  type TransformedAccount,
  type TransformedTransaction,
} from '@banksync/types';
import { mapCategory, mapTransactionMethod } from './category-mapper.js';

/**
 * Convert a Plaid transaction to the canonical shape.
 * Plaid amounts are positive for money leaving the account; ours are
 * positive for money coming in.
 */
export function transformTransaction(tx: PlaidTransactionRecord): TransformedTransaction {
  const { category, categoryDetailed } = mapCategory(tx.personal_finance_category);

  return {
    plaidTransactionId: tx.transaction_id,
    accountId: tx.account_id,
    date: tx.date,
    name: tx.name,
    description: nonEmpty(tx.original_description) ?? nonEmpty(tx.merchant_name) ?? null,
    merchantName: nonEmpty(tx.merchant_name) ?? null,
    amount: invertAmount(tx.amount),
    currency: tx.iso_currency_code ?? tx.unofficial_currency_code ?? DEFAULT_CURRENCY,
    category,
    categoryDetailed,
    method: mapTransactionMethod({
      paymentChannel: tx.payment_channel,
      transactionType: tx.transaction_type,
      categoryPrimary: tx.personal_finance_category?.primary,
    }),
    status: tx.pending ? 'pending' : 'posted',
  };
}

export function transformTransactions(txs: readonly PlaidTransactionRecord[]): TransformedTransaction[] {
  return txs.map(transformTransaction);
}

export function transformAccount(account: PlaidAccountRecord): TransformedAccount {
  return {
    accountId: account.account_id,
    name: account.name,
    officialName: account.official_name ?? null,
    type: toAccountType(account.type),
    subtype: account.subtype ?? null,
    mask: account.mask ?? null,
    currency: account.balances.iso_currency_code ?? DEFAULT_CURRENCY,
    currentBalance: account.balances.current ?? null,
    availableBalance: account.balances.available ?? null,
  };
}

export function transformAccounts(accounts: readonly PlaidAccountRecord[]): TransformedAccount[] {
  return accounts.map(transformAccount);
}

function nonEmpty(value: string | null | undefined): string | undefined {
  return value !== null && value !== undefined && value.trim() !== '' ? value : undefined;
}
