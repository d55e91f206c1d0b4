/**
 * Plaid taxonomy to ledger vocabulary.
 * Maps personal_finance_category primaries to our category names and
 * payment channel / transaction type / category signals to a TransactionMethod.
 * @see https://plaid.com/documents/transactions-personal-finance-category-taxonomy.csv
 */

import type { PlaidPersonalFinanceCategory, TransactionMethod } from '@banksync/types';

const PRIMARY_CATEGORY_MAP: Record<string, string> = {
  INCOME: 'income',
  TRANSFER_IN: 'transfer',
  TRANSFER_OUT: 'transfer',
  LOAN_PAYMENTS: 'loans',
  BANK_FEES: 'fees',
  ENTERTAINMENT: 'entertainment',
  FOOD_AND_DRINK: 'food',
  GENERAL_MERCHANDISE: 'shopping',
  HOME_IMPROVEMENT: 'home',
  MEDICAL: 'health',
  PERSONAL_CARE: 'personal',
  GENERAL_SERVICES: 'services',
  GOVERNMENT_AND_NON_PROFIT: 'government',
  TRANSPORTATION: 'transport',
  TRAVEL: 'travel',
  RENT_AND_UTILITIES: 'utilities',
};

// Plaid sends "in store" with a space.
const PAYMENT_CHANNEL_MAP: Record<string, TransactionMethod> = {
  online: 'card_purchase',
  'in store': 'card_purchase',
  other: 'other',
};

const TRANSACTION_TYPE_MAP: Record<string, TransactionMethod> = {
  place: 'card_purchase',
  digital: 'card_purchase',
  special: 'other',
  unresolved: 'other',
};

const CATEGORY_METHOD_MAP: Record<string, TransactionMethod> = {
  TRANSFER_IN: 'transfer',
  TRANSFER_OUT: 'transfer',
  LOAN_PAYMENTS: 'payment',
  BANK_FEES: 'fee',
  INCOME: 'deposit',
};

export interface CategoryResult {
  category: string | null;
  categoryDetailed: string | null;
}

/**
 * Map a Plaid personal finance category. Unknown primaries pass through
 * lower-cased; a missing category maps to null on both fields.
 */
export function mapCategory(pfc: PlaidPersonalFinanceCategory | null | undefined): CategoryResult {
  if (pfc === null || pfc === undefined || pfc.primary === '') {
    return { category: null, categoryDetailed: null };
  }

  const category = PRIMARY_CATEGORY_MAP[pfc.primary] ?? pfc.primary.toLowerCase();
  const detailed = pfc.detailed === '' ? null : pfc.detailed;

  return { category, categoryDetailed: detailed };
}

export interface MethodSignals {
  paymentChannel?: string | null | undefined;
  transactionType?: string | null | undefined;
  categoryPrimary?: string | null | undefined;
}

/**
 * Classify how money moved. Priority: payment channel, then transaction
 * type, then category. The first signal with a mapping decides, `other`
 * included.
 */
export function mapTransactionMethod(signals: MethodSignals): TransactionMethod {
  const channel = lookup(PAYMENT_CHANNEL_MAP, signals.paymentChannel?.toLowerCase());
  if (channel !== undefined) return channel;

  const type = lookup(TRANSACTION_TYPE_MAP, signals.transactionType?.toLowerCase());
  if (type !== undefined) return type;

  const fromCategory = lookup(CATEGORY_METHOD_MAP, signals.categoryPrimary ?? undefined);
  if (fromCategory !== undefined) return fromCategory;

  return 'other';
}

function lookup(map: Record<string, TransactionMethod>, key: string | undefined): TransactionMethod | undefined {
  if (key === undefined) return undefined;
  return Object.prototype.hasOwnProperty.call(map, key) ? map[key] : undefined;
}
