import { z } from 'zod';

export const ConnectionStatusSchema = z.enum(['connected', 'disconnected']);
export type ConnectionStatus = z.infer<typeof ConnectionStatusSchema>;

export const AccountTypeSchema = z.enum(['depository', 'credit', 'loan', 'investment', 'other']);
export type AccountType = z.infer<typeof AccountTypeSchema>;

/**
 * Narrow a provider account type string to the closed enum.
 * Anything outside the five known values becomes `other`.
 */
export function toAccountType(value: string): AccountType {
  const parsed = AccountTypeSchema.safeParse(value.toLowerCase().trim());
  return parsed.success ? parsed.data : 'other';
}

export const TransactionStatusSchema = z.enum(['pending', 'posted']);
export type TransactionStatus = z.infer<typeof TransactionStatusSchema>;

export const TransactionMethodSchema = z.enum([
  'payment',
  'card_purchase',
  'card_payment',
  'transfer',
  'ach',
  'wire',
  'atm',
  'fee',
  'interest',
  'deposit',
  'withdrawal',
  'other',
]);
export type TransactionMethod = z.infer<typeof TransactionMethodSchema>;

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format');

/**
 * A linked institution session. `accessToken` is the long-lived Plaid
 * credential and only ever leaves the store in decrypted form for provider calls.
 */
export const BankConnectionSchema = z.object({
  id: z.string(),
  institutionId: z.string(),
  itemId: z.string(),
  accessToken: z.string(),
  name: z.string(),
  logoUrl: z.string().nullable(),
  status: ConnectionStatusSchema,
  lastSyncedAt: z.string().nullable(),
  errorDetails: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});
export type BankConnection = z.infer<typeof BankConnectionSchema>;

export const BankAccountSchema = z.object({
  id: z.string(),
  connectionId: z.string(),
  accountId: z.string(),
  name: z.string(),
  officialName: z.string().nullable(),
  type: AccountTypeSchema,
  subtype: z.string().nullable(),
  mask: z.string().nullable(),
  currency: z.string(),
  currentBalance: z.number().nullable(),
  availableBalance: z.number().nullable(),
  enabled: z.boolean(),
  syncCursor: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});
export type BankAccount = z.infer<typeof BankAccountSchema>;

export const LedgerTransactionSchema = z.object({
  id: z.string(),
  bankAccountId: z.string(),
  plaidTransactionId: z.string(),
  date: isoDate,
  name: z.string(),
  description: z.string().nullable(),
  merchantName: z.string().nullable(),
  amount: z.number(),
  currency: z.string(),
  category: z.string().nullable(),
  categoryDetailed: z.string().nullable(),
  method: TransactionMethodSchema,
  status: TransactionStatusSchema,
  createdAt: z.string(),
  updatedAt: z.string(),
});
export type LedgerTransaction = z.infer<typeof LedgerTransactionSchema>;

/**
 * Transaction in canonical shape as produced by the transform layer,
 * before it is bound to a stored account.
 */
export interface TransformedTransaction {
  plaidTransactionId: string;
  accountId: string;
  date: string;
  name: string;
  description: string | null;
  merchantName: string | null;
  /** positive = inflow, negative = outflow */
  amount: number;
  currency: string;
  category: string | null;
  categoryDetailed: string | null;
  method: TransactionMethod;
  status: TransactionStatus;
}

export interface TransformedAccount {
  accountId: string;
  name: string;
  officialName: string | null;
  type: AccountType;
  subtype: string | null;
  mask: string | null;
  currency: string;
  currentBalance: number | null;
  availableBalance: number | null;
}

export interface NewConnection {
  accessToken: string;
  itemId: string;
  institutionId: string;
  institutionName: string;
  logoUrl?: string | null;
}

export type NewAccount = Omit<TransformedAccount, 'type'> & { type: string };

export type ConnectionUpdate = Partial<
  Pick<BankConnection, 'accessToken' | 'name' | 'logoUrl' | 'status' | 'lastSyncedAt' | 'errorDetails'>
>;

export type AccountUpdate = Partial<
  Pick<BankAccount, 'currentBalance' | 'availableBalance' | 'enabled' | 'syncCursor' | 'name' | 'officialName'>
>;

export interface ConnectionWithAccounts extends BankConnection {
  accounts: BankAccount[];
}

/** Connection as shown outside the engine: the credential never leaves. */
export type PublicConnection = Omit<BankConnection, 'accessToken'> & { accounts: BankAccount[] };
