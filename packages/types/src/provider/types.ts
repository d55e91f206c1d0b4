/**
 * Provider-facing types. Record shapes mirror the Plaid wire format
 * (snake_case) but stay independent of the SDK so the transform layer
 * and its tests don't need the `plaid` package.
 */

import type { TransformedAccount, TransformedTransaction } from '../schemas/ledger.js';

export type PlaidEnvironment = 'sandbox' | 'production';

export interface PlaidPersonalFinanceCategory {
  primary: string;
  detailed: string;
  confidence_level?: string | null;
}

export interface PlaidTransactionRecord {
  transaction_id: string;
  account_id: string;
  amount: number;
  iso_currency_code?: string | null;
  unofficial_currency_code?: string | null;
  date: string;
  name: string;
  merchant_name?: string | null;
  original_description?: string | null;
  pending: boolean;
  payment_channel?: string | null;
  transaction_type?: string | null;
  personal_finance_category?: PlaidPersonalFinanceCategory | null;
}

export interface PlaidAccountRecord {
  account_id: string;
  name: string;
  official_name?: string | null;
  type: string;
  subtype?: string | null;
  mask?: string | null;
  balances: {
    current?: number | null;
    available?: number | null;
    iso_currency_code?: string | null;
  };
}

export interface LinkTokenRequest {
  userId: string;
  /** Present for update mode (re-authentication of an existing item). */
  accessToken?: string | undefined;
}

export interface LinkTokenResult {
  linkToken: string;
  expiration: string;
}

export interface TokenExchangeResult {
  accessToken: string;
  itemId: string;
}

export interface Institution {
  institutionId: string;
  name: string;
  logoUrl: string | null;
}

export interface AccountsResult {
  accounts: TransformedAccount[];
  institution: Institution;
}

export interface AccountBalance {
  current: number | null;
  available: number | null;
}

export interface TransactionsQuery {
  accessToken: string;
  accountId?: string | undefined;
  startDate?: string | undefined;
  endDate?: string | undefined;
  /** Narrow the window to the last few days for a quick refresh. */
  latest?: boolean | undefined;
  /** Drop entries that have not settled yet. */
  postedOnly?: boolean | undefined;
}

export interface TransactionsResult {
  transactions: TransformedTransaction[];
  hasMore: boolean;
}

export interface SyncPageRequest {
  accessToken: string;
  cursor?: string | undefined;
  /** Scope the incremental stream (and its cursor) to one account. */
  accountId?: string | undefined;
}

export interface SyncPage {
  added: TransformedTransaction[];
  modified: TransformedTransaction[];
  /** Provider transaction ids reported as removed. */
  removed: string[];
  hasMore: boolean;
  nextCursor: string;
}

export interface ConnectionHealth {
  connected: boolean;
  error?: string;
  errorCode?: string;
  lastRefresh?: string;
}

/**
 * Everything the engine needs from a banking-aggregation API.
 * `PlaidProvider` is the production implementation.
 */
export interface BankDataProvider {
  createLinkToken(request: LinkTokenRequest): Promise<LinkTokenResult>;
  exchangePublicToken(publicToken: string): Promise<TokenExchangeResult>;
  getAccounts(accessToken: string): Promise<AccountsResult>;
  getAccountBalance(accessToken: string, accountId: string): Promise<AccountBalance>;
  getTransactions(query: TransactionsQuery): Promise<TransactionsResult>;
  syncTransactions(request: SyncPageRequest): Promise<SyncPage>;
  /** Never throws; provider-reported item errors come back as `connected: false`. */
  getConnectionStatus(accessToken: string): Promise<ConnectionHealth>;
  /** Revokes the credential upstream. Call before deleting the local row. */
  removeConnection(accessToken: string): Promise<void>;
}
