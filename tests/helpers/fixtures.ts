import { vi } from 'vitest';
import type {
  AccountBalance,
  BankDataProvider,
  PlaidAccountRecord,
  PlaidTransactionRecord,
  SyncPage,
  SyncPageRequest,
  TransformedAccount,
  TransformedTransaction,
} from '@banksync/types';
import { transformTransaction } from '@banksync/plaid-bridge';

export const createPlaidTransaction = (
  overrides: Partial<PlaidTransactionRecord> = {}
): PlaidTransactionRecord => ({
  transaction_id: 'tx-1',
  account_id: 'plaid-acc-1',
  amount: 42.5,
  iso_currency_code: 'USD',
  unofficial_currency_code: null,
  date: '2024-03-01',
  name: 'Blue Bottle Coffee',
  merchant_name: 'Blue Bottle',
  original_description: 'BLUE BOTTLE #123 OAKLAND CA',
  pending: false,
  payment_channel: 'in store',
  transaction_type: 'place',
  personal_finance_category: { primary: 'FOOD_AND_DRINK', detailed: 'FOOD_AND_DRINK_COFFEE' },
  ...overrides,
});

export const createPlaidAccount = (overrides: Partial<PlaidAccountRecord> = {}): PlaidAccountRecord => ({
  account_id: 'plaid-acc-1',
  name: 'Everyday Checking',
  official_name: 'Everyday Checking Account',
  type: 'depository',
  subtype: 'checking',
  mask: '0001',
  balances: { current: 1500.25, available: 1400, iso_currency_code: 'USD' },
  ...overrides,
});

export const createAccount = (overrides: Partial<TransformedAccount> = {}): TransformedAccount => ({
  accountId: 'plaid-acc-1',
  name: 'Everyday Checking',
  officialName: null,
  type: 'depository',
  subtype: 'checking',
  mask: '0001',
  currency: 'USD',
  currentBalance: 1500.25,
  availableBalance: 1400,
  ...overrides,
});

/** Canonical transaction built through the real transform. */
export const createTransaction = (overrides: Partial<PlaidTransactionRecord> = {}): TransformedTransaction =>
  transformTransaction(createPlaidTransaction(overrides));

export interface StreamPage {
  added?: TransformedTransaction[];
  modified?: TransformedTransaction[];
  removed?: string[];
}

/**
 * Provider stand-in with a cursor stream per account. Cursor `c-N` points
 * at page N; a cursor past the last page yields an empty page.
 */
export function createFakeProvider() {
  const streams = new Map<string, StreamPage[]>();
  const balances = new Map<string, AccountBalance>();
  const syncFailures = new Map<string, unknown>();

  const syncTransactions = vi.fn(async (request: SyncPageRequest): Promise<SyncPage> => {
    const accountId = request.accountId ?? '';
    const failure = syncFailures.get(accountId);
    if (failure !== undefined) {
      throw failure;
    }

    const pages = streams.get(accountId) ?? [];
    const index = request.cursor === undefined ? 0 : Number(request.cursor.slice(2));
    const page = pages[index];
    if (page === undefined) {
      return { added: [], modified: [], removed: [], hasMore: false, nextCursor: request.cursor ?? 'c-0' };
    }
    return {
      added: page.added ?? [],
      modified: page.modified ?? [],
      removed: page.removed ?? [],
      hasMore: index + 1 < pages.length,
      nextCursor: `c-${index + 1}`,
    };
  });

  const getAccountBalance = vi.fn(
    async (_accessToken: string, accountId: string): Promise<AccountBalance> =>
      balances.get(accountId) ?? { current: null, available: null }
  );

  const provider = {
    createLinkToken: vi.fn(),
    exchangePublicToken: vi.fn(),
    getAccounts: vi.fn(),
    getAccountBalance,
    getTransactions: vi.fn(),
    syncTransactions,
    getConnectionStatus: vi.fn(),
    removeConnection: vi.fn(async (): Promise<void> => undefined),
  } satisfies BankDataProvider;

  return { provider, streams, balances, syncFailures };
}
