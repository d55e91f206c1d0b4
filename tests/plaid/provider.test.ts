import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PlaidProvider, ProviderError, type PlaidConfig } from '@banksync/plaid-bridge';
import { createPlaidAccount, createPlaidTransaction } from '../helpers/fixtures.js';

const config: PlaidConfig = {
  clientId: 'test-client-id',
  secret: 'test-secret',
  env: 'sandbox',
  clientName: 'banksync',
};

const NOW = new Date('2024-06-15T12:00:00Z');

function createTransport() {
  return {
    linkTokenCreate: vi.fn(),
    itemPublicTokenExchange: vi.fn(),
    accountsGet: vi.fn(),
    institutionsGetById: vi.fn(),
    transactionsGet: vi.fn(),
    transactionsSync: vi.fn(),
    itemGet: vi.fn(),
    itemRemove: vi.fn(),
  };
}

describe('PlaidProvider', () => {
  let transport: ReturnType<typeof createTransport>;
  let provider: PlaidProvider;

  beforeEach(() => {
    transport = createTransport();
    provider = new PlaidProvider({ config, client: transport, now: () => NOW });
  });

  describe('createLinkToken', () => {
    beforeEach(() => {
      transport.linkTokenCreate.mockResolvedValue({
        data: { link_token: 'link-sandbox-abc', expiration: '2024-06-15T16:00:00Z' },
      });
    });

    it('should request the transactions product with two years of history', async () => {
      const result = await provider.createLinkToken({ userId: 'user-1' });

      expect(result).toEqual({ linkToken: 'link-sandbox-abc', expiration: '2024-06-15T16:00:00Z' });
      expect(transport.linkTokenCreate).toHaveBeenCalledWith({
        client_name: 'banksync',
        language: 'en',
        country_codes: ['US'],
        user: { client_user_id: 'user-1' },
        products: ['transactions'],
        transactions: { days_requested: 730 },
      });
    });

    it('should pass the access token and no products in update mode', async () => {
      await provider.createLinkToken({ userId: 'user-1', accessToken: 'access-sandbox-1' });

      expect(transport.linkTokenCreate).toHaveBeenCalledWith({
        client_name: 'banksync',
        language: 'en',
        country_codes: ['US'],
        user: { client_user_id: 'user-1' },
        access_token: 'access-sandbox-1',
      });
    });

    it('should include the webhook and redirect when configured', async () => {
      const configured = new PlaidProvider({
        config: { ...config, webhookUrl: 'https://example.test/hook', redirectUri: 'https://example.test/oauth' },
        client: transport,
      });

      await configured.createLinkToken({ userId: 'user-1' });

      expect(transport.linkTokenCreate).toHaveBeenCalledWith(
        expect.objectContaining({
          webhook: 'https://example.test/hook',
          redirect_uri: 'https://example.test/oauth',
        })
      );
    });

    it('should normalize SDK failures', async () => {
      transport.linkTokenCreate.mockRejectedValue({
        response: {
          status: 400,
          data: { error_code: 'INVALID_FIELD', error_message: 'client_name must be set', error_type: 'INVALID_REQUEST' },
        },
      });

      await expect(provider.createLinkToken({ userId: 'user-1' })).rejects.toMatchObject({
        name: 'ProviderError',
        message: 'client_name must be set',
        code: 'INVALID_FIELD',
        status: 400,
      });
    });
  });

  describe('exchangePublicToken', () => {
    it('should return the access token and item id', async () => {
      transport.itemPublicTokenExchange.mockResolvedValue({
        data: { access_token: 'access-sandbox-xyz', item_id: 'item-1' },
      });

      await expect(provider.exchangePublicToken('public-sandbox-xyz')).resolves.toEqual({
        accessToken: 'access-sandbox-xyz',
        itemId: 'item-1',
      });
      expect(transport.itemPublicTokenExchange).toHaveBeenCalledWith({ public_token: 'public-sandbox-xyz' });
    });
  });

  describe('getAccounts', () => {
    it('should return accounts with the institution', async () => {
      transport.accountsGet.mockResolvedValue({
        data: { accounts: [createPlaidAccount()], item: { institution_id: 'ins_1' } },
      });
      transport.institutionsGetById.mockResolvedValue({
        data: { institution: { name: 'First Test Bank', logo: 'bG9nbw==' } },
      });

      const result = await provider.getAccounts('access-sandbox-1');

      expect(result.institution).toEqual({ institutionId: 'ins_1', name: 'First Test Bank', logoUrl: 'bG9nbw==' });
      expect(result.accounts).toEqual([
        {
          accountId: 'plaid-acc-1',
          name: 'Everyday Checking',
          officialName: 'Everyday Checking Account',
          type: 'depository',
          subtype: 'checking',
          mask: '0001',
          currency: 'USD',
          currentBalance: 1500.25,
          availableBalance: 1400,
        },
      ]);
    });

    it('should fall back to a placeholder institution when the lookup fails', async () => {
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const withLogger = new PlaidProvider({ config, client: transport, logger });
      transport.accountsGet.mockResolvedValue({
        data: { accounts: [], item: { institution_id: 'ins_1' } },
      });
      transport.institutionsGetById.mockRejectedValue(new Error('timeout'));

      const result = await withLogger.getAccounts('access-sandbox-1');

      expect(result.institution).toEqual({ institutionId: 'ins_1', name: 'Unknown Institution', logoUrl: null });
      expect(logger.warn).toHaveBeenCalledWith('Could not fetch institution details', {
        institutionId: 'ins_1',
        error: 'Plaid institutionsGetById failed: timeout',
      });
    });

    it('should not look up an institution the item does not have', async () => {
      transport.accountsGet.mockResolvedValue({
        data: { accounts: [], item: { institution_id: null } },
      });

      const result = await provider.getAccounts('access-sandbox-1');

      expect(result.institution.institutionId).toBe('unknown');
      expect(transport.institutionsGetById).not.toHaveBeenCalled();
    });
  });

  describe('getAccountBalance', () => {
    it('should return the balances of the requested account', async () => {
      transport.accountsGet.mockResolvedValue({
        data: { accounts: [createPlaidAccount({ balances: { current: 10.5, available: null } })] },
      });

      await expect(provider.getAccountBalance('access-sandbox-1', 'plaid-acc-1')).resolves.toEqual({
        current: 10.5,
        available: null,
      });
      expect(transport.accountsGet).toHaveBeenCalledWith({
        access_token: 'access-sandbox-1',
        options: { account_ids: ['plaid-acc-1'] },
      });
    });

    it('should throw when the account is missing', async () => {
      transport.accountsGet.mockResolvedValue({ data: { accounts: [] } });

      const promise = provider.getAccountBalance('access-sandbox-1', 'plaid-acc-9');

      await expect(promise).rejects.toBeInstanceOf(ProviderError);
      await expect(promise).rejects.toMatchObject({
        message: 'Account plaid-acc-9 not found',
        code: 'ACCOUNT_NOT_FOUND',
      });
    });
  });

  describe('getTransactions', () => {
    beforeEach(() => {
      transport.transactionsGet.mockResolvedValue({
        data: {
          transactions: [
            createPlaidTransaction({ transaction_id: 'tx-1' }),
            createPlaidTransaction({ transaction_id: 'tx-2', pending: true }),
          ],
          total_transactions: 3,
        },
      });
    });

    it('should default to the last 90 days', async () => {
      const result = await provider.getTransactions({ accessToken: 'access-sandbox-1' });

      expect(transport.transactionsGet).toHaveBeenCalledWith({
        access_token: 'access-sandbox-1',
        start_date: '2024-03-17',
        end_date: '2024-06-15',
        options: { include_personal_finance_category: true, include_original_description: true },
      });
      expect(result.transactions.map((t) => t.plaidTransactionId)).toEqual(['tx-1', 'tx-2']);
      expect(result.hasMore).toBe(true);
    });

    it('should narrow the window for latest and filter to one account', async () => {
      await provider.getTransactions({ accessToken: 'access-sandbox-1', accountId: 'plaid-acc-1', latest: true });

      expect(transport.transactionsGet).toHaveBeenCalledWith({
        access_token: 'access-sandbox-1',
        start_date: '2024-06-10',
        end_date: '2024-06-15',
        options: {
          account_ids: ['plaid-acc-1'],
          include_personal_finance_category: true,
          include_original_description: true,
        },
      });
    });

    it('should drop pending entries when postedOnly is set', async () => {
      const result = await provider.getTransactions({
        accessToken: 'access-sandbox-1',
        startDate: '2024-01-01',
        endDate: '2024-01-31',
        postedOnly: true,
      });

      expect(result.transactions.map((t) => t.plaidTransactionId)).toEqual(['tx-1']);
      expect(transport.transactionsGet).toHaveBeenCalledWith(
        expect.objectContaining({ start_date: '2024-01-01', end_date: '2024-01-31' })
      );
    });
  });

  describe('syncTransactions', () => {
    it('should return one transformed page', async () => {
      transport.transactionsSync.mockResolvedValue({
        data: {
          added: [createPlaidTransaction({ transaction_id: 'tx-1', amount: 10 })],
          modified: [],
          removed: [{ transaction_id: 'tx-old' }],
          has_more: false,
          next_cursor: 'cursor-2',
        },
      });

      const page = await provider.syncTransactions({
        accessToken: 'access-sandbox-1',
        cursor: 'cursor-1',
        accountId: 'plaid-acc-1',
      });

      expect(transport.transactionsSync).toHaveBeenCalledWith({
        access_token: 'access-sandbox-1',
        cursor: 'cursor-1',
        options: {
          include_personal_finance_category: true,
          include_original_description: true,
          account_id: 'plaid-acc-1',
        },
      });
      expect(page.added[0]?.amount).toBe(-10);
      expect(page.removed).toEqual(['tx-old']);
      expect(page.hasMore).toBe(false);
      expect(page.nextCursor).toBe('cursor-2');
    });

    it('should omit an empty cursor', async () => {
      transport.transactionsSync.mockResolvedValue({
        data: { added: [], modified: [], removed: [], has_more: false, next_cursor: 'cursor-1' },
      });

      await provider.syncTransactions({ accessToken: 'access-sandbox-1', cursor: '' });

      expect(transport.transactionsSync).toHaveBeenCalledWith({
        access_token: 'access-sandbox-1',
        options: { include_personal_finance_category: true, include_original_description: true },
      });
    });
  });

  describe('getConnectionStatus', () => {
    it('should report a healthy item with its last refresh', async () => {
      transport.itemGet.mockResolvedValue({
        data: {
          item: { error: null },
          status: { transactions: { last_successful_update: '2024-06-15T10:00:00Z' } },
        },
      });

      await expect(provider.getConnectionStatus('access-sandbox-1')).resolves.toEqual({
        connected: true,
        lastRefresh: '2024-06-15T10:00:00Z',
      });
    });

    it('should report the item error', async () => {
      transport.itemGet.mockResolvedValue({
        data: {
          item: { error: { error_code: 'ITEM_LOGIN_REQUIRED', error_message: 'login required' } },
        },
      });

      await expect(provider.getConnectionStatus('access-sandbox-1')).resolves.toEqual({
        connected: false,
        error: 'login required',
        errorCode: 'ITEM_LOGIN_REQUIRED',
      });
    });

    it('should not throw when the call fails', async () => {
      transport.itemGet.mockRejectedValue({
        response: {
          status: 400,
          data: { error_code: 'INVALID_ACCESS_TOKEN', error_message: 'provided access token is invalid' },
        },
      });

      await expect(provider.getConnectionStatus('access-sandbox-1')).resolves.toEqual({
        connected: false,
        error: 'provided access token is invalid',
        errorCode: 'INVALID_ACCESS_TOKEN',
      });
    });
  });

  describe('removeConnection', () => {
    it('should revoke the item', async () => {
      transport.itemRemove.mockResolvedValue({ data: { request_id: 'req-1' } });

      await provider.removeConnection('access-sandbox-1');

      expect(transport.itemRemove).toHaveBeenCalledWith({ access_token: 'access-sandbox-1' });
    });

    it('should reject with a provider error', async () => {
      transport.itemRemove.mockRejectedValue(new Error('network down'));

      await expect(provider.removeConnection('access-sandbox-1')).rejects.toThrow(
        'Plaid itemRemove failed: network down'
      );
    });
  });
});
