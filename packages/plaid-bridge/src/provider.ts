/**
 * Plaid implementation of BankDataProvider.
 */

import { CountryCode, Products, type LinkTokenCreateRequest } from 'plaid';
import {
  TRANSACTION_WINDOWS,
  UNKNOWN_INSTITUTION_ID,
  UNKNOWN_INSTITUTION_NAME,
  daysAgo,
  silentLogger,
  toISODate,
  type AccountBalance,
  type AccountsResult,
  type BankDataProvider,
  type ConnectionHealth,
  type LinkTokenRequest,
  type LinkTokenResult,
  type Logger,
  type SyncPage,
  type SyncPageRequest,
  type TokenExchangeResult,
  type TransactionsQuery,
  type TransactionsResult,
} from '@banksync/types';
import { createPlaidClient } from './client.js';
import { ProviderError, toProviderError } from './errors.js';
import { transformAccounts, transformTransactions } from './transform.js';
import type { PlaidConfig, PlaidTransport } from './types.js';

export interface PlaidProviderOptions {
  config: PlaidConfig;
  /** Pre-built API client; built from `config` when omitted. */
  client?: PlaidTransport;
  logger?: Logger;
  /** Clock for the default transaction windows. */
  now?: () => Date;
}

export class PlaidProvider implements BankDataProvider {
  private readonly client: PlaidTransport;
  private readonly config: PlaidConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: PlaidProviderOptions) {
    this.config = options.config;
    this.client = options.client ?? createPlaidClient(options.config);
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? ((): Date => new Date());
  }

  async createLinkToken(request: LinkTokenRequest): Promise<LinkTokenResult> {
    const body: LinkTokenCreateRequest = {
      client_name: this.config.clientName,
      language: 'en',
      country_codes: [CountryCode.Us],
      user: { client_user_id: request.userId },
      ...(this.config.webhookUrl !== undefined ? { webhook: this.config.webhookUrl } : {}),
      ...(this.config.redirectUri !== undefined ? { redirect_uri: this.config.redirectUri } : {}),
    };

    if (request.accessToken !== undefined && request.accessToken !== '') {
      // Update mode: Link re-authenticates the existing item, no products.
      body.access_token = request.accessToken;
    } else {
      body.products = [Products.Transactions];
      body.transactions = { days_requested: TRANSACTION_WINDOWS.LINK_HISTORY_DAYS };
    }

    const response = await this.call('linkTokenCreate', () => this.client.linkTokenCreate(body));
    return {
      linkToken: response.data.link_token,
      expiration: response.data.expiration,
    };
  }

  async exchangePublicToken(publicToken: string): Promise<TokenExchangeResult> {
    const response = await this.call('itemPublicTokenExchange', () =>
      this.client.itemPublicTokenExchange({ public_token: publicToken })
    );
    return {
      accessToken: response.data.access_token,
      itemId: response.data.item_id,
    };
  }

  /**
   * Accounts for an item plus its institution. A failed institution lookup
   * falls back to a placeholder rather than failing the call.
   */
  async getAccounts(accessToken: string): Promise<AccountsResult> {
    const accountsResponse = await this.call('accountsGet', () =>
      this.client.accountsGet({ access_token: accessToken })
    );

    const institutionId = accountsResponse.data.item.institution_id ?? null;
    let institutionName = UNKNOWN_INSTITUTION_NAME;
    let logoUrl: string | null = null;

    if (institutionId !== null && institutionId !== '') {
      try {
        const institutionResponse = await this.client.institutionsGetById({
          institution_id: institutionId,
          country_codes: [CountryCode.Us],
          options: { include_optional_metadata: true },
        });
        institutionName = institutionResponse.data.institution.name;
        logoUrl = institutionResponse.data.institution.logo ?? null;
      } catch (error) {
        this.logger.warn('Could not fetch institution details', {
          institutionId,
          error: toProviderError(error, 'institutionsGetById').message,
        });
      }
    }

    return {
      accounts: transformAccounts(accountsResponse.data.accounts),
      institution: {
        institutionId: institutionId !== null && institutionId !== '' ? institutionId : UNKNOWN_INSTITUTION_ID,
        name: institutionName,
        logoUrl,
      },
    };
  }

  async getAccountBalance(accessToken: string, accountId: string): Promise<AccountBalance> {
    const response = await this.call('accountsGet', () =>
      this.client.accountsGet({
        access_token: accessToken,
        options: { account_ids: [accountId] },
      })
    );

    const account = response.data.accounts.find((a) => a.account_id === accountId);
    if (account === undefined) {
      throw new ProviderError(`Account ${accountId} not found`, { code: 'ACCOUNT_NOT_FOUND' });
    }

    return {
      current: account.balances.current ?? null,
      available: account.balances.available ?? null,
    };
  }

  /**
   * Ad hoc date-window fetch. `latest` narrows the window to the last few
   * days; otherwise it defaults to the last 90 days ending today.
   */
  async getTransactions(query: TransactionsQuery): Promise<TransactionsResult> {
    const today = this.now();
    const endDate = query.endDate ?? toISODate(today);
    let startDate: string;
    if (query.latest === true) {
      startDate = daysAgo(TRANSACTION_WINDOWS.LATEST_DAYS, today);
    } else {
      startDate = query.startDate ?? daysAgo(TRANSACTION_WINDOWS.DEFAULT_DAYS, today);
    }

    const response = await this.call('transactionsGet', () =>
      this.client.transactionsGet({
        access_token: query.accessToken,
        start_date: startDate,
        end_date: endDate,
        options: {
          ...(query.accountId !== undefined ? { account_ids: [query.accountId] } : {}),
          include_personal_finance_category: true,
          include_original_description: true,
        },
      })
    );

    const fetched = response.data.transactions;
    const kept = query.postedOnly === true ? fetched.filter((t) => !t.pending) : fetched;

    return {
      transactions: transformTransactions(kept),
      hasMore: response.data.total_transactions > fetched.length,
    };
  }

  /**
   * One page of the incremental sync stream.
   */
  async syncTransactions(request: SyncPageRequest): Promise<SyncPage> {
    const options = {
      include_personal_finance_category: true,
      include_original_description: true,
      ...(request.accountId !== undefined ? { account_id: request.accountId } : {}),
    };

    const response = await this.call('transactionsSync', () =>
      this.client.transactionsSync({
        access_token: request.accessToken,
        ...(request.cursor !== undefined && request.cursor !== '' ? { cursor: request.cursor } : {}),
        options,
      })
    );

    return {
      added: transformTransactions(response.data.added),
      modified: transformTransactions(response.data.modified),
      removed: response.data.removed.map((r) => r.transaction_id),
      hasMore: response.data.has_more,
      nextCursor: response.data.next_cursor,
    };
  }

  async getConnectionStatus(accessToken: string): Promise<ConnectionHealth> {
    try {
      const response = await this.client.itemGet({ access_token: accessToken });
      const itemError = response.data.item.error;

      if (itemError !== null && itemError !== undefined) {
        return {
          connected: false,
          error: itemError.error_message !== '' ? itemError.error_message : 'Unknown error',
          errorCode: itemError.error_code,
        };
      }

      const lastRefresh = response.data.status?.transactions?.last_successful_update;
      return {
        connected: true,
        ...(lastRefresh !== null && lastRefresh !== undefined ? { lastRefresh } : {}),
      };
    } catch (error) {
      const providerError = toProviderError(error, 'itemGet');
      return {
        connected: false,
        error: providerError.message,
        ...(providerError.code !== undefined ? { errorCode: providerError.code } : {}),
      };
    }
  }

  async removeConnection(accessToken: string): Promise<void> {
    await this.call('itemRemove', () => this.client.itemRemove({ access_token: accessToken }));
  }

  /** Run an SDK call and normalize whatever it rejects with. */
  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw toProviderError(error, operation);
    }
  }
}
