/**
 * Reconciliation service.
 * Pulls the incremental transaction stream for every enabled account of a
 * connection and applies it to the store idempotently.
 */

import {
  DEFAULT_TRANSACTION_LIMIT,
  silentLogger,
  toAccountType,
  type BankAccount,
  type BankConnection,
  type BankDataProvider,
  type LedgerStore,
  type LedgerTransaction,
  type Logger,
  type NewAccount,
  type NewConnection,
  type PublicConnection,
  type TransformedTransaction,
} from '@banksync/types';
import {
  ProviderError,
  isReauthErrorCode,
  isSyncMutationError,
  retryWhenNotReady,
  toProviderError,
  type NotReadyRetryOptions,
} from '@banksync/plaid-bridge';
import { AccountNotFoundError, ConnectionNotFoundError } from './errors.js';
import type {
  AccountSyncFailure,
  ConnectionStatusResult,
  ConnectionSyncSummary,
  RegisterConnectionInput,
  RegisterConnectionResult,
  SyncTransactionsResult,
} from './types.js';

/** Times a sync restarts from the stored cursor after the stream mutated mid-pagination. */
const MAX_PAGINATION_RESTARTS = 3;

export interface ReconciliationServiceConfig {
  provider: BankDataProvider;
  store: LedgerStore;
  logger?: Logger;
  /** Fixed-delay retry while a freshly linked item is not ready yet. */
  notReadyRetry?: Pick<NotReadyRetryOptions, 'attempts' | 'delayMs'>;
  now?: () => Date;
}

interface AccountSyncCounts {
  added: number;
  updated: number;
  removed: number;
}

interface CollectedStream {
  changed: TransformedTransaction[];
  removed: string[];
  nextCursor: string;
}

export class ReconciliationService {
  private readonly provider: BankDataProvider;
  private readonly store: LedgerStore;
  private readonly logger: Logger;
  private readonly notReadyRetry: Pick<NotReadyRetryOptions, 'attempts' | 'delayMs'>;
  private readonly now: () => Date;

  constructor(config: ReconciliationServiceConfig) {
    this.provider = config.provider;
    this.store = config.store;
    this.logger = config.logger ?? silentLogger;
    this.notReadyRetry = config.notReadyRetry ?? {};
    this.now = config.now ?? ((): Date => new Date());
  }

  async createConnection(details: NewConnection): Promise<string> {
    const connection = await this.store.createConnection(details);
    this.logger.info('Connection created', { connectionId: connection.id, institution: details.institutionName });
    return connection.id;
  }

  /**
   * Bulk insert. A duplicate external account id fails the whole call.
   */
  async createAccounts(connectionId: string, accounts: NewAccount[]): Promise<BankAccount[]> {
    await this.requireConnection(connectionId);
    return this.store.createAccounts(
      connectionId,
      accounts.map((account) => ({ ...account, type: toAccountType(account.type) }))
    );
  }

  /**
   * Persist a freshly exchanged item: connection, its accounts, then an
   * initial sync.
   */
  async registerConnection(input: RegisterConnectionInput): Promise<RegisterConnectionResult> {
    const { accounts, institution } = await this.provider.getAccounts(input.accessToken);

    const connectionId = await this.createConnection({
      accessToken: input.accessToken,
      itemId: input.itemId,
      institutionId: institution.institutionId,
      institutionName: institution.name,
      logoUrl: institution.logoUrl,
    });
    const created = await this.createAccounts(connectionId, accounts);
    const sync = await this.syncTransactions(connectionId);

    return { connectionId, accounts: created, sync };
  }

  async syncTransactions(connectionId: string): Promise<SyncTransactionsResult> {
    const connection = await this.requireConnection(connectionId);
    const accounts = (await this.store.listAccounts(connectionId)).filter((account) => account.enabled);

    const result: SyncTransactionsResult = { added: 0, updated: 0, removed: 0, failures: [] };

    for (const account of accounts) {
      try {
        const counts = await this.syncAccount(connection, account);
        result.added += counts.added;
        result.updated += counts.updated;
        result.removed += counts.removed;
      } catch (error) {
        const code = error instanceof ProviderError ? error.code : undefined;
        const failure: AccountSyncFailure = {
          accountId: account.id,
          accountName: account.name,
          message: error instanceof Error ? error.message : String(error),
          ...(code !== undefined ? { code } : {}),
        };
        result.failures.push(failure);
        this.logger.error('Account sync failed', {
          connectionId,
          accountId: account.id,
          code: failure.code,
          error: failure.message,
        });
      }
    }

    const needsReauth = result.failures.some((failure) => isReauthErrorCode(failure.code));

    if (result.failures.length === 0) {
      await this.store.updateConnection(connectionId, {
        lastSyncedAt: this.now().toISOString(),
        status: 'connected',
        errorDetails: null,
      });
    } else {
      await this.store.updateConnection(connectionId, {
        lastSyncedAt: this.now().toISOString(),
        errorDetails: result.failures.map((f) => `${f.accountName}: ${f.message}`).join('; '),
        ...(needsReauth ? { status: 'disconnected' as const } : {}),
      });
    }

    this.logger.info('Connection synced', {
      connectionId,
      accounts: accounts.length,
      added: result.added,
      updated: result.updated,
      removed: result.removed,
      failures: result.failures.length,
    });

    return result;
  }

  /** All connections with their accounts. The credential is stripped. */
  async getConnections(): Promise<PublicConnection[]> {
    const connections = await this.store.listConnections();
    return connections.map(
      (connection): PublicConnection => ({
        id: connection.id,
        institutionId: connection.institutionId,
        itemId: connection.itemId,
        name: connection.name,
        logoUrl: connection.logoUrl,
        status: connection.status,
        lastSyncedAt: connection.lastSyncedAt,
        errorDetails: connection.errorDetails,
        createdAt: connection.createdAt,
        updatedAt: connection.updatedAt,
        accounts: connection.accounts,
      })
    );
  }

  /** Newest first. */
  async getAccountTransactions(
    accountId: string,
    limit: number = DEFAULT_TRANSACTION_LIMIT
  ): Promise<LedgerTransaction[]> {
    return this.store.listTransactions(accountId, limit);
  }

  /**
   * Sync every connected connection, one at a time. Disconnected ones are
   * skipped until the user re-authenticates.
   */
  async syncAllConnections(): Promise<ConnectionSyncSummary[]> {
    const connections = await this.store.listConnections();
    const summaries: ConnectionSyncSummary[] = [];

    for (const connection of connections) {
      if (connection.status === 'disconnected') {
        summaries.push({ connectionId: connection.id, name: connection.name, skipped: true });
        continue;
      }

      try {
        const result = await this.syncTransactions(connection.id);
        summaries.push({ connectionId: connection.id, name: connection.name, skipped: false, result });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error('Connection sync failed', { connectionId: connection.id, error: message });
        summaries.push({ connectionId: connection.id, name: connection.name, skipped: false, error: message });
      }
    }

    return summaries;
  }

  /**
   * Ask the provider about the item and record the answer. Only errors the
   * user has to fix by re-linking mark the connection disconnected.
   */
  async refreshConnectionStatus(connectionId: string): Promise<ConnectionStatusResult> {
    const connection = await this.requireConnection(connectionId);
    const health = await this.provider.getConnectionStatus(connection.accessToken);

    let status = connection.status;
    if (health.connected) {
      status = 'connected';
      await this.store.updateConnection(connectionId, { status, errorDetails: null });
    } else {
      if (isReauthErrorCode(health.errorCode)) {
        status = 'disconnected';
      }
      await this.store.updateConnection(connectionId, { status, errorDetails: health.error ?? null });
    }

    return { ...health, connectionId, status };
  }

  /**
   * Revoke upstream, then delete locally (accounts and transactions cascade).
   * An item the provider no longer knows is deleted anyway.
   */
  async removeConnection(connectionId: string): Promise<void> {
    const connection = await this.requireConnection(connectionId);

    try {
      await this.provider.removeConnection(connection.accessToken);
    } catch (error) {
      const providerError = toProviderError(error, 'itemRemove');
      if (providerError.code !== 'ITEM_NOT_FOUND') {
        throw providerError;
      }
      this.logger.warn('Item already removed upstream', { connectionId });
    }

    await this.store.deleteConnection(connectionId);
    this.logger.info('Connection removed', { connectionId });
  }

  async setAccountEnabled(accountId: string, enabled: boolean): Promise<BankAccount> {
    const account = await this.store.getAccount(accountId);
    if (account === null) {
      throw new AccountNotFoundError(accountId);
    }

    await this.store.updateAccount(accountId, { enabled });
    return { ...account, enabled };
  }

  private async requireConnection(connectionId: string): Promise<BankConnection> {
    const connection = await this.store.getConnection(connectionId);
    if (connection === null) {
      throw new ConnectionNotFoundError(connectionId);
    }
    return connection;
  }

  /**
   * Apply one account's pending changes. The cursor is written last so an
   * interrupted pass replays from the old cursor; replays are idempotent
   * because writes are keyed on the provider transaction id.
   */
  private async syncAccount(connection: BankConnection, account: BankAccount): Promise<AccountSyncCounts> {
    const stream = await this.collectStream(connection.accessToken, account);

    const changed = stream.changed.filter((tx) => tx.accountId === account.accountId);
    if (changed.length !== stream.changed.length) {
      this.logger.warn('Ignoring transactions for other accounts', {
        accountId: account.id,
        ignored: stream.changed.length - changed.length,
      });
    }

    const { inserted, updated } = await this.store.upsertTransactions(account.id, changed);
    const removed = await this.store.deleteTransactions(stream.removed);

    const balance = await retryWhenNotReady(
      () => this.provider.getAccountBalance(connection.accessToken, account.accountId),
      this.notReadyOptions(account)
    );

    await this.store.updateAccount(account.id, {
      currentBalance: balance.current,
      availableBalance: balance.available,
      syncCursor: stream.nextCursor,
    });

    this.logger.debug('Account synced', { accountId: account.id, inserted, updated, removed });

    return { added: inserted, updated, removed };
  }

  /**
   * Page the stream from the stored cursor until the provider reports no
   * more. A mutation during pagination restarts from the stored cursor.
   */
  private async collectStream(accessToken: string, account: BankAccount): Promise<CollectedStream> {
    for (let restarts = 0; ; restarts++) {
      try {
        return await this.pageFrom(accessToken, account);
      } catch (error) {
        if (!isSyncMutationError(error) || restarts >= MAX_PAGINATION_RESTARTS) {
          throw error;
        }
        this.logger.warn('Transactions changed during pagination, restarting', {
          accountId: account.id,
          attempt: restarts + 1,
        });
      }
    }
  }

  private async pageFrom(accessToken: string, account: BankAccount): Promise<CollectedStream> {
    const changed: TransformedTransaction[] = [];
    const removed: string[] = [];
    let cursor = account.syncCursor ?? undefined;
    let hasMore = true;

    while (hasMore) {
      const page = await retryWhenNotReady(
        () => this.provider.syncTransactions({ accessToken, cursor, accountId: account.accountId }),
        this.notReadyOptions(account)
      );
      changed.push(...page.added, ...page.modified);
      removed.push(...page.removed);
      cursor = page.nextCursor;
      hasMore = page.hasMore;
    }

    return { changed, removed, nextCursor: cursor ?? '' };
  }

  private notReadyOptions(account: BankAccount): NotReadyRetryOptions {
    return {
      ...this.notReadyRetry,
      onRetry: (attempt, error, delayMs) => {
        this.logger.warn('Provider not ready, retrying', {
          accountId: account.id,
          attempt,
          delayMs,
          error: error.message,
        });
      },
    };
  }
}
