/**
 * Wires the provider, store and service from configuration.
 */

import { createConsoleLogger, type BankDataProvider, type LedgerStore, type Logger } from '@banksync/types';
import { PlaidProvider } from '@banksync/plaid-bridge';
import { CredentialCipher, InMemoryLedgerStore, SupabaseLedgerStore, createSupabaseClient } from '@banksync/store';
import { ReconciliationService, SyncScheduler } from '@banksync/sync';
import type { AppConfig } from './config.js';

export interface AppContext {
  config: AppConfig;
  provider: BankDataProvider;
  store: LedgerStore;
  service: ReconciliationService;
  /** Started by `serve` when a sync interval is configured. */
  scheduler: SyncScheduler;
  logger: Logger;
}

export interface AppContextOverrides {
  provider?: BankDataProvider;
  store?: LedgerStore;
  logger?: Logger;
}

export function createStore(config: AppConfig, logger: Logger): LedgerStore {
  if (config.supabase === undefined) {
    logger.warn('Supabase is not configured; using the in-memory store (data is lost on exit)');
    return new InMemoryLedgerStore();
  }

  return new SupabaseLedgerStore({
    client: createSupabaseClient(config.supabase),
    cipher: new CredentialCipher(config.supabase.encryptionKey),
  });
}

export function createAppContext(config: AppConfig, overrides: AppContextOverrides = {}): AppContext {
  const logger = overrides.logger ?? createConsoleLogger({ scope: 'banksync', level: config.logLevel });
  const provider =
    overrides.provider ??
    new PlaidProvider({ config: config.plaid, logger: createScopedLogger(logger, 'plaid') });
  const store = overrides.store ?? createStore(config, logger);
  const service = new ReconciliationService({ provider, store, logger });
  const scheduler = new SyncScheduler(service);

  return { config, provider, store, service, scheduler, logger };
}

/** Prefix messages with a sub-scope, keeping the parent's sink and level. */
export function createScopedLogger(parent: Logger, scope: string): Logger {
  return {
    debug: (message, context) => parent.debug(`[${scope}] ${message}`, context),
    info: (message, context) => parent.info(`[${scope}] ${message}`, context),
    warn: (message, context) => parent.warn(`[${scope}] ${message}`, context),
    error: (message, context) => parent.error(`[${scope}] ${message}`, context),
  };
}
