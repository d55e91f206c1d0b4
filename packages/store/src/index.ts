/**
 * Persistent store for connections, accounts and transactions.
 */

// Client
export { createSupabaseClient, type SupabaseConfig } from './client.js';

// Stores
export {
  SupabaseLedgerStore,
  type SupabaseLedgerStoreOptions,
  type SupabaseTableClient,
} from './supabase-store.js';
export { InMemoryLedgerStore, type InMemoryLedgerStoreOptions } from './memory-store.js';

// Credentials
export { CredentialCipher, parseEncryptionKey } from './cipher.js';

// Errors
export { StoreError, UniqueViolationError, UNIQUE_VIOLATION_CODE, toStoreError } from './errors.js';

// Migrations
export {
  runMigrations,
  getMigrationSQL,
  type MigrationClient,
  type MigrationConfig,
  type MigrationResult,
} from './migrations.js';
