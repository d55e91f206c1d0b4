/**
 * Schema migrations for the ledger tables.
 * Applied over a direct PostgreSQL connection; every statement is idempotent.
 */

import pg from 'pg';
import { silentLogger, type Logger } from '@banksync/types';

/**
 * SQL schema for all tables.
 */
const SCHEMA_SQL = `
-- Bank ledger schema
-- All monetary values use numeric(12,2)

do $$ begin
  create type connection_status as enum ('connected', 'disconnected');
exception when duplicate_object then null; end $$;

do $$ begin
  create type account_type as enum ('depository', 'credit', 'loan', 'investment', 'other');
exception when duplicate_object then null; end $$;

do $$ begin
  create type transaction_status as enum ('pending', 'posted');
exception when duplicate_object then null; end $$;

do $$ begin
  create type transaction_method as enum (
    'payment', 'card_purchase', 'card_payment', 'transfer', 'ach', 'wire',
    'atm', 'fee', 'interest', 'deposit', 'withdrawal', 'other'
  );
exception when duplicate_object then null; end $$;

create table if not exists bank_connections (
  id uuid primary key default gen_random_uuid(),
  institution_id text not null,
  item_id text not null unique,
  access_token text not null,
  name text not null,
  logo_url text,
  status connection_status not null default 'connected',
  last_synced_at timestamptz,
  error_details text,
  created_at timestamptz not null default now(),
  updated_at timestamptz not null default now()
);

create table if not exists bank_accounts (
  id uuid primary key default gen_random_uuid(),
  bank_connection_id uuid not null references bank_connections(id) on delete cascade,
  account_id text not null unique,
  name text not null,
  official_name text,
  type account_type not null default 'other',
  subtype text,
  mask text,
  currency text not null default 'USD',
  current_balance numeric(12,2),
  available_balance numeric(12,2),
  enabled boolean not null default true,
  sync_cursor text,
  created_at timestamptz not null default now(),
  updated_at timestamptz not null default now()
);

create table if not exists transactions (
  id uuid primary key default gen_random_uuid(),
  bank_account_id uuid not null references bank_accounts(id) on delete cascade,
  plaid_transaction_id text not null unique,
  date date not null,
  name text not null,
  description text,
  merchant_name text,
  amount numeric(12,2) not null,
  currency text not null default 'USD',
  category text,
  category_detailed text,
  method transaction_method not null default 'other',
  status transaction_status not null default 'posted',
  created_at timestamptz not null default now(),
  updated_at timestamptz not null default now()
);
`;

const INDEXES_SQL = `
create index if not exists idx_bank_accounts_connection on bank_accounts(bank_connection_id);
create index if not exists idx_transactions_account_date on transactions(bank_account_id, date desc);
create index if not exists idx_bank_connections_status on bank_connections(status);
`;

/** What the migration runner needs from a database client. `pg.Client` fits. */
export interface MigrationClient {
  connect(): Promise<void>;
  query(sql: string): Promise<unknown>;
  end(): Promise<void>;
}

export interface MigrationConfig {
  /** postgres:// connection string */
  connectionString: string;
  /** Use TLS without certificate verification, as hosted Postgres usually needs. */
  ssl?: boolean;
  logger?: Logger;
  createClient?: (connectionString: string, ssl: boolean) => MigrationClient;
}

export interface MigrationResult {
  success: boolean;
  tablesCreated: boolean;
  indexesCreated: boolean;
  errors: string[];
}

function createPgClient(connectionString: string, ssl: boolean): MigrationClient {
  return new pg.Client({
    connectionString,
    ...(ssl ? { ssl: { rejectUnauthorized: false } } : {}),
  });
}

/**
 * Run migrations over a direct PostgreSQL connection.
 * Never throws; failures are reported in `errors`.
 */
export async function runMigrations(config: MigrationConfig): Promise<MigrationResult> {
  const logger = config.logger ?? silentLogger;
  const createClient = config.createClient ?? createPgClient;
  const result: MigrationResult = {
    success: false,
    tablesCreated: false,
    indexesCreated: false,
    errors: [],
  };

  let client: MigrationClient | null = null;

  try {
    client = createClient(config.connectionString, config.ssl ?? false);

    logger.info('Connecting to PostgreSQL...');
    await client.connect();

    logger.info('Connected. Running schema migration...');
    await client.query(SCHEMA_SQL);
    result.tablesCreated = true;

    await client.query(INDEXES_SQL);
    result.indexesCreated = true;

    result.success = true;
    logger.info('Migration completed successfully');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    result.errors.push(message);

    if (message.includes('password authentication failed')) {
      result.errors.push('Hint: Check the password in DATABASE_URL');
    } else if (message.includes('ENOTFOUND') || message.includes('getaddrinfo')) {
      result.errors.push('Hint: Check the host in DATABASE_URL');
    }
  } finally {
    if (client !== null) {
      await client.end();
    }
  }

  return result;
}

/**
 * Get the full migration SQL for manual execution (e.g. in the Supabase SQL editor).
 */
export function getMigrationSQL(): string {
  let sql = '-- banksync database schema\n\n';
  sql += '-- ============================================\n';
  sql += '-- STEP 1: Create Types and Tables\n';
  sql += '-- ============================================\n';
  sql += SCHEMA_SQL;
  sql += '\n-- ============================================\n';
  sql += '-- STEP 2: Create Indexes\n';
  sql += '-- ============================================\n';
  sql += INDEXES_SQL;
  return sql;
}
