/* eslint-disable no-console */

import { Command } from 'commander';
import { ENGINE_VERSION } from '@banksync/types';
import { getMigrationSQL, runMigrations } from '@banksync/store';
import { createAppContext, loadConfig, startApiServer, type AppConfig, type AppContext } from '@banksync/api';

export interface ProgramDeps {
  /** Builds the application context; defaults to env-based wiring. */
  loadContext?: () => AppContext;
  /** Where command results go (stdout by default). */
  write?: (text: string) => void;
  env?: NodeJS.ProcessEnv;
}

// Helper to parse boolean env vars
const envBool = (env: NodeJS.ProcessEnv, key: string, defaultVal: boolean): boolean => {
  const val = env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

/**
 * Minutes between scheduled syncs: the `--sync-interval` flag, else the
 * configured `SYNC_INTERVAL_MINUTES`. Undefined means no scheduled sync.
 */
export function resolveSyncInterval(option: string | undefined, config: AppConfig): number | undefined {
  if (option === undefined || option.trim() === '') {
    return config.syncIntervalMinutes;
  }
  const minutes = Number(option);
  if (!Number.isFinite(minutes) || minutes <= 0) {
    throw new Error(`Invalid sync interval: ${option}`);
  }
  return minutes;
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const env = deps.env ?? process.env;
  const write = deps.write ?? ((text: string): void => console.log(text));
  const loadContext = deps.loadContext ?? ((): AppContext => createAppContext(loadConfig(env)));
  const printJson = (value: unknown, pretty: boolean): void => {
    write(JSON.stringify(value, null, pretty ? 2 : 0));
  };

  const program = new Command();

  program
    .name('banksync')
    .description('Link bank accounts through Plaid and keep a local ledger in sync')
    .version(ENGINE_VERSION)
    .option('--pretty', 'Pretty-print JSON output', envBool(env, 'BANKSYNC_PRETTY', true))
    .option('--no-pretty', 'Disable pretty-printing');

  const pretty = (): boolean => program.opts<{ pretty: boolean }>().pretty;

  program
    .command('serve')
    .description('Start the HTTP API (and the scheduled sync when an interval is set)')
    .option('-p, --port <port>', 'Port to listen on')
    .option('--sync-interval <minutes>', 'Sync all connections every N minutes (default: SYNC_INTERVAL_MINUTES)')
    .action(async (options: { port?: string; syncInterval?: string }) => {
      const ctx = loadContext();
      const port = options.port !== undefined ? Number(options.port) : ctx.config.port;
      if (!Number.isInteger(port) || port <= 0) {
        throw new Error(`Invalid port: ${options.port ?? ''}`);
      }

      const minutes = resolveSyncInterval(options.syncInterval, ctx.config);
      const server = await startApiServer(ctx, port);

      const { scheduler } = ctx;
      if (minutes !== undefined) {
        scheduler.start({
          intervalMs: minutes * 60_000,
          runImmediately: true,
          logger: ctx.logger,
          onSyncComplete: (results) => {
            const synced = results.filter((r) => !r.skipped && r.error === undefined).length;
            ctx.logger.info(`Scheduled sync finished: ${synced}/${results.length} connections synced`);
          },
        });
      }

      const shutdown = (): void => {
        ctx.logger.info('Shutting down...');
        scheduler.stop();
        server.close();
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });

  program
    .command('migrate')
    .description('Create the ledger tables in PostgreSQL')
    .option('--print', 'Print the full migration SQL to stdout instead of running it')
    .option('--database-url <url>', 'PostgreSQL connection string', env['DATABASE_URL'])
    .option('--ssl', 'Connect with TLS (hosted Postgres)', envBool(env, 'DATABASE_SSL', false))
    .action(async (options: { print?: boolean; databaseUrl?: string; ssl: boolean }) => {
      if (options.print === true) {
        write(getMigrationSQL());
        return;
      }

      if (options.databaseUrl === undefined || options.databaseUrl === '') {
        throw new Error('--database-url or DATABASE_URL env var is required (or use --print)');
      }

      console.error('[INFO] Running migrations...');
      const result = await runMigrations({ connectionString: options.databaseUrl, ssl: options.ssl });
      if (!result.success) {
        throw new Error(`Migration failed:\n  ${result.errors.join('\n  ')}`);
      }
      console.error('[INFO] Migration completed.');
    });

  program
    .command('connections')
    .description('List stored connections and their accounts')
    .action(async () => {
      const ctx = loadContext();
      printJson(await ctx.service.getConnections(), pretty());
    });

  program
    .command('sync')
    .description('Sync transactions for one connection')
    .argument('<connectionId>', 'Connection id')
    .action(async (connectionId: string) => {
      const ctx = loadContext();
      const result = await ctx.service.syncTransactions(connectionId);
      printJson(result, pretty());
      if (result.failures.length > 0) {
        process.exitCode = 2;
      }
    });

  program
    .command('sync-all')
    .description('Sync every connected connection')
    .action(async () => {
      const ctx = loadContext();
      const results = await ctx.service.syncAllConnections();
      printJson(results, pretty());
      const failed = results.some(
        (r) => r.error !== undefined || (r.result !== undefined && r.result.failures.length > 0)
      );
      if (failed) {
        process.exitCode = 2;
      }
    });

  program
    .command('status')
    .description('Check a connection with the provider and record the result')
    .argument('<connectionId>', 'Connection id')
    .action(async (connectionId: string) => {
      const ctx = loadContext();
      printJson(await ctx.service.refreshConnectionStatus(connectionId), pretty());
    });

  program
    .command('remove')
    .description('Revoke a connection upstream and delete it with its accounts and transactions')
    .argument('<connectionId>', 'Connection id')
    .action(async (connectionId: string) => {
      const ctx = loadContext();
      await ctx.service.removeConnection(connectionId);
      console.error(`[INFO] Connection ${connectionId} removed.`);
    });

  return program;
}
