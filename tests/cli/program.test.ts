import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { silentLogger } from '@banksync/types';
import { InMemoryLedgerStore } from '@banksync/store';
import { ProviderError } from '@banksync/plaid-bridge';
import { createAppContext, loadConfig, type AppContext } from '@banksync/api';
import { createProgram, resolveSyncInterval } from '@banksync/cli';
import { createAccount, createFakeProvider } from '../helpers/fixtures.js';

function sequentialIds(): () => string {
  let next = 0;
  return () => `id-${++next}`;
}

describe('CLI program', () => {
  let output: string[];
  let ctx: AppContext;
  let fake: ReturnType<typeof createFakeProvider>;

  const run = async (...args: string[]): Promise<void> => {
    const program = createProgram({
      loadContext: () => ctx,
      write: (text) => output.push(text),
      env: {},
    });
    await program.parseAsync(['node', 'banksync', ...args]);
  };

  const link = async (): Promise<string> => {
    const connectionId = await ctx.service.createConnection({
      accessToken: 'access-sandbox-1',
      itemId: 'item-1',
      institutionId: 'ins_1',
      institutionName: 'First Test Bank',
    });
    await ctx.service.createAccounts(connectionId, [createAccount()]);
    return connectionId;
  };

  beforeEach(() => {
    output = [];
    fake = createFakeProvider();
    ctx = createAppContext(loadConfig({ PLAID_CLIENT_ID: 'test-client-id', PLAID_SECRET: 'test-secret' }), {
      provider: fake.provider,
      store: new InMemoryLedgerStore({ generateId: sequentialIds() }),
      logger: silentLogger,
    });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it('should print the migration SQL', async () => {
    await run('migrate', '--print');

    expect(output).toHaveLength(1);
    expect(output[0]?.startsWith('-- banksync database schema')).toBe(true);
  });

  it('should require a database URL to migrate', async () => {
    await expect(run('migrate')).rejects.toThrow('--database-url or DATABASE_URL env var is required (or use --print)');
  });

  it('should print connections as indented JSON', async () => {
    await link();

    await run('connections');

    const [text] = output;
    expect(text?.split('\n')[1]).toBe('  {');
    expect(JSON.parse(text ?? '')).toEqual([
      expect.objectContaining({ id: 'id-1', name: 'First Test Bank', status: 'connected' }),
    ]);
  });

  it('should print compact JSON with --no-pretty', async () => {
    await run('--no-pretty', 'connections');

    expect(output).toEqual(['[]']);
  });

  it('should sync one connection', async () => {
    const connectionId = await link();

    await run('sync', connectionId);

    expect(JSON.parse(output[0] ?? '')).toEqual({ added: 0, updated: 0, removed: 0, failures: [] });
  });

  it('should exit with 2 when an account fails', async () => {
    const connectionId = await link();
    fake.syncFailures.set('plaid-acc-1', new ProviderError('login required', { code: 'ITEM_LOGIN_REQUIRED' }));

    await run('sync', connectionId);

    expect(process.exitCode).toBe(2);
  });

  it('should fail for an unknown connection', async () => {
    await expect(run('status', 'missing')).rejects.toThrow('Connection not found: missing');
  });

  it('should remove a connection', async () => {
    const connectionId = await link();

    await run('remove', connectionId);

    await expect(ctx.store.getConnection(connectionId)).resolves.toBeNull();
  });
});

describe('resolveSyncInterval', () => {
  const config = loadConfig({ PLAID_CLIENT_ID: 'test-client-id', PLAID_SECRET: 'test-secret', SYNC_INTERVAL_MINUTES: '30' });

  it('should default to the configured interval', () => {
    expect(resolveSyncInterval(undefined, config)).toBe(30);
    expect(resolveSyncInterval('', config)).toBe(30);
  });

  it('should prefer the flag', () => {
    expect(resolveSyncInterval('5', config)).toBe(5);
  });

  it('should leave scheduling off when nothing is set', () => {
    const unscheduled = loadConfig({ PLAID_CLIENT_ID: 'test-client-id', PLAID_SECRET: 'test-secret' });

    expect(resolveSyncInterval(undefined, unscheduled)).toBeUndefined();
  });

  it('should reject a non-positive flag', () => {
    expect(() => resolveSyncInterval('0', config)).toThrow('Invalid sync interval: 0');
  });
});
