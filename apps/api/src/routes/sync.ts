/**
 * Persisted connections: registration, reconciliation and management.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { DEFAULT_TRANSACTION_LIMIT } from '@banksync/types';
import type { AppContext } from '../context.js';
import { validate } from '../http/validate.js';

const SaveConnectionBodySchema = z.object({
  accessToken: z.string().min(1),
  itemId: z.string().min(1),
});

const ConnectionBodySchema = z.object({
  connectionId: z.string().min(1),
});

const TransactionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(DEFAULT_TRANSACTION_LIMIT),
});

const AccountPatchBodySchema = z.object({
  enabled: z.boolean(),
});

export function createSyncRoutes(ctx: AppContext) {
  const sync = new Hono();

  /**
   * POST /sync/connection
   * Store the connection and its accounts after Link completes, then run
   * the first sync.
   */
  sync.post('/connection', validate('json', SaveConnectionBodySchema), async (c) => {
    const result = await ctx.service.registerConnection(c.req.valid('json'));
    return c.json({
      success: true,
      data: {
        connectionId: result.connectionId,
        accountsCount: result.accounts.length,
        transactionsAdded: result.sync.added,
        failures: result.sync.failures,
      },
    });
  });

  sync.post('/refresh', validate('json', ConnectionBodySchema), async (c) => {
    const { connectionId } = c.req.valid('json');
    return c.json({ success: true, data: await ctx.service.syncTransactions(connectionId) });
  });

  sync.get('/connections', async (c) => {
    return c.json({ success: true, data: await ctx.service.getConnections() });
  });

  sync.get('/transactions/:accountId', validate('query', TransactionsQuerySchema), async (c) => {
    const { limit } = c.req.valid('query');
    const transactions = await ctx.service.getAccountTransactions(c.req.param('accountId'), limit);
    return c.json({ success: true, data: transactions });
  });

  sync.get('/connections/:connectionId/status', async (c) => {
    const status = await ctx.service.refreshConnectionStatus(c.req.param('connectionId'));
    return c.json({ success: true, data: status });
  });

  /** DELETE /sync/connections/:connectionId: revoke upstream, then delete. */
  sync.delete('/connections/:connectionId', async (c) => {
    const connectionId = c.req.param('connectionId');
    await ctx.service.removeConnection(connectionId);
    return c.json({ success: true, data: { connectionId, removed: true } });
  });

  sync.patch('/accounts/:accountId', validate('json', AccountPatchBodySchema), async (c) => {
    const { enabled } = c.req.valid('json');
    const account = await ctx.service.setAccountEnabled(c.req.param('accountId'), enabled);
    return c.json({ success: true, data: account });
  });

  return sync;
}
