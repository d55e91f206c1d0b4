/**
 * Ad hoc provider reads that bypass the store.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../context.js';
import { validate } from '../http/validate.js';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');
const queryBoolean = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true')
  .optional();

const TransactionsQuerySchema = z.object({
  accessToken: z.string().min(1),
  accountId: z.string().min(1).optional(),
  startDate: isoDate.optional(),
  endDate: isoDate.optional(),
  latest: queryBoolean,
  postedOnly: queryBoolean,
});

const SyncPageBodySchema = z.object({
  accessToken: z.string().min(1),
  cursor: z.string().optional(),
  accountId: z.string().min(1).optional(),
});

export function createTransactionRoutes(ctx: AppContext) {
  const transactions = new Hono();

  transactions.get('/', validate('query', TransactionsQuerySchema), async (c) => {
    const result = await ctx.provider.getTransactions(c.req.valid('query'));
    return c.json({ success: true, data: result });
  });

  /** POST /transactions/sync: one page of the cursor stream. */
  transactions.post('/sync', validate('json', SyncPageBodySchema), async (c) => {
    const result = await ctx.provider.syncTransactions(c.req.valid('json'));
    return c.json({ success: true, data: result });
  });

  return transactions;
}
