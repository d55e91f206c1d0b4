import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../context.js';
import { validate } from '../http/validate.js';

const AccessTokenQuerySchema = z.object({
  accessToken: z.string().min(1),
});

const BalanceQuerySchema = AccessTokenQuerySchema.extend({
  accountId: z.string().min(1),
});

export function createAccountRoutes(ctx: AppContext) {
  const accounts = new Hono();

  accounts.get('/', validate('query', AccessTokenQuerySchema), async (c) => {
    const { accessToken } = c.req.valid('query');
    return c.json({ success: true, data: await ctx.provider.getAccounts(accessToken) });
  });

  accounts.get('/balance', validate('query', BalanceQuerySchema), async (c) => {
    const { accessToken, accountId } = c.req.valid('query');
    return c.json({ success: true, data: await ctx.provider.getAccountBalance(accessToken, accountId) });
  });

  accounts.get('/status', validate('query', AccessTokenQuerySchema), async (c) => {
    const { accessToken } = c.req.valid('query');
    return c.json({ success: true, data: await ctx.provider.getConnectionStatus(accessToken) });
  });

  return accounts;
}
