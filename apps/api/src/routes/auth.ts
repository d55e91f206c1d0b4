/**
 * Plaid Link handshake: link token creation and public token exchange.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../context.js';
import { validate } from '../http/validate.js';

const LinkTokenBodySchema = z.object({
  userId: z.string().min(1),
  /** Present when re-authenticating an existing item. */
  accessToken: z.string().min(1).optional(),
});

const ExchangeBodySchema = z.object({
  publicToken: z.string().min(1),
});

export function createAuthRoutes(ctx: AppContext) {
  const auth = new Hono();

  /** POST /auth/plaid/link */
  auth.post('/plaid/link', validate('json', LinkTokenBodySchema), async (c) => {
    const { userId, accessToken } = c.req.valid('json');
    const result = await ctx.provider.createLinkToken({ userId, accessToken });
    return c.json({ success: true, data: result });
  });

  /** POST /auth/plaid/exchange */
  auth.post('/plaid/exchange', validate('json', ExchangeBodySchema), async (c) => {
    const { publicToken } = c.req.valid('json');
    const result = await ctx.provider.exchangePublicToken(publicToken);
    return c.json({ success: true, data: result });
  });

  return auth;
}
