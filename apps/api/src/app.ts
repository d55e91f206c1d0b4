/**
 * The Hono application: middleware, route groups and the error envelope.
 * Built per context so tests can drive it through `app.request()`.
 */

import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { ENGINE_VERSION } from '@banksync/types';
import type { AppContext } from './context.js';
import { toErrorResponse } from './http/errors.js';
import { createAccountRoutes } from './routes/accounts.js';
import { createAuthRoutes } from './routes/auth.js';
import { createSyncRoutes } from './routes/sync.js';
import { createTransactionRoutes } from './routes/transactions.js';

/** Requests with bodies larger than this are rejected with 413. */
export const MAX_BODY_BYTES = 1024 * 1024;

export function createApp(ctx: AppContext) {
  const app = new Hono();

  // Middleware
  app.use('*', logger((line) => ctx.logger.debug(line)));
  app.use(
    '*',
    cors({
      origin: ctx.config.corsOrigins.includes('*') ? '*' : ctx.config.corsOrigins,
      allowMethods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'Authorization'],
    })
  );
  app.use(
    '*',
    bodyLimit({
      maxSize: MAX_BODY_BYTES,
      onError: (c) => c.json({ success: false, error: 'Request body too large' }, 413),
    })
  );

  // Health check
  app.get('/', (c) => {
    return c.json({
      success: true,
      data: {
        name: 'banksync',
        version: ENGINE_VERSION,
        status: 'ok',
        scheduledSync: ctx.scheduler.getStatus(),
      },
    });
  });

  // Route groups
  app.route('/auth', createAuthRoutes(ctx));
  app.route('/accounts', createAccountRoutes(ctx));
  app.route('/transactions', createTransactionRoutes(ctx));
  app.route('/sync', createSyncRoutes(ctx));

  app.onError((err, c) => {
    const { status, message } = toErrorResponse(err);
    if (status >= 500) {
      ctx.logger.error('Request failed', { method: c.req.method, path: c.req.path, error: message });
    }
    return c.json({ success: false, error: message }, status);
  });

  app.notFound((c) => {
    return c.json({ success: false, error: 'Not found' }, 404);
  });

  return app;
}
