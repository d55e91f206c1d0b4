/**
 * Serves the Hono app on Node's HTTP server.
 */

import type { Server } from 'net';
import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import type { AppContext } from './context.js';

/**
 * Start listening. Resolves once the port is bound.
 */
export function startApiServer(ctx: AppContext, port: number = ctx.config.port): Promise<Server> {
  const app = createApp(ctx);

  return new Promise((resolve, reject) => {
    const server: Server = serve({ fetch: app.fetch, port }, (info) => {
      server.off('error', reject);
      ctx.logger.info(`API listening on http://localhost:${info.port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}
