/**
 * HTTP API for linking banks and reading the synchronized ledger.
 */

export { loadConfig, ConfigError, type AppConfig } from './config.js';
export {
  createAppContext,
  createStore,
  createScopedLogger,
  type AppContext,
  type AppContextOverrides,
} from './context.js';
export { createApp, MAX_BODY_BYTES } from './app.js';
export { startApiServer } from './server.js';
export type { ApiEnvelope } from './http/errors.js';
