/**
 * Plaid client initialization. There is no shared instance: every caller
 * builds its own client.
 */

import { Configuration, PlaidApi, PlaidEnvironments } from 'plaid';
import type { PlaidConfig, PlaidEnvironment } from './types.js';

function getPlaidEnvironmentUrl(env: PlaidEnvironment): string {
  switch (env) {
    case 'production':
      return PlaidEnvironments['production'] ?? 'https://production.plaid.com';
    case 'sandbox':
      return PlaidEnvironments['sandbox'] ?? 'https://sandbox.plaid.com';
  }
}

/**
 * Create a new Plaid client instance.
 */
export function createPlaidClient(config: PlaidConfig): PlaidApi {
  const configuration = new Configuration({
    basePath: getPlaidEnvironmentUrl(config.env),
    baseOptions: {
      headers: {
        'PLAID-CLIENT-ID': config.clientId,
        'PLAID-SECRET': config.secret,
      },
    },
  });

  return new PlaidApi(configuration);
}

