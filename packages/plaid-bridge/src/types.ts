/**
 * Plaid SDK-dependent types. SDK-independent records and results live in
 * @banksync/types.
 */

import type { PlaidApi } from 'plaid';
import type { PlaidEnvironment } from '@banksync/types';

export type { PlaidEnvironment };

export interface PlaidConfig {
  clientId: string;
  secret: string;
  env: PlaidEnvironment;
  /** Shown to the user inside Plaid Link. */
  clientName: string;
  webhookUrl?: string;
  redirectUri?: string;
}

/**
 * The slice of the Plaid API the provider calls. Narrow on purpose so tests
 * can hand in a stand-in with only these methods.
 */
export type PlaidTransport = Pick<
  PlaidApi,
  | 'linkTokenCreate'
  | 'itemPublicTokenExchange'
  | 'accountsGet'
  | 'institutionsGetById'
  | 'transactionsGet'
  | 'transactionsSync'
  | 'itemGet'
  | 'itemRemove'
>;
