export type { LedgerStore, UpsertTransactionsResult } from './store-interface.js';
