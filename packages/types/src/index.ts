// Ledger model and zod schemas
export * from './schemas/index.js';

// Provider records and the BankDataProvider interface
export * from './provider/index.js';

// LedgerStore interface
export * from './store/index.js';

// Pure utils (money, date, constants, logging)
export * from './utils/index.js';
