export type {
  PlaidEnvironment,
  PlaidPersonalFinanceCategory,
  PlaidTransactionRecord,
  PlaidAccountRecord,
  LinkTokenRequest,
  LinkTokenResult,
  TokenExchangeResult,
  Institution,
  AccountsResult,
  AccountBalance,
  TransactionsQuery,
  TransactionsResult,
  SyncPageRequest,
  SyncPage,
  ConnectionHealth,
  BankDataProvider,
} from './types.js';
