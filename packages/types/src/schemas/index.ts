export {
  ConnectionStatusSchema,
  AccountTypeSchema,
  TransactionStatusSchema,
  TransactionMethodSchema,
  BankConnectionSchema,
  BankAccountSchema,
  LedgerTransactionSchema,
  toAccountType,
} from './ledger.js';

export type {
  ConnectionStatus,
  AccountType,
  TransactionStatus,
  TransactionMethod,
  BankConnection,
  BankAccount,
  LedgerTransaction,
  TransformedTransaction,
  TransformedAccount,
  NewConnection,
  NewAccount,
  ConnectionUpdate,
  AccountUpdate,
  ConnectionWithAccounts,
  PublicConnection,
} from './ledger.js';
