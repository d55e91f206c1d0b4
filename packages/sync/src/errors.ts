export class ConnectionNotFoundError extends Error {
  readonly connectionId: string;

  constructor(connectionId: string) {
    super(`Connection not found: ${connectionId}`);
    this.name = 'ConnectionNotFoundError';
    this.connectionId = connectionId;
  }
}

export class AccountNotFoundError extends Error {
  readonly accountId: string;

  constructor(accountId: string) {
    super(`Account not found: ${accountId}`);
    this.name = 'AccountNotFoundError';
    this.accountId = accountId;
  }
}
