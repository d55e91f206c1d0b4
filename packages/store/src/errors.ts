/**
 * Storage errors. Backend-specific failures are translated into these so
 * callers never inspect Postgres error codes themselves.
 */

export class StoreError extends Error {
  readonly code: string | undefined;

  constructor(message: string, code?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
    this.code = code;
  }
}

/** A natural key (item id, account id, transaction id) already exists. */
export class UniqueViolationError extends StoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, UNIQUE_VIOLATION_CODE, options);
    this.name = 'UniqueViolationError';
  }
}

export const UNIQUE_VIOLATION_CODE = '23505';

export interface DatabaseErrorLike {
  message: string;
  code?: string | undefined;
  details?: string | null | undefined;
}

export function toStoreError(error: DatabaseErrorLike, operation: string): StoreError {
  const message = `Failed to ${operation}: ${error.message}`;
  if (error.code === UNIQUE_VIOLATION_CODE) {
    return new UniqueViolationError(message, { cause: error });
  }
  return new StoreError(message, error.code, { cause: error });
}
