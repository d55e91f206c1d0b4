/**
 * Provider error normalization. The Plaid SDK rejects with axios errors whose
 * `response.data` carries Plaid's error object; everything leaving the bridge
 * is a `ProviderError` instead.
 */

import { z } from 'zod';

/** Item errors that only the user can fix by re-linking. */
export const REAUTH_ERROR_CODES: readonly string[] = [
  'ITEM_LOGIN_REQUIRED',
  'INVALID_ACCESS_TOKEN',
  'ITEM_LOCKED',
  'ITEM_NOT_FOUND',
  'PENDING_EXPIRATION',
  'ACCESS_NOT_GRANTED',
  'USER_PERMISSION_REVOKED',
];

/** The item is linked but Plaid is still pulling its data. */
export const NOT_READY_ERROR_CODES: readonly string[] = ['PRODUCT_NOT_READY'];

export const SYNC_MUTATION_ERROR_CODE = 'TRANSACTIONS_SYNC_MUTATION_DURING_PAGINATION';

const PlaidErrorBodySchema = z.object({
  error_type: z.string().optional(),
  error_code: z.string().optional(),
  error_message: z.string().optional(),
  display_message: z.string().nullable().optional(),
  request_id: z.string().optional(),
});

const HttpErrorSchema = z.object({
  response: z.object({
    status: z.number(),
    data: z.unknown(),
  }),
});

export interface ProviderErrorDetails {
  code?: string | undefined;
  type?: string | undefined;
  status?: number | undefined;
  requestId?: string | undefined;
  displayMessage?: string | undefined;
  cause?: unknown;
}

export class ProviderError extends Error {
  readonly code: string | undefined;
  readonly type: string | undefined;
  readonly status: number | undefined;
  readonly requestId: string | undefined;
  readonly displayMessage: string | undefined;

  constructor(message: string, details: ProviderErrorDetails = {}) {
    super(redactSecrets(message), details.cause !== undefined ? { cause: details.cause } : undefined);
    this.name = 'ProviderError';
    this.code = details.code;
    this.type = details.type;
    this.status = details.status;
    this.requestId = details.requestId;
    this.displayMessage = details.displayMessage;
  }
}

const TOKEN_PATTERN = /\b(access|public|link)-(sandbox|development|production)-[A-Za-z0-9-]+/g;

/**
 * Mask Plaid tokens that may have found their way into a message.
 */
export function redactSecrets(text: string): string {
  return text.replace(TOKEN_PATTERN, '$1-$2-[redacted]');
}

/**
 * Convert whatever the SDK threw into a ProviderError.
 */
export function toProviderError(error: unknown, operation: string): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  const http = HttpErrorSchema.safeParse(error);
  if (http.success) {
    const body = PlaidErrorBodySchema.safeParse(http.data.response.data);
    if (body.success) {
      const plaid = body.data;
      return new ProviderError(
        plaid.error_message ?? `Plaid ${operation} failed with status ${http.data.response.status}`,
        {
          code: plaid.error_code,
          type: plaid.error_type,
          status: http.data.response.status,
          requestId: plaid.request_id,
          displayMessage: plaid.display_message ?? undefined,
          cause: error,
        }
      );
    }
    return new ProviderError(`Plaid ${operation} failed with status ${http.data.response.status}`, {
      status: http.data.response.status,
      cause: error,
    });
  }

  if (error instanceof Error) {
    return new ProviderError(`Plaid ${operation} failed: ${error.message}`, { cause: error });
  }

  return new ProviderError(`Plaid ${operation} failed: ${String(error)}`);
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof ProviderError) return error.code;
  if (error !== null && typeof error === 'object' && 'error_code' in error) {
    return typeof error.error_code === 'string' ? error.error_code : undefined;
  }
  return undefined;
}

export function isReauthRequiredError(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && REAUTH_ERROR_CODES.includes(code);
}

export function isNotReadyError(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && NOT_READY_ERROR_CODES.includes(code);
}

export function isSyncMutationError(error: unknown): boolean {
  return errorCode(error) === SYNC_MUTATION_ERROR_CODE;
}

export function isReauthErrorCode(code: string | undefined): boolean {
  return code !== undefined && REAUTH_ERROR_CODES.includes(code);
}
