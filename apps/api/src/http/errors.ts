import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { ProviderError, redactSecrets } from '@banksync/plaid-bridge';
import { UniqueViolationError } from '@banksync/store';
import { AccountNotFoundError, ConnectionNotFoundError } from '@banksync/sync';

const ERROR_STATUSES = [400, 404, 409, 413, 500] as const;

export type ErrorStatus = (typeof ERROR_STATUSES)[number];

export interface ErrorResponse {
  status: ErrorStatus;
  message: string;
}

/** Every response body has this shape. */
export interface ApiEnvelope<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

function toErrorStatus(status: number): ErrorStatus {
  return ERROR_STATUSES.find((candidate) => candidate === status) ?? (status >= 500 ? 500 : 400);
}

export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Map a thrown value to a status code and a client-safe message.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof HTTPException) {
    return { status: toErrorStatus(error.status), message: error.message };
  }
  if (error instanceof ZodError) {
    return { status: 400, message: formatZodError(error) };
  }
  if (error instanceof ConnectionNotFoundError || error instanceof AccountNotFoundError) {
    return { status: 404, message: error.message };
  }
  if (error instanceof UniqueViolationError) {
    return { status: 409, message: error.message };
  }
  if (error instanceof ProviderError) {
    return { status: 500, message: redactSecrets(error.displayMessage ?? error.message) };
  }
  if (error instanceof Error) {
    return { status: 500, message: redactSecrets(error.message) };
  }
  return { status: 500, message: 'Internal server error' };
}
