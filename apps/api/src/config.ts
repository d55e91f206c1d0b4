/**
 * Application configuration, read from environment variables.
 */

import { z } from 'zod';

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

// dotenv leaves `KEY=` as an empty string; coercing that would give 0.
const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const EnvSchema = z
  .object({
    PLAID_CLIENT_ID: z.string().trim().min(1, 'PLAID_CLIENT_ID is required'),
    PLAID_SECRET: z.string().trim().min(1, 'PLAID_SECRET is required'),
    PLAID_ENV: z
      .string()
      .trim()
      .toLowerCase()
      .pipe(z.enum(['sandbox', 'production']))
      .default('sandbox'),
    PLAID_CLIENT_NAME: z.string().trim().min(1).default('banksync'),
    PLAID_WEBHOOK_URL: optionalString,
    PLAID_REDIRECT_URI: optionalString,
    SUPABASE_URL: optionalString,
    SUPABASE_SERVICE_ROLE_KEY: optionalString,
    SUPABASE_ANON_KEY: optionalString,
    CREDENTIAL_ENCRYPTION_KEY: optionalString,
    DATABASE_URL: optionalString,
    PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(65535).default(3001)),
    CORS_ORIGINS: z.string().default('http://localhost:3000'),
    SYNC_INTERVAL_MINUTES: z.preprocess(blankToUndefined, z.coerce.number().positive().optional()),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .superRefine((env, ctx) => {
    if (env.SUPABASE_URL === undefined) return;
    if (env.SUPABASE_SERVICE_ROLE_KEY === undefined && env.SUPABASE_ANON_KEY === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_SERVICE_ROLE_KEY'],
        message: 'SUPABASE_SERVICE_ROLE_KEY or SUPABASE_ANON_KEY is required when SUPABASE_URL is set',
      });
    }
    if (env.CREDENTIAL_ENCRYPTION_KEY === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CREDENTIAL_ENCRYPTION_KEY'],
        message: 'CREDENTIAL_ENCRYPTION_KEY is required when SUPABASE_URL is set',
      });
    }
  });

export interface AppConfig {
  plaid: {
    clientId: string;
    secret: string;
    env: 'sandbox' | 'production';
    clientName: string;
    webhookUrl?: string;
    redirectUri?: string;
  };
  /** Absent means the in-memory store. */
  supabase?: {
    url: string;
    serviceRoleKey?: string;
    anonKey?: string;
    encryptionKey: string;
  };
  databaseUrl?: string;
  port: number;
  corsOrigins: string[];
  syncIntervalMinutes?: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const key = issue.path.join('.');
        return issue.message.startsWith(key) ? issue.message : `${key}: ${issue.message}`;
      })
    );
  }

  const e = parsed.data;
  const config: AppConfig = {
    plaid: {
      clientId: e.PLAID_CLIENT_ID,
      secret: e.PLAID_SECRET,
      env: e.PLAID_ENV,
      clientName: e.PLAID_CLIENT_NAME,
      ...(e.PLAID_WEBHOOK_URL !== undefined ? { webhookUrl: e.PLAID_WEBHOOK_URL } : {}),
      ...(e.PLAID_REDIRECT_URI !== undefined ? { redirectUri: e.PLAID_REDIRECT_URI } : {}),
    },
    port: e.PORT,
    corsOrigins: e.CORS_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin !== ''),
    logLevel: e.LOG_LEVEL,
  };

  if (e.SUPABASE_URL !== undefined && e.CREDENTIAL_ENCRYPTION_KEY !== undefined) {
    config.supabase = {
      url: e.SUPABASE_URL,
      encryptionKey: e.CREDENTIAL_ENCRYPTION_KEY,
      ...(e.SUPABASE_SERVICE_ROLE_KEY !== undefined ? { serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY } : {}),
      ...(e.SUPABASE_ANON_KEY !== undefined ? { anonKey: e.SUPABASE_ANON_KEY } : {}),
    };
  }
  if (e.DATABASE_URL !== undefined) {
    config.databaseUrl = e.DATABASE_URL;
  }
  if (e.SYNC_INTERVAL_MINUTES !== undefined) {
    config.syncIntervalMinutes = e.SYNC_INTERVAL_MINUTES;
  }

  return config;
}
