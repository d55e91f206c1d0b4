/**
 * Supabase client initialization.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export interface SupabaseConfig {
  url: string;
  /** Preferred for server-side use; bypasses row level security. */
  serviceRoleKey?: string | undefined;
  anonKey?: string | undefined;
}

/**
 * Create a new Supabase client instance.
 * Uses service role key if available for server-side operations.
 */
export function createSupabaseClient(config: SupabaseConfig): SupabaseClient {
  const key = config.serviceRoleKey !== undefined && config.serviceRoleKey !== '' ? config.serviceRoleKey : config.anonKey;
  if (key === undefined || key === '') {
    throw new Error('Supabase key is required.');
  }

  return createClient(config.url, key, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
    db: {
      schema: 'public',
    },
  });
}

