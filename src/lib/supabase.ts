// src/lib/supabase.ts
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { getConfig } from './config';

let client: SupabaseClient | null = null;

/**
 * Shared Supabase client, or null when no project is configured.
 * The journal only reads, so sessions are neither persisted nor refreshed.
 */
export function getSupabaseClient(): SupabaseClient | null {
  const { supabase } = getConfig();
  if (!supabase) {
    return null;
  }
  if (!client) {
    client = createClient(supabase.url, supabase.anonKey, {
      auth: {
        persistSession: false,
        autoRefreshToken: false,
        detectSessionInUrl: false,
      },
    });
  }
  return client;
}
