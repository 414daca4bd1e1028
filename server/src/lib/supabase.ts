import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { AppConfig } from './config.js';

let supabaseAdmin: SupabaseClient | null = null;

/**
 * Service-role client, created on first use. Returns null when Supabase is
 * not configured so callers can fall back to the in-memory repository.
 */
export function getSupabaseAdmin(config: AppConfig['supabase']): SupabaseClient | null {
  if (!config) return null;
  if (!supabaseAdmin) {
    supabaseAdmin = createClient(config.url, config.serviceRoleKey, {
      auth: { persistSession: false, autoRefreshToken: false },
    });
  }
  return supabaseAdmin;
}
