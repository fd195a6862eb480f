import { createClient, type SupabaseClient } from '@supabase/supabase-js';

/**
 * Service-role client for the worker and API processes. Callers own its
 * lifetime; nothing here is cached at module level.
 */
export function createSupabaseAdmin(url: string, serviceRoleKey: string): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
