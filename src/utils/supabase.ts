import { createClient, SupabaseClient } from '@supabase/supabase-js';

/**
 * Create a service-role Supabase client for the RAG store and index.
 *
 * No session is persisted: the backend never signs users in, it only calls
 * the RPC functions from supabase/migrations.
 */
export function createServiceClient(
  url: string,
  serviceRoleKey: string,
  fetchImpl?: typeof fetch
): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
    global: fetchImpl ? { fetch: fetchImpl } : {},
  });
}
