import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { getConfig } from "@/lib/config";

/** Service-role client. Server only: it bypasses row level security. */
export function createSupabaseServerClient(): SupabaseClient {
  const { url, serviceRoleKey } = getConfig().supabase;
  return createClient(url, serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false }
  });
}

/**
 * Throwaway anon client for password sign-in. Signing in stores the user's
 * session on the client, so it must never be the shared service client.
 */
export function createSupabaseAuthClient(): SupabaseClient {
  const { url, anonKey } = getConfig().supabase;
  return createClient(url, anonKey, {
    auth: { persistSession: false, autoRefreshToken: false }
  });
}
