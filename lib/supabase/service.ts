import { createClient, type SupabaseClient } from "@supabase/supabase-js";

export type ServiceClientEnv = {
  SUPABASE_URL?: string;
  SUPABASE_SERVICE_ROLE_KEY?: string;
};

export type ServiceClientOptions = {
  /** Replaces the global fetch for every request the client makes. */
  fetch?: typeof fetch;
};

/**
 * Server-only. Used by the batch scripts (reclassification, readiness report).
 * Requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY.
 */
export function createServiceRoleClient(
  env: ServiceClientEnv = process.env,
  options: ServiceClientOptions = {}
): SupabaseClient {
  const url = env.SUPABASE_URL;
  const key = env.SUPABASE_SERVICE_ROLE_KEY;
  if (!url || !key) {
    throw new Error("Missing SUPABASE_URL and/or SUPABASE_SERVICE_ROLE_KEY for service role client");
  }
  return createClient(url, key, {
    auth: { persistSession: false, autoRefreshToken: false },
    global: options.fetch ? { fetch: options.fetch } : undefined,
  });
}
