import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { getConfig } from "../config/loadConfig.js";
import { ConfigError } from "../errors.js";

let client: SupabaseClient | null = null;

// Created on first use so that modules importing persistence helpers load
// without Supabase credentials; the first query fails instead.
export function getSupabase(): SupabaseClient {
  if (client) return client;

  const { url, key } = getConfig().supabase;
  if (!url || !key) {
    throw new ConfigError("Missing Supabase env vars (SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY)");
  }

  client = createClient(url, key, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });
  return client;
}
