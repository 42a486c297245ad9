import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { AppConfig, config } from "../config";

type SupabaseSettings = Pick<AppConfig, "supabaseUrl" | "supabaseServiceKey">;

const clients = new Map<string, SupabaseClient>();

/**
 * Get the Supabase client for the given settings, one per project URL
 * Returns null if credentials not configured
 */
export function getSupabase(settings: SupabaseSettings = config): SupabaseClient | null {
  if (!isSupabaseConfigured(settings)) {
    return null;
  }

  let client = clients.get(settings.supabaseUrl);
  if (!client) {
    // Queue sends only; no user session to keep
    client = createClient(settings.supabaseUrl, settings.supabaseServiceKey, {
      auth: { persistSession: false, autoRefreshToken: false },
    });
    clients.set(settings.supabaseUrl, client);
  }

  return client;
}

export function isSupabaseConfigured(settings: SupabaseSettings = config): boolean {
  return !!(settings.supabaseUrl && settings.supabaseServiceKey);
}
