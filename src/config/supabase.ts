import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { AppConfig } from './appConfig';

let adminClient: SupabaseClient | null = null;

// Service-role client, created on first use
export function getSupabaseAdmin(config: AppConfig): SupabaseClient {
  if (adminClient) {
    return adminClient;
  }

  const { url, serviceRoleKey } = config.supabase;
  if (!url || !serviceRoleKey) {
    throw new Error('Missing SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY');
  }

  adminClient = createClient(url, serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return adminClient;
}
