/**
 * Supabase admin client for the subscription repository
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import type { SupabaseSettings } from './config.js';

/**
 * Service-role client. The engine never handles end-user sessions, so
 * token refresh and session storage stay off.
 */
export function createSupabaseAdmin(settings: SupabaseSettings): SupabaseClient {
  return createClient(settings.url, settings.serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
    db: { schema: 'public' },
  });
}
