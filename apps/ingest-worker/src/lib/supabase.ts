import { createClient } from '@supabase/supabase-js';
import type { SupabaseClient } from '@supabase/supabase-js';
import WebSocket from 'ws';

export interface SupabaseClientOptions {
  fetch?: typeof fetch;
}

/**
 * Service-role client. Node 20 has no global WebSocket, so the realtime
 * transport is supplied from `ws` even though the store never subscribes.
 */
export function createSupabaseClient(
  url?: string,
  key?: string,
  options: SupabaseClientOptions = {},
): SupabaseClient {
  const supabaseUrl = url ?? process.env.SUPABASE_URL;
  const serviceKey = key ?? process.env.SUPABASE_SERVICE_ROLE_KEY;
  if (!supabaseUrl || !serviceKey) {
    throw new Error('Supabase credentials missing');
  }
  return createClient(supabaseUrl, serviceKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
    realtime: { transport: WebSocket },
    global: options.fetch ? { fetch: options.fetch } : undefined,
  });
}
