import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export interface SupabaseClientOptions {
    /** HTTP implementation used for every PostgREST call; defaults to the global fetch. */
    fetch?: typeof fetch;
}

// The service role key bypasses Row-Level Security; it must only ever be used server-side.
export function createSupabaseClient(
    supabaseUrl: string,
    supabaseServiceKey: string,
    options: SupabaseClientOptions = {},
): SupabaseClient {
    return createClient(supabaseUrl, supabaseServiceKey, {
        auth: { persistSession: false, autoRefreshToken: false },
        ...(options.fetch ? { global: { fetch: options.fetch } } : {}),
    });
}
