/**
 * Server-side Supabase Client
 *
 * Uses SUPABASE_URL + SUPABASE_SERVICE_ROLE_KEY. The service-role client
 * bypasses RLS, so it is only handed to the stores and jobs in this package.
 * Stores never create a client themselves; callers pass one in.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

let serverClient: SupabaseClient | null = null;

export function isServerSupabaseConfigured(): boolean {
    return Boolean(
        process.env.SUPABASE_URL && process.env.SUPABASE_SERVICE_ROLE_KEY,
    );
}

/**
 * Create (or reuse) the service-role client.
 * Throws if credentials are missing.
 */
export function createServerSupabase(): SupabaseClient {
    if (serverClient) return serverClient;

    const url = process.env.SUPABASE_URL;
    const key = process.env.SUPABASE_SERVICE_ROLE_KEY;

    if (!url || !key) {
        throw new Error(
            'Supabase not configured: SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required.',
        );
    }

    serverClient = createClient(url, key, {
        auth: { persistSession: false, autoRefreshToken: false },
    });
    console.log('[Supabase] Service-role client created');

    return serverClient;
}

/** Drop the cached client (tests, credential rotation) */
export function resetServerSupabase(): void {
    serverClient = null;
}
