import { createClient, type SupabaseClient } from "@supabase/supabase-js";

import type { Config } from "../config/configTypes.js";

export type SupabaseClientCreateOptions = {
    fetch?: typeof fetch;
};

/**
 * Creates a service-role Supabase client. The relay acts for many users by chat id,
 * so it keeps no auth session of its own.
 */
export function supabaseClientCreate(
    config: Config["supabase"],
    options: SupabaseClientCreateOptions = {}
): SupabaseClient {
    return createClient(config.url, config.serviceKey, {
        auth: {
            persistSession: false,
            autoRefreshToken: false,
            detectSessionInUrl: false
        },
        global: options.fetch ? { fetch: options.fetch } : undefined
    });
}
