import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import config from '../../platform/config.js';
import { logger } from '../../platform/logger.js';

const COMPONENT = 'SupabaseClient';

class SupabaseService {
    private static instance: SupabaseService;
    public client: SupabaseClient | null = null;

    private constructor() {
        if (config.supabase.url && config.supabase.key) {
            try {
                // Node's global fetch: node-fetch's Response does not satisfy the fetch type
                // supabase-js takes, so HTTP(S)_PROXY applies to provider traffic only
                this.client = createClient(config.supabase.url, config.supabase.key, {
                    auth: { persistSession: false, autoRefreshToken: false },
                });
                logger.info({ kind: 'sys', component: COMPONENT, message: 'Supabase client initialized', meta: { url: config.supabase.url } });
            } catch (error) {
                logger.error({ kind: 'sys', component: COMPONENT, message: 'Failed to initialize Supabase client', error });
            }
        } else {
            logger.warn({ kind: 'sys', component: COMPONENT, message: 'Supabase credentials missing, falling back to in-memory store' });
        }
    }

    public static getInstance(): SupabaseService {
        if (!SupabaseService.instance) {
            SupabaseService.instance = new SupabaseService();
        }
        return SupabaseService.instance;
    }
}

/** Lazily built; null when SUPABASE_URL / SUPABASE_KEY are not set */
export const getSupabaseClient = (): SupabaseClient | null => SupabaseService.getInstance().client;
