import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { logger } from './logger';
import { env } from './environment';
import { AppError, ErrorCode } from '../types/error.types';

// Singleton Supabase client instance
let supabaseClient: SupabaseClient | null = null;

/**
 * Get or create Supabase client instance (singleton pattern)
 *
 * Uses the service role key; the API has no end-user sessions.
 */
export const getSupabaseClient = (): SupabaseClient => {
  if (!supabaseClient) {
    if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_ROLE_KEY) {
      throw new Error('Supabase is not configured (set SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY)');
    }

    supabaseClient = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
      db: {
        schema: 'public',
      },
    });

    logger.info('Supabase client initialized', {
      url: env.SUPABASE_URL,
      schema: 'public',
    });
  }

  return supabaseClient;
};

/**
 * Test database connection
 */
export const testConnection = async (): Promise<boolean> => {
  try {
    const client = getSupabaseClient();

    const { error } = await client.from('items').select('item_id').limit(1);

    if (error) {
      logger.error('Database connection test failed', { error: error.message });
      return false;
    }

    logger.info('Database connection test successful');
    return true;
  } catch (error) {
    logger.error('Database connection test failed', { error });
    return false;
  }
};

/**
 * Fail fast at startup when the database cannot be reached
 */
export const ensureConnection = async (): Promise<void> => {
  if (!(await testConnection())) {
    throw new AppError(ErrorCode.DATABASE_ERROR, 'Database connection test failed', 503);
  }
};

/**
 * Drop the client reference (for graceful shutdown)
 */
export const closeConnection = (): void => {
  if (supabaseClient) {
    // Connection pooling is managed by Supabase; there is nothing to close
    supabaseClient = null;
    logger.info('Supabase client connection closed');
  }
};
