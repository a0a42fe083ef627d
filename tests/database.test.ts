import { describe, it, expect, beforeEach, vi } from 'vitest';

const supabase = vi.hoisted(() => {
  process.env['SUPABASE_URL'] = 'http://localhost:54321';
  process.env['SUPABASE_SERVICE_ROLE_KEY'] = 'test-secret';

  const state: { error: { message: string; code?: string } | null } = { error: null };
  return state;
});

vi.mock('@supabase/supabase-js', () => ({
  createClient: () => ({
    from: () => ({
      select: () => ({
        limit: async () => ({ data: [], error: supabase.error }),
        order: async () => ({ data: null, error: supabase.error }),
      }),
    }),
  }),
}));

import { ensureConnection, getSupabaseClient, testConnection } from '../src/config/database';
import { ItemRepository } from '../src/repositories/item.repository';
import { ErrorCode } from '../src/types/error.types';

describe('Database connection', () => {
  beforeEach(() => {
    supabase.error = null;
  });

  it('reports a reachable database', async () => {
    await expect(testConnection()).resolves.toBe(true);
    await expect(ensureConnection()).resolves.toBeUndefined();
  });

  it('refuses to start against an unreachable database', async () => {
    supabase.error = { message: 'connection refused' };

    await expect(testConnection()).resolves.toBe(false);
    await expect(ensureConnection()).rejects.toMatchObject({
      code: ErrorCode.DATABASE_ERROR,
      statusCode: 503,
      message: 'Database connection test failed',
    });
  });

  it('raises DATABASE_ERROR when a query fails', async () => {
    supabase.error = { message: 'relation "items" does not exist', code: '42P01' };
    const items = new ItemRepository(getSupabaseClient());

    await expect(items.getAll()).rejects.toMatchObject({
      code: ErrorCode.DATABASE_ERROR,
      statusCode: 500,
      message: 'Failed to list items: relation "items" does not exist',
    });
  });
});
