import { SupabaseClient } from '@supabase/supabase-js';
import { User } from '../models/user.model';
import { UserRow } from '../types/user.types';
import { SupabaseRepository } from './supabase.repository';
import { userRowMapper } from './row-mappers';

/**
 * User Repository
 *
 * Members and staff share the users table, discriminated by `role`
 */
export class UserRepository extends SupabaseRepository<User, UserRow> {
  constructor(client: SupabaseClient) {
    super(client, { table: 'users', idColumn: 'user_id', orderColumn: 'name' }, userRowMapper);
  }
}
