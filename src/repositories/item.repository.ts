import { SupabaseClient } from '@supabase/supabase-js';
import { Item } from '../models/item.model';
import { ItemRow } from '../types/item.types';
import { ItemStore } from '../types/repository.types';
import { logger } from '../config/logger';
import { AppError, ErrorCode } from '../types/error.types';
import { SupabaseRepository } from './supabase.repository';
import { itemRowMapper } from './row-mappers';

// ilike treats % and _ as wildcards
const escapeLikePattern = (value: string): string => value.replace(/[\\%_]/g, (ch) => `\\${ch}`);

/**
 * Item Repository
 *
 * Handles all database operations for items table
 */
export class ItemRepository extends SupabaseRepository<Item, ItemRow> implements ItemStore {
  constructor(client: SupabaseClient) {
    super(client, { table: 'items', idColumn: 'item_id', orderColumn: 'title' }, itemRowMapper);
  }

  /**
   * Case-insensitive substring search on title, ordered by title
   */
  async search(titleSubstring: string): Promise<Item[]> {
    const { data, error } = await this.client
      .from('items')
      .select('*')
      .ilike('title', `%${escapeLikePattern(titleSubstring)}%`)
      .order('title', { ascending: true });

    if (error) {
      logger.error('Failed to search items', { query: titleSubstring, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to search items: ${error.message}`, 500);
    }

    return this.mapRows(data);
  }
}
