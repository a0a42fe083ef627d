import { SupabaseClient } from '@supabase/supabase-js';
import { EntityStore, RowMapper } from '../types/repository.types';
import { logger } from '../config/logger';
import { AppError, ErrorCode } from '../types/error.types';

export interface TableDefinition {
  table: string;
  idColumn: string;
  // getAll() ordering; omitted for tables with no ordering guarantee
  orderColumn?: string;
}

/**
 * Supabase Repository
 *
 * Upsert/get/list/delete for one table, keyed by the table's identifier column.
 * Entity <-> row conversion is delegated to a RowMapper.
 */
export class SupabaseRepository<T, Row> implements EntityStore<T> {
  constructor(
    protected client: SupabaseClient,
    protected definition: TableDefinition,
    protected mapper: RowMapper<T, Row>
  ) {}

  async save(entity: T): Promise<boolean> {
    const row = this.mapper.toRow(entity);
    const { table, idColumn } = this.definition;

    const { error } = await this.client.from(table).upsert(row, { onConflict: idColumn });

    if (error) {
      logger.error(`Failed to save ${table} row`, {
        id: this.mapper.idOf(row),
        error: error.message,
        code: error.code,
      });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to save ${table} row: ${error.message}`, 500);
    }

    return true;
  }

  async getById(id: string): Promise<T | null> {
    const { table, idColumn } = this.definition;

    const { data, error } = await this.client.from(table).select('*').eq(idColumn, id).maybeSingle();

    if (error) {
      logger.error(`Failed to find ${table} row`, { id, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to find ${table} row: ${error.message}`, 500);
    }

    return data ? this.mapper.fromRow(data) : null;
  }

  async getAll(): Promise<T[]> {
    const { table, orderColumn } = this.definition;

    const query = this.client.from(table).select('*');
    const { data, error } = orderColumn ? await query.order(orderColumn, { ascending: true }) : await query;

    if (error) {
      logger.error(`Failed to list ${table}`, { error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to list ${table}: ${error.message}`, 500);
    }

    return this.mapRows(data);
  }

  async delete(id: string): Promise<boolean> {
    const { table, idColumn } = this.definition;

    const { data, error } = await this.client.from(table).delete().eq(idColumn, id).select();

    if (error) {
      logger.error(`Failed to delete ${table} row`, { id, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to delete ${table} row: ${error.message}`, 500);
    }

    return (data?.length ?? 0) > 0;
  }

  protected mapRows(rows: Row[] | null): T[] {
    return (rows ?? []).map((row) => this.mapper.fromRow(row));
  }
}
