import type { Item } from '../models/item.model';
import type { Loan } from '../models/loan.model';
import type { User } from '../models/user.model';

/**
 * Persistence contract per entity type, keyed by identifier
 */
export interface EntityStore<T> {
  // Upsert: overwrites an existing record with the same identifier
  save(entity: T): Promise<boolean>;
  getById(id: string): Promise<T | null>;
  getAll(): Promise<T[]>;
  // true iff a record existed and was removed
  delete(id: string): Promise<boolean>;
}

export interface ItemStore extends EntityStore<Item> {
  // Case-insensitive substring match on title
  search(titleSubstring: string): Promise<Item[]>;
}

export interface LibraryStores {
  items: ItemStore;
  users: EntityStore<User>;
  loans: EntityStore<Loan>;
}

/**
 * Converts between a domain entity and its persisted row
 */
export interface RowMapper<T, Row> {
  toRow(entity: T): Row;
  fromRow(row: Row): T;
  idOf(row: Row): string;
}
