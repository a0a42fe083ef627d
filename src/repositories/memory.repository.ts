import { Item } from '../models/item.model';
import { Loan } from '../models/loan.model';
import { User } from '../models/user.model';
import { ItemRow } from '../types/item.types';
import { LoanRow } from '../types/loan.types';
import { EntityStore, ItemStore, LibraryStores, RowMapper } from '../types/repository.types';
import { UserRow } from '../types/user.types';
import { itemRowMapper, loanRowMapper, userRowMapper } from './row-mappers';

/**
 * In-memory Repository
 *
 * Keeps rows (not live entities) so every read returns a fresh copy,
 * the same as a round trip through the database
 */
export class InMemoryRepository<T, Row> implements EntityStore<T> {
  protected rows = new Map<string, Row>();

  constructor(
    protected mapper: RowMapper<T, Row>,
    private compare?: (a: Row, b: Row) => number
  ) {}

  async save(entity: T): Promise<boolean> {
    const row = this.mapper.toRow(entity);
    this.rows.set(this.mapper.idOf(row), structuredClone(row));
    return true;
  }

  async getById(id: string): Promise<T | null> {
    const row = this.rows.get(id);
    return row ? this.mapper.fromRow(structuredClone(row)) : null;
  }

  async getAll(): Promise<T[]> {
    return this.mapRows([...this.rows.values()]);
  }

  async delete(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }

  protected mapRows(rows: Row[]): T[] {
    const ordered = this.compare ? [...rows].sort(this.compare) : rows;
    return ordered.map((row) => this.mapper.fromRow(structuredClone(row)));
  }
}

const byText = (a: string, b: string): number => a.localeCompare(b);

export class InMemoryItemRepository extends InMemoryRepository<Item, ItemRow> implements ItemStore {
  constructor() {
    super(itemRowMapper, (a, b) => byText(a.title, b.title));
  }

  async search(titleSubstring: string): Promise<Item[]> {
    const needle = titleSubstring.toLowerCase();
    return this.mapRows([...this.rows.values()].filter((row) => row.title.toLowerCase().includes(needle)));
  }
}

export const createInMemoryStores = (): LibraryStores => ({
  items: new InMemoryItemRepository(),
  users: new InMemoryRepository<User, UserRow>(userRowMapper, (a, b) => byText(a.name, b.name)),
  loans: new InMemoryRepository<Loan, LoanRow>(loanRowMapper),
});
