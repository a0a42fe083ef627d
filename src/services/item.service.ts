import { createItem, Item, NewItemInput } from '../models/item.model';
import { ItemFilter } from '../types/item.types';
import { PopularCatalogItem } from '../types/directory.types';
import { AppError, ErrorCode, NotFoundError } from '../types/error.types';
import { componentLogger } from '../config/logger';
import { LibraryDirectory } from './directory.service';
import { WriteThrough } from './write-through';

const log = componentLogger('item-service');

export interface Persisted<T> {
  value: T;
  persisted: boolean;
}

/**
 * Item Service
 *
 * Catalog operations: add, look up, list, search and withdraw items
 */
export class ItemService {
  constructor(
    private directory: LibraryDirectory,
    private writeThrough: WriteThrough
  ) {}

  async addItem(input: NewItemInput): Promise<Persisted<Item>> {
    log.info('Adding item', { id: input.id, kind: input.kind });

    const item = createItem(input);

    if (!this.directory.addItem(item)) {
      throw new AppError(ErrorCode.DUPLICATE_IDENTIFIER, `Item with ID ${item.id} already exists`, 409);
    }

    const persisted = await this.writeThrough.commit('addItem', { items: [item] });

    log.info('Item added', { itemId: item.id, kind: item.kind });
    return { value: item, persisted };
  }

  async getItem(id: string): Promise<Item> {
    const item = this.directory.getItem(id);

    if (!item) {
      throw new NotFoundError(ErrorCode.ITEM_NOT_FOUND, `Item with ID ${id} not found`);
    }

    return item;
  }

  /**
   * Filtered listing, ordered by title
   */
  async listItems(filter: ItemFilter = {}): Promise<Item[]> {
    return this.directory.listItems(filter).sort((a, b) => a.title.localeCompare(b.title));
  }

  async removeItem(id: string): Promise<Persisted<Item>> {
    log.info('Removing item', { id });

    const item = await this.getItem(id);

    if (!this.directory.removeItem(id)) {
      throw new AppError(ErrorCode.ITEM_ON_LOAN, `Item ${id} is currently on loan and cannot be removed`, 409);
    }

    const persisted = await this.writeThrough.commit('removeItem', { deletedItemIds: [id] });

    log.info('Item removed', { itemId: id });
    return { value: item, persisted };
  }

  async getPopularItems(limit: number): Promise<PopularCatalogItem[]> {
    return this.directory.getPopularItems(limit);
  }
}
