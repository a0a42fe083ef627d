import { Item } from '../models/item.model';
import { Loan } from '../models/loan.model';
import { User } from '../models/user.model';
import { LibraryStores } from '../types/repository.types';
import { componentLogger } from '../config/logger';

const log = componentLogger('write-through');

export interface PendingWrites {
  items?: Item[];
  users?: User[];
  loans?: Loan[];
  deletedItemIds?: string[];
  deletedUserIds?: string[];
}

/**
 * Write-through to the persistence adapter after an in-memory operation succeeded.
 *
 * Store failures are logged and reported back as `false`; the in-memory
 * directory stays authoritative and is never rolled back because of them.
 */
export class WriteThrough {
  constructor(private stores: LibraryStores) {}

  async commit(operation: string, writes: PendingWrites): Promise<boolean> {
    const labelled: Array<[string, Promise<boolean>]> = [
      ...(writes.items ?? []).map((item): [string, Promise<boolean>] => [`item:${item.id}`, this.stores.items.save(item)]),
      ...(writes.users ?? []).map((user): [string, Promise<boolean>] => [`user:${user.id}`, this.stores.users.save(user)]),
      ...(writes.loans ?? []).map((loan): [string, Promise<boolean>] => [`loan:${loan.id}`, this.stores.loans.save(loan)]),
      ...(writes.deletedItemIds ?? []).map((id): [string, Promise<boolean>] => [`item:${id}`, this.stores.items.delete(id)]),
      ...(writes.deletedUserIds ?? []).map((id): [string, Promise<boolean>] => [`user:${id}`, this.stores.users.delete(id)]),
    ];

    const results = await Promise.allSettled(labelled.map(([, write]) => write));
    const failed = results.flatMap((result, index) => {
      if (result.status === 'fulfilled') return [];
      const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
      return [{ record: labelled[index]?.[0] ?? 'unknown', reason }];
    });

    if (failed.length > 0) {
      log.error('Persistence failed after in-memory update', { operation, failed });
      return false;
    }

    log.debug('Changes persisted', { operation, records: labelled.map(([label]) => label) });
    return true;
  }
}
