import { IntegrityViolation, LibraryStatistics } from '../types/directory.types';
import { LibraryStores } from '../types/repository.types';
import { getDailyFineRate, setDailyFineRate } from '../models/circulation-policy';
import { componentLogger } from '../config/logger';
import { LibraryDirectory } from './directory.service';

const log = componentLogger('maintenance-service');

export interface LoadSummary {
  items: number;
  users: number;
  loans: number;
}

/**
 * Maintenance Service
 *
 * Hydration from the store, system statistics, integrity diagnostics and the fine rate
 */
export class MaintenanceService {
  constructor(
    private directory: LibraryDirectory,
    private stores: LibraryStores
  ) {}

  /**
   * Replace the in-memory directory with the contents of the store
   */
  async loadFromStore(): Promise<LoadSummary> {
    log.info('Loading library state from store');

    const [items, users, loans] = await Promise.all([
      this.stores.items.getAll(),
      this.stores.users.getAll(),
      this.stores.loans.getAll(),
    ]);

    this.directory.restore({ items, users, loans });

    const summary = { items: items.length, users: users.length, loans: loans.length };
    log.info('Library state loaded', summary);
    return summary;
  }

  async getStatistics(): Promise<LibraryStatistics> {
    return this.directory.getStatistics();
  }

  async validateIntegrity(): Promise<IntegrityViolation[]> {
    log.info('Running integrity scan');

    const violations = this.directory.validateIntegrity();

    if (violations.length > 0) {
      log.warn('Integrity violations found', { count: violations.length, violations });
    } else {
      log.info('Integrity scan clean');
    }

    return violations;
  }

  async setDailyFineRate(rate: number): Promise<number> {
    const previous = getDailyFineRate();
    setDailyFineRate(rate);

    log.info('Daily fine rate changed', { previous, rate });
    return getDailyFineRate();
  }
}
