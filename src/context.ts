import { env, libraryPolicy, LibraryPolicy } from './config/environment';
import { getSupabaseClient } from './config/database';
import { configureCirculationPolicy } from './models/circulation-policy';
import { ItemRepository } from './repositories/item.repository';
import { LoanRepository } from './repositories/loan.repository';
import { UserRepository } from './repositories/user.repository';
import { createInMemoryStores } from './repositories/memory.repository';
import { LibraryDirectory, IdGenerator } from './services/directory.service';
import { ItemService } from './services/item.service';
import { LoanService } from './services/loan.service';
import { MaintenanceService } from './services/maintenance.service';
import { UserService } from './services/user.service';
import { WriteThrough } from './services/write-through';
import { LibraryStores } from './types/repository.types';

export interface LibraryContext {
  directory: LibraryDirectory;
  stores: LibraryStores;
  itemService: ItemService;
  userService: UserService;
  loanService: LoanService;
  maintenanceService: MaintenanceService;
}

export interface LibraryContextOptions {
  stores?: LibraryStores;
  policy?: LibraryPolicy;
  generateLoanId?: IdGenerator;
}

/**
 * Stores selected by STORAGE_DRIVER
 */
export const createStores = (): LibraryStores => {
  if (env.STORAGE_DRIVER === 'memory') {
    return createInMemoryStores();
  }

  const client = getSupabaseClient();
  return {
    items: new ItemRepository(client),
    users: new UserRepository(client),
    loans: new LoanRepository(client),
  };
};

/**
 * Wire the directory, stores and services together.
 * Applies the circulation policy process-wide.
 */
export const createLibraryContext = (options: LibraryContextOptions = {}): LibraryContext => {
  const policy = options.policy ?? libraryPolicy;
  configureCirculationPolicy({
    dailyFineRate: policy.dailyFineRate,
    fineBlockThreshold: policy.fineBlockThreshold,
    membershipTermDays: policy.membershipTermDays,
    enforceMembershipExpiry: policy.enforceMembershipExpiry,
  });

  const stores = options.stores ?? createStores();
  const directory = new LibraryDirectory({
    name: policy.libraryName,
    ...(options.generateLoanId && { generateLoanId: options.generateLoanId }),
  });
  const writeThrough = new WriteThrough(stores);

  return {
    directory,
    stores,
    itemService: new ItemService(directory, writeThrough),
    userService: new UserService(directory, writeThrough),
    loanService: new LoanService(directory, writeThrough),
    maintenanceService: new MaintenanceService(directory, stores),
  };
};
