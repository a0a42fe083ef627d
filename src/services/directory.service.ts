import { v4 as uuidv4 } from 'uuid';
import { Item } from '../models/item.model';
import { Loan } from '../models/loan.model';
import { User } from '../models/user.model';
import {
  CheckInResult,
  CheckOutResult,
  DirectoryFailureReason,
  DirectorySnapshot,
  IntegrityViolation,
  LibraryStatistics,
  MemberActivity,
  OperationFailure,
  PopularCatalogItem,
  RenewResult,
} from '../types/directory.types';
import { ItemFilter, ItemKind } from '../types/item.types';
import { RenewalDenialReason } from '../types/loan.types';
import { UserKind } from '../types/user.types';
import { formatCurrency, formatDate, roundCurrency, wholeDaysBetween } from '../utils/dates';
import { componentLogger } from '../config/logger';

const log = componentLogger('library-directory');

export type IdGenerator = () => string;

export interface LibraryDirectoryOptions {
  name?: string;
  generateLoanId?: IdGenerator;
}

const RECENT_LOAN_LIMIT = 10;

const fail = (reason: DirectoryFailureReason, message: string): OperationFailure => ({
  success: false,
  reason,
  message,
});

const RENEWAL_DENIAL_MESSAGES: Record<RenewalDenialReason, string> = {
  RETURNED: 'Cannot renew loan: item has already been returned',
  MAX_RENEWALS_REACHED: 'Cannot renew loan: maximum renewals reached',
  OVERDUE: 'Cannot renew loan: item is overdue',
};

/**
 * Library Directory
 *
 * Aggregate root over items, users and loans. Sole owner of loan records;
 * items and users are referenced by identifier only.
 *
 * Every operation is synchronous and runs to completion, so the registries
 * (item-by-id, user-by-id, loan-by-id, user -> active loan ids) are always
 * updated together. Business-rule refusals come back as `{ success: false }`
 * results rather than exceptions.
 */
export class LibraryDirectory {
  readonly name: string;
  private readonly startedAt = new Date();
  private readonly generateLoanId: IdGenerator;

  private items = new Map<string, Item>();
  private users = new Map<string, User>();
  private loans = new Map<string, Loan>();
  private activeLoans = new Map<string, string[]>();

  constructor(options: LibraryDirectoryOptions = {}) {
    this.name = options.name ?? 'City Library';
    this.generateLoanId = options.generateLoanId ?? uuidv4;
  }

  get totalItems(): number {
    return this.items.size;
  }

  get totalUsers(): number {
    return this.users.size;
  }

  get totalLoans(): number {
    return this.loans.size;
  }

  get activeLoanCount(): number {
    let count = 0;
    for (const ids of this.activeLoans.values()) count += ids.length;
    return count;
  }

  /**
   * Replace the directory contents with persisted state and rebuild the active-loan index
   */
  restore(snapshot: DirectorySnapshot): void {
    this.items = new Map(snapshot.items.map((item) => [item.id, item]));
    this.users = new Map(snapshot.users.map((user) => [user.id, user]));
    this.activeLoans = new Map(snapshot.users.map((user) => [user.id, []]));

    const ordered = [...snapshot.loans].sort((a, b) => a.dateBorrowed.getTime() - b.dateBorrowed.getTime());
    this.loans = new Map(ordered.map((loan) => [loan.id, loan]));

    for (const loan of ordered) {
      if (loan.isReturned) continue;
      const ids = this.activeLoans.get(loan.userId);
      if (ids) {
        ids.push(loan.id);
      } else {
        this.activeLoans.set(loan.userId, [loan.id]);
      }
    }
  }

  // User management

  registerUser(user: User): boolean {
    if (this.users.has(user.id)) return false;
    this.users.set(user.id, user);
    this.activeLoans.set(user.id, []);
    return true;
  }

  getUser(userId: string): User | undefined {
    return this.users.get(userId);
  }

  removeUser(userId: string): boolean {
    if (!this.users.has(userId)) return false;
    if ((this.activeLoans.get(userId)?.length ?? 0) > 0) return false;

    this.users.delete(userId);
    this.activeLoans.delete(userId);
    return true;
  }

  listUsers(role?: UserKind): User[] {
    const users = [...this.users.values()];
    return role ? users.filter((user) => user.role() === role) : users;
  }

  // Item management

  addItem(item: Item): boolean {
    if (this.items.has(item.id)) return false;
    this.items.set(item.id, item);
    return true;
  }

  getItem(itemId: string): Item | undefined {
    return this.items.get(itemId);
  }

  removeItem(itemId: string): boolean {
    const item = this.items.get(itemId);
    if (!item || !item.isAvailable()) return false;
    this.items.delete(itemId);
    return true;
  }

  listItems(filter: ItemFilter = {}): Item[] {
    const needle = filter.query?.toLowerCase();
    return [...this.items.values()].filter(
      (item) =>
        (filter.kind === undefined || item.itemType() === filter.kind) &&
        (filter.available === undefined || item.isAvailable() === filter.available) &&
        (needle === undefined || item.title.toLowerCase().includes(needle))
    );
  }

  availableItems(): Item[] {
    return this.listItems({ available: true });
  }

  searchItems(query: string): Item[] {
    return this.listItems({ query });
  }

  // Loans

  getLoan(loanId: string): Loan | undefined {
    return this.loans.get(loanId);
  }

  getUserLoans(userId: string, activeOnly = true): Loan[] {
    if (activeOnly) {
      return (this.activeLoans.get(userId) ?? []).flatMap((id) => this.loans.get(id) ?? []);
    }
    return [...this.loans.values()].filter((loan) => loan.userId === userId);
  }

  checkOutItem(userId: string, itemId: string): CheckOutResult {
    const user = this.users.get(userId);
    if (!user) return fail('USER_NOT_FOUND', 'User not found');

    const item = this.items.get(itemId);
    if (!item) return fail('ITEM_NOT_FOUND', 'Item not found');

    if (!user.canBorrow(item)) {
      return item.isAvailable()
        ? fail('BORROWING_NOT_ALLOWED', 'User cannot borrow this item (check limits, fines, or membership status)')
        : fail('ITEM_UNAVAILABLE', 'Item is not available');
    }

    // canBorrow already looked at availability, but the item flag is the authority here
    if (!item.isAvailable()) return fail('ITEM_UNAVAILABLE', 'Item is not available');

    const loan = Loan.create({
      id: this.generateLoanId(),
      userId,
      itemId,
      loanPeriodDays: item.loanPeriodDays(),
    });

    if (this.loans.has(loan.id)) {
      log.error('Generated loan id collides with an existing loan', { loanId: loan.id });
      return fail('CHECKOUT_FAILED', 'Failed to check out item');
    }

    if (!item.markCheckedOut()) {
      return fail('CHECKOUT_FAILED', 'Failed to check out item');
    }

    if (!user.addBorrowedItem(itemId)) {
      // Undo the flip so the checkout leaves no trace
      item.markCheckedIn();
      log.warn('Borrowed-item set already held the item; checkout rolled back', { userId, itemId });
      return fail('CHECKOUT_FAILED', 'Failed to check out item');
    }

    this.loans.set(loan.id, loan);
    this.activeLoanIds(userId).push(loan.id);

    return {
      success: true,
      message: `Item checked out successfully. Due date: ${formatDate(loan.dateDue)}`,
      loan,
    };
  }

  checkInItem(userId: string, itemId: string, returnTime: Date = new Date()): CheckInResult {
    const loan = this.findActiveLoan(userId, itemId);
    if (!loan) {
      return { ...fail('LOAN_NOT_FOUND', 'No active loan found for this item and user'), fine: 0 };
    }

    const user = this.users.get(userId);
    if (!user) return { ...fail('USER_NOT_FOUND', 'User not found'), fine: 0 };

    const item = this.items.get(itemId);
    if (!item) return { ...fail('ITEM_NOT_FOUND', 'Item not found'), fine: 0 };

    if (item.isAvailable()) {
      log.warn('Active loan references an item already marked available', { loanId: loan.id, itemId });
      return { ...fail('CHECKIN_FAILED', 'Failed to check in item'), fine: 0 };
    }

    const fine = loan.returnItem(returnTime);
    item.markCheckedIn();

    const ids = this.activeLoanIds(userId);
    ids.splice(ids.indexOf(loan.id), 1);
    user.removeBorrowedItem(itemId);
    user.addLoanToHistory(loan.id);

    let fineCharged = false;
    if (fine > 0 && user.kind === 'Member') {
      user.addFine(fine);
      fineCharged = true;
    }

    let message = 'Item returned successfully.';
    if (fineCharged) {
      message += ` Fine owed: ${formatCurrency(fine)}`;
    } else if (fine > 0) {
      message += ` Returned late; ${formatCurrency(fine)} recorded on the loan (staff accounts carry no fines)`;
    }

    return { success: true, message, fine, fineCharged, loan };
  }

  renewLoan(userId: string, itemId: string): RenewResult {
    const loan = this.findActiveLoan(userId, itemId);
    if (!loan) return fail('LOAN_NOT_FOUND', 'No active loan found for this item and user');

    const denial = loan.renewalDenialReason();
    if (denial !== null || !loan.renew()) {
      const reason = denial ?? 'OVERDUE';
      return { ...fail('RENEWAL_DENIED', RENEWAL_DENIAL_MESSAGES[reason]), denial: reason };
    }

    return {
      success: true,
      message: `Loan renewed successfully. New due date: ${formatDate(loan.dateDue)}`,
      loan,
    };
  }

  getOverdueLoans(): Loan[] {
    return [...this.loans.values()].filter((loan) => !loan.isReturned && loan.isOverdue());
  }

  /**
   * Items ranked by loan count over all loans ever made. Ties keep the order
   * in which each item was first borrowed; items no longer in the catalog are skipped.
   */
  getPopularItems(limit = 10): PopularCatalogItem[] {
    const counts = new Map<string, number>();
    for (const loan of this.loans.values()) {
      if (!this.items.has(loan.itemId)) continue;
      counts.set(loan.itemId, (counts.get(loan.itemId) ?? 0) + 1);
    }

    return [...counts.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, Math.max(0, limit))
      .flatMap(([itemId, loanCount]) => {
        const item = this.items.get(itemId);
        return item ? [{ item, loanCount }] : [];
      });
  }

  getMemberActivity(userId: string): MemberActivity | null {
    const user = this.users.get(userId);
    if (!user) return null;

    const allLoans = this.getUserLoans(userId, false);
    const active = this.getUserLoans(userId, true);

    return {
      userId: user.id,
      userName: user.name,
      userRole: user.role(),
      totalLoans: allLoans.length,
      activeLoans: active.length,
      overdueLoans: active.filter((loan) => loan.isOverdue()).length,
      finesOwed: user.kind === 'Member' ? user.finesOwed : 0,
      borrowingLimit: user.borrowingLimit(),
      recentLoans: allLoans.slice(-RECENT_LOAN_LIMIT),
    };
  }

  getStatistics(): LibraryStatistics {
    const overdue = this.getOverdueLoans();
    const users = [...this.users.values()];
    const itemsByType: Record<ItemKind, number> = { Book: 0, Magazine: 0, DVD: 0 };
    for (const item of this.items.values()) itemsByType[item.itemType()] += 1;

    return {
      libraryName: this.name,
      totalItems: this.totalItems,
      availableItems: this.availableItems().length,
      itemsByType,
      totalUsers: this.totalUsers,
      totalMembers: users.filter((user) => user.kind === 'Member').length,
      totalStaff: users.filter((user) => user.kind === 'Staff').length,
      totalLoans: this.totalLoans,
      activeLoans: this.activeLoanCount,
      overdueLoans: overdue.length,
      accruingOverdueFines: roundCurrency(overdue.reduce((sum, loan) => sum + loan.currentFine(), 0)),
      outstandingMemberFines: roundCurrency(
        users.reduce((sum, user) => sum + (user.kind === 'Member' ? user.finesOwed : 0), 0)
      ),
      uptimeDays: wholeDaysBetween(this.startedAt, new Date()),
    };
  }

  /**
   * Diagnostic scan; reports problems without repairing them
   */
  validateIntegrity(): IntegrityViolation[] {
    const violations: IntegrityViolation[] = [];
    const activeByItem = new Map<string, Loan[]>();

    for (const loan of this.loans.values()) {
      if (!this.users.has(loan.userId)) {
        violations.push({
          kind: 'ORPHANED_LOAN_USER',
          message: `Loan ${loan.id} references non-existent user ${loan.userId}`,
          loanId: loan.id,
          userId: loan.userId,
        });
      }
      if (!this.items.has(loan.itemId)) {
        violations.push({
          kind: 'ORPHANED_LOAN_ITEM',
          message: `Loan ${loan.id} references non-existent item ${loan.itemId}`,
          loanId: loan.id,
          itemId: loan.itemId,
        });
      }
      if (!loan.isReturned) {
        activeByItem.set(loan.itemId, [...(activeByItem.get(loan.itemId) ?? []), loan]);
      }
    }

    for (const item of this.items.values()) {
      const active = activeByItem.get(item.id) ?? [];

      if (active.length > 1) {
        violations.push({
          kind: 'MULTIPLE_ACTIVE_LOANS',
          message: `Item ${item.id} has multiple active loans`,
          itemId: item.id,
        });
      } else if (active.length === 1 && item.isAvailable()) {
        violations.push({
          kind: 'AVAILABLE_WITH_ACTIVE_LOAN',
          message: `Item ${item.id} is marked available but has an active loan`,
          itemId: item.id,
          loanId: active[0]?.id,
        });
      } else if (active.length === 0 && !item.isAvailable()) {
        violations.push({
          kind: 'UNAVAILABLE_WITHOUT_LOAN',
          message: `Item ${item.id} is marked unavailable but has no active loan`,
          itemId: item.id,
        });
      }
    }

    return violations;
  }

  private activeLoanIds(userId: string): string[] {
    let ids = this.activeLoans.get(userId);
    if (!ids) {
      ids = [];
      this.activeLoans.set(userId, ids);
    }
    return ids;
  }

  private findActiveLoan(userId: string, itemId: string): Loan | undefined {
    for (const loanId of this.activeLoans.get(userId) ?? []) {
      const loan = this.loans.get(loanId);
      if (loan && loan.itemId === itemId && !loan.isReturned) return loan;
    }
    return undefined;
  }
}
