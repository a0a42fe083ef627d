import { describe, it, expect, beforeEach } from 'vitest';
import { LibraryDirectory } from '../src/services/directory.service';
import { Loan } from '../src/models/loan.model';
import { Item } from '../src/models/item.model';
import { addDays } from '../src/utils/dates';
import {
  START,
  aBook,
  aDvd,
  aMagazine,
  aMember,
  aStaff,
  advanceDays,
  freezeClock,
  sequentialIds,
} from './helpers/fixtures';

const activeLoansFor = (directory: LibraryDirectory, item: Item): number =>
  directory
    .listUsers()
    .flatMap((user) => directory.getUserLoans(user.id))
    .filter((loan) => loan.itemId === item.id).length;

describe('LibraryDirectory', () => {
  let directory: LibraryDirectory;

  beforeEach(() => {
    freezeClock();
    directory = new LibraryDirectory({ name: 'Riverside Branch', generateLoanId: sequentialIds() });
    directory.registerUser(aMember('U1'));
    directory.registerUser(aStaff('S1'));
    directory.addItem(aBook('B1'));
    directory.addItem(aMagazine('M1'));
    directory.addItem(aDvd('D1'));
  });

  describe('registration', () => {
    it('rejects duplicate identifiers', () => {
      expect(directory.registerUser(aMember('U1', 'Someone Else'))).toBe(false);
      expect(directory.addItem(aBook('B1', 'Another Book'))).toBe(false);
      expect(directory.getUser('U1')?.name).toBe('Alice Reader');
      expect(directory.getItem('B1')?.title).toBe('The Silent River');
    });

    it('counts registry sizes', () => {
      expect(directory.totalUsers).toBe(2);
      expect(directory.totalItems).toBe(3);
      expect(directory.totalLoans).toBe(0);
      expect(directory.activeLoanCount).toBe(0);
    });

    it('filters listings by role, kind, availability and title', () => {
      directory.checkOutItem('U1', 'M1');

      expect(directory.listUsers('Staff').map((user) => user.id)).toEqual(['S1']);
      expect(directory.listItems({ kind: 'DVD' }).map((item) => item.id)).toEqual(['D1']);
      expect(directory.availableItems().map((item) => item.id)).toEqual(['B1', 'D1']);
      expect(directory.searchItems('silent').map((item) => item.id)).toEqual(['B1']);
    });
  });

  describe('checkOutItem', () => {
    it('lends a book for 21 days', () => {
      const result = directory.checkOutItem('U1', 'B1');

      expect(result).toMatchObject({
        success: true,
        message: 'Item checked out successfully. Due date: 2025-03-22',
      });
      if (!result.success) throw new Error('checkout failed');
      expect(result.loan.id).toBe('loan-1');
      expect(result.loan.dateDue).toEqual(addDays(START, 21));
      expect(directory.getItem('B1')?.isAvailable()).toBe(false);
      expect(directory.getUser('U1')?.borrowedItems).toEqual(['B1']);
      expect(directory.getUserLoans('U1').map((loan) => loan.id)).toEqual(['loan-1']);
      expect(directory.activeLoanCount).toBe(1);
    });

    it('fails for an unknown user or item', () => {
      expect(directory.checkOutItem('nobody', 'B1')).toEqual({
        success: false,
        reason: 'USER_NOT_FOUND',
        message: 'User not found',
      });
      expect(directory.checkOutItem('U1', 'nothing')).toEqual({
        success: false,
        reason: 'ITEM_NOT_FOUND',
        message: 'Item not found',
      });
    });

    it('fails on an unavailable item without changing anything', () => {
      directory.checkOutItem('U1', 'B1');

      const result = directory.checkOutItem('S1', 'B1');

      expect(result).toEqual({ success: false, reason: 'ITEM_UNAVAILABLE', message: 'Item is not available' });
      expect(directory.totalLoans).toBe(1);
      expect(directory.getUser('S1')?.borrowedItems).toEqual([]);
      expect(directory.getUserLoans('S1')).toEqual([]);
    });

    it('refuses a member owing more than the fine threshold', () => {
      const member = directory.getUser('U1');
      if (member?.kind !== 'Member') throw new Error('expected a member');
      member.addFine(15);

      const result = directory.checkOutItem('U1', 'B1');

      expect(result).toEqual({
        success: false,
        reason: 'BORROWING_NOT_ALLOWED',
        message: 'User cannot borrow this item (check limits, fines, or membership status)',
      });
      expect(directory.getItem('B1')?.isAvailable()).toBe(true);
      expect(directory.totalLoans).toBe(0);
    });

    it('refuses a member at the borrowing limit', () => {
      for (const id of ['B2', 'B3', 'B4', 'B5', 'B6', 'B7']) directory.addItem(aBook(id, `Volume ${id}`));
      for (const id of ['B2', 'B3', 'B4', 'B5', 'B6']) {
        expect(directory.checkOutItem('U1', id).success).toBe(true);
      }

      expect(directory.checkOutItem('U1', 'B7')).toMatchObject({ success: false, reason: 'BORROWING_NOT_ALLOWED' });
    });

    it('rolls back when the borrowed set already holds the item', () => {
      directory.getUser('U1')?.addBorrowedItem('B1');

      const result = directory.checkOutItem('U1', 'B1');

      expect(result).toEqual({ success: false, reason: 'CHECKOUT_FAILED', message: 'Failed to check out item' });
      expect(directory.getItem('B1')?.isAvailable()).toBe(true);
      expect(directory.totalLoans).toBe(0);
    });

    it('fails when the id generator repeats an id', () => {
      const repeating = new LibraryDirectory({ generateLoanId: () => 'same' });
      repeating.registerUser(aMember('U1'));
      repeating.addItem(aBook('B1'));
      repeating.addItem(aBook('B2'));
      repeating.checkOutItem('U1', 'B1');

      expect(repeating.checkOutItem('U1', 'B2')).toMatchObject({ success: false, reason: 'CHECKOUT_FAILED' });
      expect(repeating.getItem('B2')?.isAvailable()).toBe(true);
    });
  });

  describe('checkInItem', () => {
    it('returns on time with no fine', () => {
      directory.checkOutItem('U1', 'B1');
      advanceDays(10);

      const result = directory.checkInItem('U1', 'B1');

      expect(result).toMatchObject({ success: true, message: 'Item returned successfully.', fine: 0, fineCharged: false });
      expect(directory.getItem('B1')?.isAvailable()).toBe(true);
      expect(directory.getUserLoans('U1')).toEqual([]);
      expect(directory.getUser('U1')?.borrowedItems).toEqual([]);
      expect(directory.getUser('U1')?.loanHistory).toEqual(['loan-1']);
    });

    it('charges a member 2.50 for a book returned 5 days late', () => {
      directory.checkOutItem('U1', 'B1');
      advanceDays(26);

      const result = directory.checkInItem('U1', 'B1');

      expect(result).toMatchObject({
        success: true,
        message: 'Item returned successfully. Fine owed: $2.50',
        fine: 2.5,
        fineCharged: true,
      });
      const member = directory.getUser('U1');
      expect(member?.kind === 'Member' && member.finesOwed).toBe(2.5);
    });

    it('records but does not charge a late staff return', () => {
      directory.checkOutItem('S1', 'M1');
      advanceDays(11);

      const result = directory.checkInItem('S1', 'M1');

      expect(result).toMatchObject({
        success: true,
        message: 'Item returned successfully. Returned late; $2.00 recorded on the loan (staff accounts carry no fines)',
        fine: 2,
        fineCharged: false,
      });
      expect(directory.getLoan('loan-1')?.fineAmount).toBe(2);
    });

    it('accepts an explicit return time', () => {
      directory.checkOutItem('U1', 'D1');

      const result = directory.checkInItem('U1', 'D1', addDays(START, 20));

      expect(result).toMatchObject({ success: true, fine: 3 });
    });

    it('fails when there is no active loan', () => {
      expect(directory.checkInItem('U1', 'B1')).toEqual({
        success: false,
        reason: 'LOAN_NOT_FOUND',
        message: 'No active loan found for this item and user',
        fine: 0,
      });
    });

    it('fails and changes nothing when the item is already marked available', () => {
      directory.checkOutItem('U1', 'B1');
      directory.getItem('B1')?.markCheckedIn();

      const result = directory.checkInItem('U1', 'B1');

      expect(result).toMatchObject({ success: false, reason: 'CHECKIN_FAILED', fine: 0 });
      expect(directory.getLoan('loan-1')?.isReturned).toBe(false);
      expect(directory.getUserLoans('U1').map((loan) => loan.id)).toEqual(['loan-1']);
    });

    it('only returns the loan once', () => {
      directory.checkOutItem('U1', 'B1');
      directory.checkInItem('U1', 'B1');

      expect(directory.checkInItem('U1', 'B1')).toMatchObject({ success: false, reason: 'LOAN_NOT_FOUND' });
    });
  });

  describe('renewLoan', () => {
    it('renews twice and denies the third attempt', () => {
      directory.checkOutItem('U1', 'B1');

      expect(directory.renewLoan('U1', 'B1')).toMatchObject({
        success: true,
        message: 'Loan renewed successfully. New due date: 2025-04-12',
      });
      expect(directory.getLoan('loan-1')?.renewalCount).toBe(1);
      expect(directory.renewLoan('U1', 'B1')).toMatchObject({ success: true });
      expect(directory.getLoan('loan-1')?.renewalCount).toBe(2);

      expect(directory.renewLoan('U1', 'B1')).toEqual({
        success: false,
        reason: 'RENEWAL_DENIED',
        message: 'Cannot renew loan: maximum renewals reached',
        denial: 'MAX_RENEWALS_REACHED',
      });
      expect(directory.getLoan('loan-1')?.dateDue).toEqual(addDays(START, 63));
    });

    it('denies an overdue loan', () => {
      directory.checkOutItem('U1', 'M1');
      advanceDays(8);

      expect(directory.renewLoan('U1', 'M1')).toMatchObject({
        success: false,
        reason: 'RENEWAL_DENIED',
        message: 'Cannot renew loan: item is overdue',
        denial: 'OVERDUE',
      });
    });

    it('fails without an active loan', () => {
      expect(directory.renewLoan('U1', 'B1')).toMatchObject({ success: false, reason: 'LOAN_NOT_FOUND' });
    });
  });

  describe('removal', () => {
    it('refuses to remove an item on loan and allows it after check-in', () => {
      directory.checkOutItem('U1', 'B1');
      expect(directory.removeItem('B1')).toBe(false);
      expect(directory.getItem('B1')).toBeDefined();

      directory.checkInItem('U1', 'B1');
      expect(directory.removeItem('B1')).toBe(true);
      expect(directory.getItem('B1')).toBeUndefined();
    });

    it('refuses to remove a user with active loans', () => {
      directory.checkOutItem('U1', 'B1');
      expect(directory.removeUser('U1')).toBe(false);

      directory.checkInItem('U1', 'B1');
      expect(directory.removeUser('U1')).toBe(true);
      expect(directory.removeUser('U1')).toBe(false);
    });
  });

  it('keeps availability in step with active loans across operations', () => {
    directory.checkOutItem('U1', 'B1');
    directory.checkOutItem('S1', 'D1');
    directory.checkOutItem('S1', 'B1');
    directory.renewLoan('U1', 'B1');
    directory.checkInItem('S1', 'D1');
    directory.checkOutItem('U1', 'D1');

    for (const item of directory.listItems()) {
      expect(item.isAvailable()).toBe(activeLoansFor(directory, item) === 0);
    }
    expect(directory.validateIntegrity()).toEqual([]);
  });

  describe('reports', () => {
    it('lists overdue loans only', () => {
      directory.checkOutItem('U1', 'M1');
      directory.checkOutItem('U1', 'B1');
      advanceDays(10);

      expect(directory.getOverdueLoans().map((loan) => loan.itemId)).toEqual(['M1']);
    });

    it('ranks popular items by loan count, ties in first-borrow order', () => {
      directory.checkOutItem('U1', 'D1');
      directory.checkInItem('U1', 'D1');
      directory.checkOutItem('U1', 'M1');
      directory.checkInItem('U1', 'M1');
      directory.checkOutItem('U1', 'B1');
      directory.checkInItem('U1', 'B1');
      directory.checkOutItem('U1', 'B1');

      expect(directory.getPopularItems().map(({ item, loanCount }) => [item.id, loanCount])).toEqual([
        ['B1', 2],
        ['D1', 1],
        ['M1', 1],
      ]);
      expect(directory.getPopularItems(1).map(({ item }) => item.id)).toEqual(['B1']);
    });

    it('skips removed items in the popularity ranking', () => {
      directory.checkOutItem('U1', 'D1');
      directory.checkInItem('U1', 'D1');
      directory.removeItem('D1');

      expect(directory.getPopularItems()).toEqual([]);
    });

    it('summarises member activity', () => {
      directory.checkOutItem('U1', 'M1');
      directory.checkOutItem('U1', 'B1');
      advanceDays(10);

      expect(directory.getMemberActivity('U1')).toMatchObject({
        userId: 'U1',
        userName: 'Alice Reader',
        userRole: 'Member',
        totalLoans: 2,
        activeLoans: 2,
        overdueLoans: 1,
        finesOwed: 0,
        borrowingLimit: 5,
      });
      expect(directory.getMemberActivity('ghost')).toBeNull();
    });

    it('computes statistics', () => {
      directory.checkOutItem('U1', 'M1');
      directory.checkOutItem('S1', 'B1');
      advanceDays(10);

      expect(directory.getStatistics()).toEqual({
        libraryName: 'Riverside Branch',
        totalItems: 3,
        availableItems: 1,
        itemsByType: { Book: 1, Magazine: 1, DVD: 1 },
        totalUsers: 2,
        totalMembers: 1,
        totalStaff: 1,
        totalLoans: 2,
        activeLoans: 2,
        overdueLoans: 1,
        accruingOverdueFines: 1.5,
        outstandingMemberFines: 0,
        uptimeDays: 10,
      });
    });
  });

  describe('validateIntegrity', () => {
    it('reports orphaned loans and availability mismatches', () => {
      const orphan = Loan.create({ id: 'orphan', userId: 'ghost', itemId: 'B1', loanPeriodDays: 21 });
      directory.restore({
        users: directory.listUsers(),
        items: directory.listItems(),
        loans: [orphan],
      });
      directory.getItem('D1')?.markCheckedOut();

      expect(directory.validateIntegrity().map((violation) => violation.kind)).toEqual([
        'ORPHANED_LOAN_USER',
        'AVAILABLE_WITH_ACTIVE_LOAN',
        'UNAVAILABLE_WITHOUT_LOAN',
      ]);
    });
  });

  describe('restore', () => {
    it('rebuilds the active-loan index from persisted loans', () => {
      directory.checkOutItem('U1', 'B1');
      directory.checkOutItem('U1', 'M1');
      directory.checkInItem('U1', 'M1');

      const restored = new LibraryDirectory();
      restored.restore({
        users: directory.listUsers(),
        items: directory.listItems(),
        loans: directory.getUserLoans('U1', false),
      });

      expect(restored.activeLoanCount).toBe(1);
      expect(restored.getUserLoans('U1').map((loan) => loan.itemId)).toEqual(['B1']);
      expect(restored.checkInItem('U1', 'B1')).toMatchObject({ success: true });
    });
  });
});
