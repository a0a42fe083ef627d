import { Item, restoreItem } from '../models/item.model';
import { Loan } from '../models/loan.model';
import { restoreUser, User } from '../models/user.model';
import { DVD_RATINGS, DvdRating, ItemRow, ItemSnapshot } from '../types/item.types';
import { LoanRow } from '../types/loan.types';
import { RowMapper } from '../types/repository.types';
import { STAFF_ROLES, StaffRole, UserRow, UserSnapshot } from '../types/user.types';

const toIso = (date: Date): string => date.toISOString();

const requireField = <V>(value: V | null | undefined, field: string, id: string): V => {
  if (value === null || value === undefined) {
    throw new Error(`Corrupt row ${id}: missing ${field}`);
  }
  return value;
};

const isDvdRating = (value: string): value is DvdRating => DVD_RATINGS.some((r) => r === value);

const isStaffRole = (value: string): value is StaffRole => STAFF_ROLES.some((r) => r === value);

const emptyItemColumns = {
  author: null,
  isbn: null,
  pages: null,
  issue_number: null,
  publisher: null,
  publication_date: null,
  duration: null,
  genre: null,
  director: null,
  rating: null,
};

export const itemRowMapper: RowMapper<Item, ItemRow> = {
  toRow(item) {
    const snapshot = item.toSnapshot();
    const base = {
      ...emptyItemColumns,
      item_id: snapshot.id,
      title: snapshot.title,
      item_type: snapshot.kind,
      is_available: snapshot.isAvailable,
      date_added: toIso(snapshot.dateAdded),
    };

    switch (snapshot.kind) {
      case 'Book':
        return { ...base, author: snapshot.author, isbn: snapshot.isbn, pages: snapshot.pages };
      case 'Magazine':
        return {
          ...base,
          issue_number: snapshot.issueNumber,
          publisher: snapshot.publisher,
          publication_date: toIso(snapshot.publicationDate),
        };
      case 'DVD':
        return {
          ...base,
          duration: snapshot.durationMinutes,
          genre: snapshot.genre,
          director: snapshot.director,
          rating: snapshot.rating,
        };
    }
  },

  fromRow(row) {
    const base = {
      id: row.item_id,
      title: row.title,
      isAvailable: row.is_available,
      dateAdded: new Date(row.date_added),
    };
    let snapshot: ItemSnapshot;

    switch (row.item_type) {
      case 'Book':
        snapshot = {
          ...base,
          kind: 'Book',
          author: requireField(row.author, 'author', row.item_id),
          isbn: requireField(row.isbn, 'isbn', row.item_id),
          pages: row.pages ?? 0,
        };
        break;
      case 'Magazine':
        snapshot = {
          ...base,
          kind: 'Magazine',
          issueNumber: requireField(row.issue_number, 'issue_number', row.item_id),
          publisher: requireField(row.publisher, 'publisher', row.item_id),
          publicationDate: new Date(requireField(row.publication_date, 'publication_date', row.item_id)),
        };
        break;
      case 'DVD':
        snapshot = {
          ...base,
          kind: 'DVD',
          durationMinutes: requireField(row.duration, 'duration', row.item_id),
          genre: requireField(row.genre, 'genre', row.item_id),
          director: row.director,
          rating: row.rating !== null && isDvdRating(row.rating) ? row.rating : null,
        };
        break;
      default:
        throw new Error(`Corrupt row ${row.item_id}: unknown item type ${row.item_type}`);
    }

    return restoreItem(snapshot);
  },

  idOf: (row) => row.item_id,
};

export const userRowMapper: RowMapper<User, UserRow> = {
  toRow(user) {
    const snapshot = user.toSnapshot();
    const base = {
      user_id: snapshot.id,
      name: snapshot.name,
      email: snapshot.email,
      role: snapshot.kind,
      registration_date: toIso(snapshot.registrationDate),
      borrowed_item_ids: snapshot.borrowedItemIds,
      loan_history_ids: snapshot.loanHistoryIds,
      phone: null,
      fines_owed: null,
      membership_expiry: null,
      staff_role: null,
      hire_date: null,
    };

    switch (snapshot.kind) {
      case 'Member':
        return {
          ...base,
          phone: snapshot.phone,
          fines_owed: snapshot.finesOwed,
          membership_expiry: toIso(snapshot.membershipExpiry),
        };
      case 'Staff':
        return { ...base, staff_role: snapshot.staffRole, hire_date: toIso(snapshot.hireDate) };
    }
  },

  fromRow(row) {
    const base = {
      id: row.user_id,
      name: row.name,
      email: row.email,
      registrationDate: new Date(row.registration_date),
      borrowedItemIds: row.borrowed_item_ids ?? [],
      loanHistoryIds: row.loan_history_ids ?? [],
    };
    let snapshot: UserSnapshot;

    switch (row.role) {
      case 'Member':
        snapshot = {
          ...base,
          kind: 'Member',
          phone: row.phone,
          finesOwed: row.fines_owed === null ? 0 : Number(row.fines_owed),
          membershipExpiry: new Date(requireField(row.membership_expiry, 'membership_expiry', row.user_id)),
        };
        break;
      case 'Staff': {
        const staffRole = requireField(row.staff_role, 'staff_role', row.user_id);
        if (!isStaffRole(staffRole)) {
          throw new Error(`Corrupt row ${row.user_id}: unknown staff role ${staffRole}`);
        }
        snapshot = {
          ...base,
          kind: 'Staff',
          staffRole,
          hireDate: new Date(requireField(row.hire_date, 'hire_date', row.user_id)),
        };
        break;
      }
      default:
        throw new Error(`Corrupt row ${row.user_id}: unknown role ${row.role}`);
    }

    return restoreUser(snapshot);
  },

  idOf: (row) => row.user_id,
};

export const loanRowMapper: RowMapper<Loan, LoanRow> = {
  toRow(loan) {
    const snapshot = loan.toSnapshot();
    return {
      loan_id: snapshot.id,
      user_id: snapshot.userId,
      item_id: snapshot.itemId,
      loan_period_days: snapshot.loanPeriodDays,
      date_borrowed: toIso(snapshot.dateBorrowed),
      date_due: toIso(snapshot.dateDue),
      date_returned: snapshot.dateReturned ? toIso(snapshot.dateReturned) : null,
      is_returned: snapshot.isReturned,
      fine_amount: snapshot.fineAmount,
      renewal_count: snapshot.renewalCount,
    };
  },

  fromRow(row) {
    return Loan.restore({
      id: row.loan_id,
      userId: row.user_id,
      itemId: row.item_id,
      loanPeriodDays: row.loan_period_days,
      dateBorrowed: new Date(row.date_borrowed),
      dateDue: new Date(row.date_due),
      dateReturned: row.date_returned ? new Date(row.date_returned) : null,
      isReturned: row.is_returned,
      fineAmount: Number(row.fine_amount),
      renewalCount: row.renewal_count,
    });
  },

  idOf: (row) => row.loan_id,
};
