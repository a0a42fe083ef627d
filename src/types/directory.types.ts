/**
 * Library directory result and report types
 */
import type { Item } from '../models/item.model';
import type { Loan } from '../models/loan.model';
import type { User } from '../models/user.model';
import type { ItemKind, PopularItem } from './item.types';
import type { RenewalDenialReason } from './loan.types';
import type { UserKind } from './user.types';

export type DirectoryFailureReason =
  | 'USER_NOT_FOUND'
  | 'ITEM_NOT_FOUND'
  | 'LOAN_NOT_FOUND'
  | 'BORROWING_NOT_ALLOWED'
  | 'ITEM_UNAVAILABLE'
  | 'RENEWAL_DENIED'
  | 'CHECKOUT_FAILED'
  | 'CHECKIN_FAILED';

// Routine refusals are returned, never thrown
export interface OperationFailure {
  success: false;
  reason: DirectoryFailureReason;
  message: string;
}

export type CheckOutResult = { success: true; message: string; loan: Loan } | OperationFailure;

export type CheckInResult =
  | {
      success: true;
      message: string;
      fine: number;
      // false when the borrower's account cannot carry fines (staff)
      fineCharged: boolean;
      loan: Loan;
    }
  | (OperationFailure & { fine: number });

export type RenewResult =
  | { success: true; message: string; loan: Loan }
  | (OperationFailure & { denial?: RenewalDenialReason });

export type IntegrityViolationKind =
  | 'ORPHANED_LOAN_USER'
  | 'ORPHANED_LOAN_ITEM'
  | 'MULTIPLE_ACTIVE_LOANS'
  | 'AVAILABLE_WITH_ACTIVE_LOAN'
  | 'UNAVAILABLE_WITHOUT_LOAN';

/**
 * Found only by the diagnostic scan; means an atomic update was broken somewhere
 */
export interface IntegrityViolation {
  kind: IntegrityViolationKind;
  message: string;
  loanId?: string;
  itemId?: string;
  userId?: string;
}

export interface LibraryStatistics {
  libraryName: string;
  totalItems: number;
  availableItems: number;
  itemsByType: Record<ItemKind, number>;
  totalUsers: number;
  totalMembers: number;
  totalStaff: number;
  totalLoans: number;
  activeLoans: number;
  overdueLoans: number;
  // Accrued on open overdue loans, not yet charged
  accruingOverdueFines: number;
  // Charged to member accounts and unpaid
  outstandingMemberFines: number;
  uptimeDays: number;
}

export interface MemberActivity {
  userId: string;
  userName: string;
  userRole: UserKind;
  totalLoans: number;
  activeLoans: number;
  overdueLoans: number;
  finesOwed: number;
  borrowingLimit: number;
  recentLoans: Loan[];
}

export interface DirectorySnapshot {
  users: User[];
  items: Item[];
  loans: Loan[];
}

export type PopularCatalogItem = PopularItem<Item>;
