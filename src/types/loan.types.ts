/**
 * Loan domain types
 */

// Derived from the clock on every read; only RETURNED is stored
export enum LoanStatus {
  ACTIVE = 'ACTIVE',
  OVERDUE = 'OVERDUE',
  RETURNED = 'RETURNED',
}

export const MAX_RENEWALS = 2;

export type RenewalDenialReason = 'RETURNED' | 'MAX_RENEWALS_REACHED' | 'OVERDUE';

export interface LoanSnapshot {
  id: string;
  userId: string;
  itemId: string;
  loanPeriodDays: number;
  dateBorrowed: Date;
  dateDue: Date;
  dateReturned: Date | null;
  isReturned: boolean;
  fineAmount: number;
  renewalCount: number;
}

// Database row type (snake_case from PostgreSQL)
export interface LoanRow {
  loan_id: string;
  user_id: string;
  item_id: string;
  loan_period_days: number;
  date_borrowed: string;
  date_due: string;
  date_returned: string | null;
  is_returned: boolean;
  fine_amount: number;
  renewal_count: number;
}
