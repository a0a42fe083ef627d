/**
 * User domain types
 */

export const USER_KINDS = ['Member', 'Staff'] as const;
export type UserKind = (typeof USER_KINDS)[number];

export const STAFF_ROLES = ['Manager', 'Librarian'] as const;
export type StaffRole = (typeof STAFF_ROLES)[number];

export const MEMBER_BORROWING_LIMIT = 5;

export const STAFF_BORROWING_LIMITS: Readonly<Record<StaffRole, number>> = {
  Manager: 20,
  Librarian: 15,
};

export type Permission =
  | 'view_catalog'
  | 'help_members'
  | 'add_items'
  | 'remove_items'
  | 'manage_users'
  | 'view_reports'
  | 'system_admin'
  | 'manage_fines'
  | 'check_out_items'
  | 'check_in_items'
  | 'view_member_history';

interface UserSnapshotBase {
  id: string;
  name: string;
  email: string;
  registrationDate: Date;
  borrowedItemIds: string[];
  loanHistoryIds: string[];
}

export interface MemberSnapshot extends UserSnapshotBase {
  kind: 'Member';
  phone: string | null;
  finesOwed: number;
  membershipExpiry: Date;
}

export interface StaffSnapshot extends UserSnapshotBase {
  kind: 'Staff';
  staffRole: StaffRole;
  hireDate: Date;
}

export type UserSnapshot = MemberSnapshot | StaffSnapshot;

// Database row type (snake_case from PostgreSQL)
export interface UserRow {
  user_id: string;
  name: string;
  email: string;
  role: string;
  registration_date: string;
  borrowed_item_ids: string[] | null;
  loan_history_ids: string[] | null;
  // Member
  phone: string | null;
  fines_owed: number | null;
  membership_expiry: string | null;
  // Staff
  staff_role: string | null;
  hire_date: string | null;
}
