import { z } from 'zod';
import { ValidationError } from '../types/error.types';
import {
  MEMBER_BORROWING_LIMIT,
  MemberSnapshot,
  Permission,
  STAFF_BORROWING_LIMITS,
  STAFF_ROLES,
  StaffRole,
  StaffSnapshot,
  UserKind,
  UserSnapshot,
} from '../types/user.types';
import { addDays, roundCurrency, DAY_MS } from '../utils/dates';
import { getCirculationPolicy } from './circulation-policy';
import { Item } from './item.model';
import { identifier, optionalText, parseEntityInput, requiredText } from './validation';

/**
 * User validation schemas
 */

// Must contain "@" with a "." somewhere after it
export const isValidEmail = (email: string): boolean => {
  const at = email.indexOf('@');
  return at >= 0 && email.slice(at + 1).includes('.');
};

const emailSchema = z
  .string({ required_error: 'Email is required' })
  .trim()
  .refine(isValidEmail, 'Invalid email format');

const userBaseSchema = z.object({
  id: identifier('User ID'),
  name: requiredText('Name').max(255, 'Name must be at most 255 characters'),
  email: emailSchema,
});

export const memberInputSchema = userBaseSchema.extend({
  phone: optionalText(),
});

const staffRoleSchema = z.enum(STAFF_ROLES, {
  errorMap: () => ({ message: `Staff role must be one of: ${STAFF_ROLES.join(', ')}` }),
});

export const staffInputSchema = userBaseSchema.extend({
  staffRole: staffRoleSchema.default('Librarian'),
  hireDate: z.coerce.date().optional(),
});

export type MemberInput = z.input<typeof memberInputSchema>;
export type StaffInput = z.input<typeof staffInputSchema>;

const BASE_PERMISSIONS: readonly Permission[] = ['view_catalog', 'help_members'];

const ROLE_PERMISSIONS: Readonly<Record<StaffRole, readonly Permission[]>> = {
  Manager: ['add_items', 'remove_items', 'manage_users', 'view_reports', 'system_admin', 'manage_fines'],
  Librarian: [
    'add_items',
    'remove_items',
    'check_out_items',
    'check_in_items',
    'view_member_history',
    'manage_fines',
  ],
};

export const permissionsForRole = (role: StaffRole): readonly Permission[] => [
  ...BASE_PERMISSIONS,
  ...ROLE_PERMISSIONS[role],
];

interface UserState {
  id: string;
  name: string;
  email: string;
  registrationDate: Date;
  borrowedItemIds: string[];
  loanHistoryIds: string[];
}

/**
 * Identity, contact details and borrowed-item bookkeeping shared by members and staff
 */
export abstract class LibraryUser<K extends UserKind> {
  abstract readonly kind: K;

  readonly id: string;
  readonly registrationDate: Date;
  private _name: string;
  private _email: string;
  private readonly borrowed: string[];
  private readonly history: string[];

  protected constructor(state: UserState) {
    this.id = state.id;
    this._name = state.name;
    this._email = state.email;
    this.registrationDate = new Date(state.registrationDate);
    this.borrowed = [...state.borrowedItemIds];
    this.history = [...state.loanHistoryIds];
  }

  get name(): string {
    return this._name;
  }

  get email(): string {
    return this._email;
  }

  get borrowedItems(): readonly string[] {
    return [...this.borrowed];
  }

  get loanHistory(): readonly string[] {
    return [...this.history];
  }

  role(): K {
    return this.kind;
  }

  abstract borrowingLimit(): number;

  abstract canBorrow(item: Item): boolean;

  protected hasCapacityFor(item: Item): boolean {
    return item.isAvailable() && this.borrowed.length < this.borrowingLimit();
  }

  /**
   * @returns false if the item is already in the borrowed set
   */
  addBorrowedItem(itemId: string): boolean {
    if (this.borrowed.includes(itemId)) return false;
    this.borrowed.push(itemId);
    return true;
  }

  /**
   * @returns false if the item is not in the borrowed set
   */
  removeBorrowedItem(itemId: string): boolean {
    const index = this.borrowed.indexOf(itemId);
    if (index === -1) return false;
    this.borrowed.splice(index, 1);
    return true;
  }

  addLoanToHistory(loanId: string): boolean {
    if (this.history.includes(loanId)) return false;
    this.history.push(loanId);
    return true;
  }

  rename(name: string): void {
    this._name = parseEntityInput(userBaseSchema.shape.name, name, 'name');
  }

  changeEmail(email: string): void {
    this._email = parseEntityInput(emailSchema, email, 'email');
  }

  protected baseSnapshot(): UserState {
    return {
      id: this.id,
      name: this._name,
      email: this._email,
      registrationDate: new Date(this.registrationDate),
      borrowedItemIds: [...this.borrowed],
      loanHistoryIds: [...this.history],
    };
  }

  abstract toSnapshot(): UserSnapshot;
}

export class Member extends LibraryUser<'Member'> {
  readonly kind = 'Member' as const;
  readonly phone: string | null;
  private _finesOwed: number;
  private _membershipExpiry: Date;

  constructor(snapshot: Omit<MemberSnapshot, 'kind'>) {
    super(snapshot);
    if (snapshot.finesOwed < 0) {
      throw new ValidationError(`Member ${snapshot.id} cannot owe a negative fine`);
    }
    this.phone = snapshot.phone;
    this._finesOwed = snapshot.finesOwed;
    this._membershipExpiry = new Date(snapshot.membershipExpiry);
  }

  static create(input: MemberInput): Member {
    const data = parseEntityInput(memberInputSchema, input, 'member');
    const now = new Date();
    return new Member({
      ...data,
      registrationDate: now,
      borrowedItemIds: [],
      loanHistoryIds: [],
      finesOwed: 0,
      membershipExpiry: addDays(now, getCirculationPolicy().membershipTermDays),
    });
  }

  get finesOwed(): number {
    return this._finesOwed;
  }

  get membershipExpiry(): Date {
    return new Date(this._membershipExpiry);
  }

  borrowingLimit(): number {
    return MEMBER_BORROWING_LIMIT;
  }

  canBorrow(item: Item): boolean {
    if (!this.hasCapacityFor(item)) return false;

    const policy = getCirculationPolicy();
    if (policy.enforceMembershipExpiry && !this.isMembershipActive()) return false;

    // Outstanding fines above the threshold block new loans, but not returns or renewals
    return this._finesOwed <= policy.fineBlockThreshold;
  }

  addFine(amount: number): void {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new ValidationError('Fine amount cannot be negative', { amount });
    }
    this._finesOwed = roundCurrency(this._finesOwed + amount);
  }

  /**
   * Apply a payment; any excess over the balance is ignored.
   *
   * @returns the amount actually applied
   */
  payFine(amount: number): number {
    if (!Number.isFinite(amount) || amount <= 0) {
      throw new ValidationError('Payment amount must be positive', { amount });
    }
    const applied = Math.min(amount, this._finesOwed);
    this._finesOwed = roundCurrency(Math.max(0, this._finesOwed - amount));
    return roundCurrency(applied);
  }

  isMembershipActive(): boolean {
    return Date.now() < this._membershipExpiry.getTime();
  }

  /**
   * Extends from the current expiry while active, otherwise from today
   */
  extendMembership(days: number): Date {
    if (!Number.isInteger(days) || days <= 0) {
      throw new ValidationError('Membership extension must be a positive number of days', { days });
    }
    const base = this.isMembershipActive() ? this._membershipExpiry : new Date();
    this._membershipExpiry = addDays(base, days);
    return this.membershipExpiry;
  }

  toSnapshot(): MemberSnapshot {
    return {
      ...this.baseSnapshot(),
      kind: this.kind,
      phone: this.phone,
      finesOwed: this._finesOwed,
      membershipExpiry: this.membershipExpiry,
    };
  }
}

export class Staff extends LibraryUser<'Staff'> {
  readonly kind = 'Staff' as const;
  readonly hireDate: Date;
  private _staffRole: StaffRole;
  private _permissions: readonly Permission[];

  constructor(snapshot: Omit<StaffSnapshot, 'kind'>) {
    super(snapshot);
    this.hireDate = new Date(snapshot.hireDate);
    this._staffRole = snapshot.staffRole;
    this._permissions = permissionsForRole(snapshot.staffRole);
  }

  static create(input: StaffInput): Staff {
    const data = parseEntityInput(staffInputSchema, input, 'staff member');
    const now = new Date();
    return new Staff({
      ...data,
      hireDate: data.hireDate ?? now,
      registrationDate: now,
      borrowedItemIds: [],
      loanHistoryIds: [],
    });
  }

  get staffRole(): StaffRole {
    return this._staffRole;
  }

  get permissions(): Permission[] {
    return [...this._permissions];
  }

  changeRole(role: string): void {
    this._staffRole = parseEntityInput(staffRoleSchema, role, 'staff role');
    this._permissions = permissionsForRole(this._staffRole);
  }

  borrowingLimit(): number {
    return STAFF_BORROWING_LIMITS[this._staffRole];
  }

  // Staff have no membership expiry and are never blocked on fines
  canBorrow(item: Item): boolean {
    return this.hasCapacityFor(item);
  }

  hasPermission(permission: string): boolean {
    return this._permissions.some((granted) => granted === permission);
  }

  canManageInventory(): boolean {
    return this.hasPermission('add_items') && this.hasPermission('remove_items');
  }

  canManageUsers(): boolean {
    return this.hasPermission('manage_users');
  }

  canViewMemberActivity(): boolean {
    return this.hasPermission('view_member_history');
  }

  yearsOfService(): number {
    const days = Math.floor((Date.now() - this.hireDate.getTime()) / DAY_MS);
    return Math.round((days / 365.25) * 10) / 10;
  }

  toSnapshot(): StaffSnapshot {
    return {
      ...this.baseSnapshot(),
      kind: this.kind,
      staffRole: this._staffRole,
      hireDate: new Date(this.hireDate),
    };
  }
}

export type User = Member | Staff;

export function restoreUser(snapshot: UserSnapshot): User {
  switch (snapshot.kind) {
    case 'Member':
      return new Member(snapshot);
    case 'Staff':
      return new Staff(snapshot);
  }
}
