import { Member, MemberInput, Staff, StaffInput, User } from '../models/user.model';
import { Loan } from '../models/loan.model';
import { MemberActivity } from '../types/directory.types';
import { AppError, ErrorCode, NotFoundError } from '../types/error.types';
import { UserKind } from '../types/user.types';
import { componentLogger } from '../config/logger';
import { LibraryDirectory } from './directory.service';
import { Persisted } from './item.service';
import { WriteThrough } from './write-through';

const log = componentLogger('user-service');

export interface FinePayment {
  member: Member;
  amountApplied: number;
}

/**
 * User Service
 *
 * Registration and account maintenance for members and staff
 */
export class UserService {
  constructor(
    private directory: LibraryDirectory,
    private writeThrough: WriteThrough
  ) {}

  async registerMember(input: MemberInput): Promise<Persisted<Member>> {
    return this.register(Member.create(input));
  }

  async registerStaff(input: StaffInput): Promise<Persisted<Staff>> {
    return this.register(Staff.create(input));
  }

  async getUser(id: string): Promise<User> {
    const user = this.directory.getUser(id);

    if (!user) {
      throw new NotFoundError(ErrorCode.USER_NOT_FOUND, `User with ID ${id} not found`);
    }

    return user;
  }

  /**
   * Users ordered by name, optionally limited to one role
   */
  async listUsers(role?: UserKind): Promise<User[]> {
    return this.directory.listUsers(role).sort((a, b) => a.name.localeCompare(b.name));
  }

  async removeUser(id: string): Promise<Persisted<User>> {
    log.info('Removing user', { id });

    const user = await this.getUser(id);

    if (!this.directory.removeUser(id)) {
      throw new AppError(ErrorCode.HAS_ACTIVE_LOANS, `User ${id} has active loans and cannot be removed`, 409, {
        activeLoans: this.directory.getUserLoans(id).length,
      });
    }

    const persisted = await this.writeThrough.commit('removeUser', { deletedUserIds: [id] });

    log.info('User removed', { userId: id });
    return { value: user, persisted };
  }

  async getUserLoans(id: string, activeOnly: boolean): Promise<Loan[]> {
    await this.getUser(id);
    return this.directory.getUserLoans(id, activeOnly);
  }

  async getActivity(id: string): Promise<MemberActivity> {
    const activity = this.directory.getMemberActivity(id);

    if (!activity) {
      throw new NotFoundError(ErrorCode.USER_NOT_FOUND, `User with ID ${id} not found`);
    }

    return activity;
  }

  async payFine(id: string, amount: number): Promise<Persisted<FinePayment>> {
    const member = await this.getMember(id);

    const amountApplied = member.payFine(amount);
    const persisted = await this.writeThrough.commit('payFine', { users: [member] });

    log.info('Fine payment applied', { userId: id, amountApplied, finesOwed: member.finesOwed });
    return { value: { member, amountApplied }, persisted };
  }

  async extendMembership(id: string, days: number): Promise<Persisted<Member>> {
    const member = await this.getMember(id);

    const expiry = member.extendMembership(days);
    const persisted = await this.writeThrough.commit('extendMembership', { users: [member] });

    log.info('Membership extended', { userId: id, days, expiry });
    return { value: member, persisted };
  }

  async changeStaffRole(id: string, role: string): Promise<Persisted<Staff>> {
    const user = await this.getUser(id);

    if (user.kind !== 'Staff') {
      throw new AppError(ErrorCode.UNSUPPORTED_FOR_ROLE, `User ${id} is not a staff member`, 409);
    }

    user.changeRole(role);
    const persisted = await this.writeThrough.commit('changeStaffRole', { users: [user] });

    log.info('Staff role changed', { userId: id, role: user.staffRole });
    return { value: user, persisted };
  }

  private async getMember(id: string): Promise<Member> {
    const user = await this.getUser(id);

    if (user.kind !== 'Member') {
      throw new AppError(ErrorCode.UNSUPPORTED_FOR_ROLE, `User ${id} is not a member`, 409);
    }

    return user;
  }

  private async register<T extends User>(user: T): Promise<Persisted<T>> {
    log.info('Registering user', { id: user.id, role: user.role() });

    if (!this.directory.registerUser(user)) {
      throw new AppError(ErrorCode.DUPLICATE_IDENTIFIER, `User with ID ${user.id} already exists`, 409);
    }

    const persisted = await this.writeThrough.commit('registerUser', { users: [user] });

    log.info('User registered', { userId: user.id, role: user.role() });
    return { value: user, persisted };
  }
}
