import { Loan } from '../models/loan.model';
import { ErrorCode, NotFoundError } from '../types/error.types';
import { componentLogger } from '../config/logger';
import { LibraryDirectory } from './directory.service';
import { toAppError } from './directory-errors';
import { PendingWrites, WriteThrough } from './write-through';

const log = componentLogger('loan-service');

export interface LoanOperationResult {
  loan: Loan;
  message: string;
  persisted: boolean;
}

export interface CheckInOperationResult extends LoanOperationResult {
  fine: number;
  fineCharged: boolean;
}

/**
 * Loan Service
 *
 * Checkout, check-in and renewal over the library directory.
 *
 * Each operation runs synchronously against the directory first; only after
 * it succeeds are the touched records (loan, item, user) written through to
 * the store. A refusal from the directory becomes an AppError for the caller.
 */
export class LoanService {
  constructor(
    private directory: LibraryDirectory,
    private writeThrough: WriteThrough
  ) {}

  async checkOut(userId: string, itemId: string): Promise<LoanOperationResult> {
    log.info('Checking out item', { userId, itemId });

    const result = this.directory.checkOutItem(userId, itemId);

    if (!result.success) {
      log.debug('Checkout refused', { userId, itemId, reason: result.reason });
      throw toAppError(result, { userId, itemId });
    }

    const persisted = await this.writeThrough.commit('checkOut', this.touched(result.loan));

    log.info('Item checked out', { loanId: result.loan.id, userId, itemId, dateDue: result.loan.dateDue });
    return { loan: result.loan, message: result.message, persisted };
  }

  async checkIn(userId: string, itemId: string): Promise<CheckInOperationResult> {
    log.info('Checking in item', { userId, itemId });

    const result = this.directory.checkInItem(userId, itemId);

    if (!result.success) {
      log.debug('Check-in refused', { userId, itemId, reason: result.reason });
      throw toAppError(result, { userId, itemId });
    }

    const persisted = await this.writeThrough.commit('checkIn', this.touched(result.loan));

    log.info('Item checked in', {
      loanId: result.loan.id,
      userId,
      itemId,
      fine: result.fine,
      fineCharged: result.fineCharged,
    });
    return {
      loan: result.loan,
      message: result.message,
      fine: result.fine,
      fineCharged: result.fineCharged,
      persisted,
    };
  }

  async renew(userId: string, itemId: string): Promise<LoanOperationResult> {
    log.info('Renewing loan', { userId, itemId });

    const result = this.directory.renewLoan(userId, itemId);

    if (!result.success) {
      log.debug('Renewal refused', { userId, itemId, reason: result.reason, denial: result.denial });
      throw toAppError(result, { userId, itemId, ...(result.denial && { denial: result.denial }) });
    }

    const persisted = await this.writeThrough.commit('renew', { loans: [result.loan] });

    log.info('Loan renewed', {
      loanId: result.loan.id,
      renewalCount: result.loan.renewalCount,
      dateDue: result.loan.dateDue,
    });
    return { loan: result.loan, message: result.message, persisted };
  }

  async getLoan(id: string): Promise<Loan> {
    const loan = this.directory.getLoan(id);

    if (!loan) {
      throw new NotFoundError(ErrorCode.LOAN_NOT_FOUND, `Loan with ID ${id} not found`);
    }

    return loan;
  }

  async getOverdueLoans(): Promise<Loan[]> {
    return this.directory.getOverdueLoans();
  }

  // The loan plus the item and borrower it references
  private touched(loan: Loan): PendingWrites {
    const item = this.directory.getItem(loan.itemId);
    const user = this.directory.getUser(loan.userId);
    return {
      loans: [loan],
      items: item ? [item] : [],
      users: user ? [user] : [],
    };
  }
}
