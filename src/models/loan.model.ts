import { AlreadyReturnedError, ValidationError } from '../types/error.types';
import { LoanSnapshot, LoanStatus, MAX_RENEWALS, RenewalDenialReason } from '../types/loan.types';
import { addDays, formatCurrency, roundCurrency, wholeDaysBetween } from '../utils/dates';
import { getDailyFineRate } from './circulation-policy';

export interface NewLoanParams {
  id: string;
  userId: string;
  itemId: string;
  loanPeriodDays: number;
}

/**
 * Loan
 *
 * One borrowing transaction between a user and an item.
 *
 * Lifecycle:
 * 1. **ACTIVE**: created at checkout, due `loanPeriodDays` later
 * 2. **OVERDUE**: derived, never stored; the clock has passed `dateDue`
 * 3. **RETURNED**: terminal, the fine is frozen at the value computed on return
 *
 * Renewal is only possible from ACTIVE, at most {@link MAX_RENEWALS} times.
 */
export class Loan {
  readonly id: string;
  readonly userId: string;
  readonly itemId: string;
  readonly loanPeriodDays: number;
  readonly dateBorrowed: Date;
  readonly maxRenewals = MAX_RENEWALS;

  private _dateDue: Date;
  private _dateReturned: Date | null;
  private _isReturned: boolean;
  private _fineAmount: number;
  private _renewalCount: number;

  private constructor(snapshot: LoanSnapshot) {
    this.id = snapshot.id;
    this.userId = snapshot.userId;
    this.itemId = snapshot.itemId;
    this.loanPeriodDays = snapshot.loanPeriodDays;
    this.dateBorrowed = new Date(snapshot.dateBorrowed);
    this._dateDue = new Date(snapshot.dateDue);
    this._dateReturned = snapshot.dateReturned ? new Date(snapshot.dateReturned) : null;
    this._isReturned = snapshot.isReturned;
    this._fineAmount = snapshot.fineAmount;
    this._renewalCount = snapshot.renewalCount;
  }

  static create(params: NewLoanParams): Loan {
    if (!params.id.trim() || !params.userId.trim() || !params.itemId.trim()) {
      throw new ValidationError('Loan requires an id, a user id and an item id');
    }
    if (!Number.isInteger(params.loanPeriodDays) || params.loanPeriodDays <= 0) {
      throw new ValidationError('Loan period must be a positive number of days', {
        loanPeriodDays: params.loanPeriodDays,
      });
    }

    const now = new Date();
    return new Loan({
      ...params,
      dateBorrowed: now,
      dateDue: addDays(now, params.loanPeriodDays),
      dateReturned: null,
      isReturned: false,
      fineAmount: 0,
      renewalCount: 0,
    });
  }

  /**
   * Rebuild a loan from a persisted snapshot
   */
  static restore(snapshot: LoanSnapshot): Loan {
    if (snapshot.renewalCount < 0 || snapshot.renewalCount > MAX_RENEWALS) {
      throw new ValidationError(`Loan ${snapshot.id} has an invalid renewal count`, {
        renewalCount: snapshot.renewalCount,
      });
    }
    if (snapshot.fineAmount < 0) {
      throw new ValidationError(`Loan ${snapshot.id} has a negative fine`);
    }
    return new Loan(snapshot);
  }

  get dateDue(): Date {
    return new Date(this._dateDue);
  }

  get dateReturned(): Date | null {
    return this._dateReturned ? new Date(this._dateReturned) : null;
  }

  get isReturned(): boolean {
    return this._isReturned;
  }

  get renewalCount(): number {
    return this._renewalCount;
  }

  /**
   * Fine frozen at return time (0 while the loan is open)
   */
  get fineAmount(): number {
    return this._fineAmount;
  }

  isOverdue(): boolean {
    if (this._isReturned) return false;
    return Date.now() > this._dateDue.getTime();
  }

  daysOverdue(): number {
    if (!this.isOverdue()) return 0;
    return wholeDaysBetween(this._dateDue, new Date());
  }

  /**
   * Fine accrued so far for an open overdue loan, otherwise the stored fine
   */
  currentFine(): number {
    if (!this._isReturned && this.isOverdue()) {
      return roundCurrency(this.daysOverdue() * getDailyFineRate());
    }
    return this._fineAmount;
  }

  /**
   * Close the loan and freeze the fine. Throws AlreadyReturnedError on a second call.
   *
   * @returns the final fine
   */
  returnItem(returnTime: Date = new Date()): number {
    if (this._isReturned) {
      throw new AlreadyReturnedError(this.id);
    }

    this._isReturned = true;
    this._dateReturned = new Date(returnTime);

    if (returnTime.getTime() > this._dateDue.getTime()) {
      const daysLate = wholeDaysBetween(this._dateDue, returnTime);
      this._fineAmount = roundCurrency(daysLate * getDailyFineRate());
    } else {
      this._fineAmount = 0;
    }

    return this._fineAmount;
  }

  renewalDenialReason(): RenewalDenialReason | null {
    if (this._isReturned) return 'RETURNED';
    if (this._renewalCount >= this.maxRenewals) return 'MAX_RENEWALS_REACHED';
    if (this.isOverdue()) return 'OVERDUE';
    return null;
  }

  canRenew(): boolean {
    return this.renewalDenialReason() === null;
  }

  /**
   * Extend the due date. Returns false (and changes nothing) when renewal is denied.
   */
  renew(additionalDays: number = this.loanPeriodDays): boolean {
    if (!Number.isInteger(additionalDays) || additionalDays <= 0) {
      throw new ValidationError('Renewal period must be a positive number of days', { additionalDays });
    }
    if (!this.canRenew()) return false;

    this._dateDue = addDays(this._dateDue, additionalDays);
    this._renewalCount += 1;
    return true;
  }

  loanDurationDays(): number {
    const end = this._isReturned && this._dateReturned ? this._dateReturned : new Date();
    return wholeDaysBetween(this.dateBorrowed, end);
  }

  status(): LoanStatus {
    if (this._isReturned) return LoanStatus.RETURNED;
    return this.isOverdue() ? LoanStatus.OVERDUE : LoanStatus.ACTIVE;
  }

  statusLabel(): string {
    switch (this.status()) {
      case LoanStatus.RETURNED:
        return this._fineAmount > 0
          ? `Returned Late (Fine: ${formatCurrency(this._fineAmount)})`
          : 'Returned On Time';
      case LoanStatus.OVERDUE:
        return `Overdue (${this.daysOverdue()} days)`;
      case LoanStatus.ACTIVE:
        return `Active (${wholeDaysBetween(new Date(), this._dateDue)} days remaining)`;
    }
  }

  toSnapshot(): LoanSnapshot {
    return {
      id: this.id,
      userId: this.userId,
      itemId: this.itemId,
      loanPeriodDays: this.loanPeriodDays,
      dateBorrowed: new Date(this.dateBorrowed),
      dateDue: this.dateDue,
      dateReturned: this.dateReturned,
      isReturned: this._isReturned,
      fineAmount: this._fineAmount,
      renewalCount: this._renewalCount,
    };
  }
}
