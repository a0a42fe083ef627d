import { ValidationError } from '../types/error.types';

/**
 * Process-wide circulation rules read by loans and members
 */
export interface CirculationPolicy {
  dailyFineRate: number;
  fineBlockThreshold: number;
  enforceMembershipExpiry: boolean;
  membershipTermDays: number;
}

export const DEFAULT_CIRCULATION_POLICY: Readonly<CirculationPolicy> = {
  dailyFineRate: 0.5,
  fineBlockThreshold: 10,
  enforceMembershipExpiry: true,
  membershipTermDays: 365,
};

let current: CirculationPolicy = { ...DEFAULT_CIRCULATION_POLICY };

export const getCirculationPolicy = (): Readonly<CirculationPolicy> => current;

export const getDailyFineRate = (): number => current.dailyFineRate;

const assertDailyFineRate = (rate: number): void => {
  if (!Number.isFinite(rate) || rate < 0) {
    throw new ValidationError('Daily fine rate cannot be negative', { rate });
  }
};

export const setDailyFineRate = (rate: number): void => {
  assertDailyFineRate(rate);
  current = { ...current, dailyFineRate: rate };
};

// Nothing is applied unless every field is valid
export const configureCirculationPolicy = (overrides: Partial<CirculationPolicy>): void => {
  const next = { ...current, ...overrides };
  assertDailyFineRate(next.dailyFineRate);
  if (!Number.isFinite(next.fineBlockThreshold) || next.fineBlockThreshold < 0) {
    throw new ValidationError('Fine block threshold cannot be negative', {
      fineBlockThreshold: next.fineBlockThreshold,
    });
  }
  if (!Number.isInteger(next.membershipTermDays) || next.membershipTermDays <= 0) {
    throw new ValidationError('Membership term must be a positive number of days', {
      membershipTermDays: next.membershipTermDays,
    });
  }
  current = next;
};

export const resetCirculationPolicy = (): void => {
  current = { ...DEFAULT_CIRCULATION_POLICY };
};
