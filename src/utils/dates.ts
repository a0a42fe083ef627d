export const DAY_MS = 24 * 60 * 60 * 1000;

export const addDays = (date: Date, days: number): Date => new Date(date.getTime() + days * DAY_MS);

/**
 * Whole days elapsed from `from` to `to`, partial days dropped
 */
export const wholeDaysBetween = (from: Date, to: Date): number =>
  Math.floor((to.getTime() - from.getTime()) / DAY_MS);

// YYYY-MM-DD in UTC
export const formatDate = (date: Date): string => date.toISOString().slice(0, 10);

export const roundCurrency = (amount: number): number => Math.round(amount * 100) / 100;

export const formatCurrency = (amount: number): string => `$${amount.toFixed(2)}`;
