/**
 * Error types and codes
 */

export enum ErrorCode {
  // Validation errors (400)
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_INPUT = 'INVALID_INPUT',

  // Not found errors (404)
  NOT_FOUND = 'NOT_FOUND',
  USER_NOT_FOUND = 'USER_NOT_FOUND',
  ITEM_NOT_FOUND = 'ITEM_NOT_FOUND',
  LOAN_NOT_FOUND = 'LOAN_NOT_FOUND',

  // Conflict errors (409)
  DUPLICATE_IDENTIFIER = 'DUPLICATE_IDENTIFIER',
  ITEM_UNAVAILABLE = 'ITEM_UNAVAILABLE',
  BORROWING_NOT_ALLOWED = 'BORROWING_NOT_ALLOWED',
  RENEWAL_DENIED = 'RENEWAL_DENIED',
  ALREADY_RETURNED = 'ALREADY_RETURNED',
  HAS_ACTIVE_LOANS = 'HAS_ACTIVE_LOANS',
  ITEM_ON_LOAN = 'ITEM_ON_LOAN',
  UNSUPPORTED_FOR_ROLE = 'UNSUPPORTED_FOR_ROLE',

  // Server errors (500)
  DATABASE_ERROR = 'DATABASE_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode | string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Malformed entity input (identifier, title, email, ...).
 * Raised at construction or update time and never recovered from.
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.VALIDATION_ERROR, message, 400, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(code: ErrorCode, message: string) {
    super(code, message, 404);
    this.name = 'NotFoundError';
  }
}

/**
 * A loan was returned twice; indicates a coordination bug in the caller
 */
export class AlreadyReturnedError extends AppError {
  constructor(public loanId: string) {
    super(ErrorCode.ALREADY_RETURNED, `Loan ${loanId} has already been returned`, 409, { loanId });
    this.name = 'AlreadyReturnedError';
  }
}
