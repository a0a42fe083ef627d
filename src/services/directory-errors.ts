import { AppError, ErrorCode, NotFoundError } from '../types/error.types';
import { OperationFailure } from '../types/directory.types';

/**
 * Translate a directory refusal into the HTTP-facing error taxonomy
 */
export const toAppError = (failure: OperationFailure, details?: Record<string, unknown>): AppError => {
  switch (failure.reason) {
    case 'USER_NOT_FOUND':
      return new NotFoundError(ErrorCode.USER_NOT_FOUND, failure.message);
    case 'ITEM_NOT_FOUND':
      return new NotFoundError(ErrorCode.ITEM_NOT_FOUND, failure.message);
    case 'LOAN_NOT_FOUND':
      return new NotFoundError(ErrorCode.LOAN_NOT_FOUND, failure.message);
    case 'BORROWING_NOT_ALLOWED':
      return new AppError(ErrorCode.BORROWING_NOT_ALLOWED, failure.message, 409, details);
    case 'ITEM_UNAVAILABLE':
      return new AppError(ErrorCode.ITEM_UNAVAILABLE, failure.message, 409, details);
    case 'RENEWAL_DENIED':
      return new AppError(ErrorCode.RENEWAL_DENIED, failure.message, 409, details);
    case 'CHECKOUT_FAILED':
    case 'CHECKIN_FAILED':
      return new AppError(ErrorCode.INTERNAL_ERROR, failure.message, 500, details);
  }
};
