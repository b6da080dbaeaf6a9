/**
 * Loan error taxonomy.
 *
 * Every rule violation in target resolution or the loan lifecycle surfaces as
 * a LoanError with a stable `code`. Race losses detected at commit time use
 * the same codes as the pre-checks, so callers see one remedy per code.
 */

import { z } from 'zod';

export const LoanErrorCode = z.enum([
  'VALIDATION_ERROR',
  'INVALID_DATE_RANGE',
  'ASSET_UNAVAILABLE',
  'TARGET_ALREADY_ASSIGNED',
  'TARGET_OFFICE_MISMATCH',
  'PROFILE_NOT_LINKED',
  'ALREADY_RETURNED',
  'FORBIDDEN',
  'NOT_FOUND',
]);
export type LoanErrorCode = z.infer<typeof LoanErrorCode>;

export const LOAN_ERROR_STATUS: Record<LoanErrorCode, number> = {
  VALIDATION_ERROR: 400,
  INVALID_DATE_RANGE: 400,
  TARGET_OFFICE_MISMATCH: 400,
  ASSET_UNAVAILABLE: 409,
  TARGET_ALREADY_ASSIGNED: 409,
  ALREADY_RETURNED: 409,
  PROFILE_NOT_LINKED: 422,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
};

/** Field name → user-facing message. */
export type FieldErrors = Record<string, string>;

export class LoanError extends Error {
  readonly code: LoanErrorCode;
  readonly statusCode: number;
  readonly fieldErrors: FieldErrors | undefined;

  constructor(code: LoanErrorCode, message: string, fieldErrors?: FieldErrors) {
    super(message);
    this.name = 'LoanError';
    this.code = code;
    this.statusCode = LOAN_ERROR_STATUS[code];
    this.fieldErrors = fieldErrors;
  }

  /** FORBIDDEN and NOT_FOUND are terminal; everything else can be retried with corrected input. */
  get retryable(): boolean {
    return this.code !== 'FORBIDDEN' && this.code !== 'NOT_FOUND';
  }
}

export function isLoanError(err: unknown): err is LoanError {
  return err instanceof LoanError;
}

export const loanErrors = {
  validation(fieldErrors: FieldErrors, message = 'Validation error'): LoanError {
    return new LoanError('VALIDATION_ERROR', message, fieldErrors);
  },
  invalidDateRange(field: 'loanDate' | 'dueDate', message: string): LoanError {
    return new LoanError('INVALID_DATE_RANGE', message, { [field]: message });
  },
  assetUnavailable(): LoanError {
    return new LoanError('ASSET_UNAVAILABLE', 'Selected asset is not available.', {
      asset: 'Selected asset is not available.',
    });
  },
  positionAlreadyAssigned(): LoanError {
    return new LoanError('TARGET_ALREADY_ASSIGNED', 'Selected department position is already assigned.', {
      departmentPosition: 'Selected department position is already assigned.',
    });
  },
  deskAlreadyAssigned(): LoanError {
    return new LoanError('TARGET_ALREADY_ASSIGNED', 'Selected desk is already assigned to another person.', {
      desk: 'Selected desk is already assigned to another person.',
    });
  },
  targetOfficeMismatch(): LoanError {
    return new LoanError('TARGET_OFFICE_MISMATCH', 'Selected desk does not belong to the selected office.', {
      desk: 'Selected desk does not belong to the selected office.',
    });
  },
  profileNotLinked(): LoanError {
    return new LoanError(
      'PROFILE_NOT_LINKED',
      'Your account is not linked to an employee profile. Ask an administrator to link it.',
    );
  },
  alreadyReturned(): LoanError {
    return new LoanError('ALREADY_RETURNED', 'Loan already returned.');
  },
  forbidden(message = 'You are not allowed to act on this loan.'): LoanError {
    return new LoanError('FORBIDDEN', message);
  },
  notFound(entity: string): LoanError {
    return new LoanError('NOT_FOUND', `${entity} not found`);
  },
};

/**
 * Raised when a loan row or projection does not carry exactly one target.
 * This is a programming/data-integrity fault, never a user error.
 */
export class ExactlyOneTargetError extends Error {
  readonly populated: string[];

  constructor(populated: string[]) {
    super(`Loan must have exactly one target, found ${populated.length}${populated.length ? ` (${populated.join(', ')})` : ''}`);
    this.name = 'ExactlyOneTargetError';
    this.populated = populated;
  }
}
