import { describe, it, expect } from 'vitest';
import { IsoDate, isValidIsoDate, toIsoDate, todayIsoDate } from '../dates.js';
import { LOAN_ERROR_STATUS, LoanError, isLoanError, loanErrors } from '../errors.js';

describe('ISO dates', () => {
  it('accepts real calendar dates only', () => {
    expect(isValidIsoDate('2024-02-29')).toBe(true);
    expect(isValidIsoDate('2023-02-29')).toBe(false);
    expect(isValidIsoDate('2024-13-01')).toBe(false);
    expect(isValidIsoDate('2024-1-01')).toBe(false);
    expect(isValidIsoDate('2024-01-01T00:00:00Z')).toBe(false);
  });

  it('formats local calendar dates', () => {
    expect(toIsoDate(new Date(2026, 0, 5, 23, 30))).toBe('2026-01-05');
    expect(todayIsoDate(new Date(2026, 11, 31, 8, 0))).toBe('2026-12-31');
  });

  it('validates through the Zod schema', () => {
    expect(IsoDate.safeParse('2026-03-10').success).toBe(true);
    expect(IsoDate.safeParse('10.03.2026').success).toBe(false);
  });
});

describe('LoanError', () => {
  it('carries the status of its code', () => {
    const error = loanErrors.assetUnavailable();
    expect(error.code).toBe('ASSET_UNAVAILABLE');
    expect(error.statusCode).toBe(409);
    expect(error.fieldErrors).toEqual({ asset: 'Selected asset is not available.' });
    expect(isLoanError(error)).toBe(true);
    expect(isLoanError(new Error('x'))).toBe(false);
  });

  it('marks FORBIDDEN and NOT_FOUND as terminal', () => {
    expect(loanErrors.forbidden().retryable).toBe(false);
    expect(loanErrors.notFound('Loan').retryable).toBe(false);
    expect(loanErrors.notFound('Loan').message).toBe('Loan not found');
    expect(loanErrors.alreadyReturned().retryable).toBe(true);
  });

  it('maps every code to a 4xx status', () => {
    for (const status of Object.values(LOAN_ERROR_STATUS)) {
      expect(status).toBeGreaterThanOrEqual(400);
      expect(status).toBeLessThan(500);
    }
    expect(new LoanError('PROFILE_NOT_LINKED', 'x').statusCode).toBe(422);
  });
});
