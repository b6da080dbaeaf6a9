/**
 * PostgreSQL error classification.
 *
 * Only the SQLSTATE codes the API reacts to are named here.
 */

export const PG_UNIQUE_VIOLATION = '23505';
export const PG_FOREIGN_KEY_VIOLATION = '23503';
export const PG_CHECK_VIOLATION = '23514';

export interface PgErrorLike {
  code: string;
  constraint?: string;
}

export function isPgError(err: unknown): err is PgErrorLike {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    typeof err.code === 'string' &&
    /^[0-9A-Z]{5}$/.test(err.code)
  );
}

export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  if (!isPgError(err) || err.code !== PG_UNIQUE_VIOLATION) return false;
  return constraint === undefined || err.constraint === constraint;
}

export function isForeignKeyViolation(err: unknown): boolean {
  return isPgError(err) && err.code === PG_FOREIGN_KEY_VIOLATION;
}

/** Envelope code, status and message for constraint failures surfaced to clients. */
export function describeConstraintError(
  err: unknown,
): { code: string; statusCode: number; message: string } | null {
  if (!isPgError(err)) return null;
  switch (err.code) {
    case PG_UNIQUE_VIOLATION:
      return { code: 'CONFLICT', statusCode: 409, message: 'A record with the same unique value already exists' };
    case PG_FOREIGN_KEY_VIOLATION:
      return { code: 'IN_USE', statusCode: 409, message: 'Record is referenced by other records' };
    case PG_CHECK_VIOLATION:
      return { code: 'VALIDATION_ERROR', statusCode: 400, message: 'Record violates a data constraint' };
    default:
      return null;
  }
}
