/**
 * Access Control Gate
 *
 * Admins see and act on every loan. Everyone else only sees loans they
 * created, or loans whose person target is linked to their own identity.
 * The same rule scopes the active view, the history view, and returns.
 */

import type { LoanDetail } from './loan.js';
import type { ActorIdentity, Role } from './roles.js';

export type LoanVisibility =
  | { scope: 'all' }
  | { scope: 'own'; userId: string };

export function visibleLoanScope(actor: Pick<ActorIdentity, 'userId'>, role: Role): LoanVisibility {
  if (role === 'admin') return { scope: 'all' };
  return { scope: 'own', userId: actor.userId };
}

/** Identity linked to the loan's person target, if any. */
export function linkedUserId(loan: Pick<LoanDetail, 'resolvedTarget'>): string | null {
  return loan.resolvedTarget.kind === 'person' ? loan.resolvedTarget.person.userId : null;
}

export function isLoanVisible(
  visibility: LoanVisibility,
  loan: Pick<LoanDetail, 'createdByUserId' | 'resolvedTarget'>,
): boolean {
  if (visibility.scope === 'all') return true;
  return loan.createdByUserId === visibility.userId || linkedUserId(loan) === visibility.userId;
}

export function canReturnLoan(
  actor: Pick<ActorIdentity, 'userId'>,
  role: Role,
  loan: Pick<LoanDetail, 'createdByUserId' | 'resolvedTarget'>,
): boolean {
  return isLoanVisible(visibleLoanScope(actor, role), loan);
}
