import { describe, it, expect } from 'vitest';
import { canReturnLoan, isLoanVisible, linkedUserId, visibleLoanScope } from '../access.js';
import type { LoanDetail } from '../loan.js';
import { IDS, ada } from './fixtures.js';

type Gated = Pick<LoanDetail, 'createdByUserId' | 'resolvedTarget'>;

const officeLoan: Gated = {
  createdByUserId: IDS.otherUser,
  resolvedTarget: { kind: 'office', office: { id: IDS.berlin, name: 'Berlin' } },
};

const adaLoan: Gated = {
  createdByUserId: IDS.otherUser,
  resolvedTarget: {
    kind: 'person',
    person: { id: ada.id, firstName: ada.firstName, lastName: ada.lastName, userId: IDS.adaUser },
  },
};

const adaActor = { userId: IDS.adaUser };
const stranger = { userId: '00000000-0000-4000-8000-000000000099' };

describe('visibleLoanScope', () => {
  it('is unrestricted for admins only', () => {
    expect(visibleLoanScope(stranger, 'admin')).toEqual({ scope: 'all' });
    expect(visibleLoanScope(adaActor, 'company')).toEqual({ scope: 'own', userId: IDS.adaUser });
    expect(visibleLoanScope(adaActor, 'employee')).toEqual({ scope: 'own', userId: IDS.adaUser });
  });
});

describe('isLoanVisible', () => {
  it('shows loans the actor created', () => {
    const scope = visibleLoanScope({ userId: IDS.otherUser }, 'company');
    expect(isLoanVisible(scope, officeLoan)).toBe(true);
  });

  it('shows loans to the person linked to the target', () => {
    expect(linkedUserId(adaLoan)).toBe(IDS.adaUser);
    expect(isLoanVisible(visibleLoanScope(adaActor, 'employee'), adaLoan)).toBe(true);
  });

  it('hides everything else from non-admins', () => {
    expect(isLoanVisible(visibleLoanScope(stranger, 'employee'), adaLoan)).toBe(false);
    expect(isLoanVisible(visibleLoanScope(adaActor, 'employee'), officeLoan)).toBe(false);
    expect(linkedUserId(officeLoan)).toBeNull();
  });
});

describe('canReturnLoan', () => {
  it('mirrors visibility', () => {
    expect(canReturnLoan(stranger, 'admin', officeLoan)).toBe(true);
    expect(canReturnLoan(adaActor, 'employee', adaLoan)).toBe(true);
    expect(canReturnLoan(stranger, 'company', officeLoan)).toBe(false);
  });
});
