import { describe, it, expect } from 'vitest';
import type { LoanError } from '../errors.js';
import {
  AdminTargetStrategy,
  CompanyTargetStrategy,
  EmployeeTargetStrategy,
  allowedTargetKinds,
  strategyFor,
  type BindResult,
  type LoanBinding,
} from '../target-strategies.js';
import {
  IDS,
  TODAY,
  ada,
  berlin,
  candidate,
  deskInBerlin,
  deskInWarsaw,
  grace,
  itPosition,
  laptop,
  warsaw,
} from './fixtures.js';

function bound(result: BindResult): LoanBinding {
  if (!result.ok) throw new Error(`expected a binding, got ${result.error.code}`);
  return result.binding;
}

function rejected(result: BindResult): LoanError {
  if (result.ok) throw new Error('expected a rejection');
  return result.error;
}

describe('strategyFor / allowedTargetKinds', () => {
  it('picks the strategy matching the role', () => {
    expect(strategyFor('admin')).toBeInstanceOf(AdminTargetStrategy);
    expect(strategyFor('company')).toBeInstanceOf(CompanyTargetStrategy);
    expect(strategyFor('employee')).toBeInstanceOf(EmployeeTargetStrategy);
  });

  it('lists target kinds in a stable order', () => {
    expect(allowedTargetKinds('admin')).toEqual(['person', 'desk', 'office', 'department_position']);
    expect(allowedTargetKinds('company')).toEqual(['office', 'department_position']);
    expect(allowedTargetKinds('employee')).toEqual(['person']);
  });
});

describe('common rules', () => {
  const admin = new AdminTargetStrategy();

  it('reports every unresolved reference at once', () => {
    const error = rejected(admin.validateAndBind(candidate(
      { targetType: 'person', personId: IDS.grace, deskId: IDS.deskA },
      { asset: null },
    )));
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.fieldErrors).toEqual({
      asset: 'Select a valid asset.',
      person: 'Select a valid person.',
      desk: 'Select a valid desk.',
    });
  });

  it('rejects an asset that is not available before looking at dates', () => {
    const error = rejected(admin.validateAndBind(candidate(
      { targetType: 'office', officeId: IDS.berlin, loanDate: '2020-01-01' },
      { asset: { ...laptop, status: 'assigned' }, office: berlin },
    )));
    expect(error.code).toBe('ASSET_UNAVAILABLE');
  });

  it('rejects a loan date in the past', () => {
    const error = rejected(admin.validateAndBind(candidate(
      { targetType: 'office', officeId: IDS.berlin, loanDate: '2026-03-09' },
      { office: berlin },
    )));
    expect(error.code).toBe('INVALID_DATE_RANGE');
    expect(error.fieldErrors).toEqual({ loanDate: 'Loan date cannot be in the past.' });
  });

  it('rejects a due date before the loan date', () => {
    const error = rejected(admin.validateAndBind(candidate(
      { targetType: 'office', officeId: IDS.berlin, loanDate: '2026-03-12', dueDate: '2026-03-11' },
      { office: berlin },
    )));
    expect(error.code).toBe('INVALID_DATE_RANGE');
    expect(error.fieldErrors).toEqual({ dueDate: 'Due date must be on or after the loan date.' });
  });

  it('accepts a due date equal to the loan date', () => {
    const binding = bound(admin.validateAndBind(candidate(
      { targetType: 'office', officeId: IDS.berlin, dueDate: TODAY },
      { office: berlin },
    )));
    expect(binding.loanDate).toBe(TODAY);
    expect(binding.dueDate).toBe(TODAY);
  });

  it('rejects a department position that already has an active loan', () => {
    const error = rejected(admin.validateAndBind(candidate(
      { targetType: 'department_position', departmentPositionId: IDS.position },
      { position: itPosition, positionHasActiveLoan: true },
    )));
    expect(error.code).toBe('TARGET_ALREADY_ASSIGNED');
    expect(error.fieldErrors).toEqual({ departmentPosition: 'Selected department position is already assigned.' });
  });

  it('rejects a desk outside the selected office', () => {
    const error = rejected(admin.validateAndBind(candidate(
      { targetType: 'person', personId: IDS.ada, officeId: IDS.berlin, deskId: IDS.deskB },
      { person: ada, office: berlin, desk: deskInWarsaw },
    )));
    expect(error.code).toBe('TARGET_OFFICE_MISMATCH');
  });

  it('trims issuedBy and drops it when blank', () => {
    const named = bound(admin.validateAndBind(candidate(
      { targetType: 'office', officeId: IDS.berlin, issuedBy: '  Front desk ' },
      { office: berlin },
    )));
    expect(named.issuedBy).toBe('Front desk');

    const blank = bound(admin.validateAndBind(candidate(
      { targetType: 'office', officeId: IDS.berlin, issuedBy: '   ' },
      { office: berlin },
    )));
    expect(blank.issuedBy).toBeNull();
  });
});

describe('AdminTargetStrategy', () => {
  const admin = new AdminTargetStrategy();

  it('requires a target type', () => {
    const error = rejected(admin.validateAndBind(candidate({ officeId: IDS.berlin }, { office: berlin })));
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.fieldErrors).toEqual({ targetType: 'Choose loan target type.' });
  });

  it('binds a person with desk placement and snapshots the department', () => {
    const binding = bound(admin.validateAndBind(candidate(
      { targetType: 'person', personId: IDS.ada, deskId: IDS.deskA },
      { person: ada, desk: deskInBerlin },
    )));
    expect(binding).toEqual({
      assetId: IDS.asset,
      target: { kind: 'person', personId: IDS.ada },
      placement: { officeId: IDS.berlin, deskId: IDS.deskA },
      department: 'IT',
      loanDate: TODAY,
      dueDate: null,
      issuedBy: null,
    });
  });

  it('requires the selected person for a person target', () => {
    const error = rejected(admin.validateAndBind(candidate({ targetType: 'person' })));
    expect(error.fieldErrors).toEqual({ person: 'Select a person.' });
  });

  it('binds a desk without placement or department', () => {
    const binding = bound(admin.validateAndBind(candidate(
      { targetType: 'desk', deskId: IDS.deskA, department: 'Sales' },
      { desk: deskInBerlin },
    )));
    expect(binding.target).toEqual({ kind: 'desk', deskId: IDS.deskA });
    expect(binding.placement).toEqual({ officeId: null, deskId: null });
    expect(binding.department).toBeNull();
  });

  it('binds a department position with the office as placement', () => {
    const binding = bound(admin.validateAndBind(candidate(
      { targetType: 'department_position', departmentPositionId: IDS.position, officeId: IDS.warsaw },
      { position: itPosition, office: warsaw },
    )));
    expect(binding.target).toEqual({ kind: 'department_position', departmentPositionId: IDS.position });
    expect(binding.placement).toEqual({ officeId: IDS.warsaw, deskId: null });
  });

  it('rejects an office loan when the asset is already assigned', () => {
    const error = rejected(admin.validateAndBind(candidate(
      { targetType: 'office', officeId: IDS.berlin },
      { office: berlin, asset: { ...laptop, status: 'assigned' } },
    )));
    expect(error.code).toBe('ASSET_UNAVAILABLE');
  });

  it('refuses to seat a second person at a held desk', () => {
    const error = rejected(admin.validateAndBind(candidate(
      { targetType: 'person', personId: IDS.grace, deskId: IDS.deskA },
      { person: grace, desk: deskInBerlin, deskHolderPersonId: IDS.ada },
    )));
    expect(error.code).toBe('TARGET_ALREADY_ASSIGNED');
    expect(error.fieldErrors).toEqual({ desk: 'Selected desk is already assigned to another person.' });
  });

  it('lets the current holder take another asset at the same desk', () => {
    const binding = bound(admin.validateAndBind(candidate(
      { targetType: 'person', personId: IDS.ada, deskId: IDS.deskA },
      { person: ada, desk: deskInBerlin, deskHolderPersonId: IDS.ada },
    )));
    expect(binding.placement.deskId).toBe(IDS.deskA);
  });

  it('ignores a held desk when it is the target itself', () => {
    const binding = bound(admin.validateAndBind(candidate(
      { targetType: 'desk', deskId: IDS.deskA },
      { desk: deskInBerlin, deskHolderPersonId: IDS.ada },
    )));
    expect(binding.target.kind).toBe('desk');
  });
});

describe('CompanyTargetStrategy', () => {
  const company = new CompanyTargetStrategy();

  it('targets the office and keeps the free-text department', () => {
    const binding = bound(company.validateAndBind(candidate(
      { officeId: IDS.berlin, department: '  Sales ' },
      { office: berlin },
    )));
    expect(binding.target).toEqual({ kind: 'office', officeId: IDS.berlin });
    expect(binding.placement).toEqual({ officeId: null, deskId: null });
    expect(binding.department).toBe('Sales');
  });

  it('targets a selected position and snapshots its label', () => {
    const binding = bound(company.validateAndBind(candidate(
      { officeId: IDS.berlin, departmentPositionId: IDS.position, department: 'ignored' },
      { office: berlin, position: itPosition },
    )));
    expect(binding.target).toEqual({ kind: 'department_position', departmentPositionId: IDS.position });
    expect(binding.placement).toEqual({ officeId: IDS.berlin, deskId: null });
    expect(binding.department).toBe('IT #2');
  });

  it('ignores a desk from another office', () => {
    const binding = bound(company.validateAndBind(candidate(
      { officeId: IDS.berlin, deskId: IDS.deskB, departmentPositionId: IDS.position },
      { office: berlin, desk: deskInWarsaw, position: itPosition, deskHolderPersonId: IDS.grace },
    )));
    expect(binding.target).toEqual({ kind: 'department_position', departmentPositionId: IDS.position });
    expect(binding.placement).toEqual({ officeId: IDS.berlin, deskId: null });
  });

  it('requires an office', () => {
    const error = rejected(company.validateAndBind(candidate({ department: 'Sales' })));
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.fieldErrors).toEqual({ office: 'Select an office.' });
  });

  it('requires a position when the position kind is requested', () => {
    const error = rejected(company.validateAndBind(candidate({ targetType: 'department_position' })));
    expect(error.fieldErrors).toEqual({
      office: 'Select an office.',
      departmentPosition: 'Select a department position.',
    });
  });

  it('refuses person targets', () => {
    const error = rejected(company.validateAndBind(candidate(
      { targetType: 'person', personId: IDS.ada, officeId: IDS.berlin },
      { person: ada, office: berlin },
    )));
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.fieldErrors).toEqual({ targetType: 'Target type "person" is not available for the company role.' });
  });
});

describe('EmployeeTargetStrategy', () => {
  const employee = new EmployeeTargetStrategy();

  it('loans to the actor profile at the chosen desk', () => {
    const binding = bound(employee.validateAndBind(candidate(
      { officeId: IDS.berlin, deskId: IDS.deskA, loanDate: TODAY },
      { office: berlin, desk: deskInBerlin, actorPerson: ada },
    )));
    expect(binding.target).toEqual({ kind: 'person', personId: IDS.ada });
    expect(binding.placement).toEqual({ officeId: IDS.berlin, deskId: IDS.deskA });
    expect(binding.department).toBe('IT');
  });

  it('rejects a desk from another office', () => {
    const error = rejected(employee.validateAndBind(candidate(
      { officeId: IDS.berlin, deskId: IDS.deskB },
      { office: berlin, desk: deskInWarsaw, actorPerson: ada },
    )));
    expect(error.code).toBe('TARGET_OFFICE_MISMATCH');
  });

  it('discards an explicitly chosen person', () => {
    const binding = bound(employee.validateAndBind(candidate(
      { personId: IDS.grace, officeId: IDS.berlin, deskId: IDS.deskA },
      { person: grace, office: berlin, desk: deskInBerlin, actorPerson: ada },
    )));
    expect(binding.target).toEqual({ kind: 'person', personId: IDS.ada });
  });

  it('fails when the actor has no linked profile', () => {
    const error = rejected(employee.validateAndBind(candidate(
      { officeId: IDS.berlin, deskId: IDS.deskA },
      { office: berlin, desk: deskInBerlin },
    )));
    expect(error.code).toBe('PROFILE_NOT_LINKED');
    expect(error.statusCode).toBe(422);
  });

  it('requires both office and desk', () => {
    const error = rejected(employee.validateAndBind(candidate(
      { officeId: IDS.berlin },
      { office: berlin, actorPerson: ada },
    )));
    expect(error.fieldErrors).toEqual({ desk: 'Select a desk.' });
  });

  it('refuses other target kinds', () => {
    const error = rejected(employee.validateAndBind(candidate(
      { targetType: 'office', officeId: IDS.berlin },
      { office: berlin, actorPerson: ada },
    )));
    expect(error.fieldErrors).toEqual({ targetType: 'Target type "office" is not available for the employee role.' });
  });
});
