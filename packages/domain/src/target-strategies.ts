/**
 * Target Resolution Strategies
 *
 * PURE DOMAIN LOGIC - No database, no API.
 * The caller loads every entity the request references into a LoanCandidate;
 * the strategy for the actor's role validates it and binds it to exactly one
 * LoanTarget (plus an optional placement).
 *
 * Rule order (first failure wins):
 *   1. Referenced ids resolve                    → VALIDATION_ERROR
 *   2. Asset is `available`                      → ASSET_UNAVAILABLE
 *   3. loanDate ≥ today, dueDate ≥ loanDate      → INVALID_DATE_RANGE
 *   4. Selected position has no active loan      → TARGET_ALREADY_ASSIGNED
 *   5. Selected desk sits in selected office     → TARGET_OFFICE_MISMATCH
 *   6. Role-specific binding                     → VALIDATION_ERROR / PROFILE_NOT_LINKED
 *   7. Seated desk not held by another person    → TARGET_ALREADY_ASSIGNED
 */

import { LoanError, loanErrors, type FieldErrors } from './errors.js';
import {
  NO_PLACEMENT,
  positionName,
  type DeskRef,
  type LoanPlacement,
  type LoanTarget,
  type PositionRef,
} from './loan.js';
import type { Role } from './roles.js';
import type { Asset, Office, Person, TargetKind } from './types.js';

// ============================================================================
// INPUT / OUTPUT TYPES
// ============================================================================

/** Raw loan request fields, already shape-checked at the API boundary. */
export interface LoanRequest {
  assetId: string;
  targetType?: TargetKind;
  personId?: string;
  deskId?: string;
  officeId?: string;
  departmentPositionId?: string;
  department?: string;
  loanDate?: string;
  dueDate?: string;
  issuedBy?: string;
}

/** A LoanRequest with every referenced entity looked up (null = not found / not loaded). */
export interface LoanCandidate {
  request: LoanRequest;
  today: string;
  asset: Asset | null;
  person: Person | null;
  office: Office | null;
  desk: DeskRef | null;
  position: PositionRef | null;
  positionHasActiveLoan: boolean;
  /** Person currently seated at `desk` through an active loan, if any. */
  deskHolderPersonId: string | null;
  /** Profile of the acting identity (employee role only). */
  actorPerson: Person | null;
}

export interface LoanBinding {
  assetId: string;
  target: LoanTarget;
  placement: LoanPlacement;
  department: string | null;
  loanDate: string;
  dueDate: string | null;
  issuedBy: string | null;
}

export type BindResult =
  | { ok: true; binding: LoanBinding }
  | { ok: false; error: LoanError };

export interface TargetResolutionStrategy {
  readonly role: Role;
  allowedTargetKinds(): ReadonlySet<TargetKind>;
  validateAndBind(candidate: LoanCandidate): BindResult;
}

type TargetBinding = Pick<LoanBinding, 'target' | 'placement' | 'department'>;

// ============================================================================
// COMMON RULES
// ============================================================================

function blankToNull(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function checkReferences(c: LoanCandidate): void {
  const { request } = c;
  const errors: FieldErrors = {};

  if (!c.asset) errors.asset = 'Select a valid asset.';
  if (request.personId && !c.person) errors.person = 'Select a valid person.';
  if (request.officeId && !c.office) errors.office = 'Select a valid office.';
  if (request.deskId && !c.desk) errors.desk = 'Select a valid desk.';
  if (request.departmentPositionId && !c.position) {
    errors.departmentPosition = 'Select a valid department position.';
  }

  if (Object.keys(errors).length > 0) throw loanErrors.validation(errors);
}

function checkAssetAvailable(asset: Asset): void {
  if (asset.status !== 'available') throw loanErrors.assetUnavailable();
}

function checkDates(c: LoanCandidate): { loanDate: string; dueDate: string | null } {
  const loanDate = c.request.loanDate ?? c.today;
  const dueDate = c.request.dueDate ?? null;

  if (loanDate < c.today) {
    throw loanErrors.invalidDateRange('loanDate', 'Loan date cannot be in the past.');
  }
  if (dueDate !== null && dueDate < loanDate) {
    throw loanErrors.invalidDateRange('dueDate', 'Due date must be on or after the loan date.');
  }
  return { loanDate, dueDate };
}

function checkPositionFree(c: LoanCandidate): void {
  if (c.position && c.positionHasActiveLoan) throw loanErrors.positionAlreadyAssigned();
}

function checkDeskInOffice(c: LoanCandidate): void {
  if (c.desk && c.office && c.desk.office.id !== c.office.id) {
    throw loanErrors.targetOfficeMismatch();
  }
}

function checkDeskHolder(c: LoanCandidate, bound: TargetBinding): void {
  if (bound.target.kind !== 'person' || bound.placement.deskId === null) return;
  if (c.deskHolderPersonId !== null && c.deskHolderPersonId !== bound.target.personId) {
    throw loanErrors.deskAlreadyAssigned();
  }
}

// ============================================================================
// STRATEGIES
// ============================================================================

abstract class BaseTargetStrategy implements TargetResolutionStrategy {
  abstract readonly role: Role;
  protected abstract readonly targetKinds: readonly TargetKind[];

  allowedTargetKinds(): ReadonlySet<TargetKind> {
    return new Set(this.targetKinds);
  }

  validateAndBind(candidate: LoanCandidate): BindResult {
    try {
      checkReferences(candidate);
      const asset = candidate.asset;
      if (!asset) throw loanErrors.validation({ asset: 'Select a valid asset.' });
      checkAssetAvailable(asset);
      const dates = checkDates(candidate);
      checkPositionFree(candidate);
      checkDeskInOffice(candidate);

      const bound = this.bind(candidate);
      checkDeskHolder(candidate, bound);

      return {
        ok: true,
        binding: {
          assetId: asset.id,
          ...bound,
          ...dates,
          issuedBy: blankToNull(candidate.request.issuedBy),
        },
      };
    } catch (err) {
      if (err instanceof LoanError) return { ok: false, error: err };
      throw err;
    }
  }

  /** Resolve the requested target kind, rejecting kinds this role may not use. */
  protected targetKindOf(candidate: LoanCandidate, fallback?: TargetKind): TargetKind {
    const kind = candidate.request.targetType ?? fallback;
    if (!kind) {
      throw loanErrors.validation({ targetType: 'Choose loan target type.' });
    }
    if (!this.targetKinds.includes(kind)) {
      throw loanErrors.validation({ targetType: `Target type "${kind}" is not available for the ${this.role} role.` });
    }
    return kind;
  }

  protected abstract bind(candidate: LoanCandidate): TargetBinding;
}

/**
 * Admin: any target kind. Person targets snapshot the person's department and
 * may carry an office/desk placement; every other kind clears the snapshot.
 */
export class AdminTargetStrategy extends BaseTargetStrategy {
  readonly role = 'admin' as const;
  protected readonly targetKinds = ['person', 'desk', 'office', 'department_position'] as const;

  protected bind(c: LoanCandidate): TargetBinding {
    const kind = this.targetKindOf(c);

    switch (kind) {
      case 'person': {
        if (!c.person) throw loanErrors.validation({ person: 'Select a person.' });
        return {
          target: { kind: 'person', personId: c.person.id },
          placement: {
            officeId: c.office?.id ?? c.desk?.office.id ?? null,
            deskId: c.desk?.id ?? null,
          },
          department: blankToNull(c.person.department),
        };
      }
      case 'desk': {
        if (!c.desk) throw loanErrors.validation({ desk: 'Select a desk.' });
        return { target: { kind: 'desk', deskId: c.desk.id }, placement: NO_PLACEMENT, department: null };
      }
      case 'office': {
        if (!c.office) throw loanErrors.validation({ office: 'Select an office.' });
        return { target: { kind: 'office', officeId: c.office.id }, placement: NO_PLACEMENT, department: null };
      }
      case 'department_position': {
        if (!c.position) throw loanErrors.validation({ departmentPosition: 'Select a department position.' });
        return {
          target: { kind: 'department_position', departmentPositionId: c.position.id },
          placement: { officeId: c.office?.id ?? null, deskId: null },
          department: null,
        };
      }
    }
  }
}

/**
 * Company: office required. A selected position becomes the target (with the
 * office as placement); otherwise the office is the target and the free-text
 * department label is snapshotted.
 */
export class CompanyTargetStrategy extends BaseTargetStrategy {
  readonly role = 'company' as const;
  protected readonly targetKinds = ['office', 'department_position'] as const;

  validateAndBind(candidate: LoanCandidate): BindResult {
    // Company loans never sit at a desk; a stray desk is ignored.
    return super.validateAndBind({
      ...candidate,
      request: { ...candidate.request, deskId: undefined },
      desk: null,
      deskHolderPersonId: null,
    });
  }

  protected bind(c: LoanCandidate): TargetBinding {
    const kind = this.targetKindOf(c, c.position ? 'department_position' : 'office');
    const { office, position } = c;
    const needsPosition = kind === 'department_position' && !position;

    if (!office || needsPosition) {
      throw loanErrors.validation({
        ...(office ? {} : { office: 'Select an office.' }),
        ...(needsPosition ? { departmentPosition: 'Select a department position.' } : {}),
      });
    }

    if (kind === 'department_position' && position) {
      return {
        target: { kind: 'department_position', departmentPositionId: position.id },
        placement: { officeId: office.id, deskId: null },
        department: positionName(position),
      };
    }
    return {
      target: { kind: 'office', officeId: office.id },
      placement: NO_PLACEMENT,
      department: blankToNull(c.request.department),
    };
  }
}

/**
 * Employee: the target is always the actor's own profile. Office and desk are
 * required and become the placement.
 */
export class EmployeeTargetStrategy extends BaseTargetStrategy {
  readonly role = 'employee' as const;
  protected readonly targetKinds = ['person'] as const;

  validateAndBind(candidate: LoanCandidate): BindResult {
    // The person is implied by the actor; an explicit choice is discarded.
    return super.validateAndBind({
      ...candidate,
      request: { ...candidate.request, personId: undefined },
      person: null,
    });
  }

  protected bind(c: LoanCandidate): TargetBinding {
    this.targetKindOf(c, 'person');
    const { actorPerson, office, desk } = c;
    if (!actorPerson) throw loanErrors.profileNotLinked();

    if (!office || !desk) {
      throw loanErrors.validation({
        ...(office ? {} : { office: 'Select an office.' }),
        ...(desk ? {} : { desk: 'Select a desk.' }),
      });
    }

    return {
      target: { kind: 'person', personId: actorPerson.id },
      placement: { officeId: office.id, deskId: desk.id },
      department: blankToNull(actorPerson.department),
    };
  }
}

const STRATEGIES: Record<Role, TargetResolutionStrategy> = {
  admin: new AdminTargetStrategy(),
  employee: new EmployeeTargetStrategy(),
  company: new CompanyTargetStrategy(),
};

export function strategyFor(role: Role): TargetResolutionStrategy {
  return STRATEGIES[role];
}

/** Stable, presentation-friendly ordering of a role's target kinds. */
export function allowedTargetKinds(role: Role): TargetKind[] {
  const allowed = strategyFor(role).allowedTargetKinds();
  const order: TargetKind[] = ['person', 'desk', 'office', 'department_position'];
  return order.filter((kind) => allowed.has(kind));
}
