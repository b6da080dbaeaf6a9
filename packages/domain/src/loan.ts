/**
 * Loan records, the target sum type, and the read-only label projections.
 *
 * A loan points at exactly one target. In memory that is the `LoanTarget`
 * tagged union; storage keeps four nullable foreign keys, and the
 * `targetToColumns` / `targetFromColumns` pair is the only bridge between
 * the two.
 */

import { z } from 'zod';
import { ExactlyOneTargetError } from './errors.js';
import { assetLabel, personName, type TargetKind } from './types.js';

// ============================================================================
// TARGET SUM TYPE
// ============================================================================

export type LoanTarget =
  | { kind: 'person'; personId: string }
  | { kind: 'desk'; deskId: string }
  | { kind: 'office'; officeId: string }
  | { kind: 'department_position'; departmentPositionId: string };

export interface LoanTargetColumns {
  personId: string | null;
  deskId: string | null;
  officeId: string | null;
  departmentPositionId: string | null;
}

const TARGET_COLUMNS: readonly (keyof LoanTargetColumns)[] = [
  'personId',
  'deskId',
  'officeId',
  'departmentPositionId',
];

export function targetId(target: LoanTarget): string {
  switch (target.kind) {
    case 'person':
      return target.personId;
    case 'desk':
      return target.deskId;
    case 'office':
      return target.officeId;
    case 'department_position':
      return target.departmentPositionId;
  }
}

export function targetToColumns(target: LoanTarget): LoanTargetColumns {
  const columns: LoanTargetColumns = {
    personId: null,
    deskId: null,
    officeId: null,
    departmentPositionId: null,
  };
  switch (target.kind) {
    case 'person':
      columns.personId = target.personId;
      break;
    case 'desk':
      columns.deskId = target.deskId;
      break;
    case 'office':
      columns.officeId = target.officeId;
      break;
    case 'department_position':
      columns.departmentPositionId = target.departmentPositionId;
      break;
  }
  return columns;
}

/**
 * Rebuild the target from storage columns.
 * Throws ExactlyOneTargetError unless exactly one column is populated.
 */
export function targetFromColumns(columns: LoanTargetColumns): LoanTarget {
  const populated = TARGET_COLUMNS.filter((key) => columns[key] !== null);
  if (populated.length !== 1) {
    throw new ExactlyOneTargetError(populated);
  }

  if (columns.personId !== null) return { kind: 'person', personId: columns.personId };
  if (columns.deskId !== null) return { kind: 'desk', deskId: columns.deskId };
  if (columns.officeId !== null) return { kind: 'office', officeId: columns.officeId };
  if (columns.departmentPositionId !== null) {
    return { kind: 'department_position', departmentPositionId: columns.departmentPositionId };
  }
  throw new ExactlyOneTargetError(populated);
}

// ============================================================================
// LOAN RECORD
// ============================================================================

/** Where a person/position loan physically sits. Never a target on its own. */
export interface LoanPlacement {
  officeId: string | null;
  deskId: string | null;
}

export const NO_PLACEMENT: LoanPlacement = { officeId: null, deskId: null };

export interface Loan {
  id: string;
  assetId: string;
  target: LoanTarget;
  placement: LoanPlacement;
  department: string | null;       // write-once snapshot
  loanDate: string;
  dueDate: string | null;
  returnDate: string | null;
  issuedBy: string | null;
  createdByUserId: string | null;
  returnedByUserId: string | null;
  createdAt: Date;
}

export type LoanState = 'active' | 'returned';

export function loanState(loan: Pick<Loan, 'returnDate'>): LoanState {
  return loan.returnDate === null ? 'active' : 'returned';
}

export function isOverdue(loan: Pick<Loan, 'returnDate' | 'dueDate'>, today: string): boolean {
  return loan.returnDate === null && loan.dueDate !== null && loan.dueDate < today;
}

// ============================================================================
// RESOLVED REFERENCES (for display)
// ============================================================================

export interface OfficeRef {
  id: string;
  name: string;
}

export interface DeskRef {
  id: string;
  code: string;
  roomName: string;
  office: OfficeRef;
}

export interface PositionRef {
  id: string;
  number: number;
  departmentName: string;
}

export interface PersonRef {
  id: string;
  firstName: string;
  lastName: string;
  userId: string | null;
}

export type ResolvedLoanTarget =
  | { kind: 'person'; person: PersonRef }
  | { kind: 'desk'; desk: DeskRef }
  | { kind: 'office'; office: OfficeRef }
  | { kind: 'department_position'; position: PositionRef };

export interface LoanDetail extends Loan {
  asset: { id: string; name: string; serialNumber: string };
  resolvedTarget: ResolvedLoanTarget;
  placementOffice: OfficeRef | null;
  placementDesk: DeskRef | null;
}

export function deskName(desk: DeskRef): string {
  return `${desk.office.name} / ${desk.roomName} / ${desk.code}`;
}

export function positionName(position: Pick<PositionRef, 'departmentName' | 'number'>): string {
  return `${position.departmentName} #${position.number}`;
}

// ============================================================================
// LABEL PROJECTIONS
// ============================================================================

type LabelSource = Pick<LoanDetail, 'resolvedTarget' | 'placementOffice' | 'placementDesk' | 'department'>;

export function targetDisplayName(target: ResolvedLoanTarget): string {
  switch (target.kind) {
    case 'person':
      return personName(target.person);
    case 'desk':
      return deskName(target.desk);
    case 'office':
      return target.office.name;
    case 'department_position':
      return positionName(target.position);
  }
}

const TARGET_KIND_TITLES: Record<TargetKind, string> = {
  person: 'Person',
  desk: 'Desk',
  office: 'Office',
  department_position: 'Department',
};

export function targetLabel(loan: LabelSource): string {
  const target = loan.resolvedTarget;
  return `${TARGET_KIND_TITLES[target.kind]}: ${targetDisplayName(target)}`;
}

export function officeLabel(loan: LabelSource): string {
  const target = loan.resolvedTarget;
  if (target.kind === 'office') return target.office.name;
  if (target.kind === 'desk') return target.desk.office.name;
  if (loan.placementOffice) return loan.placementOffice.name;
  if (loan.placementDesk) return loan.placementDesk.office.name;
  return '-';
}

export function deskLabel(loan: LabelSource): string {
  const target = loan.resolvedTarget;
  if (target.kind === 'desk') return deskName(target.desk);
  if (loan.placementDesk) return deskName(loan.placementDesk);
  return '-';
}

export function departmentLabel(loan: LabelSource): string {
  const target = loan.resolvedTarget;
  if (target.kind === 'department_position') return positionName(target.position);
  if (loan.department) return loan.department;
  return '-';
}

export function loanAssetLabel(loan: Pick<LoanDetail, 'asset'>): string {
  return assetLabel(loan.asset);
}

// ============================================================================
// LISTING
// ============================================================================

export const LoanSortField = z.enum(['createdAt', 'loanDate', 'dueDate', 'returnDate', 'asset']);
export type LoanSortField = z.infer<typeof LoanSortField>;

export const SortDirection = z.enum(['asc', 'desc']);
export type SortDirection = z.infer<typeof SortDirection>;

export interface LoanSort {
  field: LoanSortField;
  direction: SortDirection;
}

export const DEFAULT_LOAN_SORT: LoanSort = { field: 'createdAt', direction: 'desc' };

function sortKey(loan: Pick<LoanDetail, LoanSortField | 'asset'>, field: LoanSortField): string | number | null {
  switch (field) {
    case 'createdAt':
      return loan.createdAt.getTime();
    case 'asset':
      return loan.asset.name.toLowerCase();
    default:
      return loan[field];
  }
}

/**
 * Comparator matching the SQL ordering: the sort field in the requested
 * direction with nulls last, then newest first, then id.
 */
export function compareLoans(
  a: Pick<LoanDetail, 'id' | 'asset' | LoanSortField>,
  b: Pick<LoanDetail, 'id' | 'asset' | LoanSortField>,
  sort: LoanSort = DEFAULT_LOAN_SORT,
): number {
  const ka = sortKey(a, sort.field);
  const kb = sortKey(b, sort.field);

  if (ka !== kb) {
    if (ka === null) return 1;
    if (kb === null) return -1;
    const order = ka < kb ? -1 : 1;
    return sort.direction === 'asc' ? order : -order;
  }
  const byCreated = b.createdAt.getTime() - a.createdAt.getTime();
  if (byCreated !== 0) return byCreated;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
