/**
 * Loan route contracts.
 *
 * Loans are created and returned only through the lifecycle engine. There
 * is no update or delete contract.
 */

import { z } from 'zod';
import { IsoDate, LoanSortField, Role, SortDirection, TargetKind } from '@loandesk/domain';
import { defineRoute } from '../define-route.js';

// ---------------------------------------------------------------------------
// Shared schemas
// ---------------------------------------------------------------------------

const nullableString = z.string().nullable();
const nullableUuid = z.string().uuid().nullable();

export const LoanApiSchema = z.object({
  id: z.string().uuid(),
  asset: z.object({
    id: z.string().uuid(),
    name: z.string(),
    serialNumber: z.string(),
    label: z.string(),
  }),
  target: z.object({
    type: TargetKind,
    id: z.string().uuid(),
    label: z.string(),
  }),
  personId: nullableUuid,
  deskId: nullableUuid,
  officeId: nullableUuid,
  departmentPositionId: nullableUuid,
  placementOfficeId: nullableUuid,
  placementDeskId: nullableUuid,
  department: nullableString,
  loanDate: z.string(),
  dueDate: nullableString,
  returnDate: nullableString,
  issuedBy: nullableString,
  createdByUserId: nullableUuid,
  returnedByUserId: nullableUuid,
  targetLabel: z.string(),
  officeLabel: z.string(),
  deskLabel: z.string(),
  departmentLabel: z.string(),
  isActive: z.boolean(),
  isOverdue: z.boolean(),
  createdAt: z.string(),
});
export type LoanApi = z.infer<typeof LoanApiSchema>;

// ---------------------------------------------------------------------------
// Body / query schemas
// ---------------------------------------------------------------------------

export const CreateLoanBodySchema = z.object({
  assetId: z.string().uuid(),
  targetType: TargetKind.optional(),
  personId: z.string().uuid().optional(),
  deskId: z.string().uuid().optional(),
  officeId: z.string().uuid().optional(),
  departmentPositionId: z.string().uuid().optional(),
  department: z.string().max(120).optional(),
  loanDate: IsoDate.optional(),
  dueDate: IsoDate.optional(),
  issuedBy: z.string().max(120).optional(),
}).strict();
export type CreateLoanBody = z.infer<typeof CreateLoanBodySchema>;

const booleanFlag = z.enum(['true', 'false', '1', '0']).transform((v) => v === 'true' || v === '1');

export const ListLoansQuerySchema = z.object({
  /** History view: include returned loans. */
  includeReturned: booleanFlag.optional(),
  /** `active=1` forces the active-only view. */
  active: booleanFlag.optional(),
  sort: LoanSortField.default('createdAt'),
  direction: SortDirection.default('desc'),
});
export type ListLoansQuery = z.infer<typeof ListLoansQuerySchema>;

const LoanIdParamsSchema = z.object({ loanId: z.string().uuid() });

// ---------------------------------------------------------------------------
// Route contracts
// ---------------------------------------------------------------------------

export const loanRoutes = {
  list: defineRoute({
    method: 'GET',
    path: '/loans',
    summary: 'List loans visible to the caller (active by default, full history with includeReturned)',
    query: ListLoansQuerySchema,
    response: z.object({ loans: z.array(LoanApiSchema) }),
  }),

  targetKinds: defineRoute({
    method: 'GET',
    path: '/loans/target-kinds',
    summary: 'Target kinds the caller may use when creating a loan',
    response: z.object({ role: Role, targetKinds: z.array(TargetKind) }),
  }),

  get: defineRoute({
    method: 'GET',
    path: '/loans/:loanId',
    summary: 'Get a single visible loan',
    params: LoanIdParamsSchema,
    response: z.object({ loan: LoanApiSchema }),
    errors: ['NOT_FOUND'],
  }),

  create: defineRoute({
    method: 'POST',
    path: '/loans',
    summary: 'Create a loan through the role-specific target resolution pipeline',
    body: CreateLoanBodySchema,
    response: z.object({ loan: LoanApiSchema }),
    successStatus: 201,
    errors: [
      'VALIDATION_ERROR',
      'INVALID_DATE_RANGE',
      'ASSET_UNAVAILABLE',
      'TARGET_ALREADY_ASSIGNED',
      'TARGET_OFFICE_MISMATCH',
      'PROFILE_NOT_LINKED',
    ],
  }),

  return: defineRoute({
    method: 'POST',
    path: '/loans/:loanId/return',
    summary: 'Return an active loan and release its asset',
    params: LoanIdParamsSchema,
    response: z.object({ loan: LoanApiSchema }),
    errors: ['NOT_FOUND', 'ALREADY_RETURNED', 'FORBIDDEN'],
  }),
} as const;
