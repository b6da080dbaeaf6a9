/**
 * API Request Schemas
 * Zod schemas for validating catalog payloads and query strings.
 * Loan payloads are validated by the route contracts instead.
 */

import { z } from 'zod';
import {
  AdministrativeAssetStatus,
  AssetStatus,
  IsoDate,
  Role,
} from '@loandesk/domain';

/**
 * Optional free-text field: undefined leaves it unchanged, null or a blank
 * string clears it.
 */
function nullableText(max: number) {
  return z
    .string()
    .trim()
    .max(max)
    .nullable()
    .optional()
    .transform((v) => (v === undefined ? undefined : v || null));
}

/** A query parameter that may be repeated (`?status=a&status=b`). */
function repeated<T extends z.ZodTypeAny>(item: T) {
  return z.preprocess(
    (v) => (v === undefined || Array.isArray(v) ? v : [v]),
    z.array(item).optional(),
  );
}

// ============================================================================
// COMMON
// ============================================================================

export const IdParamsSchema = z.object({
  id: z.string().uuid(),
});

export const DepartmentPositionParamsSchema = z.object({
  id: z.string().uuid(),
  positionId: z.string().uuid(),
});

// ============================================================================
// CATEGORY / ASSET SCHEMAS
// ============================================================================

export const CreateCategoryRequestSchema = z.object({
  name: z.string().trim().min(1).max(120),
}).strict();

export const UpdateCategoryRequestSchema = CreateCategoryRequestSchema.partial();

export const CreateAssetRequestSchema = z.object({
  categoryId: z.string().uuid(),
  name: z.string().trim().min(1).max(200),
  serialNumber: z.string().trim().min(1).max(120),
  assetTag: nullableText(120),
  status: AdministrativeAssetStatus.default('available'),
  purchaseDate: IsoDate.nullable().optional(),
  notes: nullableText(5000),
}).strict();
export type CreateAssetRequest = z.infer<typeof CreateAssetRequestSchema>;

export const UpdateAssetRequestSchema = z.object({
  categoryId: z.string().uuid().optional(),
  name: z.string().trim().min(1).max(200).optional(),
  serialNumber: z.string().trim().min(1).max(120).optional(),
  assetTag: nullableText(120),
  status: AdministrativeAssetStatus.optional(),
  purchaseDate: IsoDate.nullable().optional(),
  notes: nullableText(5000),
}).strict();
export type UpdateAssetRequest = z.infer<typeof UpdateAssetRequestSchema>;

export const AssetListQuerySchema = z.object({
  name: z.string().trim().min(1).optional(),
  serialNumber: z.string().trim().min(1).optional(),
  status: repeated(AssetStatus),
  categoryId: z.string().uuid().optional(),
});

// ============================================================================
// PERSON SCHEMAS
// ============================================================================

export const CreatePersonRequestSchema = z.object({
  firstName: z.string().trim().min(1).max(120),
  lastName: z.string().trim().min(1).max(120),
  department: nullableText(120),
  email: z.string().trim().email().max(254).nullable().optional(),
  userId: z.string().uuid().nullable().optional(),
}).strict();

export const UpdatePersonRequestSchema = CreatePersonRequestSchema.partial();

export const PersonListQuerySchema = z.object({
  name: z.string().trim().min(1).optional(),
  email: z.string().trim().min(1).optional(),
  department: repeated(z.string().trim().min(1)),
});

// ============================================================================
// LOCATION SCHEMAS
// ============================================================================

export const CreateOfficeRequestSchema = z.object({
  name: z.string().trim().min(1).max(200),
  address: nullableText(300),
}).strict();

export const UpdateOfficeRequestSchema = CreateOfficeRequestSchema.partial();

export const CreateRoomRequestSchema = z.object({
  officeId: z.string().uuid(),
  name: z.string().trim().min(1).max(200),
  type: z.string().trim().min(1).max(50).default('open_space'),
}).strict();

export const UpdateRoomRequestSchema = z.object({
  officeId: z.string().uuid().optional(),
  name: z.string().trim().min(1).max(200).optional(),
  type: z.string().trim().min(1).max(50).optional(),
}).strict();

export const RoomListQuerySchema = z.object({
  officeId: z.string().uuid().optional(),
});

export const CreateDeskRequestSchema = z.object({
  roomId: z.string().uuid(),
  code: z.string().trim().min(1).max(50),
}).strict();

export const UpdateDeskRequestSchema = CreateDeskRequestSchema.partial();

export const DeskListQuerySchema = z.object({
  officeId: z.string().uuid().optional(),
  roomId: z.string().uuid().optional(),
});

// ============================================================================
// DEPARTMENT SCHEMAS
// ============================================================================

export const CreateDepartmentRequestSchema = z.object({
  name: z.string().trim().min(1).max(120),
  /** Create positions 1..N along with the department. */
  positions: z.number().int().min(0).max(500).optional(),
}).strict();

export const UpdateDepartmentRequestSchema = z.object({
  name: z.string().trim().min(1).max(120).optional(),
}).strict();

export const CreatePositionRequestSchema = z.object({
  number: z.number().int().positive().max(32767),
}).strict();

// ============================================================================
// ROLE GROUP SCHEMAS
// ============================================================================

export const RoleGroupMemberParamsSchema = z.object({
  name: Role,
  userId: z.string().uuid(),
});
