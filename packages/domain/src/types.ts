import { z } from 'zod';
import { IsoDate } from './dates.js';

// ============================================================================
// ENUMS
// ============================================================================

export const AssetStatus = z.enum([
  'available',   // Free to be loaned
  'assigned',    // Held by exactly one active loan
  'in_service',  // Out for repair/maintenance (set by admins)
  'retired',     // Written off (set by admins)
]);
export type AssetStatus = z.infer<typeof AssetStatus>;

/**
 * Statuses an admin may set directly. `assigned` is a projection of the
 * loan table and is only ever written by the loan lifecycle.
 */
export const AdministrativeAssetStatus = AssetStatus.exclude(['assigned']);
export type AdministrativeAssetStatus = z.infer<typeof AdministrativeAssetStatus>;

export const TargetKind = z.enum([
  'person',
  'desk',
  'office',
  'department_position',
]);
export type TargetKind = z.infer<typeof TargetKind>;

// ============================================================================
// ENTITY CATALOG (Zod Schemas)
// ============================================================================

export const OfficeSchema = z.object({
  id: z.string().uuid(),
  name: z.string().trim().min(1).max(200),
  address: z.string().max(300).nullable(),
});
export type Office = z.infer<typeof OfficeSchema>;

export const RoomSchema = z.object({
  id: z.string().uuid(),
  officeId: z.string().uuid(),
  name: z.string().trim().min(1).max(200),
  type: z.string().trim().min(1).max(50).default('open_space'),
});
export type Room = z.infer<typeof RoomSchema>;

export const DeskSchema = z.object({
  id: z.string().uuid(),
  roomId: z.string().uuid(),
  code: z.string().trim().min(1).max(50),
});
export type Desk = z.infer<typeof DeskSchema>;

export const DepartmentSchema = z.object({
  id: z.string().uuid(),
  name: z.string().trim().min(1).max(120),
});
export type Department = z.infer<typeof DepartmentSchema>;

export const DepartmentPositionSchema = z.object({
  id: z.string().uuid(),
  departmentId: z.string().uuid(),
  number: z.number().int().positive().max(32767),
});
export type DepartmentPosition = z.infer<typeof DepartmentPositionSchema>;

export const AssetCategorySchema = z.object({
  id: z.string().uuid(),
  name: z.string().trim().min(1).max(120),
});
export type AssetCategory = z.infer<typeof AssetCategorySchema>;

export const AssetSchema = z.object({
  id: z.string().uuid(),
  categoryId: z.string().uuid(),
  name: z.string().trim().min(1).max(200),
  serialNumber: z.string().trim().min(1).max(120),
  assetTag: z.string().trim().min(1).max(120).nullable(),
  status: AssetStatus,
  purchaseDate: IsoDate.nullable(),
  notes: z.string().nullable(),
});
export type Asset = z.infer<typeof AssetSchema>;

export const PersonSchema = z.object({
  id: z.string().uuid(),
  firstName: z.string().trim().min(1).max(120),
  lastName: z.string().trim().min(1).max(120),
  department: z.string().trim().max(120).nullable(),   // free text, denormalized
  email: z.string().email().nullable(),
  userId: z.string().uuid().nullable(),                // optional login identity
});
export type Person = z.infer<typeof PersonSchema>;

// ============================================================================
// DISPLAY HELPERS
// ============================================================================

export function assetLabel(asset: Pick<Asset, 'name' | 'serialNumber'>): string {
  return `${asset.name} (${asset.serialNumber})`;
}

export function personName(person: Pick<Person, 'firstName' | 'lastName'>): string {
  return `${person.firstName} ${person.lastName}`;
}
