/**
 * Standard API envelope helpers.
 *
 * All API responses use:
 *   Success: { data: <payload> }
 *   Error:   { error: { code, message, details?, requestId? } }
 *
 * Field-scoped failures put a `{ field: message }` map in `details`.
 */

import { z } from 'zod';

/** Wrap a payload schema in the standard `{ data: T }` envelope. */
export function DataEnvelope<T extends z.ZodTypeAny>(schema: T) {
  return z.object({ data: schema });
}

/** Field name → message map carried by field-scoped errors. */
export const FieldErrorsSchema = z.record(z.string(), z.string());
export type FieldErrorsApi = z.infer<typeof FieldErrorsSchema>;

/** Standard error envelope: `{ error: { code, message, details?, requestId? } }` */
export const ErrorEnvelope = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
    requestId: z.string().optional(),
  }),
});
export type ErrorEnvelope = z.infer<typeof ErrorEnvelope>;
