/**
 * Calendar dates are carried as `YYYY-MM-DD` strings end to end (the database
 * DATE parser is configured to hand them back unchanged). Lexical order of
 * such strings is chronological order, so comparisons are plain `<`/`>`.
 */

import { z } from 'zod';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isValidIsoDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    date.getUTCFullYear() === Number(y) &&
    date.getUTCMonth() === Number(m) - 1 &&
    date.getUTCDate() === Number(d)
  );
}

export const IsoDate = z
  .string()
  .regex(ISO_DATE_PATTERN, 'Expected a date in YYYY-MM-DD format')
  .refine(isValidIsoDate, 'Invalid calendar date');
export type IsoDate = z.infer<typeof IsoDate>;

/** Local calendar date of `date`. */
export function toIsoDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export function todayIsoDate(now: Date = new Date()): string {
  return toIsoDate(now);
}
