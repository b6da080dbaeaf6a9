/**
 * Small SQL-building helpers shared by the PostgreSQL repositories.
 * Column names always come from code, never from request input.
 */

export interface UpdateClause {
  /** `col = $n` fragments, numbered from 1. */
  sets: string[];
  values: unknown[];
}

/** Build SET assignments for every column whose value is not undefined. */
export function buildUpdate(columns: Record<string, unknown>): UpdateClause {
  const sets: string[] = [];
  const values: unknown[] = [];
  for (const [column, value] of Object.entries(columns)) {
    if (value === undefined) continue;
    values.push(value);
    sets.push(`${column} = $${values.length}`);
  }
  return { sets, values };
}

/** Escape LIKE wildcards so user input is matched literally as a prefix. */
export function likePrefix(value: string): string {
  return `${value.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}
