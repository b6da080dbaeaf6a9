/**
 * SQL migration runner.
 *
 * Applies `NNN_name.sql` files in lexical order, each in its own
 * transaction, and records them in `_migrations`.
 */

import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import type pg from 'pg';

export interface MigrationLogger {
  info(message: string): void;
}

/** Files not yet recorded as executed, in execution order. */
export function pendingMigrations(files: readonly string[], executed: ReadonlySet<string>): string[] {
  return files
    .filter(f => f.endsWith('.sql'))
    .sort()
    .filter(f => !executed.has(f));
}

export async function runMigrations(
  client: pg.PoolClient,
  migrationsDir: string,
  log: MigrationLogger,
): Promise<string[]> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name VARCHAR(255) PRIMARY KEY,
      executed_at TIMESTAMPTZ DEFAULT NOW()
    )
  `);

  const { rows } = await client.query<{ name: string }>('SELECT name FROM _migrations');
  const pending = pendingMigrations(readdirSync(migrationsDir), new Set(rows.map(r => r.name)));

  for (const file of pending) {
    log.info(`Executing ${file}...`);
    const sql = readFileSync(join(migrationsDir, file), 'utf-8');

    await client.query('BEGIN');
    try {
      await client.query(sql);
      await client.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
      await client.query('COMMIT');
      log.info(`Completed ${file}`);
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    }
  }
  return pending;
}
