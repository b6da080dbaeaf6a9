/**
 * Database Migration Script
 * Runs all SQL migrations in order
 *
 * Usage: npm run db:migrate
 */

import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { closePool, getPool } from '../src/db/index.js';
import { runMigrations } from '../src/db/migrations.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

async function migrate(): Promise<void> {
  const client = await getPool().connect();
  try {
    const applied = await runMigrations(client, join(__dirname, 'migrations'), console);
    console.log(applied.length > 0
      ? `Applied ${applied.length} migration(s)`
      : 'Database is up to date');
  } finally {
    client.release();
    await closePool();
  }
}

migrate().catch(err => {
  console.error('Migration failed:', err);
  process.exit(1);
});
