import { describe, it, expect } from 'vitest';
import { pendingMigrations } from '../src/db/migrations.js';

describe('pendingMigrations', () => {
  it('returns unexecuted .sql files in lexical order', () => {
    const files = ['003_views.sql', 'README.md', '001_initial_schema.sql', '002_indexes.sql'];
    const executed = new Set(['001_initial_schema.sql']);
    expect(pendingMigrations(files, executed)).toEqual(['002_indexes.sql', '003_views.sql']);
  });

  it('returns nothing when everything ran', () => {
    expect(pendingMigrations(['001_initial_schema.sql'], new Set(['001_initial_schema.sql']))).toEqual([]);
  });
});
