#!/usr/bin/env npx tsx
/**
 * Contract Route Registration Guardrail
 *
 * Every contract group must be registered ONLY via registerContractRoute(),
 * not via raw fastify.get/post/patch/delete. Each group maps to one route
 * file, and the number of registerContractRoute() calls there must equal
 * the number of routes the group declares.
 *
 * Usage:
 *   npx tsx scripts/check-contract-routes.ts
 */

import { readFileSync } from 'fs';
import { join, dirname, relative } from 'path';
import { fileURLToPath } from 'url';
import { contract } from '@loandesk/contract';

const ROOT = join(dirname(fileURLToPath(import.meta.url)), '..');
const ROUTES_DIR = join(ROOT, 'apps', 'api', 'src', 'routes');

let failures = 0;

console.log('\n' + '='.repeat(70));
console.log('CONTRACT ROUTE REGISTRATION DRIFT CHECK');
console.log('='.repeat(70) + '\n');

for (const [group, routes] of Object.entries(contract)) {
  const path = join(ROUTES_DIR, `${group}.routes.ts`);
  const rel = relative(ROOT, path).replace(/\\/g, '/');
  const expected = Object.keys(routes).length;
  const content = readFileSync(path, 'utf-8');

  const count = content.match(/registerContractRoute\s*\(/g)?.length ?? 0;

  if (count !== expected) {
    console.log(`\x1b[31mFAIL\x1b[0m ${rel}`);
    console.log(`  Found ${count} registerContractRoute() call(s), expected ${expected}`);
    console.log(`  Every route in contract.${group} must be registered through the adapter.\n`);
    failures++;
  } else {
    console.log(`\x1b[32mPASS\x1b[0m ${rel}: ${count} contract route(s)`);
  }
}

console.log('');
if (failures > 0) {
  console.log(`\x1b[31m${failures} file(s) failed.\x1b[0m`);
  process.exit(1);
} else {
  console.log('\x1b[32mAll contract route files verified.\x1b[0m\n');
  process.exit(0);
}
