/**
 * Repository Interfaces
 * Abstract persistence layer; PostgreSQL in production, in-memory in tests.
 */

export * from './catalog.repository.js';
export * from './location.repository.js';
export * from './department.repository.js';
export * from './person.repository.js';
export * from './role-group.repository.js';
export * from './loan.repository.js';
