// Entity catalog schemas and enums
export * from './types.js';

// Calendar date helpers
export * from './dates.js';

// Error taxonomy
export * from './errors.js';

// Roles and role resolution
export * from './roles.js';

// Loan records, target sum type, label projections
export * from './loan.js';

// Target resolution strategies (one per role)
export * from './target-strategies.js';

// Loan visibility / authorization rules
export * from './access.js';
