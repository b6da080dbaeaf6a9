/**
 * PostgreSQL Repository Implementations
 */

export { PostgresCatalogRepository } from './catalog.repository.js';
export { PostgresLocationRepository } from './location.repository.js';
export { PostgresDepartmentRepository } from './department.repository.js';
export { PostgresPersonRepository } from './person.repository.js';
export { PostgresRoleGroupRepository } from './role-group.repository.js';
export { PostgresLoanRepository } from './loan.repository.js';
