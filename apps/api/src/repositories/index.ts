/**
 * Repository Factory
 *
 * Provides singleton repository instances backed by PostgreSQL. Tests swap
 * the whole set for in-process fakes with setRepositories().
 */

import {
  ICatalogRepository,
  IDepartmentRepository,
  ILoanRepository,
  ILocationRepository,
  IPersonRepository,
  IRoleGroupRepository,
} from './interfaces/index.js';
import {
  PostgresCatalogRepository,
  PostgresDepartmentRepository,
  PostgresLoanRepository,
  PostgresLocationRepository,
  PostgresPersonRepository,
  PostgresRoleGroupRepository,
} from './postgres/index.js';

export interface Repositories {
  catalog: ICatalogRepository;
  locations: ILocationRepository;
  departments: IDepartmentRepository;
  persons: IPersonRepository;
  roleGroups: IRoleGroupRepository;
  loans: ILoanRepository;
}

let repositories: Repositories | null = null;

function createPostgresRepositories(): Repositories {
  return {
    catalog: new PostgresCatalogRepository(),
    locations: new PostgresLocationRepository(),
    departments: new PostgresDepartmentRepository(),
    persons: new PostgresPersonRepository(),
    roleGroups: new PostgresRoleGroupRepository(),
    loans: new PostgresLoanRepository(),
  };
}

export function getRepositories(): Repositories {
  if (!repositories) {
    repositories = createPostgresRepositories();
  }
  return repositories;
}

export function getCatalogRepository(): ICatalogRepository {
  return getRepositories().catalog;
}

export function getLocationRepository(): ILocationRepository {
  return getRepositories().locations;
}

export function getDepartmentRepository(): IDepartmentRepository {
  return getRepositories().departments;
}

export function getPersonRepository(): IPersonRepository {
  return getRepositories().persons;
}

export function getRoleGroupRepository(): IRoleGroupRepository {
  return getRepositories().roleGroups;
}

export function getLoanRepository(): ILoanRepository {
  return getRepositories().loans;
}

/**
 * Replace the repository set (tests)
 */
export function setRepositories(replacement: Repositories): void {
  repositories = replacement;
}

/**
 * Reset all repository instances (useful for testing)
 */
export function resetRepositories(): void {
  repositories = null;
}

// Re-export interfaces for convenience
export * from './interfaces/index.js';
