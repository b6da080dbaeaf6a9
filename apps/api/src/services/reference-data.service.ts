/**
 * Reference Data Bootstrap
 *
 * Idempotent start-up initialization: the canonical role groups and the
 * configured default departments with positions 1..N. Runs once per
 * process, never from a read path.
 */

import type { FastifyBaseLogger } from 'fastify';
import type { IDepartmentRepository, IRoleGroupRepository } from '../repositories/index.js';
import { ensureRoleGroups } from './role.service.js';

export interface ReferenceDataOptions {
  departments: readonly string[];
  positionsPerDepartment: number;
}

export interface ReferenceDataResult {
  groupsCreated: string[];
  departments: string[];
  positionsCreated: number;
}

export async function ensureDefaultDepartments(
  repo: IDepartmentRepository,
  options: ReferenceDataOptions,
): Promise<{ departments: string[]; positionsCreated: number }> {
  const departments: string[] = [];
  let positionsCreated = 0;

  for (const name of options.departments) {
    const department = await repo.ensureDepartment(name);
    positionsCreated += await repo.ensurePositions(department.id, options.positionsPerDepartment);
    departments.push(department.name);
  }
  return { departments, positionsCreated };
}

export async function bootstrapReferenceData(
  repos: { roleGroups: IRoleGroupRepository; departments: IDepartmentRepository },
  options: ReferenceDataOptions,
  log: FastifyBaseLogger,
): Promise<ReferenceDataResult> {
  const groupsCreated = await ensureRoleGroups(repos.roleGroups);
  const { departments, positionsCreated } = await ensureDefaultDepartments(repos.departments, options);

  log.info(
    { code: 'REFERENCE_DATA_READY', groupsCreated, departments, positionsCreated },
    'Reference data ready',
  );
  return { groupsCreated, departments, positionsCreated };
}
