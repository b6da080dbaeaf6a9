import { describe, it, expect, vi } from 'vitest';
import Fastify from 'fastify';
import { InMemoryStore } from './support/in-memory-store.js';
import { actor, USERS } from './support/world.js';
import { ensureRoleGroups, resolveActorRole } from '../src/services/role.service.js';
import { bootstrapReferenceData, ensureDefaultDepartments } from '../src/services/reference-data.service.js';

describe('role service', () => {
  it('creates the canonical groups once', async () => {
    const store = new InMemoryStore();
    expect(await ensureRoleGroups(store.roleGroups)).toEqual(['admin', 'employee', 'company']);
    expect(await ensureRoleGroups(store.roleGroups)).toEqual([]);
  });

  it('resolves privileged actors to admin without reading groups', async () => {
    const store = new InMemoryStore();
    const lookup = vi.spyOn(store.roleGroups, 'findGroupNamesForUser');
    expect(await resolveActorRole(store.roleGroups, actor(USERS.admin, { isStaff: true }))).toBe('admin');
    expect(lookup).not.toHaveBeenCalled();
  });

  it('resolves from group membership, falling back to employee', async () => {
    const store = new InMemoryStore();
    await ensureRoleGroups(store.roleGroups);
    await store.roleGroups.addMember('company', USERS.company);
    await store.roleGroups.addMember('employee', USERS.ada);
    await store.roleGroups.addMember('admin', USERS.ada);

    expect(await resolveActorRole(store.roleGroups, actor(USERS.company))).toBe('company');
    expect(await resolveActorRole(store.roleGroups, actor(USERS.ada))).toBe('admin');
    expect(await resolveActorRole(store.roleGroups, actor(USERS.stranger))).toBe('employee');
  });
});

describe('reference data bootstrap', () => {
  const options = { departments: ['IT', 'HR'], positionsPerDepartment: 2 };

  it('creates departments with numbered positions and is idempotent', async () => {
    const store = new InMemoryStore();

    expect(await ensureDefaultDepartments(store.departments, options)).toEqual({
      departments: ['IT', 'HR'],
      positionsCreated: 4,
    });
    expect(await ensureDefaultDepartments(store.departments, options)).toEqual({
      departments: ['IT', 'HR'],
      positionsCreated: 0,
    });

    const [hr, itDepartment] = await store.departments.listDepartments();
    expect(hr.name).toBe('HR');
    expect((await store.departments.listPositions(itDepartment.id)).map((p) => p.number)).toEqual([1, 2]);
  });

  it('tops up missing positions when the count grows', async () => {
    const store = new InMemoryStore();
    await ensureDefaultDepartments(store.departments, options);
    const result = await ensureDefaultDepartments(store.departments, { departments: ['IT'], positionsPerDepartment: 3 });
    expect(result.positionsCreated).toBe(1);
  });

  it('logs a summary once ready', async () => {
    const store = new InMemoryStore();
    const log = Fastify({ logger: false }).log;
    const info = vi.spyOn(log, 'info');

    const result = await bootstrapReferenceData(store.repositories(), options, log);

    expect(result).toEqual({
      groupsCreated: ['admin', 'employee', 'company'],
      departments: ['IT', 'HR'],
      positionsCreated: 4,
    });
    expect(info).toHaveBeenCalledWith(
      { code: 'REFERENCE_DATA_READY', ...result },
      'Reference data ready',
    );
  });
});
