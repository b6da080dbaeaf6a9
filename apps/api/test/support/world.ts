/**
 * A small, fixed catalog for lifecycle and route tests:
 * two offices with one desk each, an IT department with three positions,
 * a handful of assets, and people linked by user id or by email only.
 */

import type { ActorIdentity, Asset, Department, DepartmentPosition, Office, Person } from '@loandesk/domain';
import type { DeskWithLocation } from '../../src/repositories/index.js';
import { InMemoryStore } from './in-memory-store.js';

export const TODAY = '2026-03-10';

export const USERS = {
  admin: '10000000-0000-4000-8000-000000000001',
  ada: '10000000-0000-4000-8000-000000000002',
  grace: '10000000-0000-4000-8000-000000000003',
  company: '10000000-0000-4000-8000-000000000004',
  stranger: '10000000-0000-4000-8000-000000000005',
} as const;

export function actor(userId: string, overrides: Partial<ActorIdentity> = {}): ActorIdentity {
  return {
    userId,
    username: `user-${userId.slice(-4)}`,
    email: null,
    isSuperuser: false,
    isStaff: false,
    ...overrides,
  };
}

export interface World {
  store: InMemoryStore;
  berlin: Office;
  warsaw: Office;
  deskBerlin: DeskWithLocation;
  deskWarsaw: DeskWithLocation;
  it: Department;
  itPositions: DepartmentPosition[];
  assets: Asset[];
  /** Linked through user id. */
  ada: Person;
  /** Linked through email only. */
  grace: Person;
  /** No identity at all. */
  linus: Person;
}

export async function seedWorld(store = new InMemoryStore(), assetCount = 3): Promise<World> {
  const { catalog, locations, departments, persons, roleGroups } = store;

  await roleGroups.ensureGroups(['admin', 'employee', 'company']);
  await roleGroups.addMember('company', USERS.company);

  const berlin = await locations.createOffice({ name: 'Berlin', address: null });
  const warsaw = await locations.createOffice({ name: 'Warsaw', address: null });
  const roomBerlin = await locations.createRoom({ officeId: berlin.id, name: 'Room 1', type: 'open_space' });
  const roomWarsaw = await locations.createRoom({ officeId: warsaw.id, name: 'Room 1', type: 'open_space' });
  const deskBerlin = await locations.createDesk({ roomId: roomBerlin.id, code: 'D1' });
  const deskWarsaw = await locations.createDesk({ roomId: roomWarsaw.id, code: 'D1' });

  const it = await departments.ensureDepartment('IT');
  await departments.ensurePositions(it.id, 3);
  const itPositions = await departments.listPositions(it.id);

  const laptops = await catalog.createCategory({ name: 'Laptops' });
  const assets: Asset[] = [];
  for (let i = 1; i <= assetCount; i++) {
    assets.push(await catalog.createAsset({
      categoryId: laptops.id,
      name: `A${100 + i}`,
      serialNumber: `SN-${String(i).padStart(4, '0')}`,
      assetTag: null,
      status: 'available',
      purchaseDate: null,
      notes: null,
    }));
  }

  const ada = await persons.create({
    firstName: 'Ada', lastName: 'Lovelace', department: 'IT', email: 'ada@example.com', userId: USERS.ada,
  });
  const grace = await persons.create({
    firstName: 'Grace', lastName: 'Hopper', department: 'IT', email: 'grace@example.com', userId: null,
  });
  const linus = await persons.create({
    firstName: 'Linus', lastName: 'Pauling', department: null, email: null, userId: null,
  });

  return { store, berlin, warsaw, deskBerlin, deskWarsaw, it, itPositions, assets, ada, grace, linus };
}

export function assetStatus(world: World, assetId: string): string | undefined {
  return world.store.state.assets.get(assetId)?.status;
}
