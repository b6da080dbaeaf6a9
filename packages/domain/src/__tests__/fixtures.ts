/**
 * Shared entity fixtures for the domain tests.
 */

import type { DeskRef, PositionRef } from '../loan.js';
import type { LoanCandidate, LoanRequest } from '../target-strategies.js';
import type { Asset, Office, Person } from '../types.js';

export const TODAY = '2026-03-10';

export const IDS = {
  asset: '00000000-0000-4000-8000-000000000001',
  category: '00000000-0000-4000-8000-000000000002',
  berlin: '00000000-0000-4000-8000-000000000011',
  warsaw: '00000000-0000-4000-8000-000000000012',
  deskA: '00000000-0000-4000-8000-000000000021',
  deskB: '00000000-0000-4000-8000-000000000022',
  position: '00000000-0000-4000-8000-000000000031',
  ada: '00000000-0000-4000-8000-000000000041',
  grace: '00000000-0000-4000-8000-000000000042',
  adaUser: '00000000-0000-4000-8000-000000000051',
  otherUser: '00000000-0000-4000-8000-000000000052',
} as const;

export const berlin: Office = { id: IDS.berlin, name: 'Berlin', address: null };
export const warsaw: Office = { id: IDS.warsaw, name: 'Warsaw', address: null };

export const deskInBerlin: DeskRef = {
  id: IDS.deskA,
  code: 'D1',
  roomName: 'Room 1',
  office: { id: IDS.berlin, name: 'Berlin' },
};

export const deskInWarsaw: DeskRef = {
  id: IDS.deskB,
  code: 'D2',
  roomName: 'Room 7',
  office: { id: IDS.warsaw, name: 'Warsaw' },
};

export const itPosition: PositionRef = { id: IDS.position, number: 2, departmentName: 'IT' };

export const laptop: Asset = {
  id: IDS.asset,
  categoryId: IDS.category,
  name: 'A101',
  serialNumber: 'SN-0001',
  assetTag: null,
  status: 'available',
  purchaseDate: null,
  notes: null,
};

export const ada: Person = {
  id: IDS.ada,
  firstName: 'Ada',
  lastName: 'Lovelace',
  department: ' IT ',
  email: 'ada@example.com',
  userId: IDS.adaUser,
};

export const grace: Person = {
  id: IDS.grace,
  firstName: 'Grace',
  lastName: 'Hopper',
  department: 'HR',
  email: 'grace@example.com',
  userId: null,
};

export function candidate(
  request: Partial<LoanRequest>,
  overrides: Partial<Omit<LoanCandidate, 'request'>> = {},
): LoanCandidate {
  return {
    request: { assetId: IDS.asset, ...request },
    today: TODAY,
    asset: laptop,
    person: null,
    office: null,
    desk: null,
    position: null,
    positionHasActiveLoan: false,
    deskHolderPersonId: null,
    actorPerson: null,
    ...overrides,
  };
}
