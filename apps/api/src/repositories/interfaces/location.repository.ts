/**
 * Location Repository Interface
 * Offices, their rooms, and the desks inside them.
 */

import type { Desk, Office, OfficeRef, Room } from '@loandesk/domain';

/** Desk joined with its room and office, ready for labels and office checks. */
export interface DeskWithLocation extends Desk {
  roomName: string;
  office: OfficeRef;
}

export interface CreateOfficeData {
  name: string;
  address: string | null;
}
export type UpdateOfficeData = Partial<CreateOfficeData>;

export interface CreateRoomData {
  officeId: string;
  name: string;
  type: string;
}
export type UpdateRoomData = Partial<CreateRoomData>;

export interface CreateDeskData {
  roomId: string;
  code: string;
}
export type UpdateDeskData = Partial<CreateDeskData>;

export interface RoomFilters {
  officeId?: string;
}

export interface DeskFilters {
  officeId?: string;
  roomId?: string;
}

export interface ILocationRepository {
  listOffices(): Promise<Office[]>;
  findOfficeById(id: string): Promise<Office | null>;
  createOffice(data: CreateOfficeData): Promise<Office>;
  updateOffice(id: string, data: UpdateOfficeData): Promise<Office | null>;
  deleteOffice(id: string): Promise<boolean>;

  listRooms(filters?: RoomFilters): Promise<Room[]>;
  findRoomById(id: string): Promise<Room | null>;
  createRoom(data: CreateRoomData): Promise<Room>;
  updateRoom(id: string, data: UpdateRoomData): Promise<Room | null>;
  deleteRoom(id: string): Promise<boolean>;

  listDesks(filters?: DeskFilters): Promise<DeskWithLocation[]>;
  findDeskById(id: string): Promise<DeskWithLocation | null>;
  createDesk(data: CreateDeskData): Promise<DeskWithLocation>;
  updateDesk(id: string, data: UpdateDeskData): Promise<DeskWithLocation | null>;
  deleteDesk(id: string): Promise<boolean>;
}
