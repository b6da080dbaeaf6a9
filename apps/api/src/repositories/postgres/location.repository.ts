/**
 * PostgreSQL Location Repository Implementation
 */

import type { Office, Room } from '@loandesk/domain';
import { query } from '../../db/index.js';
import {
  CreateDeskData,
  CreateOfficeData,
  CreateRoomData,
  DeskFilters,
  DeskWithLocation,
  ILocationRepository,
  RoomFilters,
  UpdateDeskData,
  UpdateOfficeData,
  UpdateRoomData,
} from '../interfaces/location.repository.js';
import { buildUpdate } from './sql.js';

interface OfficeRow {
  id: string;
  name: string;
  address: string | null;
}

interface RoomRow {
  id: string;
  office_id: string;
  name: string;
  type: string;
}

interface DeskRow {
  id: string;
  room_id: string;
  code: string;
  room_name: string;
  office_id: string;
  office_name: string;
}

function mapOfficeRow(row: OfficeRow): Office {
  return { id: row.id, name: row.name, address: row.address };
}

function mapRoomRow(row: RoomRow): Room {
  return { id: row.id, officeId: row.office_id, name: row.name, type: row.type };
}

function mapDeskRow(row: DeskRow): DeskWithLocation {
  return {
    id: row.id,
    roomId: row.room_id,
    code: row.code,
    roomName: row.room_name,
    office: { id: row.office_id, name: row.office_name },
  };
}

const SELECT_DESK_WITH_LOCATION = `
  SELECT
    d.id, d.room_id, d.code,
    r.name AS room_name,
    o.id AS office_id,
    o.name AS office_name
  FROM desk d
  JOIN room r ON d.room_id = r.id
  JOIN office o ON r.office_id = o.id
`;

export class PostgresLocationRepository implements ILocationRepository {
  // ── Offices ──────────────────────────────────────────────────────────

  async listOffices(): Promise<Office[]> {
    const result = await query<OfficeRow>('SELECT id, name, address FROM office ORDER BY name');
    return result.rows.map(mapOfficeRow);
  }

  async findOfficeById(id: string): Promise<Office | null> {
    const result = await query<OfficeRow>('SELECT id, name, address FROM office WHERE id = $1', [id]);
    return result.rows.length > 0 ? mapOfficeRow(result.rows[0]) : null;
  }

  async createOffice(data: CreateOfficeData): Promise<Office> {
    const result = await query<OfficeRow>(
      'INSERT INTO office (name, address) VALUES ($1, $2) RETURNING id, name, address',
      [data.name, data.address],
    );
    return mapOfficeRow(result.rows[0]);
  }

  async updateOffice(id: string, data: UpdateOfficeData): Promise<Office | null> {
    const { sets, values } = buildUpdate({ name: data.name, address: data.address });
    if (sets.length === 0) return this.findOfficeById(id);

    values.push(id);
    const result = await query<OfficeRow>(`
      UPDATE office SET ${sets.join(', ')}
      WHERE id = $${values.length}
      RETURNING id, name, address
    `, values);
    return result.rows.length > 0 ? mapOfficeRow(result.rows[0]) : null;
  }

  async deleteOffice(id: string): Promise<boolean> {
    const result = await query('DELETE FROM office WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  // ── Rooms ────────────────────────────────────────────────────────────

  async listRooms(filters?: RoomFilters): Promise<Room[]> {
    let sql = 'SELECT id, office_id, name, type FROM room';
    const params: unknown[] = [];
    if (filters?.officeId) {
      params.push(filters.officeId);
      sql += ` WHERE office_id = $${params.length}`;
    }
    sql += ' ORDER BY name';

    const result = await query<RoomRow>(sql, params);
    return result.rows.map(mapRoomRow);
  }

  async findRoomById(id: string): Promise<Room | null> {
    const result = await query<RoomRow>('SELECT id, office_id, name, type FROM room WHERE id = $1', [id]);
    return result.rows.length > 0 ? mapRoomRow(result.rows[0]) : null;
  }

  async createRoom(data: CreateRoomData): Promise<Room> {
    const result = await query<RoomRow>(
      'INSERT INTO room (office_id, name, type) VALUES ($1, $2, $3) RETURNING id, office_id, name, type',
      [data.officeId, data.name, data.type],
    );
    return mapRoomRow(result.rows[0]);
  }

  async updateRoom(id: string, data: UpdateRoomData): Promise<Room | null> {
    const { sets, values } = buildUpdate({ office_id: data.officeId, name: data.name, type: data.type });
    if (sets.length === 0) return this.findRoomById(id);

    values.push(id);
    const result = await query<RoomRow>(`
      UPDATE room SET ${sets.join(', ')}
      WHERE id = $${values.length}
      RETURNING id, office_id, name, type
    `, values);
    return result.rows.length > 0 ? mapRoomRow(result.rows[0]) : null;
  }

  async deleteRoom(id: string): Promise<boolean> {
    const result = await query('DELETE FROM room WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  // ── Desks ────────────────────────────────────────────────────────────

  async listDesks(filters?: DeskFilters): Promise<DeskWithLocation[]> {
    let sql = `${SELECT_DESK_WITH_LOCATION} WHERE 1 = 1`;
    const params: unknown[] = [];
    if (filters?.officeId) {
      params.push(filters.officeId);
      sql += ` AND o.id = $${params.length}`;
    }
    if (filters?.roomId) {
      params.push(filters.roomId);
      sql += ` AND r.id = $${params.length}`;
    }
    sql += ' ORDER BY o.name, r.name, d.code';

    const result = await query<DeskRow>(sql, params);
    return result.rows.map(mapDeskRow);
  }

  async findDeskById(id: string): Promise<DeskWithLocation | null> {
    const result = await query<DeskRow>(`${SELECT_DESK_WITH_LOCATION} WHERE d.id = $1`, [id]);
    return result.rows.length > 0 ? mapDeskRow(result.rows[0]) : null;
  }

  async createDesk(data: CreateDeskData): Promise<DeskWithLocation> {
    const result = await query<{ id: string }>(
      'INSERT INTO desk (room_id, code) VALUES ($1, $2) RETURNING id',
      [data.roomId, data.code],
    );
    const desk = await this.findDeskById(result.rows[0].id);
    if (!desk) throw new Error('Desk disappeared after insert');
    return desk;
  }

  async updateDesk(id: string, data: UpdateDeskData): Promise<DeskWithLocation | null> {
    const { sets, values } = buildUpdate({ room_id: data.roomId, code: data.code });
    if (sets.length > 0) {
      values.push(id);
      const result = await query(`UPDATE desk SET ${sets.join(', ')} WHERE id = $${values.length}`, values);
      if ((result.rowCount ?? 0) === 0) return null;
    }
    return this.findDeskById(id);
  }

  async deleteDesk(id: string): Promise<boolean> {
    const result = await query('DELETE FROM desk WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
