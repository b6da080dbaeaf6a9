/**
 * PostgreSQL Person Repository Implementation
 */

import type { Person } from '@loandesk/domain';
import { query } from '../../db/index.js';
import {
  CreatePersonData,
  IPersonRepository,
  PersonFilters,
  UpdatePersonData,
} from '../interfaces/person.repository.js';
import { buildUpdate, likePrefix } from './sql.js';

interface PersonRow {
  id: string;
  first_name: string;
  last_name: string;
  department: string | null;
  email: string | null;
  user_id: string | null;
}

function mapPersonRow(row: PersonRow): Person {
  return {
    id: row.id,
    firstName: row.first_name,
    lastName: row.last_name,
    department: row.department,
    email: row.email,
    userId: row.user_id,
  };
}

const PERSON_COLUMNS = 'id, first_name, last_name, department, email, user_id';

export class PostgresPersonRepository implements IPersonRepository {
  async list(filters?: PersonFilters): Promise<Person[]> {
    let sql = `SELECT ${PERSON_COLUMNS} FROM person WHERE 1 = 1`;
    const params: unknown[] = [];

    if (filters?.name) {
      params.push(likePrefix(filters.name));
      sql += ` AND (first_name ILIKE $${params.length} OR last_name ILIKE $${params.length})`;
    }
    if (filters?.email) {
      params.push(likePrefix(filters.email));
      sql += ` AND email ILIKE $${params.length}`;
    }
    if (filters?.department && filters.department.length > 0) {
      params.push(filters.department);
      sql += ` AND department = ANY($${params.length}::varchar[])`;
    }

    sql += ' ORDER BY last_name, first_name, created_at, id';

    const result = await query<PersonRow>(sql, params);
    return result.rows.map(mapPersonRow);
  }

  async findById(id: string): Promise<Person | null> {
    const result = await query<PersonRow>(`SELECT ${PERSON_COLUMNS} FROM person WHERE id = $1`, [id]);
    return result.rows.length > 0 ? mapPersonRow(result.rows[0]) : null;
  }

  async findByUserId(userId: string): Promise<Person | null> {
    const result = await query<PersonRow>(`SELECT ${PERSON_COLUMNS} FROM person WHERE user_id = $1`, [userId]);
    return result.rows.length > 0 ? mapPersonRow(result.rows[0]) : null;
  }

  async findByEmail(email: string): Promise<Person | null> {
    const result = await query<PersonRow>(`
      SELECT ${PERSON_COLUMNS} FROM person
      WHERE LOWER(email) = LOWER($1)
      ORDER BY created_at, id
      LIMIT 1
    `, [email]);
    return result.rows.length > 0 ? mapPersonRow(result.rows[0]) : null;
  }

  async create(data: CreatePersonData): Promise<Person> {
    const result = await query<PersonRow>(`
      INSERT INTO person (first_name, last_name, department, email, user_id)
      VALUES ($1, $2, $3, $4, $5)
      RETURNING ${PERSON_COLUMNS}
    `, [data.firstName, data.lastName, data.department, data.email, data.userId]);
    return mapPersonRow(result.rows[0]);
  }

  async update(id: string, data: UpdatePersonData): Promise<Person | null> {
    const { sets, values } = buildUpdate({
      first_name: data.firstName,
      last_name: data.lastName,
      department: data.department,
      email: data.email,
      user_id: data.userId,
    });
    if (sets.length === 0) return this.findById(id);

    values.push(id);
    const result = await query<PersonRow>(`
      UPDATE person SET ${sets.join(', ')}
      WHERE id = $${values.length}
      RETURNING ${PERSON_COLUMNS}
    `, values);
    return result.rows.length > 0 ? mapPersonRow(result.rows[0]) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await query('DELETE FROM person WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async listDepartmentLabels(): Promise<string[]> {
    const result = await query<{ department: string }>(`
      SELECT DISTINCT department FROM person
      WHERE department IS NOT NULL AND BTRIM(department) <> ''
      ORDER BY department
    `);
    return result.rows.map(r => r.department);
  }
}
