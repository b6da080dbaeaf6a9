/**
 * PostgreSQL Department Repository Implementation
 */

import type { Department, DepartmentPosition } from '@loandesk/domain';
import { query, transaction } from '../../db/index.js';
import {
  CreateDepartmentData,
  IDepartmentRepository,
  PositionWithDepartment,
  UpdateDepartmentData,
} from '../interfaces/department.repository.js';
import { buildUpdate } from './sql.js';

interface DepartmentRow {
  id: string;
  name: string;
}

interface PositionRow {
  id: string;
  department_id: string;
  number: number;
}

function mapDepartmentRow(row: DepartmentRow): Department {
  return { id: row.id, name: row.name };
}

function mapPositionRow(row: PositionRow): DepartmentPosition {
  return { id: row.id, departmentId: row.department_id, number: row.number };
}

export class PostgresDepartmentRepository implements IDepartmentRepository {
  async listDepartments(): Promise<Department[]> {
    const result = await query<DepartmentRow>('SELECT id, name FROM department ORDER BY name');
    return result.rows.map(mapDepartmentRow);
  }

  async findDepartmentById(id: string): Promise<Department | null> {
    const result = await query<DepartmentRow>('SELECT id, name FROM department WHERE id = $1', [id]);
    return result.rows.length > 0 ? mapDepartmentRow(result.rows[0]) : null;
  }

  async createDepartment(data: CreateDepartmentData): Promise<Department> {
    return transaction(async (client) => {
      const result = await client.query<DepartmentRow>(
        'INSERT INTO department (name) VALUES ($1) RETURNING id, name',
        [data.name],
      );
      const department = mapDepartmentRow(result.rows[0]);
      if (data.positions && data.positions > 0) {
        await client.query(`
          INSERT INTO department_position (department_id, number)
          SELECT $1, n FROM generate_series(1, $2::int) AS n
        `, [department.id, data.positions]);
      }
      return department;
    });
  }

  async updateDepartment(id: string, data: UpdateDepartmentData): Promise<Department | null> {
    const { sets, values } = buildUpdate({ name: data.name });
    if (sets.length === 0) return this.findDepartmentById(id);

    values.push(id);
    const result = await query<DepartmentRow>(`
      UPDATE department SET ${sets.join(', ')}
      WHERE id = $${values.length}
      RETURNING id, name
    `, values);
    return result.rows.length > 0 ? mapDepartmentRow(result.rows[0]) : null;
  }

  async deleteDepartment(id: string): Promise<boolean> {
    const result = await query('DELETE FROM department WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async listPositions(departmentId: string): Promise<DepartmentPosition[]> {
    const result = await query<PositionRow>(
      'SELECT id, department_id, number FROM department_position WHERE department_id = $1 ORDER BY number',
      [departmentId],
    );
    return result.rows.map(mapPositionRow);
  }

  async findPositionById(id: string): Promise<PositionWithDepartment | null> {
    const result = await query<PositionRow & { department_name: string }>(`
      SELECT p.id, p.department_id, p.number, d.name AS department_name
      FROM department_position p
      JOIN department d ON p.department_id = d.id
      WHERE p.id = $1
    `, [id]);
    if (result.rows.length === 0) return null;
    const row = result.rows[0];
    return { ...mapPositionRow(row), departmentName: row.department_name };
  }

  async createPosition(departmentId: string, number: number): Promise<DepartmentPosition> {
    const result = await query<PositionRow>(
      'INSERT INTO department_position (department_id, number) VALUES ($1, $2) RETURNING id, department_id, number',
      [departmentId, number],
    );
    return mapPositionRow(result.rows[0]);
  }

  async deletePosition(id: string): Promise<boolean> {
    const result = await query('DELETE FROM department_position WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async ensureDepartment(name: string): Promise<Department> {
    // No-op update so RETURNING yields the existing row on conflict
    const result = await query<DepartmentRow>(`
      INSERT INTO department (name) VALUES ($1)
      ON CONFLICT (name) DO UPDATE SET name = EXCLUDED.name
      RETURNING id, name
    `, [name]);
    return mapDepartmentRow(result.rows[0]);
  }

  async ensurePositions(departmentId: string, count: number): Promise<number> {
    if (count <= 0) return 0;
    const result = await query(`
      INSERT INTO department_position (department_id, number)
      SELECT $1, n FROM generate_series(1, $2::int) AS n
      ON CONFLICT (department_id, number) DO NOTHING
    `, [departmentId, count]);
    return result.rowCount ?? 0;
  }
}
