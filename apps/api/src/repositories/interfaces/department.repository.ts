/**
 * Department Repository Interface
 * Departments and their numbered positions.
 */

import type { Department, DepartmentPosition } from '@loandesk/domain';

export interface PositionWithDepartment extends DepartmentPosition {
  departmentName: string;
}

export interface CreateDepartmentData {
  name: string;
  /** Positions 1..N created with the department. */
  positions?: number;
}
export type UpdateDepartmentData = Partial<Pick<CreateDepartmentData, 'name'>>;

export interface IDepartmentRepository {
  listDepartments(): Promise<Department[]>;
  findDepartmentById(id: string): Promise<Department | null>;
  /** Department and its positions are written together or not at all. */
  createDepartment(data: CreateDepartmentData): Promise<Department>;
  updateDepartment(id: string, data: UpdateDepartmentData): Promise<Department | null>;
  deleteDepartment(id: string): Promise<boolean>;

  /** Positions ordered by number. */
  listPositions(departmentId: string): Promise<DepartmentPosition[]>;
  findPositionById(id: string): Promise<PositionWithDepartment | null>;
  createPosition(departmentId: string, number: number): Promise<DepartmentPosition>;
  deletePosition(id: string): Promise<boolean>;

  /** Find-or-create by name. */
  ensureDepartment(name: string): Promise<Department>;
  /** Create any missing positions 1..count; returns how many were created. */
  ensurePositions(departmentId: string, count: number): Promise<number>;
}
