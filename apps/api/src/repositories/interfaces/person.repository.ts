/**
 * Person Repository Interface
 */

import type { Person } from '@loandesk/domain';

export interface PersonFilters {
  /** Prefix of first or last name, case-insensitive. */
  name?: string;
  /** Email prefix, case-insensitive. */
  email?: string;
  department?: string[];
}

export interface CreatePersonData {
  firstName: string;
  lastName: string;
  department: string | null;
  email: string | null;
  userId: string | null;
}
export type UpdatePersonData = Partial<CreatePersonData>;

export interface IPersonRepository {
  list(filters?: PersonFilters): Promise<Person[]>;
  findById(id: string): Promise<Person | null>;
  findByUserId(userId: string): Promise<Person | null>;
  /**
   * Case-insensitive email match. When several people share an address the
   * earliest-created one wins, so the lookup is deterministic.
   */
  findByEmail(email: string): Promise<Person | null>;
  create(data: CreatePersonData): Promise<Person>;
  update(id: string, data: UpdatePersonData): Promise<Person | null>;
  delete(id: string): Promise<boolean>;
  /** Distinct non-empty department labels, sorted. */
  listDepartmentLabels(): Promise<string[]>;
}
