/**
 * PostgreSQL Loan Repository Implementation
 *
 * The loan row keeps the target as four nullable foreign keys; mapping goes
 * through targetToColumns / targetFromColumns so exactly one is ever set.
 */

import pg, { type QueryResultRow } from 'pg';
import {
  loanErrors,
  targetFromColumns,
  targetToColumns,
  type Asset,
  type AssetStatus,
  type DeskRef,
  type LoanDetail,
  type LoanSortField,
  type LoanTarget,
  type LoanVisibility,
  type ResolvedLoanTarget,
} from '@loandesk/domain';
import { query, transaction } from '../../db/index.js';
import {
  ILoanRepository,
  LoanListOptions,
  LoanUnitOfWork,
  NewLoan,
} from '../interfaces/loan.repository.js';
import { isUniqueViolation } from '../../utils/pg-errors.js';

export type QueryRunner = <T extends QueryResultRow>(text: string, params?: unknown[]) => Promise<pg.QueryResult<T>>;

interface LoanRow {
  id: string;
  asset_id: string;
  person_id: string | null;
  desk_id: string | null;
  office_id: string | null;
  department_position_id: string | null;
  placement_office_id: string | null;
  placement_desk_id: string | null;
  department: string | null;
  loan_date: string;
  due_date: string | null;
  return_date: string | null;
  issued_by: string | null;
  created_by_user_id: string | null;
  returned_by_user_id: string | null;
  created_at: Date;

  asset_name: string;
  asset_serial_number: string;
  person_first_name: string | null;
  person_last_name: string | null;
  person_user_id: string | null;
  desk_code: string | null;
  desk_room_name: string | null;
  desk_office_id: string | null;
  desk_office_name: string | null;
  office_name: string | null;
  position_number: number | null;
  position_department_name: string | null;
  placement_office_name: string | null;
  placement_desk_code: string | null;
  placement_desk_room_name: string | null;
  placement_desk_office_id: string | null;
  placement_desk_office_name: string | null;
}

const SELECT_WITH_JOINS = `
  SELECT
    l.*,
    a.name AS asset_name,
    a.serial_number AS asset_serial_number,
    p.first_name AS person_first_name,
    p.last_name AS person_last_name,
    p.user_id AS person_user_id,
    td.code AS desk_code,
    tr.name AS desk_room_name,
    tro.id AS desk_office_id,
    tro.name AS desk_office_name,
    o.name AS office_name,
    dp.number AS position_number,
    dd.name AS position_department_name,
    po.name AS placement_office_name,
    pd.code AS placement_desk_code,
    pr.name AS placement_desk_room_name,
    pro.id AS placement_desk_office_id,
    pro.name AS placement_desk_office_name
  FROM loan l
  JOIN asset a ON l.asset_id = a.id
  LEFT JOIN person p ON l.person_id = p.id
  LEFT JOIN desk td ON l.desk_id = td.id
  LEFT JOIN room tr ON td.room_id = tr.id
  LEFT JOIN office tro ON tr.office_id = tro.id
  LEFT JOIN office o ON l.office_id = o.id
  LEFT JOIN department_position dp ON l.department_position_id = dp.id
  LEFT JOIN department dd ON dp.department_id = dd.id
  LEFT JOIN office po ON l.placement_office_id = po.id
  LEFT JOIN desk pd ON l.placement_desk_id = pd.id
  LEFT JOIN room pr ON pd.room_id = pr.id
  LEFT JOIN office pro ON pr.office_id = pro.id
`;

const SORT_COLUMNS: Record<LoanSortField, string> = {
  createdAt: 'l.created_at',
  loanDate: 'l.loan_date',
  dueDate: 'l.due_date',
  returnDate: 'l.return_date',
  asset: 'LOWER(a.name)',
};

function joined<T>(value: T | null, column: string, loanId: string): T {
  if (value === null) {
    throw new Error(`Loan ${loanId} is missing joined column ${column}`);
  }
  return value;
}

function deskRef(
  id: string,
  code: string | null,
  roomName: string | null,
  officeId: string | null,
  officeName: string | null,
  loanId: string,
): DeskRef {
  return {
    id,
    code: joined(code, 'desk code', loanId),
    roomName: joined(roomName, 'room name', loanId),
    office: {
      id: joined(officeId, 'desk office id', loanId),
      name: joined(officeName, 'desk office name', loanId),
    },
  };
}

function resolveTarget(row: LoanRow, target: LoanTarget): ResolvedLoanTarget {
  switch (target.kind) {
    case 'person':
      return {
        kind: 'person',
        person: {
          id: target.personId,
          firstName: joined(row.person_first_name, 'person_first_name', row.id),
          lastName: joined(row.person_last_name, 'person_last_name', row.id),
          userId: row.person_user_id,
        },
      };
    case 'desk':
      return {
        kind: 'desk',
        desk: deskRef(target.deskId, row.desk_code, row.desk_room_name, row.desk_office_id, row.desk_office_name, row.id),
      };
    case 'office':
      return {
        kind: 'office',
        office: { id: target.officeId, name: joined(row.office_name, 'office_name', row.id) },
      };
    case 'department_position':
      return {
        kind: 'department_position',
        position: {
          id: target.departmentPositionId,
          number: joined(row.position_number, 'position_number', row.id),
          departmentName: joined(row.position_department_name, 'position_department_name', row.id),
        },
      };
  }
}

function mapLoanRow(row: LoanRow): LoanDetail {
  const target = targetFromColumns({
    personId: row.person_id,
    deskId: row.desk_id,
    officeId: row.office_id,
    departmentPositionId: row.department_position_id,
  });

  return {
    id: row.id,
    assetId: row.asset_id,
    target,
    placement: { officeId: row.placement_office_id, deskId: row.placement_desk_id },
    department: row.department,
    loanDate: row.loan_date,
    dueDate: row.due_date,
    returnDate: row.return_date,
    issuedBy: row.issued_by,
    createdByUserId: row.created_by_user_id,
    returnedByUserId: row.returned_by_user_id,
    createdAt: row.created_at,
    asset: { id: row.asset_id, name: row.asset_name, serialNumber: row.asset_serial_number },
    resolvedTarget: resolveTarget(row, target),
    placementOffice: row.placement_office_id
      ? { id: row.placement_office_id, name: joined(row.placement_office_name, 'placement_office_name', row.id) }
      : null,
    placementDesk: row.placement_desk_id
      ? deskRef(
          row.placement_desk_id,
          row.placement_desk_code,
          row.placement_desk_room_name,
          row.placement_desk_office_id,
          row.placement_desk_office_name,
          row.id,
        )
      : null,
  };
}

interface AssetRow {
  id: string;
  category_id: string;
  name: string;
  serial_number: string;
  asset_tag: string | null;
  status: AssetStatus;
  purchase_date: string | null;
  notes: string | null;
}

function visibilityClause(visibility: LoanVisibility, params: unknown[]): string {
  if (visibility.scope === 'all') return '';
  params.push(visibility.userId);
  return ` AND (l.created_by_user_id = $${params.length} OR p.user_id = $${params.length})`;
}

async function activePositionLoanExists(run: QueryRunner, positionId: string): Promise<boolean> {
  const result = await run<{ exists: boolean }>(`
    SELECT EXISTS (
      SELECT 1 FROM loan WHERE department_position_id = $1 AND return_date IS NULL
    ) AS exists
  `, [positionId]);
  return result.rows[0]?.exists ?? false;
}

async function activeDeskHolder(run: QueryRunner, deskId: string): Promise<string | null> {
  const result = await run<{ person_id: string }>(`
    SELECT person_id FROM loan
    WHERE placement_desk_id = $1 AND return_date IS NULL AND person_id IS NOT NULL
    ORDER BY created_at
    LIMIT 1
  `, [deskId]);
  return result.rows[0]?.person_id ?? null;
}

/** Loan writes on one transaction's connection. */
export class PostgresLoanUnitOfWork implements LoanUnitOfWork {
  constructor(private readonly run: QueryRunner) {}

  async lockAsset(assetId: string): Promise<Asset | null> {
    const result = await this.run<AssetRow>(`
      SELECT id, category_id, name, serial_number, asset_tag, status, purchase_date, notes
      FROM asset WHERE id = $1
      FOR UPDATE
    `, [assetId]);
    if (result.rows.length === 0) return null;
    const row = result.rows[0];
    return {
      id: row.id,
      categoryId: row.category_id,
      name: row.name,
      serialNumber: row.serial_number,
      assetTag: row.asset_tag,
      status: row.status,
      purchaseDate: row.purchase_date,
      notes: row.notes,
    };
  }

  async lockDepartmentPosition(positionId: string): Promise<boolean> {
    const result = await this.run('SELECT id FROM department_position WHERE id = $1 FOR UPDATE', [positionId]);
    return result.rows.length > 0;
  }

  async lockDesk(deskId: string): Promise<boolean> {
    const result = await this.run('SELECT id FROM desk WHERE id = $1 FOR UPDATE', [deskId]);
    return result.rows.length > 0;
  }

  hasActivePositionLoan(positionId: string): Promise<boolean> {
    return activePositionLoanExists(this.run, positionId);
  }

  findActiveDeskHolder(deskId: string): Promise<string | null> {
    return activeDeskHolder(this.run, deskId);
  }

  async insertLoan(loan: NewLoan): Promise<string> {
    const columns = targetToColumns(loan.target);
    try {
      const result = await this.run<{ id: string }>(`
        INSERT INTO loan (
          asset_id, person_id, desk_id, office_id, department_position_id,
          placement_office_id, placement_desk_id, department,
          loan_date, due_date, issued_by, created_by_user_id
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
        RETURNING id
      `, [
        loan.assetId,
        columns.personId,
        columns.deskId,
        columns.officeId,
        columns.departmentPositionId,
        loan.placement.officeId,
        loan.placement.deskId,
        loan.department,
        loan.loanDate,
        loan.dueDate,
        loan.issuedBy,
        loan.createdByUserId,
      ]);
      return result.rows[0].id;
    } catch (err) {
      // Backstop for the partial unique indexes; same codes as the pre-checks
      if (isUniqueViolation(err, 'loan_one_active_per_asset')) throw loanErrors.assetUnavailable();
      if (isUniqueViolation(err, 'loan_one_active_per_position')) throw loanErrors.positionAlreadyAssigned();
      throw err;
    }
  }

  async setAssetStatus(assetId: string, status: AssetStatus): Promise<void> {
    await this.run('UPDATE asset SET status = $1 WHERE id = $2', [status, assetId]);
  }

  async lockLoan(loanId: string): Promise<LoanDetail | null> {
    const result = await this.run<LoanRow>(`${SELECT_WITH_JOINS} WHERE l.id = $1 FOR UPDATE OF l`, [loanId]);
    return result.rows.length > 0 ? mapLoanRow(result.rows[0]) : null;
  }

  async markReturned(loanId: string, returnDate: string, returnedByUserId: string): Promise<void> {
    await this.run(`
      UPDATE loan SET return_date = $2, returned_by_user_id = $3
      WHERE id = $1 AND return_date IS NULL
    `, [loanId, returnDate, returnedByUserId]);
  }
}

export class PostgresLoanRepository implements ILoanRepository {
  async findById(id: string): Promise<LoanDetail | null> {
    const result = await query<LoanRow>(`${SELECT_WITH_JOINS} WHERE l.id = $1`, [id]);
    return result.rows.length > 0 ? mapLoanRow(result.rows[0]) : null;
  }

  async findMany(options: LoanListOptions): Promise<LoanDetail[]> {
    const params: unknown[] = [];
    let sql = `${SELECT_WITH_JOINS} WHERE 1 = 1`;

    if (!options.includeReturned) {
      sql += ' AND l.return_date IS NULL';
    }
    sql += visibilityClause(options.visibility, params);

    const direction = options.sort.direction === 'asc' ? 'ASC' : 'DESC';
    sql += ` ORDER BY ${SORT_COLUMNS[options.sort.field]} ${direction} NULLS LAST, l.created_at DESC, l.id`;

    const result = await query<LoanRow>(sql, params);
    return result.rows.map(mapLoanRow);
  }

  hasActivePositionLoan(positionId: string): Promise<boolean> {
    return activePositionLoanExists(query, positionId);
  }

  findActiveDeskHolder(deskId: string): Promise<string | null> {
    return activeDeskHolder(query, deskId);
  }

  runInTransaction<T>(work: (uow: LoanUnitOfWork) => Promise<T>): Promise<T> {
    return transaction(client => work(new PostgresLoanUnitOfWork((text, params) => client.query(text, params))));
  }
}
