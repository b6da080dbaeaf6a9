/**
 * Loan Repository Interface
 *
 * Reads return fully resolved LoanDetail records. Writes only happen inside
 * runInTransaction, through a LoanUnitOfWork whose lock methods take row
 * locks that are held until the transaction ends.
 */

import type {
  Asset,
  AssetStatus,
  LoanBinding,
  LoanDetail,
  LoanSort,
  LoanVisibility,
} from '@loandesk/domain';

export interface LoanListOptions {
  visibility: LoanVisibility;
  includeReturned: boolean;
  sort: LoanSort;
}

export interface NewLoan extends LoanBinding {
  createdByUserId: string;
}

export interface LoanUnitOfWork {
  lockAsset(assetId: string): Promise<Asset | null>;
  /** Returns false when the position does not exist. */
  lockDepartmentPosition(positionId: string): Promise<boolean>;
  /** Returns false when the desk does not exist. */
  lockDesk(deskId: string): Promise<boolean>;
  hasActivePositionLoan(positionId: string): Promise<boolean>;
  /** Person seated at the desk through an active person loan, if any. */
  findActiveDeskHolder(deskId: string): Promise<string | null>;
  /** Returns the new loan id. */
  insertLoan(loan: NewLoan): Promise<string>;
  setAssetStatus(assetId: string, status: AssetStatus): Promise<void>;
  lockLoan(loanId: string): Promise<LoanDetail | null>;
  markReturned(loanId: string, returnDate: string, returnedByUserId: string): Promise<void>;
}

export interface ILoanRepository {
  findById(id: string): Promise<LoanDetail | null>;
  findMany(options: LoanListOptions): Promise<LoanDetail[]>;
  hasActivePositionLoan(positionId: string): Promise<boolean>;
  findActiveDeskHolder(deskId: string): Promise<string | null>;
  runInTransaction<T>(work: (uow: LoanUnitOfWork) => Promise<T>): Promise<T>;
}
