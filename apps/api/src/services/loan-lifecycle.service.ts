/**
 * Loan Lifecycle Engine
 *
 * Create: load references → role strategy validates and binds → inside one
 * transaction, lock and re-check asset / position / desk → insert loan →
 * flip asset to `assigned`.
 *
 * Return: inside one transaction, lock loan → NOT_FOUND → ALREADY_RETURNED →
 * FORBIDDEN → set return date → flip asset to `available`.
 *
 * Nothing is written unless every check passes; a race lost at commit time
 * surfaces with the same code as the pre-check.
 */

import {
  canReturnLoan,
  isLoanVisible,
  loanErrors,
  strategyFor,
  todayIsoDate,
  visibleLoanScope,
  type ActorIdentity,
  type LoanBinding,
  type LoanCandidate,
  type LoanDetail,
  type LoanRequest,
  type LoanSort,
  type Person,
  type Role,
} from '@loandesk/domain';
import {
  getRepositories,
  type ICatalogRepository,
  type IDepartmentRepository,
  type ILoanRepository,
  type ILocationRepository,
  type IPersonRepository,
  type LoanUnitOfWork,
} from '../repositories/index.js';

// ============================================================================
// Types
// ============================================================================

export interface ActorContext {
  actor: ActorIdentity;
  role: Role;
}

export interface LoanLifecycleDeps {
  loans: ILoanRepository;
  catalog: ICatalogRepository;
  locations: ILocationRepository;
  departments: IDepartmentRepository;
  persons: IPersonRepository;
  /** Current local date as YYYY-MM-DD. */
  today?: () => string;
}

export interface ListLoansOptions {
  includeReturned: boolean;
  sort: LoanSort;
}

// ============================================================================
// Service
// ============================================================================

export class LoanLifecycleService {
  private readonly today: () => string;

  constructor(private readonly deps: LoanLifecycleDeps) {
    this.today = deps.today ?? (() => todayIsoDate());
  }

  /**
   * Person profile of the actor: the explicit link first, then a
   * case-insensitive email match.
   */
  async resolveActorPerson(actor: ActorIdentity): Promise<Person | null> {
    const linked = await this.deps.persons.findByUserId(actor.userId);
    if (linked) return linked;
    if (!actor.email) return null;
    return this.deps.persons.findByEmail(actor.email);
  }

  async createLoan(ctx: ActorContext, request: LoanRequest): Promise<LoanDetail> {
    const candidate = await this.loadCandidate(ctx, request);
    const result = strategyFor(ctx.role).validateAndBind(candidate);
    if (!result.ok) throw result.error;

    const { binding } = result;
    const loanId = await this.deps.loans.runInTransaction(async (uow) => {
      await recheckBinding(uow, binding);
      const id = await uow.insertLoan({ ...binding, createdByUserId: ctx.actor.userId });
      await uow.setAssetStatus(binding.assetId, 'assigned');
      return id;
    });

    return this.requireLoan(loanId);
  }

  async returnLoan(ctx: ActorContext, loanId: string): Promise<LoanDetail> {
    const today = this.today();

    await this.deps.loans.runInTransaction(async (uow) => {
      const loan = await uow.lockLoan(loanId);
      if (!loan) throw loanErrors.notFound('Loan');
      if (loan.returnDate !== null) throw loanErrors.alreadyReturned();
      if (!canReturnLoan(ctx.actor, ctx.role, loan)) throw loanErrors.forbidden();

      await uow.markReturned(loan.id, today, ctx.actor.userId);
      await uow.setAssetStatus(loan.assetId, 'available');
    });

    return this.requireLoan(loanId);
  }

  listVisibleLoans(ctx: ActorContext, options: ListLoansOptions): Promise<LoanDetail[]> {
    return this.deps.loans.findMany({
      visibility: visibleLoanScope(ctx.actor, ctx.role),
      includeReturned: options.includeReturned,
      sort: options.sort,
    });
  }

  /** Invisible loans are reported as missing, not forbidden. */
  async getVisibleLoan(ctx: ActorContext, loanId: string): Promise<LoanDetail> {
    const loan = await this.deps.loans.findById(loanId);
    if (!loan || !isLoanVisible(visibleLoanScope(ctx.actor, ctx.role), loan)) {
      throw loanErrors.notFound('Loan');
    }
    return loan;
  }

  currentDate(): string {
    return this.today();
  }

  private async loadCandidate(ctx: ActorContext, request: LoanRequest): Promise<LoanCandidate> {
    const { catalog, persons, locations, departments, loans } = this.deps;

    const [asset, person, office, desk, position, actorPerson] = await Promise.all([
      catalog.findAssetById(request.assetId),
      request.personId ? persons.findById(request.personId) : null,
      request.officeId ? locations.findOfficeById(request.officeId) : null,
      request.deskId ? locations.findDeskById(request.deskId) : null,
      request.departmentPositionId ? departments.findPositionById(request.departmentPositionId) : null,
      ctx.role === 'employee' ? this.resolveActorPerson(ctx.actor) : null,
    ]);

    const [positionHasActiveLoan, deskHolderPersonId] = await Promise.all([
      position ? loans.hasActivePositionLoan(position.id) : false,
      desk ? loans.findActiveDeskHolder(desk.id) : null,
    ]);

    return {
      request,
      today: this.today(),
      asset,
      person,
      office,
      desk,
      position,
      positionHasActiveLoan,
      deskHolderPersonId,
      actorPerson,
    };
  }

  private async requireLoan(loanId: string): Promise<LoanDetail> {
    const loan = await this.deps.loans.findById(loanId);
    if (!loan) throw loanErrors.notFound('Loan');
    return loan;
  }
}

// ============================================================================
// Commit-time re-checks (locks: asset → position → desk)
// ============================================================================

async function recheckBinding(uow: LoanUnitOfWork, binding: LoanBinding): Promise<void> {
  const asset = await uow.lockAsset(binding.assetId);
  if (!asset || asset.status !== 'available') throw loanErrors.assetUnavailable();

  const { target, placement } = binding;

  if (target.kind === 'department_position') {
    const positionId = target.departmentPositionId;
    if (!(await uow.lockDepartmentPosition(positionId))) {
      throw loanErrors.validation({ departmentPosition: 'Select a valid department position.' });
    }
    if (await uow.hasActivePositionLoan(positionId)) throw loanErrors.positionAlreadyAssigned();
  }

  if (target.kind === 'person' && placement.deskId !== null) {
    if (!(await uow.lockDesk(placement.deskId))) {
      throw loanErrors.validation({ desk: 'Select a valid desk.' });
    }
    const holder = await uow.findActiveDeskHolder(placement.deskId);
    if (holder !== null && holder !== target.personId) throw loanErrors.deskAlreadyAssigned();
  }
}

export function createLoanLifecycleService(today?: () => string): LoanLifecycleService {
  const { loans, catalog, locations, departments, persons } = getRepositories();
  return new LoanLifecycleService({ loans, catalog, locations, departments, persons, today });
}
