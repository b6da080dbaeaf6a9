/**
 * Loan Routes
 * Contract-driven: paths, request and response shapes come from
 * @loandesk/contract. Rule violations are thrown as LoanErrors by the
 * lifecycle engine and rendered by the central error handler.
 */

import { FastifyInstance, FastifyRequest } from 'fastify';
import { contract, type LoanApi } from '@loandesk/contract';
import {
  allowedTargetKinds,
  assetLabel,
  departmentLabel,
  deskLabel,
  isLoanError,
  isOverdue,
  loanState,
  officeLabel,
  targetDisplayName,
  targetId,
  targetLabel,
  targetToColumns,
  type LoanDetail,
} from '@loandesk/domain';
import { requireAuthenticated, toActor } from '../plugins/auth.js';
import { registerContractRoute } from '../lib/contract-route.js';
import {
  createLoanLifecycleService,
  type ActorContext,
} from '../services/loan-lifecycle.service.js';

const PREFIX = '/loans';

export function formatLoan(loan: LoanDetail, today: string): LoanApi {
  const columns = targetToColumns(loan.target);
  return {
    id: loan.id,
    asset: {
      id: loan.asset.id,
      name: loan.asset.name,
      serialNumber: loan.asset.serialNumber,
      label: assetLabel(loan.asset),
    },
    target: {
      type: loan.target.kind,
      id: targetId(loan.target),
      label: targetDisplayName(loan.resolvedTarget),
    },
    personId: columns.personId,
    deskId: columns.deskId,
    officeId: columns.officeId,
    departmentPositionId: columns.departmentPositionId,
    placementOfficeId: loan.placement.officeId,
    placementDeskId: loan.placement.deskId,
    department: loan.department,
    loanDate: loan.loanDate,
    dueDate: loan.dueDate,
    returnDate: loan.returnDate,
    issuedBy: loan.issuedBy,
    createdByUserId: loan.createdByUserId,
    returnedByUserId: loan.returnedByUserId,
    targetLabel: targetLabel(loan),
    officeLabel: officeLabel(loan),
    deskLabel: deskLabel(loan),
    departmentLabel: departmentLabel(loan),
    isActive: loanState(loan) === 'active',
    isOverdue: isOverdue(loan, today),
    createdAt: loan.createdAt.toISOString(),
  };
}

function actorContext(request: FastifyRequest): ActorContext {
  return { actor: toActor(request.user), role: request.role };
}

export async function loansRoutes(fastify: FastifyInstance): Promise<void> {
  const lifecycle = createLoanLifecycleService();

  registerContractRoute(fastify, contract.loans.list, PREFIX, {
    preHandler: [requireAuthenticated],
    handler: async (request, _reply, { query }) => {
      // active=1 wins over includeReturned
      const includeReturned = query.active === true ? false : query.includeReturned ?? false;
      const loans = await lifecycle.listVisibleLoans(actorContext(request), {
        includeReturned,
        sort: { field: query.sort, direction: query.direction },
      });
      const today = lifecycle.currentDate();
      return { loans: loans.map((loan) => formatLoan(loan, today)) };
    },
  });

  registerContractRoute(fastify, contract.loans.targetKinds, PREFIX, {
    preHandler: [requireAuthenticated],
    handler: async (request) => {
      return { role: request.role, targetKinds: allowedTargetKinds(request.role) };
    },
  });

  registerContractRoute(fastify, contract.loans.get, PREFIX, {
    preHandler: [requireAuthenticated],
    handler: async (request, _reply, { params }) => {
      const loan = await lifecycle.getVisibleLoan(actorContext(request), params.loanId);
      return { loan: formatLoan(loan, lifecycle.currentDate()) };
    },
  });

  registerContractRoute(fastify, contract.loans.create, PREFIX, {
    preHandler: [requireAuthenticated],
    handler: async (request, _reply, { body }) => {
      const ctx = actorContext(request);
      try {
        const loan = await lifecycle.createLoan(ctx, body);
        request.log.info({
          code: 'LOAN_CREATED',
          loanId: loan.id,
          assetId: loan.assetId,
          targetType: loan.target.kind,
          userId: ctx.actor.userId,
          role: ctx.role,
        }, 'Loan created');
        return { loan: formatLoan(loan, lifecycle.currentDate()) };
      } catch (err) {
        if (isLoanError(err)) {
          request.log.info({ code: 'LOAN_REJECTED', errorCode: err.code, assetId: body.assetId, userId: ctx.actor.userId, role: ctx.role }, 'Loan rejected');
        }
        throw err;
      }
    },
  });

  registerContractRoute(fastify, contract.loans.return, PREFIX, {
    preHandler: [requireAuthenticated],
    handler: async (request, _reply, { params }) => {
      const ctx = actorContext(request);
      const loan = await lifecycle.returnLoan(ctx, params.loanId);
      request.log.info({
        code: 'LOAN_RETURNED',
        loanId: loan.id,
        assetId: loan.assetId,
        userId: ctx.actor.userId,
      }, 'Loan returned');
      return { loan: formatLoan(loan, lifecycle.currentDate()) };
    },
  });
}
