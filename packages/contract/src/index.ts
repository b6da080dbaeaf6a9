/**
 * @loandesk/contract: canonical API contract definitions.
 *
 * Exports route contracts, envelope helpers, and the contract registry.
 */

// Core types
export type { ContractRoute, HttpMethod } from './define-route.js';
export { defineRoute } from './define-route.js';

// Envelope helpers
export { DataEnvelope, ErrorEnvelope, FieldErrorsSchema, type FieldErrorsApi } from './envelope.js';

// Route contracts & registry
export { contract, loanRoutes, allContractRoutes, type RegisteredRoute } from './routes/index.js';

// Re-export schemas that consumers may need for type inference
export {
  LoanApiSchema,
  type LoanApi,
  CreateLoanBodySchema,
  type CreateLoanBody,
  ListLoansQuerySchema,
  type ListLoansQuery,
} from './routes/loans.js';
