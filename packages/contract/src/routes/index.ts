/**
 * Contract registry. Aggregates all route contracts.
 */

export { loanRoutes } from './loans.js';

import type { ContractRoute } from '../define-route.js';
import { loanRoutes } from './loans.js';

/** The full contract registry. */
export const contract = {
  loans: loanRoutes,
} as const;

export interface RegisteredRoute {
  /** `<group>.<name>`, also used as the OpenAPI operationId. */
  key: string;
  route: ContractRoute;
}

/** Flatten the registry into a list, in declaration order. */
export function allContractRoutes(): RegisteredRoute[] {
  const result: RegisteredRoute[] = [];
  for (const [groupName, routes] of Object.entries(contract)) {
    for (const [routeName, route] of Object.entries(routes)) {
      result.push({ key: `${groupName}.${routeName}`, route });
    }
  }
  return result;
}
