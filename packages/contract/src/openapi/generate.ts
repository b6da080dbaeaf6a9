/**
 * OpenAPI 3.1 document generator.
 *
 * Walks the contract registry and produces an OpenAPI document
 * using @asteasolutions/zod-to-openapi.
 */

import {
  OpenAPIRegistry,
  OpenApiGeneratorV31,
  extendZodWithOpenApi,
  type ResponseConfig,
} from '@asteasolutions/zod-to-openapi';
import { z } from 'zod';
import { LOAN_ERROR_STATUS, type LoanErrorCode } from '@loandesk/domain';
import { allContractRoutes } from '../routes/index.js';
import type { ContractRoute, HttpMethod } from '../define-route.js';
import { ErrorEnvelope } from '../envelope.js';

// Extend Zod with .openapi() method
extendZodWithOpenApi(z);

const OPENAPI_METHODS: Record<HttpMethod, 'get' | 'post' | 'patch' | 'put' | 'delete'> = {
  GET: 'get',
  POST: 'post',
  PATCH: 'patch',
  PUT: 'put',
  DELETE: 'delete',
};

/**
 * Convert a contract route path like `/loans/:loanId` to OpenAPI `/loans/{loanId}`.
 */
export function toOpenApiPath(path: string): string {
  return path.replace(/:([a-zA-Z0-9_]+)/g, '{$1}');
}

function successResponse(route: ContractRoute): [string, ResponseConfig] {
  if (route.response === 'void') {
    return ['204', { description: 'No content' }];
  }
  const status = String(route.successStatus ?? 200);
  return [status, {
    description: status === '201' ? 'Created' : 'Successful response',
    content: { 'application/json': { schema: z.object({ data: route.response }) } },
  }];
}

/** Group a route's domain error codes by HTTP status. */
function errorResponses(codes: readonly LoanErrorCode[]): Record<string, ResponseConfig> {
  const byStatus = new Map<number, LoanErrorCode[]>();
  for (const code of codes) {
    const status = LOAN_ERROR_STATUS[code];
    byStatus.set(status, [...(byStatus.get(status) ?? []), code]);
  }

  const responses: Record<string, ResponseConfig> = {};
  for (const [status, grouped] of byStatus) {
    responses[String(status)] = {
      description: grouped.join(', '),
      content: { 'application/json': { schema: ErrorEnvelope } },
    };
  }
  return responses;
}

/**
 * Generate an OpenAPI 3.1 document from the contract registry.
 */
export function generateOpenApiDocument() {
  const registry = new OpenAPIRegistry();

  for (const { key, route } of allContractRoutes()) {
    const [successStatus, success] = successResponse(route);

    registry.registerPath({
      method: OPENAPI_METHODS[route.method],
      path: toOpenApiPath(route.path),
      operationId: key,
      summary: route.summary,
      request: {
        params: route.params instanceof z.ZodObject ? route.params : undefined,
        query: route.query instanceof z.ZodObject ? route.query : undefined,
        body: route.body
          ? { content: { 'application/json': { schema: route.body } }, required: true }
          : undefined,
      },
      responses: {
        [successStatus]: success,
        '401': {
          description: 'UNAUTHENTICATED',
          content: { 'application/json': { schema: ErrorEnvelope } },
        },
        ...errorResponses(route.errors ?? []),
      },
    });
  }

  const generator = new OpenApiGeneratorV31(registry.definitions);
  return generator.generateDocument({
    openapi: '3.1.0',
    info: {
      title: 'Loandesk API',
      version: '1.0.0',
      description: 'Auto-generated from the route contract registry.',
    },
    servers: [
      { url: 'http://localhost:3001/api', description: 'Local development' },
    ],
  });
}
