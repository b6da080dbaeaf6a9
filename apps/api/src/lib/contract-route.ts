/**
 * Contract Route Adapter
 *
 * Registers Fastify routes from contract definitions with automatic:
 * - params/query/body validation (Zod, before handler)
 * - response validation (Zod, after handler, before send)
 * - standardized error envelope for validation failures
 *
 * Handlers receive the parsed request parts and return the unwrapped
 * payload; the adapter wraps it in `{ data }` with the contract's success
 * status. Domain failures are thrown and left to the central error handler.
 */

import { FastifyInstance, FastifyRequest, FastifyReply, RouteHandlerMethod } from 'fastify';
import type { ContractRoute } from '@loandesk/contract';
import { z } from 'zod';
import { fail, ok } from '../utils/reply.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type Part = 'params' | 'query' | 'body';

type PartOutput<R, K extends Part> =
  R extends Record<K, infer S> ? (S extends z.ZodTypeAny ? z.output<S> : undefined) : undefined;

/** Parsed and validated request parts, typed from the route's schemas. */
export interface ContractData<R extends ContractRoute> {
  params: PartOutput<R, 'params'>;
  query: PartOutput<R, 'query'>;
  body: PartOutput<R, 'body'>;
}

/** Unwrapped response payload the handler must produce. */
export type ContractResponse<R extends ContractRoute> =
  R extends { response: infer S extends z.ZodTypeAny } ? z.input<S> : void;

export type ContractHandler<R extends ContractRoute> = (
  request: FastifyRequest,
  reply: FastifyReply,
  data: ContractData<R>,
) => Promise<ContractResponse<R>>;

export interface ContractRouteOptions<R extends ContractRoute> {
  /** Fastify preHandler hooks (auth, roles, etc.) */
  preHandler?: RouteHandlerMethod | RouteHandlerMethod[];
  /** The route handler function. */
  handler: ContractHandler<R>;
}

// ---------------------------------------------------------------------------
// Path conversion
// ---------------------------------------------------------------------------

/**
 * Contract paths are absolute (e.g. /loans/:loanId); Fastify routes are
 * relative to their plugin prefix (e.g. /:loanId under /api/loans).
 */
function contractPathToFastify(contractPath: string, prefix: string): string {
  if (contractPath.startsWith(prefix)) {
    const relative = contractPath.slice(prefix.length);
    return relative || '/';
  }
  return contractPath;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const NO_INPUT = z.undefined();

function parsePart(schema: z.ZodTypeAny | undefined, value: unknown) {
  return schema ? schema.safeParse(value) : NO_INPUT.safeParse(undefined);
}

/**
 * Validate the unwrapped payload against the contract response schema.
 * Failures are logged with field paths only.
 */
function responseIsValid(
  responseSchema: z.ZodTypeAny | 'void',
  payload: unknown,
  request: FastifyRequest,
): boolean {
  if (responseSchema === 'void') {
    return true;
  }

  const result = responseSchema.safeParse(payload);
  if (result.success) {
    return true;
  }

  request.log.error({
    code: 'SERVER_RESPONSE_INVALID',
    method: request.method,
    url: request.url,
    issues: result.error.issues.map(i => ({
      path: i.path,
      code: i.code,
      message: i.message,
    })),
  });
  return false;
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

/**
 * Register a single contract-authoritative route on a Fastify instance.
 *
 * @param prefix - Route prefix (e.g. '/loans') that the contract path starts with.
 */
export function registerContractRoute<R extends ContractRoute>(
  fastify: FastifyInstance,
  route: R,
  prefix: string,
  options: ContractRouteOptions<R>,
): void {
  const { preHandler, handler } = options;
  const url = contractPathToFastify(route.path, prefix);

  const preHandlerArray = preHandler
    ? (Array.isArray(preHandler) ? preHandler : [preHandler])
    : [];

  fastify.route({
    method: route.method,
    url,
    preHandler: preHandlerArray,
    handler: async (request: FastifyRequest, reply: FastifyReply) => {
      const params = parsePart(route.params, request.params);
      if (!params.success) {
        return fail(reply, 'INVALID_REQUEST', 'Invalid path parameters', 400, params.error.flatten());
      }

      const query = parsePart(route.query, request.query);
      if (!query.success) {
        return fail(reply, 'INVALID_REQUEST', 'Invalid query parameters', 400, query.error.flatten());
      }

      const body = parsePart(route.body, request.body);
      if (!body.success) {
        return fail(reply, 'VALIDATION_ERROR', 'Validation error', 400, body.error.flatten());
      }

      const payload = await handler(request, reply, {
        params: params.data,
        query: query.data,
        body: body.data,
      });
      if (reply.sent) {
        return reply;
      }

      if (route.response === 'void') {
        return reply.status(route.successStatus ?? 204).send();
      }
      if (!responseIsValid(route.response, payload, request)) {
        return fail(reply, 'SERVER_RESPONSE_INVALID', 'Response validation failed', 500);
      }
      return ok(reply, payload, route.successStatus ?? 200);
    },
  });
}
