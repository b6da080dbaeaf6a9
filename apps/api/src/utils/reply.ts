/**
 * Standardized API Reply Helpers
 *
 * All API responses use a consistent envelope:
 *   Success: { data: <payload> }
 *   Error:   { error: { code: string, message: string, details?: unknown, requestId?: string } }
 *
 * Usage:
 *   return ok(reply, { assets: [...] });
 *   return ok(reply, { asset }, 201);
 *   return fail(reply, 'VALIDATION_ERROR', 'Validation error', 400, zodErrors);
 *   return fail(reply, 'NOT_FOUND', 'Desk not found', 404);
 */

import { FastifyReply } from 'fastify';
import { z } from 'zod';
import type { LoanError } from '@loandesk/domain';

interface ErrorBody {
  error: { code: string; message: string; details?: unknown; requestId?: string };
}

/**
 * Send a success response wrapped in { data }.
 */
export function ok<T>(reply: FastifyReply, data: T, statusCode = 200): FastifyReply {
  return reply.status(statusCode).send({ data });
}

/**
 * Send an error response wrapped in { error: { code, message, details?, requestId? } }.
 */
export function fail(
  reply: FastifyReply,
  code: string,
  message: string,
  statusCode = 400,
  details?: unknown,
): FastifyReply {
  const body: ErrorBody = { error: { code, message } };
  if (details !== undefined) {
    body.error.details = details;
  }
  if (reply.request.requestId) {
    body.error.requestId = reply.request.requestId;
  }
  return reply.status(statusCode).send(body);
}

/** Send a domain error; field-scoped failures carry their field map in `details`. */
export function failWith(reply: FastifyReply, err: LoanError): FastifyReply {
  return fail(reply, err.code, err.message, err.statusCode, err.fieldErrors);
}

/**
 * Parse request data against a Zod schema.
 * Returns the parsed value on success, or null after sending a 400 error.
 *
 * Usage:
 *   const body = validated(reply, MySchema, request.body);
 *   if (!body) return;
 */
export function validated<S extends z.ZodTypeAny>(
  reply: FastifyReply,
  schema: S,
  data: unknown,
): z.output<S> | null {
  const result = schema.safeParse(data);
  if (!result.success) {
    fail(reply, 'VALIDATION_ERROR', 'Validation error', 400, result.error.flatten());
    return null;
  }
  return result.data;
}
