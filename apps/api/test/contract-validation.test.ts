/**
 * Contract Route Adapter Tests
 *
 * Verifies that registerContractRoute enforces:
 * 1. Request validation (params, query, body) - rejects invalid input with 400
 * 2. Response validation - malformed handler output produces 500 SERVER_RESPONSE_INVALID
 * 3. Success status and envelope come from the contract
 * 4. Auth preHandlers still run first
 */

import { describe, it, expect } from 'vitest';
import Fastify from 'fastify';
import { z } from 'zod';
import { defineRoute } from '@loandesk/contract';
import { registerContractRoute } from '../src/lib/contract-route.js';

// ---------------------------------------------------------------------------
// Test route contracts
// ---------------------------------------------------------------------------

const testGetRoute = defineRoute({
  method: 'GET',
  path: '/test/:id',
  summary: 'Test GET',
  params: z.object({ id: z.string().uuid() }),
  query: z.object({ page: z.coerce.number().int().positive().optional() }),
  response: z.object({ name: z.string(), value: z.number().int().nonnegative() }),
});

const testPostRoute = defineRoute({
  method: 'POST',
  path: '/test',
  summary: 'Test POST',
  body: z.object({ name: z.string().min(1), count: z.number().int() }),
  response: z.object({ id: z.string(), name: z.string() }),
  successStatus: 201,
});

const testDeleteRoute = defineRoute({
  method: 'DELETE',
  path: '/test/:id',
  summary: 'Test DELETE',
  params: z.object({ id: z.string().uuid() }),
  response: 'void',
});

function buildApp() {
  return Fastify({ logger: false });
}

const VALID_UUID = '00000000-0000-4000-8000-000000000001';

// ---------------------------------------------------------------------------
// Request validation
// ---------------------------------------------------------------------------

describe('Contract route - request validation', () => {
  it('rejects invalid params with 400 INVALID_REQUEST', async () => {
    const app = buildApp();
    registerContractRoute(app, testGetRoute, '/test', {
      handler: async () => ({ name: 'x', value: 1 }),
    });
    await app.ready();

    const res = await app.inject({ method: 'GET', url: '/not-a-uuid' });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('INVALID_REQUEST');
  });

  it('rejects invalid query with 400 INVALID_REQUEST', async () => {
    const app = buildApp();
    registerContractRoute(app, testGetRoute, '/test', {
      handler: async () => ({ name: 'x', value: 1 }),
    });
    await app.ready();

    const res = await app.inject({ method: 'GET', url: `/${VALID_UUID}?page=0` });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('INVALID_REQUEST');
  });

  it('rejects invalid body with 400 VALIDATION_ERROR and field issues', async () => {
    const app = buildApp();
    registerContractRoute(app, testPostRoute, '/test', {
      handler: async () => ({ id: '1', name: 'x' }),
    });
    await app.ready();

    const res = await app.inject({
      method: 'POST',
      url: '/',
      payload: { name: '', count: 'not-a-number' },
    });
    expect(res.statusCode).toBe(400);
    const { error } = res.json();
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(Object.keys(error.details.fieldErrors).sort()).toEqual(['count', 'name']);
  });

  it('passes parsed params and query to the handler', async () => {
    const app = buildApp();
    registerContractRoute(app, testGetRoute, '/test', {
      handler: async (_req, _reply, { params, query }) => ({ name: params.id, value: query.page ?? 0 }),
    });
    await app.ready();

    const res = await app.inject({ method: 'GET', url: `/${VALID_UUID}?page=3` });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ data: { name: VALID_UUID, value: 3 } });
  });
});

// ---------------------------------------------------------------------------
// Response handling
// ---------------------------------------------------------------------------

describe('Contract route - response handling', () => {
  it('returns 500 SERVER_RESPONSE_INVALID for a payload the schema rejects', async () => {
    const app = buildApp();
    registerContractRoute(app, testGetRoute, '/test', {
      handler: async () => ({ name: 'test', value: -1 }),
    });
    await app.ready();

    const res = await app.inject({ method: 'GET', url: `/${VALID_UUID}` });
    expect(res.statusCode).toBe(500);
    expect(res.json().error.code).toBe('SERVER_RESPONSE_INVALID');
  });

  it('uses the contract success status', async () => {
    const app = buildApp();
    registerContractRoute(app, testPostRoute, '/test', {
      handler: async (_req, _reply, { body }) => ({ id: 'new', name: body.name }),
    });
    await app.ready();

    const res = await app.inject({ method: 'POST', url: '/', payload: { name: 'dock', count: 2 } });
    expect(res.statusCode).toBe(201);
    expect(res.json()).toEqual({ data: { id: 'new', name: 'dock' } });
  });

  it('sends 204 for void contract routes', async () => {
    const app = buildApp();
    registerContractRoute(app, testDeleteRoute, '/test', {
      handler: async () => undefined,
    });
    await app.ready();

    const res = await app.inject({ method: 'DELETE', url: `/${VALID_UUID}` });
    expect(res.statusCode).toBe(204);
  });

  it('leaves a reply the handler already sent untouched', async () => {
    const app = buildApp();
    registerContractRoute(app, testDeleteRoute, '/test', {
      handler: async (_req, reply) => {
        reply.status(202).send({ data: { queued: true } });
      },
    });
    await app.ready();

    const res = await app.inject({ method: 'DELETE', url: `/${VALID_UUID}` });
    expect(res.statusCode).toBe(202);
    expect(res.json()).toEqual({ data: { queued: true } });
  });
});

// ---------------------------------------------------------------------------
// Auth independence
// ---------------------------------------------------------------------------

describe('Contract route - auth preHandlers', () => {
  it('invokes preHandler before contract validation', async () => {
    const app = buildApp();
    let authCalled = false;
    let handlerCalled = false;

    registerContractRoute(app, testGetRoute, '/test', {
      preHandler: [
        async (_req, reply) => {
          authCalled = true;
          return reply.status(401).send({ error: { code: 'UNAUTHENTICATED', message: 'Authentication required' } });
        },
      ],
      handler: async () => {
        handlerCalled = true;
        return { name: 'x', value: 1 };
      },
    });
    await app.ready();

    const res = await app.inject({ method: 'GET', url: '/not-a-uuid' });
    expect(authCalled).toBe(true);
    expect(handlerCalled).toBe(false);
    expect(res.statusCode).toBe(401);
  });
});
