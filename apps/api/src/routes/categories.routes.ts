/**
 * Asset Category Routes
 * Reads for any authenticated actor; mutations are admin-only.
 */

import { FastifyInstance } from 'fastify';
import {
  CreateCategoryRequestSchema,
  IdParamsSchema,
  UpdateCategoryRequestSchema,
} from '../schemas/index.js';
import { requireAdmin, requireAuthenticated } from '../plugins/auth.js';
import { getCatalogRepository } from '../repositories/index.js';
import { ok, fail, validated } from '../utils/reply.js';

export async function categoriesRoutes(fastify: FastifyInstance): Promise<void> {
  const catalogRepo = getCatalogRepository();

  /**
   * GET /categories
   */
  fastify.get('/', {
    preHandler: [requireAuthenticated],
  }, async (_request, reply) => {
    const categories = await catalogRepo.listCategories();
    return ok(reply, { categories });
  });

  /**
   * GET /categories/:id
   */
  fastify.get('/:id', {
    preHandler: [requireAuthenticated],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;

    const category = await catalogRepo.findCategoryById(params.id);
    if (!category) {
      return fail(reply, 'NOT_FOUND', 'Category not found', 404);
    }
    return ok(reply, { category });
  });

  /**
   * POST /categories
   */
  fastify.post('/', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const body = validated(reply, CreateCategoryRequestSchema, request.body);
    if (!body) return;

    const category = await catalogRepo.createCategory(body);
    return ok(reply, { category }, 201);
  });

  /**
   * PATCH /categories/:id
   */
  fastify.patch('/:id', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;
    const body = validated(reply, UpdateCategoryRequestSchema, request.body);
    if (!body) return;

    const category = await catalogRepo.updateCategory(params.id, body);
    if (!category) {
      return fail(reply, 'NOT_FOUND', 'Category not found', 404);
    }
    return ok(reply, { category });
  });

  /**
   * DELETE /categories/:id
   * Refused with IN_USE while assets still reference the category.
   */
  fastify.delete('/:id', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;

    const deleted = await catalogRepo.deleteCategory(params.id);
    if (!deleted) {
      return fail(reply, 'NOT_FOUND', 'Category not found', 404);
    }
    return reply.status(204).send();
  });
}
