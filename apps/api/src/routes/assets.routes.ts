/**
 * Asset Routes
 *
 * Admins may set the administrative statuses (available, in_service,
 * retired). `assigned` is owned by the loan lifecycle, and an asset on loan
 * keeps its status until the loan is returned.
 */

import { FastifyInstance } from 'fastify';
import { assetLabel, type Asset } from '@loandesk/domain';
import {
  AssetListQuerySchema,
  CreateAssetRequestSchema,
  IdParamsSchema,
  UpdateAssetRequestSchema,
} from '../schemas/index.js';
import { requireAdmin, requireAuthenticated } from '../plugins/auth.js';
import { getCatalogRepository } from '../repositories/index.js';
import { ok, fail, validated } from '../utils/reply.js';

function formatAsset(asset: Asset) {
  return {
    ...asset,
    label: assetLabel(asset),
  };
}

export async function assetsRoutes(fastify: FastifyInstance): Promise<void> {
  const catalogRepo = getCatalogRepository();

  /**
   * GET /assets
   * Filters: name (prefix), serialNumber (prefix), status (repeatable), categoryId
   */
  fastify.get('/', {
    preHandler: [requireAuthenticated],
  }, async (request, reply) => {
    const filters = validated(reply, AssetListQuerySchema, request.query);
    if (!filters) return;

    const assets = await catalogRepo.listAssets(filters);
    return ok(reply, { assets: assets.map(formatAsset) });
  });

  /**
   * GET /assets/:id
   */
  fastify.get('/:id', {
    preHandler: [requireAuthenticated],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;

    const asset = await catalogRepo.findAssetById(params.id);
    if (!asset) {
      return fail(reply, 'NOT_FOUND', 'Asset not found', 404);
    }
    return ok(reply, { asset: formatAsset(asset) });
  });

  /**
   * POST /assets
   */
  fastify.post('/', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const body = validated(reply, CreateAssetRequestSchema, request.body);
    if (!body) return;

    if (!(await catalogRepo.findCategoryById(body.categoryId))) {
      return fail(reply, 'VALIDATION_ERROR', 'Validation error', 400, { categoryId: 'Select a valid category.' });
    }

    const asset = await catalogRepo.createAsset({
      categoryId: body.categoryId,
      name: body.name,
      serialNumber: body.serialNumber,
      assetTag: body.assetTag ?? null,
      status: body.status,
      purchaseDate: body.purchaseDate ?? null,
      notes: body.notes ?? null,
    });
    return ok(reply, { asset: formatAsset(asset) }, 201);
  });

  /**
   * PATCH /assets/:id
   */
  fastify.patch('/:id', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;
    const body = validated(reply, UpdateAssetRequestSchema, request.body);
    if (!body) return;

    if (body.categoryId && !(await catalogRepo.findCategoryById(body.categoryId))) {
      return fail(reply, 'VALIDATION_ERROR', 'Validation error', 400, { categoryId: 'Select a valid category.' });
    }

    const result = await catalogRepo.updateAsset(params.id, body);
    if (result.outcome === 'not_found') {
      return fail(reply, 'NOT_FOUND', 'Asset not found', 404);
    }
    if (result.outcome === 'on_loan') {
      return fail(reply, 'ASSET_ON_LOAN', 'Asset is on loan; return the loan before changing its status', 409);
    }
    return ok(reply, { asset: formatAsset(result.asset) });
  });

  /**
   * DELETE /assets/:id
   * Refused with IN_USE once the asset has loan history.
   */
  fastify.delete('/:id', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;

    const deleted = await catalogRepo.deleteAsset(params.id);
    if (!deleted) {
      return fail(reply, 'NOT_FOUND', 'Asset not found', 404);
    }
    return reply.status(204).send();
  });
}
