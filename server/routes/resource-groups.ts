// =============================================================================
// Resource Groups API Routes
// =============================================================================

import { Router } from 'express';
import { CatalogServices } from '../services/catalog';
import {
  createResourceGroupBodySchema,
  paginationQuerySchema,
  parseId,
  updateResourceGroupBodySchema,
  validateBody,
  validateQuery,
} from '../src/middleware/validation';
import { sendCreated, sendNoContent, sendOk, sendPage } from './responses';

export function resourceGroupsRouter(services: CatalogServices): Router {
  const router = Router();

  router.get('/', validateQuery(paginationQuerySchema), async (req, res, next) => {
    try {
      sendPage(res, await services.resourceGroups.list(req.query));
    } catch (error) {
      next(error);
    }
  });

  router.post('/', validateBody(createResourceGroupBodySchema), async (req, res, next) => {
    try {
      const group = await services.resourceGroups.create(req.body);
      sendCreated(res, group, 'Resource group created');
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req, res, next) => {
    try {
      sendOk(res, await services.resourceGroups.get(parseId(req.params.id)));
    } catch (error) {
      next(error);
    }
  });

  router.put('/:id', validateBody(updateResourceGroupBodySchema), async (req, res, next) => {
    try {
      const group = await services.resourceGroups.update(parseId(req.params.id), req.body);
      sendOk(res, group, 'Resource group updated');
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', async (req, res, next) => {
    try {
      await services.resourceGroups.delete(parseId(req.params.id));
      sendNoContent(res);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id/resources', async (req, res, next) => {
    try {
      sendOk(res, await services.resourceGroups.listResources(parseId(req.params.id)));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
