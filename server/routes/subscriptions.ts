// =============================================================================
// Subscriptions API Routes
// =============================================================================

import { Router } from 'express';
import { CatalogServices } from '../services/catalog';
import {
  createSubscriptionBodySchema,
  paginationQuerySchema,
  parseId,
  updateSubscriptionBodySchema,
  validateBody,
  validateQuery,
} from '../src/middleware/validation';
import { sendCreated, sendNoContent, sendOk, sendPage } from './responses';

export function subscriptionsRouter(services: CatalogServices): Router {
  const router = Router();

  router.get('/', validateQuery(paginationQuerySchema), async (req, res, next) => {
    try {
      sendPage(res, await services.subscriptions.list(req.query));
    } catch (error) {
      next(error);
    }
  });

  router.post('/', validateBody(createSubscriptionBodySchema), async (req, res, next) => {
    try {
      const subscription = await services.subscriptions.create(req.body);
      sendCreated(res, subscription, 'Subscription created');
    } catch (error) {
      next(error);
    }
  });

  router.get('/by-name/:name', async (req, res, next) => {
    try {
      sendOk(res, await services.subscriptions.getByName(req.params.name));
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req, res, next) => {
    try {
      sendOk(res, await services.subscriptions.get(parseId(req.params.id)));
    } catch (error) {
      next(error);
    }
  });

  router.put('/:id', validateBody(updateSubscriptionBodySchema), async (req, res, next) => {
    try {
      const subscription = await services.subscriptions.update(parseId(req.params.id), req.body);
      sendOk(res, subscription, 'Subscription updated');
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', async (req, res, next) => {
    try {
      await services.subscriptions.delete(parseId(req.params.id));
      sendNoContent(res);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id/resources', async (req, res, next) => {
    try {
      sendOk(res, await services.subscriptions.listResources(parseId(req.params.id)));
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id/resource-groups', async (req, res, next) => {
    try {
      sendOk(res, await services.subscriptions.listResourceGroups(parseId(req.params.id)));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
