// =============================================================================
// Applications API Routes
// =============================================================================

import { Router } from 'express';
import { CatalogServices } from '../services/catalog';
import {
  applicationBodySchema,
  applicationListQuerySchema,
  parseId,
  validateBody,
  validateQuery,
} from '../src/middleware/validation';
import { sendCreated, sendNoContent, sendOk, sendPage } from './responses';

export function applicationsRouter(services: CatalogServices): Router {
  const router = Router();

  // GET /api/v1/applications: paginated, or every application of one owner
  router.get('/', validateQuery(applicationListQuerySchema), async (req, res, next) => {
    try {
      const { ownerEmail, page, size } = req.query;
      if (ownerEmail !== undefined) {
        sendOk(res, await services.applications.listByOwnerEmail(ownerEmail));
        return;
      }
      sendPage(res, await services.applications.list({ page, size }));
    } catch (error) {
      next(error);
    }
  });

  router.post('/', validateBody(applicationBodySchema), async (req, res, next) => {
    try {
      const application = await services.applications.create(req.body);
      sendCreated(res, application, 'Application created');
    } catch (error) {
      next(error);
    }
  });

  router.get('/by-code/:code', async (req, res, next) => {
    try {
      sendOk(res, await services.applications.getByCode(req.params.code));
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req, res, next) => {
    try {
      sendOk(res, await services.applications.get(parseId(req.params.id)));
    } catch (error) {
      next(error);
    }
  });

  router.put('/:id', validateBody(applicationBodySchema), async (req, res, next) => {
    try {
      const application = await services.applications.update(parseId(req.params.id), req.body);
      sendOk(res, application, 'Application updated');
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', async (req, res, next) => {
    try {
      await services.applications.delete(parseId(req.params.id));
      sendNoContent(res);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id/resources', async (req, res, next) => {
    try {
      sendOk(res, await services.applications.listResources(parseId(req.params.id)));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
