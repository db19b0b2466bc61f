// =============================================================================
// Resources API Routes
// =============================================================================

import { Router } from 'express';
import { z } from 'zod';
import { ResourceFilters } from '../types/query';
import { CatalogServices } from '../services/catalog';
import {
  createResourceBodySchema,
  linkApplicationBodySchema,
  parseId,
  relationQuerySchema,
  resourceQuerySchema,
  updateResourceBodySchema,
  validateBody,
  validateQuery,
} from '../src/middleware/validation';
import { sendCreated, sendNoContent, sendOk, sendPage } from './responses';

type ResourceQuery = z.output<typeof resourceQuerySchema>;

function toFilters(q: ResourceQuery): ResourceFilters {
  return {
    resourceType: q.type,
    location: q.location,
    environment: q.environment,
    vendor: q.vendor,
    subscriptionId: q.subscriptionId,
    resourceGroupId: q.resourceGroupId,
    search: q.search,
    tags: q.tags,
  };
}

export function resourcesRouter(services: CatalogServices): Router {
  const router = Router();

  // GET /api/v1/resources: filtered, sorted, paginated query
  router.get('/', validateQuery(resourceQuerySchema), async (req, res, next) => {
    try {
      const q = req.query;
      const result = await services.resources.query(
        toFilters(q),
        { field: q.sortField, direction: q.sortDirection },
        { page: q.page, size: q.size }
      );
      sendPage(res, result);
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/resources/all: every match up to the scan cap, unpaginated
  router.get('/all', validateQuery(resourceQuerySchema), async (req, res, next) => {
    try {
      sendOk(res, await services.resources.listAll(toFilters(req.query)));
    } catch (error) {
      next(error);
    }
  });

  // POST /api/v1/resources
  router.post('/', validateBody(createResourceBodySchema), async (req, res, next) => {
    try {
      const resource = await services.resources.create(req.body);
      sendCreated(res, resource, 'Resource created');
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/resources/stats: counts by type, location, environment
  router.get('/stats', async (_req, res, next) => {
    try {
      sendOk(res, await services.resources.statistics());
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/resources/types: distinct resource types
  router.get('/types', async (_req, res, next) => {
    try {
      sendOk(res, await services.resources.distinctTypes());
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req, res, next) => {
    try {
      sendOk(res, await services.resources.get(parseId(req.params.id)));
    } catch (error) {
      next(error);
    }
  });

  router.put('/:id', validateBody(updateResourceBodySchema), async (req, res, next) => {
    try {
      const resource = await services.resources.update(parseId(req.params.id), req.body);
      sendOk(res, resource, 'Resource updated');
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', async (req, res, next) => {
    try {
      await services.resources.delete(parseId(req.params.id));
      sendNoContent(res);
    } catch (error) {
      next(error);
    }
  });

  // POST /api/v1/resources/:id/applications: link to an application
  router.post('/:id/applications', validateBody(linkApplicationBodySchema), async (req, res, next) => {
    try {
      const link = await services.applications.linkResource(
        parseId(req.params.id),
        req.body.applicationId,
        req.body.relationType
      );
      sendCreated(res, link, 'Resource linked to application');
    } catch (error) {
      next(error);
    }
  });

  // DELETE /api/v1/resources/:id/applications/:applicationId?relationType=
  router.delete('/:id/applications/:applicationId', validateQuery(relationQuerySchema), async (req, res, next) => {
    try {
      await services.applications.unlinkResource(
        parseId(req.params.id),
        parseId(req.params.applicationId, 'applicationId'),
        req.query.relationType
      );
      sendNoContent(res);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
