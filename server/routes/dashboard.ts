// =============================================================================
// Dashboard & Tag Discovery Routes
// =============================================================================

import { Router } from 'express';
import { CatalogServices } from '../services/catalog';
import { dashboardQuerySchema, tagSuggestionQuerySchema, validateQuery } from '../src/middleware/validation';
import { sendOk } from './responses';

export function dashboardRouter(services: CatalogServices): Router {
  const router = Router();

  // GET /api/v1/dashboard/summary?subscriptionId=&resourceGroupId=&location=&environment=
  router.get('/summary', validateQuery(dashboardQuerySchema), async (req, res, next) => {
    try {
      sendOk(res, await services.dashboard.summarize(req.query));
    } catch (error) {
      next(error);
    }
  });

  return router;
}

export function tagsRouter(services: CatalogServices): Router {
  const router = Router();

  // GET /api/v1/tags: key→values index and popular pairs
  router.get('/', async (_req, res, next) => {
    try {
      const index = await services.tags.index();
      // Map/Set do not serialize; send plain objects with sorted values
      const tagValuesByKey: Record<string, string[]> = {};
      for (const [key, values] of index.tagValuesByKey) {
        tagValuesByKey[key] = [...values].sort();
      }
      sendOk(res, { tagValuesByKey, popularTags: index.popularTags });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/tags/suggestions?q=
  router.get('/suggestions', validateQuery(tagSuggestionQuerySchema), async (req, res, next) => {
    try {
      sendOk(res, await services.tags.suggest(req.query.q));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
