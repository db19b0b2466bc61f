// =============================================================================
// Express Application Factory
// =============================================================================

import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { CatalogServices } from '../services/catalog';
import { CatalogConfig } from '../lib/config';
import { CatalogCounts } from '../types/catalog';
import { resourcesRouter } from '../routes/resources';
import { subscriptionsRouter } from '../routes/subscriptions';
import { resourceGroupsRouter } from '../routes/resource-groups';
import { applicationsRouter } from '../routes/applications';
import { dashboardRouter, tagsRouter } from '../routes/dashboard';
import { sendOk } from '../routes/responses';
import { requestLogger } from './middleware/request-logger';
import { errorHandler, notFoundHandler } from './middleware/error-handler';

export type AppConfig = Pick<CatalogConfig, 'corsOrigins' | 'rateLimitMax'>;

export function createApp(services: CatalogServices, config: AppConfig): Express {
  const app = express();

  // ===========================================================================
  // Middleware Stack
  // ===========================================================================

  app.use(helmet());
  app.use(
    cors({
      origin: config.corsOrigins,
      methods: ['GET', 'POST', 'PUT', 'DELETE'],
      allowedHeaders: ['Content-Type'],
    })
  );
  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  app.use(
    '/api/',
    rateLimit({
      windowMs: 60 * 1000, // 1 minute
      max: config.rateLimitMax,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'Too many requests, please try again later' },
    })
  );

  // ===========================================================================
  // Routes
  // ===========================================================================

  app.get('/', (_req, res) => {
    res.json({ name: 'Resource Catalog API', status: 'running' });
  });

  app.get('/health', async (_req, res, next) => {
    try {
      await services.stores.resources.ping();
      res.json({ status: 'ok', timestamp: new Date().toISOString(), uptime: process.uptime() });
    } catch (error) {
      next(error);
    }
  });

  app.get('/stats', async (_req, res, next) => {
    try {
      const [totalResources, totalSubscriptions, totalResourceGroups, totalApplications] = await Promise.all([
        services.stores.resources.countAll(),
        services.stores.subscriptions.countAll(),
        services.stores.resourceGroups.countAll(),
        services.stores.applications.countAll(),
      ]);
      const counts: CatalogCounts = { totalResources, totalSubscriptions, totalResourceGroups, totalApplications };
      sendOk(res, counts);
    } catch (error) {
      next(error);
    }
  });

  app.use('/api/v1/resources', resourcesRouter(services));
  app.use('/api/v1/subscriptions', subscriptionsRouter(services));
  app.use('/api/v1/resource-groups', resourceGroupsRouter(services));
  app.use('/api/v1/applications', applicationsRouter(services));
  app.use('/api/v1/dashboard', dashboardRouter(services));
  app.use('/api/v1/tags', tagsRouter(services));

  // Error handling (must be after routes)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
