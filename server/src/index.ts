import dotenv from 'dotenv';
import path from 'path';
dotenv.config({ path: path.resolve(__dirname, '../.env') });

import { createServer } from 'http';
import { loadConfig } from '../lib/config';
import { createPool, runMigrations } from '../db';
import { createCatalogServices } from '../services/catalog';
import { createMemoryStores } from '../services/stores/memory';
import { createPostgresStores } from '../services/stores/postgres';
import { CatalogStores } from '../types/stores';
import { createApp } from './app';

// =============================================================================
// Server Startup
// =============================================================================

async function openStores(store: 'postgres' | 'memory', databaseUrl: string): Promise<CatalogStores> {
  if (store === 'memory') {
    console.log('[Server] Using in-memory catalog store');
    return createMemoryStores();
  }
  const pool = createPool(databaseUrl);
  await runMigrations(pool);
  return createPostgresStores(pool);
}

async function startServer(): Promise<void> {
  const config = loadConfig();
  const stores = await openStores(config.store, config.databaseUrl);
  const services = createCatalogServices(stores, config.fullScanLimit);
  const httpServer = createServer(createApp(services, config));

  // ===========================================================================
  // Graceful Shutdown
  // ===========================================================================

  function gracefulShutdown(signal: string): void {
    console.log(`\n[Server] Received ${signal}. Shutting down gracefully...`);

    httpServer.close(() => {
      console.log('[Server] HTTP server closed');
      stores
        .close()
        .then(() => {
          console.log('[Server] Store connections closed');
          process.exit(0);
        })
        .catch((err) => {
          console.error('[Server] Failed to close store:', err);
          process.exit(1);
        });
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('[Server] Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  }

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  httpServer.listen(config.port, () => {
    console.log(`[Server] Running on http://localhost:${config.port}`);
    console.log(`[Server] CORS origins: ${config.corsOrigins.join(', ')}`);
    console.log(`[Server] Store: ${config.store}`);
  });
}

startServer().catch((error) => {
  console.error('[Server] Failed to start:', error);
  process.exit(1);
});
