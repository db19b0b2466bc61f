// =============================================================================
// Catalog Configuration
// =============================================================================

import { z } from 'zod';
import { InvalidInputError } from './errors';

export const MAX_SCAN_LIMIT = 100_000;

const DEFAULT_DATABASE_URL = 'postgresql://localhost:5432/resource_catalog';
const DEFAULT_CORS_ORIGINS = 'http://localhost:5173,http://localhost:3000';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  DATABASE_URL: z.string().min(1).default(DEFAULT_DATABASE_URL),
  CORS_ORIGINS: z.string().default(DEFAULT_CORS_ORIGINS),
  CATALOG_STORE: z.enum(['postgres', 'memory']).default('postgres'),
  RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(100),
  FULL_SCAN_LIMIT: z.coerce.number().int().min(1).max(MAX_SCAN_LIMIT).default(MAX_SCAN_LIMIT),
});

export interface CatalogConfig {
  port: number;
  databaseUrl: string;
  corsOrigins: string[];
  store: 'postgres' | 'memory';
  rateLimitMax: number;
  fullScanLimit: number;
}

/**
 * Build the typed configuration from environment variables. Empty strings count
 * as unset so that `PORT=` in a .env file falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CatalogConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') present[key] = value;
  }

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new InvalidInputError(`configuration: ${details}`);
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    corsOrigins: parsed.CORS_ORIGINS.split(',')
      .map((o) => o.trim())
      .filter((o) => o.length > 0),
    store: parsed.CATALOG_STORE,
    rateLimitMax: parsed.RATE_LIMIT_MAX,
    fullScanLimit: parsed.FULL_SCAN_LIMIT,
  };
}
