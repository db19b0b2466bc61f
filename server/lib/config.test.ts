import { describe, it, expect } from 'vitest';
import { loadConfig, MAX_SCAN_LIMIT } from './config';
import { InvalidInputError } from './errors';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      databaseUrl: 'postgresql://localhost:5432/resource_catalog',
      corsOrigins: ['http://localhost:5173', 'http://localhost:3000'],
      store: 'postgres',
      rateLimitMax: 100,
      fullScanLimit: MAX_SCAN_LIMIT,
    });
  });

  it('parses and trims provided values', () => {
    const config = loadConfig({
      PORT: '8080',
      CORS_ORIGINS: ' https://a.example , https://b.example ,',
      CATALOG_STORE: 'memory',
      FULL_SCAN_LIMIT: '500',
    });
    expect(config.port).toBe(8080);
    expect(config.corsOrigins).toEqual(['https://a.example', 'https://b.example']);
    expect(config.store).toBe('memory');
    expect(config.fullScanLimit).toBe(500);
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ PORT: '  ', DATABASE_URL: '' }).port).toBe(3001);
  });

  it('rejects invalid values with the offending key', () => {
    expect(() => loadConfig({ CATALOG_STORE: 'sqlite' })).toThrow(InvalidInputError);
    expect(() => loadConfig({ FULL_SCAN_LIMIT: '100001' })).toThrow(/FULL_SCAN_LIMIT/);
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/PORT/);
  });
});
