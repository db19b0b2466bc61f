import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Express } from 'express';
import request from 'supertest';
import { createApp } from '../../src/app';
import { createCatalogServices } from '../../services/catalog';
import { createMemoryStores } from '../../services/stores/memory';
import { seedCatalog, steppingClock } from '../fixtures/catalog';

// =============================================================================
// Catalog API over the in-memory store
// =============================================================================

describe('Catalog API', () => {
  let app: Express;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const stores = createMemoryStores({ now: steppingClock() });
    await seedCatalog(stores);
    app = createApp(createCatalogServices(stores), {
      corsOrigins: ['http://localhost:5173'],
      rateLimitMax: 1000,
    });
  });

  // ---------------------------------------------------------------------------
  // Service endpoints
  // ---------------------------------------------------------------------------

  it('GET /health reports ok', async () => {
    const res = await request(app).get('/health').expect(200);
    expect(res.body.status).toBe('ok');
  });

  it('GET /stats returns catalog counts', async () => {
    const res = await request(app).get('/stats').expect(200);
    expect(res.body).toEqual({
      success: true,
      data: { totalResources: 5, totalSubscriptions: 2, totalResourceGroups: 3, totalApplications: 0 },
    });
  });

  it('answers unknown routes with 404', async () => {
    const res = await request(app).get('/api/v1/nothing-here').expect(404);
    expect(res.body).toEqual({ error: 'Not found' });
  });

  it('rejects malformed JSON bodies', async () => {
    const res = await request(app)
      .post('/api/v1/resources')
      .set('Content-Type', 'application/json')
      .send('{bad')
      .expect(400);
    expect(res.body).toEqual({ error: 'Malformed JSON body', code: 'INVALID_INPUT', status: 400 });
  });

  // ---------------------------------------------------------------------------
  // Resource queries
  // ---------------------------------------------------------------------------

  describe('GET /api/v1/resources', () => {
    it('pages in creation order by default', async () => {
      const res = await request(app).get('/api/v1/resources?page=2&size=2').expect(200);
      expect(res.body.data.map((r: { name: string }) => r.name)).toEqual(['store-01', 'test-vm1']);
      expect(res.body.pagination).toEqual({ page: 2, size: 2, total: 5, totalPages: 3 });
    });

    it('filters by type and sorts by a chosen field', async () => {
      const res = await request(app)
        .get('/api/v1/resources?type=virtualmachines&sortField=name&sortDirection=DESC')
        .expect(200);
      expect(res.body.data.map((r: { name: string }) => r.name)).toEqual(['web-vm10', 'web-vm1', 'test-vm1']);
    });

    it('OR-combines tag filters', async () => {
      const res = await request(app).get('/api/v1/resources?tags=Env:dev,Provisioner:terra').expect(200);
      expect(res.body.data.map((r: { name: string }) => r.name)).toEqual(['store-01', 'test-vm1']);
    });

    it('ranks exact name matches before prefix matches', async () => {
      const res = await request(app).get('/api/v1/resources?search=web-vm1').expect(200);
      expect(res.body.data.map((r: { name: string }) => r.name)).toEqual(['web-vm1', 'web-vm10']);
    });

    it('rejects unknown sort fields', async () => {
      const res = await request(app).get('/api/v1/resources?sortField=bogus').expect(400);
      expect(res.body).toEqual({
        error: 'Invalid input: unsupported sort field "bogus"',
        code: 'INVALID_INPUT',
        status: 400,
      });
    });

    it('rejects malformed ids in the query', async () => {
      const res = await request(app).get('/api/v1/resources?subscriptionId=abc').expect(400);
      expect(res.body.error).toBe('Validation error');
      expect(res.body.details[0].path).toBe('subscriptionId');
    });
  });

  it('GET /api/v1/resources/all returns every match unpaginated', async () => {
    const res = await request(app).get('/api/v1/resources/all?environment=prod').expect(200);
    expect(res.body.data.map((r: { name: string }) => r.name)).toEqual(['web-vm1', 'web-vm10', 'store-01']);
    expect(res.body.pagination).toBeUndefined();
  });

  it('GET /api/v1/subscriptions/by-name/:name looks a subscription up', async () => {
    const res = await request(app).get('/api/v1/subscriptions/by-name/dev-sub').expect(200);
    expect(res.body.data).toEqual({ id: 2, name: 'dev-sub', tenantId: null });

    const missing = await request(app).get('/api/v1/subscriptions/by-name/nope').expect(404);
    expect(missing.body.error).toBe('Entity not found: Subscription with id nope');
  });

  it('GET /api/v1/resources/stats and /types', async () => {
    const stats = await request(app).get('/api/v1/resources/stats').expect(200);
    expect(stats.body.data.byEnvironment[0]).toEqual({ label: 'prod', count: 3 });

    const types = await request(app).get('/api/v1/resources/types').expect(200);
    expect(types.body.data).toEqual(['microsoft.compute/virtualmachines', 'microsoft.storage/storageaccounts']);
  });

  // ---------------------------------------------------------------------------
  // Resource CRUD
  // ---------------------------------------------------------------------------

  describe('resource CRUD', () => {
    it('creates, updates and deletes a resource', async () => {
      const created = await request(app)
        .post('/api/v1/resources')
        .send({
          name: 'api-gw',
          resourceType: 'microsoft.network/applicationgateways',
          location: 'westeurope',
          subscriptionId: 1,
          resourceGroupId: 1,
          tags: { Env: 'prod' },
        })
        .expect(201);
      expect(created.body.message).toBe('Resource created');
      expect(created.body.data.id).toBe(6);

      const updated = await request(app).put('/api/v1/resources/6').send({ location: 'eastus' }).expect(200);
      expect(updated.body.data.location).toBe('eastus');
      expect(updated.body.data.name).toBe('api-gw');

      await request(app).delete('/api/v1/resources/6').expect(204);
      await request(app).get('/api/v1/resources/6').expect(404);
    });

    it('reports missing resources', async () => {
      const res = await request(app).get('/api/v1/resources/99').expect(404);
      expect(res.body).toEqual({ error: 'Entity not found: Resource with id 99', code: 'NOT_FOUND', status: 404 });
    });

    it('rejects non-numeric path ids', async () => {
      const res = await request(app).get('/api/v1/resources/abc').expect(400);
      expect(res.body.code).toBe('INVALID_INPUT');
    });

    it('refuses a group from another subscription', async () => {
      const res = await request(app)
        .post('/api/v1/resources')
        .send({ name: 'x', resourceType: 'vm', location: 'eastus', subscriptionId: 2, resourceGroupId: 1 })
        .expect(422);
      expect(res.body.code).toBe('BUSINESS_RULE_VIOLATION');
    });
  });

  // ---------------------------------------------------------------------------
  // Applications and links
  // ---------------------------------------------------------------------------

  it('links a resource to an application and back', async () => {
    const app1 = await request(app)
      .post('/api/v1/applications')
      .send({ code: 'PAY', ownerEmail: 'pay@example.com' })
      .expect(201);
    expect(app1.body.data.id).toBe(1);

    const link = await request(app).post('/api/v1/resources/1/applications').send({ applicationId: 1 }).expect(201);
    expect(link.body.data).toEqual({ resourceId: 1, applicationId: 1, relationType: 'uses' });
    await request(app).post('/api/v1/resources/1/applications').send({ applicationId: 1 }).expect(409);

    const linked = await request(app).get('/api/v1/applications/1/resources').expect(200);
    expect(linked.body.data.map((r: { name: string }) => r.name)).toEqual(['web-vm1']);

    const owned = await request(app).get('/api/v1/applications?ownerEmail=pay@example.com').expect(200);
    expect(owned.body.data).toHaveLength(1);
    expect(owned.body.pagination).toBeUndefined();

    await request(app).delete('/api/v1/resources/1/applications/1').expect(204);
    await request(app).delete('/api/v1/resources/1/applications/1').expect(404);
  });

  // ---------------------------------------------------------------------------
  // Subscriptions and resource groups
  // ---------------------------------------------------------------------------

  it('lists the groups of a subscription and guards deletion', async () => {
    const groups = await request(app).get('/api/v1/subscriptions/1/resource-groups').expect(200);
    expect(groups.body.data.map((g: { name: string }) => g.name)).toEqual(['rg-data', 'rg-web']);

    const res = await request(app).delete('/api/v1/subscriptions/2').expect(422);
    expect(res.body.error).toBe('Business rule violation: subscription 2 still has 1 resource group(s)');
  });

  it('rejects duplicate group names within a subscription', async () => {
    await request(app).post('/api/v1/resource-groups').send({ name: 'rg-web', subscriptionId: 1 }).expect(409);
    await request(app).post('/api/v1/resource-groups').send({ name: 'rg-web', subscriptionId: 2 }).expect(201);
  });

  // ---------------------------------------------------------------------------
  // Dashboard and tags
  // ---------------------------------------------------------------------------

  it('GET /api/v1/dashboard/summary honours the scope', async () => {
    const res = await request(app).get('/api/v1/dashboard/summary?subscriptionId=1').expect(200);
    expect(res.body.data.totalResources).toBe(3);
    expect(res.body.data.totalResourceGroups).toBe(2);
  });

  it('GET /api/v1/tags returns values per key and popular pairs', async () => {
    const res = await request(app).get('/api/v1/tags').expect(200);
    expect(res.body.data.tagValuesByKey.Env).toEqual(['dev', 'prod']);
    expect(res.body.data.popularTags[0]).toEqual({ key: 'Env', value: 'prod', count: 3 });
  });

  it('GET /api/v1/tags/suggestions matches keys and values', async () => {
    const res = await request(app).get('/api/v1/tags/suggestions?q=terra').expect(200);
    expect(res.body.data).toEqual([{ key: 'Provisioner', value: 'terraform', display: 'Provisioner:terraform' }]);
  });
});
