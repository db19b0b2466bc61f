import { describe, it, expect, beforeEach } from 'vitest';
import { createMemoryStores } from './memory';
import { CatalogStores } from '../../types/stores';
import { compileResourceQuery } from '../query/compiler';
import { BASE_TIME, SeededCatalog, seedCatalog, steppingClock } from '../../tests/fixtures/catalog';

describe('memory stores', () => {
  let stores: CatalogStores;
  let seeded: SeededCatalog;

  beforeEach(async () => {
    stores = createMemoryStores({ now: steppingClock() });
    seeded = await seedCatalog(stores);
  });

  describe('resources', () => {
    it('assigns ids and timestamps on create', async () => {
      const first = await stores.resources.findById(1);
      expect(first?.name).toBe('web-vm1');
      expect(first?.createdAt).toEqual(BASE_TIME);
      expect(first?.tags).toEqual({ Env: 'prod', Team: 'web' });
      expect(await stores.resources.findById(99)).toBeNull();
    });

    it('applies a compiled query with a filter-only total', async () => {
      const page = await stores.resources.query(
        compileResourceQuery({ location: 'westeurope' }, { field: 'name' }, { page: 1, size: 2 })
      );
      expect(page.total).toBe(3);
      expect(page.records.map((r) => r.name)).toEqual(['test-vm1', 'web-vm1']);
    });

    it('updates only the given fields and refreshes updatedAt', async () => {
      const before = await stores.resources.findById(2);
      const updated = await stores.resources.update(2, { vendor: 'fabrikam' });
      expect(updated.vendor).toBe('fabrikam');
      expect(updated.name).toBe('web-vm10');
      expect(updated.updatedAt.getTime()).toBeGreaterThan(before?.updatedAt.getTime() ?? Infinity);
    });

    it('looks up by subscription, group and application', async () => {
      const byDev = await stores.resources.findBySubscriptionId(seeded.subscriptionIds.dev);
      expect(byDev.map((r) => r.name)).toEqual(['test-vm1', 'scratch']);
      const byData = await stores.resources.findByResourceGroupId(seeded.groupIds.data);
      expect(byData.map((r) => r.name)).toEqual(['store-01']);

      const app = await stores.applications.create({ code: 'APP1' });
      await stores.applications.link({ resourceId: 3, applicationId: app.id, relationType: 'uses' });
      await stores.applications.link({ resourceId: 1, applicationId: app.id, relationType: 'uses' });
      const linked = await stores.resources.findByApplicationId(app.id);
      expect(linked.map((r) => r.id)).toEqual([1, 3]);
    });

    it('counts by dimension, labelling missing values Unknown', async () => {
      expect(await stores.resources.countBy('environment')).toEqual([
        { label: 'prod', count: 3 },
        { label: 'Unknown', count: 1 },
        { label: 'dev', count: 1 },
      ]);
      expect(await stores.resources.countBy('location', { subscriptionId: seeded.subscriptionIds.prod })).toEqual([
        { label: 'westeurope', count: 2 },
        { label: 'northeurope', count: 1 },
      ]);
    });

    it('lists distinct types and tag blobs', async () => {
      expect(await stores.resources.distinctTypes()).toEqual([
        'microsoft.compute/virtualmachines',
        'microsoft.storage/storageaccounts',
      ]);
      expect(await stores.resources.listTagBlobs(2)).toEqual([{ Env: 'prod', Team: 'web' }, { Env: 'prod' }]);
    });

    it('removes links when a resource is deleted', async () => {
      const app = await stores.applications.create({ code: 'APP1' });
      const link = { resourceId: 1, applicationId: app.id, relationType: 'uses' };
      await stores.applications.link(link);
      await stores.resources.delete(1);
      expect(await stores.applications.hasLink(link)).toBe(false);
      expect(await stores.resources.countAll()).toBe(4);
    });
  });

  describe('subscriptions and groups', () => {
    it('pages subscriptions ordered by name', async () => {
      const page = await stores.subscriptions.findAll({ offset: 0, limit: 1 });
      expect(page.total).toBe(2);
      expect(page.records.map((s) => s.name)).toEqual(['dev-sub']);
    });

    it('finds groups by name within a subscription', async () => {
      const found = await stores.resourceGroups.findByNameAndSubscription('rg-web', seeded.subscriptionIds.prod);
      expect(found?.id).toBe(seeded.groupIds.web);
      expect(await stores.resourceGroups.findByNameAndSubscription('rg-web', seeded.subscriptionIds.dev)).toBeNull();
      expect(await stores.resourceGroups.countBySubscription(seeded.subscriptionIds.prod)).toBe(2);
    });
  });

  describe('applications', () => {
    it('links idempotently and reports unlink results', async () => {
      const app = await stores.applications.create({ code: 'APP1', ownerEmail: 'owner@example.com' });
      const link = { resourceId: 2, applicationId: app.id, relationType: 'uses' };
      await stores.applications.link(link);
      await stores.applications.link(link);
      expect(await stores.resources.findByApplicationId(app.id)).toHaveLength(1);
      expect(await stores.applications.unlink(link)).toBe(true);
      expect(await stores.applications.unlink(link)).toBe(false);
    });

    it('finds by code and owner email', async () => {
      await stores.applications.create({ code: 'B', name: 'Billing', ownerEmail: 'team@example.com' });
      await stores.applications.create({ code: 'A', name: 'Accounts', ownerEmail: 'team@example.com' });
      expect((await stores.applications.findByCode('B'))?.name).toBe('Billing');
      const owned = await stores.applications.findByOwnerEmail('team@example.com');
      expect(owned.map((a) => a.name)).toEqual(['Accounts', 'Billing']);
    });
  });
});
