import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InventoryImporter, parseCsvTags } from './importer';
import { createCatalogServices, CatalogServices } from './catalog';
import { createMemoryStores } from './stores/memory';
import { InvalidInputError } from '../lib/errors';

const HEADER = 'Name,Type,kind,Location,Subscription,Resource group,Tags,extendedLocation';

function csv(...lines: string[]): string {
  return [HEADER, ...lines].join('\n');
}

describe('parseCsvTags', () => {
  it('treats empty and null as no tags', () => {
    expect(parseCsvTags('')).toEqual({});
    expect(parseCsvTags(' null ')).toEqual({});
  });

  it('keeps non-string values as JSON text and drops nulls', () => {
    expect(parseCsvTags('{"Env":"prod","Cost":12,"Gone":null}')).toEqual({ Env: 'prod', Cost: '12' });
  });

  it('returns null for text that is not a JSON object', () => {
    expect(parseCsvTags('{broken')).toBeNull();
    expect(parseCsvTags('["a"]')).toBeNull();
  });
});

describe('InventoryImporter', () => {
  let services: CatalogServices;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    services = createCatalogServices(createMemoryStores());
  });

  it('creates owners once and derives attributes from tags', async () => {
    const text = csv(
      'vm-a,microsoft.compute/virtualmachines,,westeurope,prod-sub,rg-web,"{""Environment"":""prod"",""Vendor"":""contoso""}",',
      'vm-b,microsoft.compute/virtualmachines,null,westeurope,prod-sub,rg-web,,'
    );

    const report = await new InventoryImporter(services).importCsv(text);

    expect(report).toEqual({
      processed: 2,
      imported: 2,
      skipped: 0,
      subscriptionsCreated: 1,
      resourceGroupsCreated: 1,
      applicationsCreated: 0,
    });
    const vmA = await services.resources.get(1);
    expect(vmA).toMatchObject({ name: 'vm-a', environment: 'prod', vendor: 'contoso', kind: null });
    expect(vmA.tags).toEqual({ Environment: 'prod', Vendor: 'contoso' });
    expect((await services.resources.get(2)).kind).toBeNull();
  });

  it('reuses owners that already exist', async () => {
    const sub = await services.subscriptions.create({ name: 'prod-sub' });
    await services.resourceGroups.create({ name: 'rg-web', subscriptionId: sub.id });

    const report = await new InventoryImporter(services).importCsv(
      csv('vm-a,microsoft.compute/virtualmachines,,westeurope,prod-sub,rg-web,,')
    );

    expect(report.subscriptionsCreated).toBe(0);
    expect(report.resourceGroupsCreated).toBe(0);
    expect((await services.resources.get(1)).subscriptionId).toBe(sub.id);
  });

  it('links resources to the application named in their tags', async () => {
    const tags = '"{""AppID"":""PAY"",""AppName"":""Payments"",""AdminName"":""pay@example.com""}"';
    const report = await new InventoryImporter(services).importCsv(
      csv(
        `vm-a,microsoft.compute/virtualmachines,,westeurope,prod-sub,rg-web,${tags},`,
        `vm-b,microsoft.compute/virtualmachines,,westeurope,prod-sub,rg-web,${tags},`
      )
    );

    expect(report.applicationsCreated).toBe(1);
    const app = await services.applications.getByCode('PAY');
    expect(app).toMatchObject({ name: 'Payments', ownerEmail: 'pay@example.com' });
    expect((await services.applications.listResources(app.id)).map((r) => r.name)).toEqual(['vm-a', 'vm-b']);
  });

  it('ignores admin tags that are not addresses', async () => {
    await new InventoryImporter(services).importCsv(
      csv('vm-a,t,,westeurope,s,g,"{""AppID"":""OPS"",""AdminName"":""Jane Ops""}",')
    );
    expect((await services.applications.getByCode('OPS')).ownerEmail).toBeNull();
  });

  it('skips rows with missing columns or unparseable tags', async () => {
    const report = await new InventoryImporter(services).importCsv(
      csv(
        ',microsoft.compute/virtualmachines,,westeurope,prod-sub,rg-web,,',
        'vm-b,microsoft.compute/virtualmachines,,westeurope,prod-sub,rg-web,{broken,',
        'vm-c,microsoft.compute/virtualmachines,,westeurope,prod-sub,rg-web,,'
      )
    );

    expect(report).toMatchObject({ processed: 3, imported: 1, skipped: 2 });
    expect(console.warn).toHaveBeenCalledWith('[Import] Line 2: missing required columns, skipped');
    expect(console.warn).toHaveBeenCalledWith('[Import] Line 3: unparseable Tags column, skipped');
  });

  it('skips rows whose required columns are only whitespace and keeps going', async () => {
    const report = await new InventoryImporter(services).importCsv(
      csv(
        'vm-a,microsoft.compute/virtualmachines,,westeurope,prod-sub,rg-web,,',
        '"   ",microsoft.compute/virtualmachines,,westeurope,prod-sub,rg-web,,',
        'vm-c,microsoft.compute/virtualmachines,,  ,prod-sub,rg-web,,',
        'vm-d,microsoft.compute/virtualmachines,,westeurope,prod-sub,rg-web,,'
      )
    );

    expect(report).toMatchObject({ processed: 4, imported: 2, skipped: 2 });
    expect(console.warn).toHaveBeenCalledWith('[Import] Line 3: missing required columns, skipped');
    expect(console.warn).toHaveBeenCalledWith('[Import] Line 4: missing required columns, skipped');
    expect((await services.resources.get(2)).name).toBe('vm-d');
  });

  it('rejects text that is not CSV', async () => {
    await expect(
      new InventoryImporter(services).importCsv(`${HEADER}\n"unterminated,a,b`)
    ).rejects.toBeInstanceOf(InvalidInputError);
  });
});
