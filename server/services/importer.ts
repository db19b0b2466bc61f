// =============================================================================
// Inventory CSV Importer
// Reads a resource-graph export and loads it through the use cases. Name→id
// lookups are cached per run only.
// =============================================================================

import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { TagMap } from '../types/catalog';
import { InvalidInputError } from '../lib/errors';
import type { CatalogServices } from './catalog';

const csvRowSchema = z.object({
  Name: z.string().trim().min(1),
  Type: z.string().trim().min(1),
  kind: z.string().optional(),
  Location: z.string().trim().min(1),
  Subscription: z.string().trim().min(1),
  'Resource group': z.string().trim().min(1),
  Tags: z.string().default(''),
  extendedLocation: z.string().optional(),
});

type CsvRow = z.infer<typeof csvRowSchema>;

export interface ImportReport {
  processed: number;
  imported: number;
  skipped: number;
  subscriptionsCreated: number;
  resourceGroupsCreated: number;
  applicationsCreated: number;
}

const OWNER_TAGS = ['AdminName', 'AdminName1', 'AdminName2'];

/**
 * Decode the Tags column. `null` and empty mean no tags; non-string values
 * are kept as their JSON text. Returns null when the column is not a JSON object.
 */
export function parseCsvTags(raw: string): TagMap | null {
  const text = raw.trim();
  if (text === '' || text === 'null') return {};

  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof decoded !== 'object' || decoded === null || Array.isArray(decoded)) return null;

  const tags: TagMap = {};
  for (const [key, value] of Object.entries(decoded)) {
    if (typeof value === 'string') {
      tags[key] = value;
    } else if (value !== null) {
      tags[key] = JSON.stringify(value);
    }
  }
  return tags;
}

function optionalColumn(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === '' || trimmed === 'null' ? undefined : trimmed;
}

export class InventoryImporter {
  private readonly subscriptionIds = new Map<string, number>();
  private readonly resourceGroupIds = new Map<string, number>();
  private readonly applicationIds = new Map<string, number>();
  private report: ImportReport = InventoryImporter.emptyReport();

  constructor(private readonly services: CatalogServices) {}

  private static emptyReport(): ImportReport {
    return {
      processed: 0,
      imported: 0,
      skipped: 0,
      subscriptionsCreated: 0,
      resourceGroupsCreated: 0,
      applicationsCreated: 0,
    };
  }

  async importCsv(csvText: string): Promise<ImportReport> {
    this.subscriptionIds.clear();
    this.resourceGroupIds.clear();
    this.applicationIds.clear();
    this.report = InventoryImporter.emptyReport();

    let records: unknown;
    try {
      records = parse(csvText, { columns: true, skip_empty_lines: true, bom: true });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new InvalidInputError(`CSV could not be parsed: ${message}`);
    }
    const rows = z.array(z.unknown()).parse(records);

    for (const [index, raw] of rows.entries()) {
      this.report.processed++;
      const line = index + 2; // header is line 1

      const row = csvRowSchema.safeParse(raw);
      if (!row.success) {
        this.report.skipped++;
        console.warn(`[Import] Line ${line}: missing required columns, skipped`);
        continue;
      }

      const tags = parseCsvTags(row.data.Tags);
      if (!tags) {
        this.report.skipped++;
        console.warn(`[Import] Line ${line}: unparseable Tags column, skipped`);
        continue;
      }

      await this.importRow(row.data, tags);
      this.report.imported++;

      if (this.report.processed % 100 === 0) {
        console.log(`[Import] Processed ${this.report.processed} records`);
      }
    }

    console.log(
      `[Import] Done: ${this.report.imported} imported, ${this.report.skipped} skipped of ${this.report.processed}`
    );
    return { ...this.report };
  }

  private async importRow(row: CsvRow, tags: TagMap): Promise<void> {
    const subscriptionId = await this.subscriptionFor(row.Subscription);
    const resourceGroupId = await this.resourceGroupFor(row['Resource group'], subscriptionId);

    const resource = await this.services.resources.create({
      name: row.Name,
      resourceType: row.Type,
      kind: optionalColumn(row.kind),
      location: row.Location,
      subscriptionId,
      resourceGroupId,
      tags,
      extendedLocation: optionalColumn(row.extendedLocation),
      vendor: tags.Vendor,
      environment: tags.Environment,
      provisioner: tags.Provisioner,
    });

    const appCode = optionalColumn(tags.AppID);
    if (appCode) {
      const applicationId = await this.applicationFor(appCode, tags);
      await this.services.applications.linkResource(resource.id, applicationId);
    }
  }

  private async subscriptionFor(name: string): Promise<number> {
    const cached = this.subscriptionIds.get(name);
    if (cached !== undefined) return cached;

    const existing = await this.services.stores.subscriptions.findByName(name);
    const subscription = existing ?? (await this.services.subscriptions.create({ name }));
    if (!existing) this.report.subscriptionsCreated++;

    this.subscriptionIds.set(name, subscription.id);
    return subscription.id;
  }

  private async resourceGroupFor(name: string, subscriptionId: number): Promise<number> {
    const key = `${subscriptionId}/${name}`;
    const cached = this.resourceGroupIds.get(key);
    if (cached !== undefined) return cached;

    const existing = await this.services.stores.resourceGroups.findByNameAndSubscription(name, subscriptionId);
    const group = existing ?? (await this.services.resourceGroups.create({ name, subscriptionId }));
    if (!existing) this.report.resourceGroupsCreated++;

    this.resourceGroupIds.set(key, group.id);
    return group.id;
  }

  private async applicationFor(code: string, tags: TagMap): Promise<number> {
    const cached = this.applicationIds.get(code);
    if (cached !== undefined) return cached;

    const existing = await this.services.stores.applications.findByCode(code);
    let id: number;
    if (existing) {
      id = existing.id;
    } else {
      const owner = OWNER_TAGS.map((key) => tags[key]).find((value) => value !== undefined);
      const created = await this.services.applications.create({
        code,
        name: tags.AppName,
        // Admin tags sometimes hold a display name rather than an address
        ownerEmail: owner !== undefined && owner.includes('@') ? owner : undefined,
      });
      id = created.id;
      this.report.applicationsCreated++;
    }

    this.applicationIds.set(code, id);
    return id;
  }
}
