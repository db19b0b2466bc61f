import dotenv from 'dotenv';
import path from 'path';
dotenv.config({ path: path.resolve(__dirname, '.env') });

import fs from 'fs/promises';
import { loadConfig } from './lib/config';
import { createPool, runMigrations } from './db';
import { createCatalogServices } from './services/catalog';
import { InventoryImporter } from './services/importer';
import { createPostgresStores } from './services/stores/postgres';

// Run via: tsx server/import.ts path/to/inventory.csv
async function main(): Promise<void> {
  const csvPath = process.argv[2];
  if (!csvPath) {
    console.error('[Import] Usage: import <csv-file>');
    process.exit(1);
  }

  const config = loadConfig();
  const pool = createPool(config.databaseUrl);
  const stores = createPostgresStores(pool);

  try {
    await runMigrations(pool);
    const csvText = await fs.readFile(path.resolve(csvPath), 'utf-8');
    console.log(`[Import] Reading ${csvPath}`);

    const report = await new InventoryImporter(createCatalogServices(stores, config.fullScanLimit)).importCsv(csvText);
    console.log(
      `[Import] Subscriptions created: ${report.subscriptionsCreated}, ` +
        `resource groups created: ${report.resourceGroupsCreated}, ` +
        `applications created: ${report.applicationsCreated}`
    );
  } finally {
    await stores.close();
  }
}

main().catch((error) => {
  console.error('[Import] Import failed:', error);
  process.exit(1);
});
