import { Pool } from 'pg';
import { CatalogStores } from '../../../types/stores';
import { PostgresApplicationStore } from './application-store';
import { PostgresResourceGroupStore } from './resource-group-store';
import { PostgresResourceStore } from './resource-store';
import { PostgresSubscriptionStore } from './subscription-store';

export { PostgresApplicationStore, PostgresResourceGroupStore, PostgresResourceStore, PostgresSubscriptionStore };

export function createPostgresStores(pool: Pool): CatalogStores {
  return {
    resources: new PostgresResourceStore(pool),
    subscriptions: new PostgresSubscriptionStore(pool),
    resourceGroups: new PostgresResourceGroupStore(pool),
    applications: new PostgresApplicationStore(pool),
    close: () => pool.end(),
  };
}
