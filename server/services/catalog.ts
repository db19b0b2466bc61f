import { CatalogStores } from '../types/stores';
import { MAX_SCAN_LIMIT } from '../lib/config';
import { ApplicationService } from './applications';
import { DashboardService } from './dashboard';
import { ResourceGroupService } from './resource-groups';
import { ResourceService } from './resources';
import { SubscriptionService } from './subscriptions';
import { TagService } from './tag-index';

export interface CatalogServices {
  stores: CatalogStores;
  resources: ResourceService;
  subscriptions: SubscriptionService;
  resourceGroups: ResourceGroupService;
  applications: ApplicationService;
  dashboard: DashboardService;
  tags: TagService;
}

export function createCatalogServices(
  stores: CatalogStores,
  fullScanLimit: number = MAX_SCAN_LIMIT
): CatalogServices {
  return {
    stores,
    resources: new ResourceService(stores, fullScanLimit),
    subscriptions: new SubscriptionService(stores),
    resourceGroups: new ResourceGroupService(stores),
    applications: new ApplicationService(stores),
    dashboard: new DashboardService(stores),
    tags: new TagService(stores.resources, fullScanLimit),
  };
}
