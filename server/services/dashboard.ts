// =============================================================================
// Dashboard Aggregation
// Grouped counts by type, location and environment, optionally narrowed by a
// scope. The reads are issued independently, so a dashboard taken during
// concurrent writes may mix before/after counts.
// =============================================================================

import {
  CostSummary,
  DashboardScope,
  DashboardSummary,
  GroupCount,
  HealthSummary,
  SummaryEntry,
} from '../types/dashboard';
import { CatalogStores } from '../types/stores';
import { hasScope } from './query/compiler';

const HEALTHY_SHARE = 0.85;
const WARNING_SHARE = 0.1;
const CRITICAL_SHARE = 0.05;
const COST_PER_RESOURCE = 12.5;

/** Percentage rounded to single precision; 0 when there is nothing to divide by. */
export function percentage(count: number, total: number): number {
  if (total === 0) return 0;
  return Math.fround((count / total) * 100);
}

export function toSummaryEntries(counts: GroupCount[], total: number): SummaryEntry[] {
  return counts.map(({ label, count }) => ({ label, count, percentage: percentage(count, total) }));
}

/** Placeholder health split; not backed by any monitoring data. */
export function mockHealthSummary(totalResources: number): HealthSummary {
  return {
    healthy: Math.trunc(totalResources * HEALTHY_SHARE),
    warning: Math.trunc(totalResources * WARNING_SHARE),
    critical: Math.trunc(totalResources * CRITICAL_SHARE),
  };
}

/** Placeholder cost estimate; not backed by any billing data. */
export function mockCostSummary(totalResources: number): CostSummary {
  return {
    estimatedMonthlyCost: totalResources * COST_PER_RESOURCE,
    topCostDriver: totalResources > 0 ? 'Virtual Machines' : 'N/A',
  };
}

export class DashboardService {
  constructor(private readonly stores: CatalogStores) {}

  async summarize(scope: DashboardScope = {}): Promise<DashboardSummary> {
    const scoped = hasScope(scope);
    const effectiveScope = scoped ? scope : undefined;

    const [types, locations, environments] = await Promise.all([
      this.stores.resources.countBy('resourceType', effectiveScope),
      this.stores.resources.countBy('location', effectiveScope),
      this.stores.resources.countBy('environment', effectiveScope),
    ]);

    const totalResources = types.reduce((sum, entry) => sum + entry.count, 0);
    const { totalSubscriptions, totalResourceGroups } = await this.ownershipTotals(scope, scoped);

    return {
      totalResources,
      totalSubscriptions,
      totalResourceGroups,
      totalLocations: locations.length,
      resourceTypes: toSummaryEntries(types, totalResources),
      locations: toSummaryEntries(locations, totalResources),
      environments: toSummaryEntries(environments, totalResources),
      healthSummary: mockHealthSummary(totalResources),
      costSummary: mockCostSummary(totalResources),
    };
  }

  private async ownershipTotals(
    scope: DashboardScope,
    scoped: boolean
  ): Promise<{ totalSubscriptions: number; totalResourceGroups: number }> {
    if (!scoped) {
      const [totalSubscriptions, totalResourceGroups] = await Promise.all([
        this.stores.subscriptions.countAll(),
        this.stores.resourceGroups.countAll(),
      ]);
      return { totalSubscriptions, totalResourceGroups };
    }

    // A resource group implies exactly one subscription
    const totalSubscriptions =
      scope.subscriptionId !== undefined || scope.resourceGroupId !== undefined
        ? 1
        : await this.stores.subscriptions.countAll();

    let totalResourceGroups: number;
    if (scope.resourceGroupId !== undefined) {
      totalResourceGroups = 1;
    } else if (scope.subscriptionId !== undefined) {
      totalResourceGroups = await this.stores.resourceGroups.countBySubscription(scope.subscriptionId);
    } else {
      totalResourceGroups = await this.stores.resourceGroups.countAll();
    }

    return { totalSubscriptions, totalResourceGroups };
  }
}
