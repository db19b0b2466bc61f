// =============================================================================
// Dashboard Types
// =============================================================================

export type GroupDimension = 'resourceType' | 'location' | 'environment';

export interface DashboardScope {
  subscriptionId?: number;
  resourceGroupId?: number;
  location?: string;
  environment?: string;
}

export interface GroupCount {
  label: string;
  count: number;
}

export interface SummaryEntry {
  label: string;
  count: number;
  percentage: number;
}

/** Synthetic figures; there is no monitoring feed behind them. */
export interface HealthSummary {
  healthy: number;
  warning: number;
  critical: number;
}

/** Synthetic figures; there is no billing feed behind them. */
export interface CostSummary {
  estimatedMonthlyCost: number;
  topCostDriver: string;
}

export interface DashboardSummary {
  totalResources: number;
  totalSubscriptions: number;
  totalResourceGroups: number;
  totalLocations: number;
  resourceTypes: SummaryEntry[];
  locations: SummaryEntry[];
  environments: SummaryEntry[];
  healthSummary: HealthSummary;
  costSummary: CostSummary;
}

export interface ResourceStatistics {
  byType: GroupCount[];
  byLocation: GroupCount[];
  byEnvironment: GroupCount[];
}

// -----------------------------------------------------------------------------
// Tag index
// -----------------------------------------------------------------------------

export interface TagUsage {
  key: string;
  value: string;
  count: number;
}

export interface TagIndex {
  tagValuesByKey: Map<string, Set<string>>;
  popularTags: TagUsage[];
}

export interface TagSuggestion {
  key: string;
  value: string;
  display: string;
}
