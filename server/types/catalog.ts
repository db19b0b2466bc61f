// =============================================================================
// Catalog Domain Types
// =============================================================================

export type TagMap = Record<string, string>;

export interface Subscription {
  id: number;
  name: string;
  tenantId: string | null;
}

export interface ResourceGroup {
  id: number;
  name: string;
  subscriptionId: number;
}

export interface Application {
  id: number;
  code: string | null;
  name: string | null;
  ownerTeam: string | null;
  ownerEmail: string | null;
}

export interface Resource {
  id: number;
  externalId: string | null;
  name: string;
  resourceType: string;
  kind: string | null;
  location: string;
  subscriptionId: number;
  resourceGroupId: number;
  tags: TagMap;
  extendedLocation: string | null;
  vendor: string | null;
  environment: string | null;
  provisioner: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export const DEFAULT_RELATION_TYPE = 'uses';

export interface ResourceApplicationLink {
  resourceId: number;
  applicationId: number;
  relationType: string;
}

// -----------------------------------------------------------------------------
// Create / partial-update inputs
// Every field present on an update overwrites; absent fields are left alone.
// -----------------------------------------------------------------------------

export interface CreateSubscriptionInput {
  name: string;
  tenantId?: string;
}

export type UpdateSubscriptionInput = Partial<CreateSubscriptionInput>;

export interface CreateResourceGroupInput {
  name: string;
  subscriptionId: number;
}

export type UpdateResourceGroupInput = Partial<CreateResourceGroupInput>;

export interface CreateApplicationInput {
  code?: string;
  name?: string;
  ownerTeam?: string;
  ownerEmail?: string;
}

export type UpdateApplicationInput = CreateApplicationInput;

export interface CreateResourceInput {
  externalId?: string;
  name: string;
  resourceType: string;
  kind?: string;
  location: string;
  subscriptionId: number;
  resourceGroupId: number;
  tags?: TagMap;
  extendedLocation?: string;
  vendor?: string;
  environment?: string;
  provisioner?: string;
}

export type UpdateResourceInput = Partial<CreateResourceInput>;

export interface Page<T> {
  records: T[];
  total: number;
}

export interface CatalogCounts {
  totalResources: number;
  totalSubscriptions: number;
  totalResourceGroups: number;
  totalApplications: number;
}
