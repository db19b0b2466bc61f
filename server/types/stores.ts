// =============================================================================
// Store Contracts
// Implemented by the Postgres stores and the in-memory stores. Use cases check
// existence and uniqueness before calling a mutation here.
// =============================================================================

import {
  Application,
  CreateApplicationInput,
  CreateResourceGroupInput,
  CreateResourceInput,
  CreateSubscriptionInput,
  Page,
  Resource,
  ResourceApplicationLink,
  ResourceGroup,
  Subscription,
  UpdateApplicationInput,
  UpdateResourceGroupInput,
  UpdateResourceInput,
  UpdateSubscriptionInput,
} from './catalog';
import { DashboardScope, GroupCount, GroupDimension } from './dashboard';
import { QueryDescriptor } from './query';

export interface OffsetPage {
  offset: number;
  limit: number;
}

export interface ResourceStore {
  create(input: CreateResourceInput): Promise<Resource>;
  findById(id: number): Promise<Resource | null>;
  /** `total` counts every record matching `descriptor.where`, ignoring offset/limit. */
  query(descriptor: QueryDescriptor): Promise<Page<Resource>>;
  update(id: number, input: UpdateResourceInput): Promise<Resource>;
  delete(id: number): Promise<void>;
  findBySubscriptionId(subscriptionId: number): Promise<Resource[]>;
  findByResourceGroupId(resourceGroupId: number): Promise<Resource[]>;
  findByApplicationId(applicationId: number): Promise<Resource[]>;
  /** Grouped counts ordered by count descending, then label. */
  countBy(dimension: GroupDimension, scope?: DashboardScope): Promise<GroupCount[]>;
  distinctTypes(): Promise<string[]>;
  /** Raw tag blobs as persisted, oldest resource first. */
  listTagBlobs(limit: number): Promise<unknown[]>;
  countAll(): Promise<number>;
  ping(): Promise<void>;
}

export interface SubscriptionStore {
  create(input: CreateSubscriptionInput): Promise<Subscription>;
  findById(id: number): Promise<Subscription | null>;
  findByName(name: string): Promise<Subscription | null>;
  findAll(page: OffsetPage): Promise<Page<Subscription>>;
  update(id: number, input: UpdateSubscriptionInput): Promise<Subscription>;
  delete(id: number): Promise<void>;
  countAll(): Promise<number>;
}

export interface ResourceGroupStore {
  create(input: CreateResourceGroupInput): Promise<ResourceGroup>;
  findById(id: number): Promise<ResourceGroup | null>;
  findByNameAndSubscription(name: string, subscriptionId: number): Promise<ResourceGroup | null>;
  findBySubscriptionId(subscriptionId: number): Promise<ResourceGroup[]>;
  findAll(page: OffsetPage): Promise<Page<ResourceGroup>>;
  update(id: number, input: UpdateResourceGroupInput): Promise<ResourceGroup>;
  delete(id: number): Promise<void>;
  countAll(): Promise<number>;
  countBySubscription(subscriptionId: number): Promise<number>;
}

export interface ApplicationStore {
  create(input: CreateApplicationInput): Promise<Application>;
  findById(id: number): Promise<Application | null>;
  findByCode(code: string): Promise<Application | null>;
  findByOwnerEmail(ownerEmail: string): Promise<Application[]>;
  findAll(page: OffsetPage): Promise<Page<Application>>;
  update(id: number, input: UpdateApplicationInput): Promise<Application>;
  delete(id: number): Promise<void>;
  countAll(): Promise<number>;
  link(link: ResourceApplicationLink): Promise<void>;
  /** Returns false when no such link existed. */
  unlink(link: ResourceApplicationLink): Promise<boolean>;
  hasLink(link: ResourceApplicationLink): Promise<boolean>;
}

export interface CatalogStores {
  resources: ResourceStore;
  subscriptions: SubscriptionStore;
  resourceGroups: ResourceGroupStore;
  applications: ApplicationStore;
  close(): Promise<void>;
}
