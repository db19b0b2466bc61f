// =============================================================================
// In-Memory Catalog Stores
// Process-local maps behind the same store contracts as Postgres. Queries run
// through the shared matcher so filtering and ordering agree with the SQL path.
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
} from '../../types/catalog';
import { DashboardScope, GroupCount, GroupDimension } from '../../types/dashboard';
import { QueryDescriptor } from '../../types/query';
import {
  ApplicationStore,
  CatalogStores,
  OffsetPage,
  ResourceGroupStore,
  ResourceStore,
  SubscriptionStore,
} from '../../types/stores';
import { DatabaseError } from '../../lib/errors';
import { compileScope } from '../query/compiler';
import { applyDescriptor, matchesAll } from '../query/matcher';

interface MemoryState {
  resources: Map<number, Resource>;
  subscriptions: Map<number, Subscription>;
  resourceGroups: Map<number, ResourceGroup>;
  applications: Map<number, Application>;
  links: ResourceApplicationLink[];
  nextId: { resource: number; subscription: number; resourceGroup: number; application: number };
  now: () => Date;
}

export interface MemoryStoreOptions {
  now?: () => Date;
}

function missingRow(entity: string, id: number): DatabaseError {
  // Use cases check existence first; reaching this means the row vanished in between
  return new DatabaseError(`${entity} ${id} does not exist`);
}

function pageOf<T>(rows: T[], page: OffsetPage): Page<T> {
  return { records: rows.slice(page.offset, page.offset + page.limit), total: rows.length };
}

function byText(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a < b ? -1 : 1;
}

function sameLink(a: ResourceApplicationLink, b: ResourceApplicationLink): boolean {
  return (
    a.resourceId === b.resourceId &&
    a.applicationId === b.applicationId &&
    a.relationType === b.relationType
  );
}

// -----------------------------------------------------------------------------
// Resources
// -----------------------------------------------------------------------------

export class MemoryResourceStore implements ResourceStore {
  constructor(private readonly state: MemoryState) {}

  async create(input: CreateResourceInput): Promise<Resource> {
    const now = this.state.now();
    const resource: Resource = {
      id: this.state.nextId.resource++,
      externalId: input.externalId ?? null,
      name: input.name,
      resourceType: input.resourceType,
      kind: input.kind ?? null,
      location: input.location,
      subscriptionId: input.subscriptionId,
      resourceGroupId: input.resourceGroupId,
      tags: { ...(input.tags ?? {}) },
      extendedLocation: input.extendedLocation ?? null,
      vendor: input.vendor ?? null,
      environment: input.environment ?? null,
      provisioner: input.provisioner ?? null,
      createdAt: now,
      updatedAt: now,
    };
    this.state.resources.set(resource.id, resource);
    return { ...resource };
  }

  async findById(id: number): Promise<Resource | null> {
    const resource = this.state.resources.get(id);
    return resource ? { ...resource } : null;
  }

  async query(descriptor: QueryDescriptor): Promise<Page<Resource>> {
    const { records, total } = applyDescriptor([...this.state.resources.values()], descriptor);
    return { records: records.map((r) => ({ ...r })), total };
  }

  async update(id: number, input: UpdateResourceInput): Promise<Resource> {
    const existing = this.state.resources.get(id);
    if (!existing) throw missingRow('resource', id);
    const updated: Resource = {
      ...existing,
      externalId: input.externalId ?? existing.externalId,
      name: input.name ?? existing.name,
      resourceType: input.resourceType ?? existing.resourceType,
      kind: input.kind ?? existing.kind,
      location: input.location ?? existing.location,
      subscriptionId: input.subscriptionId ?? existing.subscriptionId,
      resourceGroupId: input.resourceGroupId ?? existing.resourceGroupId,
      tags: input.tags ? { ...input.tags } : existing.tags,
      extendedLocation: input.extendedLocation ?? existing.extendedLocation,
      vendor: input.vendor ?? existing.vendor,
      environment: input.environment ?? existing.environment,
      provisioner: input.provisioner ?? existing.provisioner,
      updatedAt: this.state.now(),
    };
    this.state.resources.set(id, updated);
    return { ...updated };
  }

  async delete(id: number): Promise<void> {
    this.state.resources.delete(id);
    this.state.links = this.state.links.filter((l) => l.resourceId !== id);
  }

  async findBySubscriptionId(subscriptionId: number): Promise<Resource[]> {
    return this.sorted().filter((r) => r.subscriptionId === subscriptionId);
  }

  async findByResourceGroupId(resourceGroupId: number): Promise<Resource[]> {
    return this.sorted().filter((r) => r.resourceGroupId === resourceGroupId);
  }

  async findByApplicationId(applicationId: number): Promise<Resource[]> {
    const ids = new Set(
      this.state.links.filter((l) => l.applicationId === applicationId).map((l) => l.resourceId)
    );
    return this.sorted().filter((r) => ids.has(r.id));
  }

  async countBy(dimension: GroupDimension, scope?: DashboardScope): Promise<GroupCount[]> {
    const predicates = compileScope(scope);
    const counts = new Map<string, number>();
    for (const resource of this.state.resources.values()) {
      if (!matchesAll(resource, predicates)) continue;
      const label = resource[dimension] ?? 'Unknown';
      counts.set(label, (counts.get(label) ?? 0) + 1);
    }
    return [...counts.entries()]
      .map(([label, count]) => ({ label, count }))
      .sort((a, b) => b.count - a.count || byText(a.label, b.label));
  }

  async distinctTypes(): Promise<string[]> {
    const types = new Set<string>();
    for (const resource of this.state.resources.values()) types.add(resource.resourceType);
    return [...types].sort(byText);
  }

  async listTagBlobs(limit: number): Promise<unknown[]> {
    return this.sorted()
      .slice(0, limit)
      .map((r) => r.tags);
  }

  async countAll(): Promise<number> {
    return this.state.resources.size;
  }

  async ping(): Promise<void> {}

  private sorted(): Resource[] {
    return [...this.state.resources.values()]
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id)
      .map((r) => ({ ...r }));
  }
}

// -----------------------------------------------------------------------------
// Subscriptions
// -----------------------------------------------------------------------------

export class MemorySubscriptionStore implements SubscriptionStore {
  constructor(private readonly state: MemoryState) {}

  async create(input: CreateSubscriptionInput): Promise<Subscription> {
    const subscription: Subscription = {
      id: this.state.nextId.subscription++,
      name: input.name,
      tenantId: input.tenantId ?? null,
    };
    this.state.subscriptions.set(subscription.id, subscription);
    return { ...subscription };
  }

  async findById(id: number): Promise<Subscription | null> {
    const subscription = this.state.subscriptions.get(id);
    return subscription ? { ...subscription } : null;
  }

  async findByName(name: string): Promise<Subscription | null> {
    const found = [...this.state.subscriptions.values()].find((s) => s.name === name);
    return found ? { ...found } : null;
  }

  async findAll(page: OffsetPage): Promise<Page<Subscription>> {
    const rows = [...this.state.subscriptions.values()]
      .sort((a, b) => byText(a.name, b.name) || a.id - b.id)
      .map((s) => ({ ...s }));
    return pageOf(rows, page);
  }

  async update(id: number, input: UpdateSubscriptionInput): Promise<Subscription> {
    const existing = this.state.subscriptions.get(id);
    if (!existing) throw missingRow('subscription', id);
    const updated: Subscription = {
      ...existing,
      name: input.name ?? existing.name,
      tenantId: input.tenantId ?? existing.tenantId,
    };
    this.state.subscriptions.set(id, updated);
    return { ...updated };
  }

  async delete(id: number): Promise<void> {
    this.state.subscriptions.delete(id);
  }

  async countAll(): Promise<number> {
    return this.state.subscriptions.size;
  }
}

// -----------------------------------------------------------------------------
// Resource groups
// -----------------------------------------------------------------------------

export class MemoryResourceGroupStore implements ResourceGroupStore {
  constructor(private readonly state: MemoryState) {}

  async create(input: CreateResourceGroupInput): Promise<ResourceGroup> {
    const group: ResourceGroup = {
      id: this.state.nextId.resourceGroup++,
      name: input.name,
      subscriptionId: input.subscriptionId,
    };
    this.state.resourceGroups.set(group.id, group);
    return { ...group };
  }

  async findById(id: number): Promise<ResourceGroup | null> {
    const group = this.state.resourceGroups.get(id);
    return group ? { ...group } : null;
  }

  async findByNameAndSubscription(name: string, subscriptionId: number): Promise<ResourceGroup | null> {
    const found = [...this.state.resourceGroups.values()].find(
      (g) => g.name === name && g.subscriptionId === subscriptionId
    );
    return found ? { ...found } : null;
  }

  async findBySubscriptionId(subscriptionId: number): Promise<ResourceGroup[]> {
    return this.sorted().filter((g) => g.subscriptionId === subscriptionId);
  }

  async findAll(page: OffsetPage): Promise<Page<ResourceGroup>> {
    return pageOf(this.sorted(), page);
  }

  async update(id: number, input: UpdateResourceGroupInput): Promise<ResourceGroup> {
    const existing = this.state.resourceGroups.get(id);
    if (!existing) throw missingRow('resource_group', id);
    const updated: ResourceGroup = {
      ...existing,
      name: input.name ?? existing.name,
      subscriptionId: input.subscriptionId ?? existing.subscriptionId,
    };
    this.state.resourceGroups.set(id, updated);
    return { ...updated };
  }

  async delete(id: number): Promise<void> {
    this.state.resourceGroups.delete(id);
  }

  async countAll(): Promise<number> {
    return this.state.resourceGroups.size;
  }

  async countBySubscription(subscriptionId: number): Promise<number> {
    return [...this.state.resourceGroups.values()].filter((g) => g.subscriptionId === subscriptionId)
      .length;
  }

  private sorted(): ResourceGroup[] {
    return [...this.state.resourceGroups.values()]
      .sort((a, b) => byText(a.name, b.name) || a.id - b.id)
      .map((g) => ({ ...g }));
  }
}

// -----------------------------------------------------------------------------
// Applications
// -----------------------------------------------------------------------------

export class MemoryApplicationStore implements ApplicationStore {
  constructor(private readonly state: MemoryState) {}

  async create(input: CreateApplicationInput): Promise<Application> {
    const application: Application = {
      id: this.state.nextId.application++,
      code: input.code ?? null,
      name: input.name ?? null,
      ownerTeam: input.ownerTeam ?? null,
      ownerEmail: input.ownerEmail ?? null,
    };
    this.state.applications.set(application.id, application);
    return { ...application };
  }

  async findById(id: number): Promise<Application | null> {
    const application = this.state.applications.get(id);
    return application ? { ...application } : null;
  }

  async findByCode(code: string): Promise<Application | null> {
    const found = [...this.state.applications.values()].find((a) => a.code === code);
    return found ? { ...found } : null;
  }

  async findByOwnerEmail(ownerEmail: string): Promise<Application[]> {
    return this.sorted().filter((a) => a.ownerEmail === ownerEmail);
  }

  async findAll(page: OffsetPage): Promise<Page<Application>> {
    return pageOf(this.sorted(), page);
  }

  async update(id: number, input: UpdateApplicationInput): Promise<Application> {
    const existing = this.state.applications.get(id);
    if (!existing) throw missingRow('application', id);
    const updated: Application = {
      ...existing,
      code: input.code ?? existing.code,
      name: input.name ?? existing.name,
      ownerTeam: input.ownerTeam ?? existing.ownerTeam,
      ownerEmail: input.ownerEmail ?? existing.ownerEmail,
    };
    this.state.applications.set(id, updated);
    return { ...updated };
  }

  async delete(id: number): Promise<void> {
    this.state.applications.delete(id);
    this.state.links = this.state.links.filter((l) => l.applicationId !== id);
  }

  async countAll(): Promise<number> {
    return this.state.applications.size;
  }

  async link(link: ResourceApplicationLink): Promise<void> {
    if (!this.state.links.some((l) => sameLink(l, link))) this.state.links.push({ ...link });
  }

  async unlink(link: ResourceApplicationLink): Promise<boolean> {
    const before = this.state.links.length;
    this.state.links = this.state.links.filter((l) => !sameLink(l, link));
    return this.state.links.length < before;
  }

  async hasLink(link: ResourceApplicationLink): Promise<boolean> {
    return this.state.links.some((l) => sameLink(l, link));
  }

  private sorted(): Application[] {
    return [...this.state.applications.values()]
      .sort((a, b) => byText(a.name ?? a.code, b.name ?? b.code) || a.id - b.id)
      .map((a) => ({ ...a }));
  }
}

// -----------------------------------------------------------------------------
// Factory
// -----------------------------------------------------------------------------

export function createMemoryStores(options: MemoryStoreOptions = {}): CatalogStores {
  const state: MemoryState = {
    resources: new Map(),
    subscriptions: new Map(),
    resourceGroups: new Map(),
    applications: new Map(),
    links: [],
    nextId: { resource: 1, subscription: 1, resourceGroup: 1, application: 1 },
    now: options.now ?? (() => new Date()),
  };

  return {
    resources: new MemoryResourceStore(state),
    subscriptions: new MemorySubscriptionStore(state),
    resourceGroups: new MemoryResourceGroupStore(state),
    applications: new MemoryApplicationStore(state),
    close: async () => {},
  };
}
