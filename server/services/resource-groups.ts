// =============================================================================
// Resource Group Use Cases
// Group names are unique within their subscription only.
// =============================================================================

import {
  CreateResourceGroupInput,
  Resource,
  ResourceGroup,
  UpdateResourceGroupInput,
} from '../types/catalog';
import { PaginationParams } from '../types/query';
import { CatalogStores } from '../types/stores';
import { AlreadyExistsError, BusinessRuleViolationError, NotFoundError } from '../lib/errors';
import { buildPagination, normalizePagination } from './query/compiler';
import { PagedResult, requireText } from './common';

export class ResourceGroupService {
  constructor(private readonly stores: CatalogStores) {}

  async create(input: CreateResourceGroupInput): Promise<ResourceGroup> {
    const name = requireText(input.name, 'name');
    await this.requireSubscription(input.subscriptionId);
    const existing = await this.stores.resourceGroups.findByNameAndSubscription(name, input.subscriptionId);
    if (existing) throw new AlreadyExistsError('ResourceGroup', 'name', name);
    return this.stores.resourceGroups.create({ name, subscriptionId: input.subscriptionId });
  }

  async get(id: number): Promise<ResourceGroup> {
    const group = await this.stores.resourceGroups.findById(id);
    if (!group) throw new NotFoundError('ResourceGroup', id);
    return group;
  }

  async list(params: PaginationParams = {}): Promise<PagedResult<ResourceGroup>> {
    const { page, size } = normalizePagination(params);
    const result = await this.stores.resourceGroups.findAll({ offset: (page - 1) * size, limit: size });
    return { records: result.records, pagination: buildPagination(page, size, result.total) };
  }

  async listBySubscription(subscriptionId: number): Promise<ResourceGroup[]> {
    await this.requireSubscription(subscriptionId);
    return this.stores.resourceGroups.findBySubscriptionId(subscriptionId);
  }

  async update(id: number, input: UpdateResourceGroupInput): Promise<ResourceGroup> {
    const current = await this.get(id);
    const patch: UpdateResourceGroupInput = { ...input };

    if (input.subscriptionId !== undefined) {
      await this.requireSubscription(input.subscriptionId);
      if (input.subscriptionId !== current.subscriptionId) {
        // Resources carry their subscription too; a move would split them from the group
        const resources = await this.stores.resources.findByResourceGroupId(id);
        if (resources.length > 0) {
          throw new BusinessRuleViolationError(
            `resource group ${id} still has ${resources.length} resource(s) and cannot change subscription`
          );
        }
      }
    }
    if (input.name !== undefined) patch.name = requireText(input.name, 'name');

    const name = patch.name ?? current.name;
    const subscriptionId = patch.subscriptionId ?? current.subscriptionId;
    const clash = await this.stores.resourceGroups.findByNameAndSubscription(name, subscriptionId);
    if (clash && clash.id !== id) throw new AlreadyExistsError('ResourceGroup', 'name', name);

    return this.stores.resourceGroups.update(id, patch);
  }

  async delete(id: number): Promise<void> {
    await this.get(id);
    const resources = await this.stores.resources.findByResourceGroupId(id);
    if (resources.length > 0) {
      throw new BusinessRuleViolationError(
        `resource group ${id} still has ${resources.length} resource(s)`
      );
    }
    await this.stores.resourceGroups.delete(id);
  }

  async listResources(id: number): Promise<Resource[]> {
    await this.get(id);
    return this.stores.resources.findByResourceGroupId(id);
  }

  private async requireSubscription(subscriptionId: number): Promise<void> {
    const subscription = await this.stores.subscriptions.findById(subscriptionId);
    if (!subscription) throw new NotFoundError('Subscription', subscriptionId);
  }
}
