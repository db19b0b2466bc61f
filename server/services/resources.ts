// =============================================================================
// Resource Use Cases
// Existence and ownership checks run here, before the store is touched.
// =============================================================================

import {
  CreateResourceInput,
  Resource,
  UpdateResourceInput,
} from '../types/catalog';
import { ResourceStatistics } from '../types/dashboard';
import { PaginationParams, ResourceFilters, SortParams } from '../types/query';
import { CatalogStores } from '../types/stores';
import { BusinessRuleViolationError, NotFoundError } from '../lib/errors';
import { MAX_SCAN_LIMIT } from '../lib/config';
import { buildPagination, compileResourceQuery } from './query/compiler';
import { PagedResult, requireText } from './common';

export class ResourceService {
  constructor(
    private readonly stores: CatalogStores,
    private readonly fullScanLimit: number = MAX_SCAN_LIMIT
  ) {}

  async create(input: CreateResourceInput): Promise<Resource> {
    const checked: CreateResourceInput = {
      ...input,
      name: requireText(input.name, 'name'),
      resourceType: requireText(input.resourceType, 'resourceType'),
      location: requireText(input.location, 'location'),
    };
    await this.checkOwnership(checked.subscriptionId, checked.resourceGroupId);
    return this.stores.resources.create(checked);
  }

  async get(id: number): Promise<Resource> {
    const resource = await this.stores.resources.findById(id);
    if (!resource) throw new NotFoundError('Resource', id);
    return resource;
  }

  async query(
    filters: ResourceFilters = {},
    sort: SortParams = {},
    pagination: PaginationParams = {}
  ): Promise<PagedResult<Resource>> {
    const descriptor = compileResourceQuery(filters, sort, pagination);
    const { records, total } = await this.stores.resources.query(descriptor);
    return { records, pagination: buildPagination(descriptor.page, descriptor.size, total) };
  }

  /** Every matching resource up to the scan cap, in creation order. */
  async listAll(filters: ResourceFilters = {}): Promise<Resource[]> {
    const descriptor = compileResourceQuery(filters, {}, { page: 1, size: this.fullScanLimit });
    const { records } = await this.stores.resources.query(descriptor);
    return records;
  }

  async update(id: number, input: UpdateResourceInput): Promise<Resource> {
    const current = await this.get(id);
    const patch: UpdateResourceInput = { ...input };
    if (input.name !== undefined) patch.name = requireText(input.name, 'name');
    if (input.resourceType !== undefined) patch.resourceType = requireText(input.resourceType, 'resourceType');
    if (input.location !== undefined) patch.location = requireText(input.location, 'location');

    if (input.subscriptionId !== undefined || input.resourceGroupId !== undefined) {
      await this.checkOwnership(
        input.subscriptionId ?? current.subscriptionId,
        input.resourceGroupId ?? current.resourceGroupId
      );
    }
    return this.stores.resources.update(id, patch);
  }

  async delete(id: number): Promise<void> {
    await this.get(id);
    await this.stores.resources.delete(id);
  }

  async statistics(): Promise<ResourceStatistics> {
    const [byType, byLocation, byEnvironment] = await Promise.all([
      this.stores.resources.countBy('resourceType'),
      this.stores.resources.countBy('location'),
      this.stores.resources.countBy('environment'),
    ]);
    return { byType, byLocation, byEnvironment };
  }

  async distinctTypes(): Promise<string[]> {
    return this.stores.resources.distinctTypes();
  }

  private async checkOwnership(subscriptionId: number, resourceGroupId: number): Promise<void> {
    const subscription = await this.stores.subscriptions.findById(subscriptionId);
    if (!subscription) throw new NotFoundError('Subscription', subscriptionId);
    const group = await this.stores.resourceGroups.findById(resourceGroupId);
    if (!group) throw new NotFoundError('ResourceGroup', resourceGroupId);
    if (group.subscriptionId !== subscriptionId) {
      throw new BusinessRuleViolationError(
        `resource group ${resourceGroupId} does not belong to subscription ${subscriptionId}`
      );
    }
  }
}
