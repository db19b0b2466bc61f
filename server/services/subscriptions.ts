// =============================================================================
// Subscription Use Cases
// =============================================================================

import {
  CreateSubscriptionInput,
  Resource,
  ResourceGroup,
  Subscription,
  UpdateSubscriptionInput,
} from '../types/catalog';
import { PaginationParams } from '../types/query';
import { CatalogStores } from '../types/stores';
import {
  AlreadyExistsError,
  BusinessRuleViolationError,
  NotFoundError,
} from '../lib/errors';
import { buildPagination, normalizePagination } from './query/compiler';
import { PagedResult, requireText } from './common';

export class SubscriptionService {
  constructor(private readonly stores: CatalogStores) {}

  async create(input: CreateSubscriptionInput): Promise<Subscription> {
    const name = requireText(input.name, 'name');
    const existing = await this.stores.subscriptions.findByName(name);
    if (existing) throw new AlreadyExistsError('Subscription', 'name', name);
    return this.stores.subscriptions.create({ ...input, name });
  }

  async get(id: number): Promise<Subscription> {
    const subscription = await this.stores.subscriptions.findById(id);
    if (!subscription) throw new NotFoundError('Subscription', id);
    return subscription;
  }

  async getByName(name: string): Promise<Subscription> {
    const subscription = await this.stores.subscriptions.findByName(name);
    if (!subscription) throw new NotFoundError('Subscription', name);
    return subscription;
  }

  async list(params: PaginationParams = {}): Promise<PagedResult<Subscription>> {
    const { page, size } = normalizePagination(params);
    const result = await this.stores.subscriptions.findAll({ offset: (page - 1) * size, limit: size });
    return { records: result.records, pagination: buildPagination(page, size, result.total) };
  }

  async update(id: number, input: UpdateSubscriptionInput): Promise<Subscription> {
    await this.get(id);
    const patch: UpdateSubscriptionInput = { ...input };
    if (input.name !== undefined) {
      const name = requireText(input.name, 'name');
      const clash = await this.stores.subscriptions.findByName(name);
      if (clash && clash.id !== id) throw new AlreadyExistsError('Subscription', 'name', name);
      patch.name = name;
    }
    return this.stores.subscriptions.update(id, patch);
  }

  async delete(id: number): Promise<void> {
    await this.get(id);
    const groups = await this.stores.resourceGroups.countBySubscription(id);
    if (groups > 0) {
      throw new BusinessRuleViolationError(
        `subscription ${id} still has ${groups} resource group(s)`
      );
    }
    await this.stores.subscriptions.delete(id);
  }

  async listResources(id: number): Promise<Resource[]> {
    await this.get(id);
    return this.stores.resources.findBySubscriptionId(id);
  }

  async listResourceGroups(id: number): Promise<ResourceGroup[]> {
    await this.get(id);
    return this.stores.resourceGroups.findBySubscriptionId(id);
  }
}
