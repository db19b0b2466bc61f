// =============================================================================
// Application Use Cases
// =============================================================================

import {
  Application,
  CreateApplicationInput,
  DEFAULT_RELATION_TYPE,
  Resource,
  ResourceApplicationLink,
  UpdateApplicationInput,
} from '../types/catalog';
import { PaginationParams } from '../types/query';
import { CatalogStores } from '../types/stores';
import { AlreadyExistsError, InvalidInputError, NotFoundError } from '../lib/errors';
import { buildPagination, normalizePagination } from './query/compiler';
import { PagedResult, requireText } from './common';

function checkEmail(email: string | undefined): void {
  if (email !== undefined && !email.includes('@')) {
    throw new InvalidInputError(`ownerEmail "${email}" is not an email address`);
  }
}

export class ApplicationService {
  constructor(private readonly stores: CatalogStores) {}

  async create(input: CreateApplicationInput): Promise<Application> {
    checkEmail(input.ownerEmail);
    const patch: CreateApplicationInput = { ...input };
    if (input.code !== undefined) {
      const code = requireText(input.code, 'code');
      const existing = await this.stores.applications.findByCode(code);
      if (existing) throw new AlreadyExistsError('Application', 'code', code);
      patch.code = code;
    }
    return this.stores.applications.create(patch);
  }

  async get(id: number): Promise<Application> {
    const application = await this.stores.applications.findById(id);
    if (!application) throw new NotFoundError('Application', id);
    return application;
  }

  async getByCode(code: string): Promise<Application> {
    const application = await this.stores.applications.findByCode(code);
    if (!application) throw new NotFoundError('Application', code);
    return application;
  }

  async listByOwnerEmail(ownerEmail: string): Promise<Application[]> {
    return this.stores.applications.findByOwnerEmail(ownerEmail);
  }

  async list(params: PaginationParams = {}): Promise<PagedResult<Application>> {
    const { page, size } = normalizePagination(params);
    const result = await this.stores.applications.findAll({ offset: (page - 1) * size, limit: size });
    return { records: result.records, pagination: buildPagination(page, size, result.total) };
  }

  async update(id: number, input: UpdateApplicationInput): Promise<Application> {
    await this.get(id);
    checkEmail(input.ownerEmail);
    const patch: UpdateApplicationInput = { ...input };
    if (input.code !== undefined) {
      const code = requireText(input.code, 'code');
      const clash = await this.stores.applications.findByCode(code);
      if (clash && clash.id !== id) throw new AlreadyExistsError('Application', 'code', code);
      patch.code = code;
    }
    return this.stores.applications.update(id, patch);
  }

  async delete(id: number): Promise<void> {
    await this.get(id);
    await this.stores.applications.delete(id);
  }

  async listResources(id: number): Promise<Resource[]> {
    await this.get(id);
    return this.stores.resources.findByApplicationId(id);
  }

  async linkResource(
    resourceId: number,
    applicationId: number,
    relationType: string = DEFAULT_RELATION_TYPE
  ): Promise<ResourceApplicationLink> {
    const resource = await this.stores.resources.findById(resourceId);
    if (!resource) throw new NotFoundError('Resource', resourceId);
    await this.get(applicationId);

    const link: ResourceApplicationLink = { resourceId, applicationId, relationType };
    if (await this.stores.applications.hasLink(link)) {
      throw new AlreadyExistsError('ResourceApplicationLink', 'resourceId', `${resourceId}:${applicationId}:${relationType}`);
    }
    await this.stores.applications.link(link);
    return link;
  }

  async unlinkResource(
    resourceId: number,
    applicationId: number,
    relationType: string = DEFAULT_RELATION_TYPE
  ): Promise<void> {
    const removed = await this.stores.applications.unlink({ resourceId, applicationId, relationType });
    if (!removed) {
      throw new NotFoundError('ResourceApplicationLink', `${resourceId}:${applicationId}:${relationType}`);
    }
  }
}
