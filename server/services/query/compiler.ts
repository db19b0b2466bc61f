// =============================================================================
// Resource Query Compiler
// Turns caller filters, sort and pagination into a QueryDescriptor that both
// the SQL renderer and the in-memory matcher understand.
// =============================================================================

import { InvalidInputError } from '../../lib/errors';
import { DashboardScope } from '../../types/dashboard';
import {
  OrderTerm,
  Pagination,
  PaginationParams,
  Predicate,
  QueryDescriptor,
  ResourceField,
  ResourceFilters,
  SortParams,
  TagFilter,
} from '../../types/query';

export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100_000;

/** Fields matched case-insensitively by the free-text `search` filter. */
const SEARCH_FIELDS: ResourceField[] = [
  'name',
  'resourceType',
  'externalId',
  'location',
  'vendor',
  'environment',
];

// Accepted sort names, camelCase and column spellings alike
const SORT_FIELDS: Record<string, ResourceField> = {
  id: 'id',
  name: 'name',
  type: 'resourceType',
  resourceType: 'resourceType',
  resource_type: 'resourceType',
  kind: 'kind',
  location: 'location',
  vendor: 'vendor',
  environment: 'environment',
  provisioner: 'provisioner',
  externalId: 'externalId',
  external_id: 'externalId',
  subscriptionId: 'subscriptionId',
  subscription_id: 'subscriptionId',
  resourceGroupId: 'resourceGroupId',
  resource_group_id: 'resourceGroupId',
  createdAt: 'createdAt',
  created_at: 'createdAt',
  updatedAt: 'updatedAt',
  updated_at: 'updatedAt',
};

// -----------------------------------------------------------------------------
// Pagination
// -----------------------------------------------------------------------------

function positiveInteger(value: number | undefined): number | undefined {
  if (value === undefined || !Number.isFinite(value)) return undefined;
  const whole = Math.floor(value);
  return whole >= 1 ? whole : undefined;
}

/**
 * Missing, zero, negative or non-numeric values fall back to the defaults;
 * oversized pages are clamped. `page` is capped so the offset stays a safe
 * integer the database accepts.
 */
export function normalizePagination(params: PaginationParams = {}): { page: number; size: number } {
  const size = Math.min(positiveInteger(params.size) ?? DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE);
  const maxPage = Math.floor(Number.MAX_SAFE_INTEGER / size) + 1;
  const page = Math.min(positiveInteger(params.page) ?? DEFAULT_PAGE, maxPage);
  return { page, size };
}

export function buildPagination(page: number, size: number, total: number): Pagination {
  return { page, size, total, totalPages: Math.ceil(total / size) };
}

// -----------------------------------------------------------------------------
// Tag filters
// -----------------------------------------------------------------------------

/**
 * Parse `key:value,key2:value2`. Tokens without exactly one `:` or with an
 * empty key are dropped.
 */
export function parseTagFilters(text: string): TagFilter[] {
  const filters: TagFilter[] = [];
  for (const token of text.split(',')) {
    const parts = token.split(':');
    if (parts.length !== 2) continue;
    const key = parts[0].trim();
    const value = parts[1].trim();
    if (!key) continue;
    filters.push({ key, value });
  }
  return filters;
}

// -----------------------------------------------------------------------------
// Sort
// -----------------------------------------------------------------------------

export function resolveSortField(field: string | undefined): ResourceField {
  if (field === undefined || field.trim() === '') return 'createdAt';
  const resolved = SORT_FIELDS[field.trim()];
  if (!resolved) {
    throw new InvalidInputError(`unsupported sort field "${field}"`);
  }
  return resolved;
}

// -----------------------------------------------------------------------------
// Compiler
// -----------------------------------------------------------------------------

function present(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

export function compileResourceQuery(
  filters: ResourceFilters = {},
  sort: SortParams = {},
  pagination: PaginationParams = {}
): QueryDescriptor {
  const where: Predicate[] = [];

  const resourceType = present(filters.resourceType);
  if (resourceType) where.push({ op: 'contains', field: 'resourceType', value: resourceType });

  const location = present(filters.location);
  if (location) where.push({ op: 'equals', field: 'location', value: location });

  const environment = present(filters.environment);
  if (environment) where.push({ op: 'equals', field: 'environment', value: environment });

  const vendor = present(filters.vendor);
  if (vendor) where.push({ op: 'equals', field: 'vendor', value: vendor });

  if (filters.subscriptionId !== undefined) {
    where.push({ op: 'equals', field: 'subscriptionId', value: filters.subscriptionId });
  }
  if (filters.resourceGroupId !== undefined) {
    where.push({ op: 'equals', field: 'resourceGroupId', value: filters.resourceGroupId });
  }

  const search = present(filters.search);
  if (search) {
    where.push({
      op: 'or',
      clauses: SEARCH_FIELDS.map((field): Predicate => ({ op: 'contains', field, value: search })),
    });
  }

  const tagText = present(filters.tags);
  if (tagText) {
    const tagFilters = parseTagFilters(tagText);
    // A tags filter with no usable token adds no restriction
    if (tagFilters.length > 0) {
      where.push({
        op: 'or',
        clauses: tagFilters.map((t): Predicate => ({ op: 'tagContains', key: t.key, value: t.value })),
      });
    }
  }

  const orderBy: OrderTerm[] = [];
  if (search) orderBy.push({ kind: 'relevance', term: search });
  orderBy.push({
    kind: 'field',
    field: resolveSortField(sort.field),
    direction: sort.direction ?? 'asc',
  });

  const { page, size } = normalizePagination(pagination);

  return {
    where,
    orderBy,
    page,
    size,
    offset: (page - 1) * size,
    limit: size,
  };
}

// -----------------------------------------------------------------------------
// Dashboard scope
// -----------------------------------------------------------------------------

/** AND-combined predicates for the dashboard scope filters that are set. */
export function compileScope(scope: DashboardScope = {}): Predicate[] {
  const where: Predicate[] = [];
  if (scope.subscriptionId !== undefined) {
    where.push({ op: 'equals', field: 'subscriptionId', value: scope.subscriptionId });
  }
  if (scope.resourceGroupId !== undefined) {
    where.push({ op: 'equals', field: 'resourceGroupId', value: scope.resourceGroupId });
  }
  const location = present(scope.location);
  if (location) where.push({ op: 'equals', field: 'location', value: location });
  const environment = present(scope.environment);
  if (environment) where.push({ op: 'equals', field: 'environment', value: environment });
  return where;
}

export function hasScope(scope: DashboardScope | undefined): boolean {
  return scope !== undefined && compileScope(scope).length > 0;
}
