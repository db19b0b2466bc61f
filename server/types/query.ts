// =============================================================================
// Resource Query Types
// Filters, sort and pagination as callers send them, and the storage-agnostic
// descriptor the compiler turns them into.
// =============================================================================

export interface ResourceFilters {
  resourceType?: string;
  location?: string;
  environment?: string;
  vendor?: string;
  subscriptionId?: number;
  resourceGroupId?: number;
  search?: string;
  /** Comma-separated `key:value` pairs, OR-combined. */
  tags?: string;
}

export type SortDirection = 'asc' | 'desc';

export interface SortParams {
  field?: string;
  direction?: SortDirection;
}

export interface PaginationParams {
  page?: number;
  size?: number;
}

export interface Pagination {
  page: number;
  size: number;
  total: number;
  totalPages: number;
}

// -----------------------------------------------------------------------------
// Query descriptor
// -----------------------------------------------------------------------------

/** Resource attributes a predicate or ordering may reference. */
export type ResourceField =
  | 'id'
  | 'externalId'
  | 'name'
  | 'resourceType'
  | 'kind'
  | 'location'
  | 'subscriptionId'
  | 'resourceGroupId'
  | 'extendedLocation'
  | 'vendor'
  | 'environment'
  | 'provisioner'
  | 'createdAt'
  | 'updatedAt';

export type Predicate =
  | { op: 'equals'; field: ResourceField; value: string | number }
  | { op: 'contains'; field: ResourceField; value: string }
  | { op: 'tagContains'; key: string; value: string }
  | { op: 'or'; clauses: Predicate[] };

export type OrderTerm =
  | { kind: 'relevance'; term: string }
  | { kind: 'field'; field: ResourceField; direction: SortDirection };

export interface QueryDescriptor {
  /** AND-combined. */
  where: Predicate[];
  orderBy: OrderTerm[];
  page: number;
  size: number;
  offset: number;
  limit: number;
}

export interface TagFilter {
  key: string;
  value: string;
}
