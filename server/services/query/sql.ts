// =============================================================================
// SQL Rendering for Resource Queries
// Every value is bound as a $n parameter; only whitelisted column names are
// ever written into the statement text.
// =============================================================================

import { GroupDimension } from '../../types/dashboard';
import { OrderTerm, Predicate, QueryDescriptor, ResourceField } from '../../types/query';

export const RESOURCE_COLUMNS: Record<ResourceField, string> = {
  id: 'r.id',
  externalId: 'r.external_id',
  name: 'r.name',
  resourceType: 'r.type',
  kind: 'r.kind',
  location: 'r.location',
  subscriptionId: 'r.subscription_id',
  resourceGroupId: 'r.resource_group_id',
  extendedLocation: 'r.extended_location',
  vendor: 'r.vendor',
  environment: 'r.environment',
  provisioner: 'r.provisioner',
  createdAt: 'r.created_at',
  updatedAt: 'r.updated_at',
};

export const RESOURCE_SELECT = `r.id, r.external_id, r.name, r.type, r.kind, r.location,
       r.subscription_id, r.resource_group_id, r.tags_json, r.extended_location,
       r.vendor, r.environment, r.provisioner, r.created_at, r.updated_at`;

const GROUP_LABELS: Record<GroupDimension, string> = {
  resourceType: 'r.type',
  location: "COALESCE(r.location, 'Unknown')",
  environment: "COALESCE(r.environment, 'Unknown')",
};

export interface SqlStatement {
  text: string;
  values: unknown[];
}

/** Escape LIKE wildcards so user text matches literally (backslash is the default escape). */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

class Params {
  readonly values: unknown[];

  constructor(initial: unknown[] = []) {
    this.values = [...initial];
  }

  add(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}

function renderPredicate(predicate: Predicate, params: Params): string {
  switch (predicate.op) {
    case 'equals':
      return `${RESOURCE_COLUMNS[predicate.field]} = ${params.add(predicate.value)}`;
    case 'contains':
      return `${RESOURCE_COLUMNS[predicate.field]} ILIKE ${params.add(`%${escapeLike(predicate.value)}%`)}`;
    case 'tagContains': {
      const key = params.add(predicate.key);
      const value = params.add(`%${escapeLike(predicate.value)}%`);
      return `r.tags_json ->> ${key} ILIKE ${value}`;
    }
    case 'or':
      return `(${predicate.clauses.map((c) => renderPredicate(c, params)).join(' OR ')})`;
  }
}

function renderWhere(predicates: Predicate[], params: Params): string {
  if (predicates.length === 0) return '';
  return `WHERE ${predicates.map((p) => renderPredicate(p, params)).join(' AND ')}`;
}

function renderOrderTerm(term: OrderTerm, params: Params): string {
  if (term.kind === 'field') {
    return `${RESOURCE_COLUMNS[term.field]} ${term.direction === 'desc' ? 'DESC' : 'ASC'}`;
  }
  const exact = params.add(term.term);
  const prefix = params.add(`${escapeLike(term.term)}%`);
  const anywhere = params.add(`%${escapeLike(term.term)}%`);
  return (
    `CASE WHEN LOWER(r.name) = LOWER(${exact}) THEN 1 ` +
    `WHEN r.name ILIKE ${prefix} THEN 2 ` +
    `WHEN r.name ILIKE ${anywhere} THEN 3 ELSE 4 END`
  );
}

function renderOrderBy(terms: OrderTerm[], params: Params): string {
  const parts = terms.map((t) => renderOrderTerm(t, params));
  // Stable pages when the requested field has ties
  if (!terms.some((t) => t.kind === 'field' && t.field === 'id')) parts.push('r.id ASC');
  return `ORDER BY ${parts.join(', ')}`;
}

/**
 * Count and page statements sharing one WHERE clause, so `total` always counts
 * the same predicate as the page.
 */
export function renderResourceQuery(descriptor: QueryDescriptor): {
  count: SqlStatement;
  page: SqlStatement;
} {
  const whereParams = new Params();
  const where = renderWhere(descriptor.where, whereParams);

  const pageParams = new Params(whereParams.values);
  const orderBy = renderOrderBy(descriptor.orderBy, pageParams);
  const limit = pageParams.add(descriptor.limit);
  const offset = pageParams.add(descriptor.offset);

  const from = where ? `FROM resource r ${where}` : 'FROM resource r';

  return {
    count: { text: `SELECT COUNT(*) AS count ${from}`, values: whereParams.values },
    page: {
      text: `SELECT ${RESOURCE_SELECT} ${from} ${orderBy} LIMIT ${limit} OFFSET ${offset}`,
      values: pageParams.values,
    },
  };
}

export function renderGroupCount(dimension: GroupDimension, predicates: Predicate[]): SqlStatement {
  const params = new Params();
  const where = renderWhere(predicates, params);
  const from = where ? `FROM resource r ${where}` : 'FROM resource r';
  return {
    text:
      `SELECT ${GROUP_LABELS[dimension]} AS label, COUNT(*) AS count ${from} ` +
      'GROUP BY label ORDER BY count DESC, label ASC',
    values: params.values,
  };
}
