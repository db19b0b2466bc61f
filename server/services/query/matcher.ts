// =============================================================================
// In-Memory Query Evaluation
// Applies a QueryDescriptor to plain records with the same semantics as the
// SQL renderer: ILIKE-style substring matches, NULLs sorted last ascending and
// first descending, id as the final tie-break.
// =============================================================================

import { Resource } from '../../types/catalog';
import { OrderTerm, Predicate, QueryDescriptor, ResourceField } from '../../types/query';

type FieldValue = string | number | Date | null;

function fieldValue(resource: Resource, field: ResourceField): FieldValue {
  return resource[field];
}

function matches(resource: Resource, tagsOf: (r: Resource) => unknown, predicate: Predicate): boolean {
  switch (predicate.op) {
    case 'equals':
      return fieldValue(resource, predicate.field) === predicate.value;
    case 'contains': {
      const value = fieldValue(resource, predicate.field);
      if (value === null) return false;
      return String(value).toLowerCase().includes(predicate.value.toLowerCase());
    }
    case 'tagContains': {
      const tags = tagsOf(resource);
      if (typeof tags !== 'object' || tags === null || Array.isArray(tags)) return false;
      const tagValue: unknown = Object.getOwnPropertyDescriptor(tags, predicate.key)?.value;
      if (tagValue === undefined || tagValue === null) return false;
      const text = typeof tagValue === 'string' ? tagValue : JSON.stringify(tagValue);
      return text.toLowerCase().includes(predicate.value.toLowerCase());
    }
    case 'or':
      return predicate.clauses.some((clause) => matches(resource, tagsOf, clause));
  }
}

export function matchesAll(
  resource: Resource,
  predicates: Predicate[],
  tagsOf: (r: Resource) => unknown = (r) => r.tags
): boolean {
  return predicates.every((p) => matches(resource, tagsOf, p));
}

/** 1 exact name, 2 name prefix, 3 name substring, 4 everything else (case-insensitive). */
export function relevanceBucket(name: string, term: string): number {
  const n = name.toLowerCase();
  const t = term.toLowerCase();
  if (n === t) return 1;
  if (n.startsWith(t)) return 2;
  if (n.includes(t)) return 3;
  return 4;
}

function compareValues(a: FieldValue, b: FieldValue, direction: 'asc' | 'desc'): number {
  if (a === null && b === null) return 0;
  // NULLS LAST for ASC, NULLS FIRST for DESC
  if (a === null) return direction === 'asc' ? 1 : -1;
  if (b === null) return direction === 'asc' ? -1 : 1;
  const left = a instanceof Date ? a.getTime() : a;
  const right = b instanceof Date ? b.getTime() : b;
  let order: number;
  if (typeof left === 'number' && typeof right === 'number') {
    order = left - right;
  } else {
    const l = String(left);
    const r = String(right);
    order = l < r ? -1 : l > r ? 1 : 0;
  }
  return direction === 'asc' ? order : -order;
}

function compareBy(terms: OrderTerm[]): (a: Resource, b: Resource) => number {
  return (a, b) => {
    for (const term of terms) {
      const order =
        term.kind === 'relevance'
          ? relevanceBucket(a.name, term.term) - relevanceBucket(b.name, term.term)
          : compareValues(fieldValue(a, term.field), fieldValue(b, term.field), term.direction);
      if (order !== 0) return order;
    }
    return a.id - b.id;
  };
}

export function applyDescriptor(
  resources: Resource[],
  descriptor: QueryDescriptor,
  tagsOf?: (r: Resource) => unknown
): { records: Resource[]; total: number } {
  const matching = resources.filter((r) => matchesAll(r, descriptor.where, tagsOf));
  matching.sort(compareBy(descriptor.orderBy));
  return {
    records: matching.slice(descriptor.offset, descriptor.offset + descriptor.limit),
    total: matching.length,
  };
}
