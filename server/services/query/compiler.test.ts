import { describe, it, expect } from 'vitest';
import {
  buildPagination,
  compileResourceQuery,
  compileScope,
  hasScope,
  normalizePagination,
  parseTagFilters,
  resolveSortField,
} from './compiler';
import { InvalidInputError } from '../../lib/errors';

describe('normalizePagination', () => {
  it('defaults missing values', () => {
    expect(normalizePagination()).toEqual({ page: 1, size: 20 });
  });

  it('replaces zero, negative and non-numeric values with defaults', () => {
    expect(normalizePagination({ page: 0, size: 0 })).toEqual({ page: 1, size: 20 });
    expect(normalizePagination({ page: -3, size: -10 })).toEqual({ page: 1, size: 20 });
    expect(normalizePagination({ page: Number.NaN, size: Number.NaN })).toEqual({ page: 1, size: 20 });
  });

  it('clamps oversized pages and floors fractions', () => {
    expect(normalizePagination({ page: 2.7, size: 250_000 })).toEqual({ page: 2, size: 100_000 });
  });

  it('caps the page so the offset stays a safe integer', () => {
    expect(normalizePagination({ page: 1e16, size: 100_000 })).toEqual({ page: 90_071_992_548, size: 100_000 });

    const descriptor = compileResourceQuery({}, {}, { page: 1e16, size: 100_000 });
    expect(descriptor.offset).toBe(9_007_199_254_700_000);
    expect(Number.isSafeInteger(descriptor.offset)).toBe(true);
  });
});

describe('buildPagination', () => {
  it('rounds totalPages up', () => {
    expect(buildPagination(2, 20, 41)).toEqual({ page: 2, size: 20, total: 41, totalPages: 3 });
  });

  it('reports zero pages for an empty result', () => {
    expect(buildPagination(1, 20, 0).totalPages).toBe(0);
  });
});

describe('parseTagFilters', () => {
  it('splits pairs and trims whitespace', () => {
    expect(parseTagFilters(' Env : prod , Team:core')).toEqual([
      { key: 'Env', value: 'prod' },
      { key: 'Team', value: 'core' },
    ]);
  });

  it('drops tokens without exactly one colon or with an empty key', () => {
    expect(parseTagFilters('novalue,a:b:c,:orphan,Env:')).toEqual([{ key: 'Env', value: '' }]);
  });
});

describe('resolveSortField', () => {
  it('defaults to creation time', () => {
    expect(resolveSortField(undefined)).toBe('createdAt');
    expect(resolveSortField(' ')).toBe('createdAt');
  });

  it('accepts camelCase and column spellings', () => {
    expect(resolveSortField('name')).toBe('name');
    expect(resolveSortField('type')).toBe('resourceType');
    expect(resolveSortField('resource_group_id')).toBe('resourceGroupId');
  });

  it('rejects unknown fields', () => {
    expect(() => resolveSortField('tags_json; DROP TABLE resource')).toThrow(InvalidInputError);
  });
});

describe('compileResourceQuery', () => {
  it('produces an unfiltered first page by default', () => {
    expect(compileResourceQuery()).toEqual({
      where: [],
      orderBy: [{ kind: 'field', field: 'createdAt', direction: 'asc' }],
      page: 1,
      size: 20,
      offset: 0,
      limit: 20,
    });
  });

  it('maps each filter to its predicate', () => {
    const descriptor = compileResourceQuery({
      resourceType: 'virtualMachines',
      location: 'westeurope',
      environment: 'prod',
      vendor: 'contoso',
      subscriptionId: 4,
      resourceGroupId: 9,
    });
    expect(descriptor.where).toEqual([
      { op: 'contains', field: 'resourceType', value: 'virtualMachines' },
      { op: 'equals', field: 'location', value: 'westeurope' },
      { op: 'equals', field: 'environment', value: 'prod' },
      { op: 'equals', field: 'vendor', value: 'contoso' },
      { op: 'equals', field: 'subscriptionId', value: 4 },
      { op: 'equals', field: 'resourceGroupId', value: 9 },
    ]);
  });

  it('ignores blank filter strings', () => {
    expect(compileResourceQuery({ location: '  ', search: '', tags: ' ' }).where).toEqual([]);
  });

  it('expands search across the searchable fields and ranks by relevance first', () => {
    const descriptor = compileResourceQuery({ search: ' vm1 ' }, { field: 'name', direction: 'desc' });
    expect(descriptor.where).toEqual([
      {
        op: 'or',
        clauses: [
          { op: 'contains', field: 'name', value: 'vm1' },
          { op: 'contains', field: 'resourceType', value: 'vm1' },
          { op: 'contains', field: 'externalId', value: 'vm1' },
          { op: 'contains', field: 'location', value: 'vm1' },
          { op: 'contains', field: 'vendor', value: 'vm1' },
          { op: 'contains', field: 'environment', value: 'vm1' },
        ],
      },
    ]);
    expect(descriptor.orderBy).toEqual([
      { kind: 'relevance', term: 'vm1' },
      { kind: 'field', field: 'name', direction: 'desc' },
    ]);
  });

  it('OR-combines tag tokens', () => {
    expect(compileResourceQuery({ tags: 'Env:prod,Team:core' }).where).toEqual([
      {
        op: 'or',
        clauses: [
          { op: 'tagContains', key: 'Env', value: 'prod' },
          { op: 'tagContains', key: 'Team', value: 'core' },
        ],
      },
    ]);
  });

  it('adds no restriction when every tag token is malformed', () => {
    expect(compileResourceQuery({ tags: 'broken,also:bad:token' }).where).toEqual([]);
  });

  it('computes offset from the normalized page', () => {
    const descriptor = compileResourceQuery({}, {}, { page: 3, size: 25 });
    expect(descriptor.offset).toBe(50);
    expect(descriptor.limit).toBe(25);
  });
});

describe('compileScope', () => {
  it('builds equality predicates for the set scope fields', () => {
    expect(compileScope({ subscriptionId: 1, environment: 'dev' })).toEqual([
      { op: 'equals', field: 'subscriptionId', value: 1 },
      { op: 'equals', field: 'environment', value: 'dev' },
    ]);
  });

  it('hasScope is false for empty and blank scopes', () => {
    expect(hasScope(undefined)).toBe(false);
    expect(hasScope({ location: ' ' })).toBe(false);
    expect(hasScope({ resourceGroupId: 2 })).toBe(true);
  });
});
