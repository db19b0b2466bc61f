// =============================================================================
// Postgres Resource Store
// =============================================================================

import { Pool, PoolClient } from 'pg';
import {
  CreateResourceInput,
  Page,
  Resource,
  TagMap,
  UpdateResourceInput,
} from '../../../types/catalog';
import { DashboardScope, GroupCount, GroupDimension } from '../../../types/dashboard';
import { QueryDescriptor } from '../../../types/query';
import { ResourceStore } from '../../../types/stores';
import { DatabaseError, withDatabaseErrors } from '../../../lib/errors';
import { parseTagBlob } from '../../../lib/tags';
import { compileScope } from '../../query/compiler';
import { RESOURCE_SELECT, renderGroupCount, renderResourceQuery } from '../../query/sql';
import { buildUpdate, inTransaction, toNumber } from './helpers';

// -----------------------------------------------------------------------------
// Row → Resource mapper
// -----------------------------------------------------------------------------

export type ResourceRow = {
  id: string;
  external_id: string | null;
  name: string;
  type: string;
  kind: string | null;
  location: string | null;
  subscription_id: string;
  resource_group_id: string;
  tags_json: unknown;
  extended_location: string | null;
  vendor: string | null;
  environment: string | null;
  provisioner: string | null;
  created_at: Date;
  updated_at: Date;
};

export function rowToResource(row: ResourceRow): Resource {
  return {
    id: toNumber(row.id),
    externalId: row.external_id,
    name: row.name,
    resourceType: row.type,
    kind: row.kind,
    location: row.location ?? '',
    subscriptionId: toNumber(row.subscription_id),
    resourceGroupId: toNumber(row.resource_group_id),
    tags: parseTagBlob(row.tags_json) ?? {},
    extendedLocation: row.extended_location,
    vendor: row.vendor,
    environment: row.environment,
    provisioner: row.provisioner,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

const RETURNING = RESOURCE_SELECT.replace(/r\./g, '');

// -----------------------------------------------------------------------------
// Store
// -----------------------------------------------------------------------------

export class PostgresResourceStore implements ResourceStore {
  constructor(private readonly pool: Pool) {}

  async create(input: CreateResourceInput): Promise<Resource> {
    const tags = input.tags ?? {};
    return withDatabaseErrors('create resource', () =>
      inTransaction(this.pool, async (client) => {
        const { rows } = await client.query<ResourceRow>(
          `INSERT INTO resource (
             external_id, name, type, kind, location, subscription_id, resource_group_id,
             tags_json, extended_location, vendor, environment, provisioner
           ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9, $10, $11, $12)
           RETURNING ${RETURNING}`,
          [
            input.externalId ?? null,
            input.name,
            input.resourceType,
            input.kind ?? null,
            input.location,
            input.subscriptionId,
            input.resourceGroupId,
            JSON.stringify(tags),
            input.extendedLocation ?? null,
            input.vendor ?? null,
            input.environment ?? null,
            input.provisioner ?? null,
          ]
        );
        const resource = rowToResource(rows[0]);
        await replaceTagRows(client, resource.id, tags);
        return resource;
      })
    );
  }

  async findById(id: number): Promise<Resource | null> {
    return withDatabaseErrors('find resource', async () => {
      const { rows } = await this.pool.query<ResourceRow>(
        `SELECT ${RESOURCE_SELECT} FROM resource r WHERE r.id = $1`,
        [id]
      );
      return rows.length === 0 ? null : rowToResource(rows[0]);
    });
  }

  async query(descriptor: QueryDescriptor): Promise<Page<Resource>> {
    const { count, page } = renderResourceQuery(descriptor);
    return withDatabaseErrors('query resources', async () => {
      const counted = await this.pool.query<{ count: string }>(count.text, count.values);
      const { rows } = await this.pool.query<ResourceRow>(page.text, page.values);
      return { records: rows.map(rowToResource), total: toNumber(counted.rows[0].count) };
    });
  }

  async update(id: number, input: UpdateResourceInput): Promise<Resource> {
    const statement = buildUpdate(
      'resource',
      id,
      [
        ['external_id', input.externalId],
        ['name', input.name],
        ['type', input.resourceType],
        ['kind', input.kind],
        ['location', input.location],
        ['subscription_id', input.subscriptionId],
        ['resource_group_id', input.resourceGroupId],
        ['tags_json', input.tags === undefined ? undefined : JSON.stringify(input.tags)],
        ['extended_location', input.extendedLocation],
        ['vendor', input.vendor],
        ['environment', input.environment],
        ['provisioner', input.provisioner],
      ],
      RETURNING,
      ['updated_at = now()']
    );
    if (!statement) throw new DatabaseError('empty resource update');

    return withDatabaseErrors('update resource', () =>
      inTransaction(this.pool, async (client) => {
        const { rows } = await client.query<ResourceRow>(statement.text, statement.values);
        if (rows.length === 0) throw new DatabaseError(`resource ${id} does not exist`);
        if (input.tags !== undefined) await replaceTagRows(client, id, input.tags);
        return rowToResource(rows[0]);
      })
    );
  }

  async delete(id: number): Promise<void> {
    await withDatabaseErrors('delete resource', () =>
      this.pool.query('DELETE FROM resource WHERE id = $1', [id])
    );
  }

  async findBySubscriptionId(subscriptionId: number): Promise<Resource[]> {
    return this.findWhere('r.subscription_id = $1', subscriptionId);
  }

  async findByResourceGroupId(resourceGroupId: number): Promise<Resource[]> {
    return this.findWhere('r.resource_group_id = $1', resourceGroupId);
  }

  async findByApplicationId(applicationId: number): Promise<Resource[]> {
    return withDatabaseErrors('find resources by application', async () => {
      const { rows } = await this.pool.query<ResourceRow>(
        `SELECT DISTINCT ${RESOURCE_SELECT}
         FROM resource r
         JOIN resource_application_map ram ON r.id = ram.resource_id
         WHERE ram.application_id = $1
         ORDER BY r.created_at ASC, r.id ASC`,
        [applicationId]
      );
      return rows.map(rowToResource);
    });
  }

  async countBy(dimension: GroupDimension, scope?: DashboardScope): Promise<GroupCount[]> {
    const statement = renderGroupCount(dimension, compileScope(scope));
    return withDatabaseErrors(`count resources by ${dimension}`, async () => {
      const { rows } = await this.pool.query<{ label: string; count: string }>(
        statement.text,
        statement.values
      );
      return rows.map((row) => ({ label: row.label, count: toNumber(row.count) }));
    });
  }

  async distinctTypes(): Promise<string[]> {
    return withDatabaseErrors('list resource types', async () => {
      const { rows } = await this.pool.query<{ type: string }>(
        'SELECT DISTINCT type FROM resource ORDER BY type ASC'
      );
      return rows.map((row) => row.type);
    });
  }

  async listTagBlobs(limit: number): Promise<unknown[]> {
    return withDatabaseErrors('list tag blobs', async () => {
      const { rows } = await this.pool.query<{ tags_json: unknown }>(
        'SELECT tags_json FROM resource ORDER BY created_at ASC, id ASC LIMIT $1',
        [limit]
      );
      return rows.map((row) => row.tags_json);
    });
  }

  async countAll(): Promise<number> {
    return withDatabaseErrors('count resources', async () => {
      const { rows } = await this.pool.query<{ count: string }>(
        'SELECT COUNT(*) AS count FROM resource'
      );
      return toNumber(rows[0].count);
    });
  }

  async ping(): Promise<void> {
    await withDatabaseErrors('reach database', () => this.pool.query('SELECT 1'));
  }

  private async findWhere(condition: string, value: number): Promise<Resource[]> {
    return withDatabaseErrors('find resources', async () => {
      const { rows } = await this.pool.query<ResourceRow>(
        `SELECT ${RESOURCE_SELECT} FROM resource r WHERE ${condition}
         ORDER BY r.created_at ASC, r.id ASC`,
        [value]
      );
      return rows.map(rowToResource);
    });
  }
}

// Mirror the tag map into resource_tag so tags can be searched by join
async function replaceTagRows(client: PoolClient, resourceId: number, tags: TagMap): Promise<void> {
  await client.query('DELETE FROM resource_tag WHERE resource_id = $1', [resourceId]);
  const entries = Object.entries(tags);
  if (entries.length === 0) return;

  const values: unknown[] = [resourceId];
  const tuples = entries.map(([key, value]) => {
    values.push(key, value);
    return `($1, $${values.length - 1}, $${values.length})`;
  });
  await client.query(
    `INSERT INTO resource_tag (resource_id, key, value) VALUES ${tuples.join(', ')}`,
    values
  );
}
