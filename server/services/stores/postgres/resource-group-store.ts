// =============================================================================
// Postgres Resource Group Store
// =============================================================================

import { Pool } from 'pg';
import {
  CreateResourceGroupInput,
  Page,
  ResourceGroup,
  UpdateResourceGroupInput,
} from '../../../types/catalog';
import { OffsetPage, ResourceGroupStore } from '../../../types/stores';
import { DatabaseError, withDatabaseErrors } from '../../../lib/errors';
import { buildUpdate, toNumber } from './helpers';

type ResourceGroupRow = {
  id: string;
  name: string;
  subscription_id: string;
};

function rowToResourceGroup(row: ResourceGroupRow): ResourceGroup {
  return { id: toNumber(row.id), name: row.name, subscriptionId: toNumber(row.subscription_id) };
}

const COLUMNS = 'id, name, subscription_id';

export class PostgresResourceGroupStore implements ResourceGroupStore {
  constructor(private readonly pool: Pool) {}

  async create(input: CreateResourceGroupInput): Promise<ResourceGroup> {
    return withDatabaseErrors('create resource group', async () => {
      const { rows } = await this.pool.query<ResourceGroupRow>(
        `INSERT INTO resource_group (name, subscription_id) VALUES ($1, $2) RETURNING ${COLUMNS}`,
        [input.name, input.subscriptionId]
      );
      return rowToResourceGroup(rows[0]);
    });
  }

  async findById(id: number): Promise<ResourceGroup | null> {
    return withDatabaseErrors('find resource group', async () => {
      const { rows } = await this.pool.query<ResourceGroupRow>(
        `SELECT ${COLUMNS} FROM resource_group WHERE id = $1`,
        [id]
      );
      return rows.length === 0 ? null : rowToResourceGroup(rows[0]);
    });
  }

  async findByNameAndSubscription(name: string, subscriptionId: number): Promise<ResourceGroup | null> {
    return withDatabaseErrors('find resource group', async () => {
      const { rows } = await this.pool.query<ResourceGroupRow>(
        `SELECT ${COLUMNS} FROM resource_group WHERE name = $1 AND subscription_id = $2`,
        [name, subscriptionId]
      );
      return rows.length === 0 ? null : rowToResourceGroup(rows[0]);
    });
  }

  async findBySubscriptionId(subscriptionId: number): Promise<ResourceGroup[]> {
    return withDatabaseErrors('list resource groups by subscription', async () => {
      const { rows } = await this.pool.query<ResourceGroupRow>(
        `SELECT ${COLUMNS} FROM resource_group WHERE subscription_id = $1 ORDER BY name ASC, id ASC`,
        [subscriptionId]
      );
      return rows.map(rowToResourceGroup);
    });
  }

  async findAll(page: OffsetPage): Promise<Page<ResourceGroup>> {
    return withDatabaseErrors('list resource groups', async () => {
      const counted = await this.pool.query<{ count: string }>(
        'SELECT COUNT(*) AS count FROM resource_group'
      );
      const { rows } = await this.pool.query<ResourceGroupRow>(
        `SELECT ${COLUMNS} FROM resource_group ORDER BY name ASC, id ASC LIMIT $1 OFFSET $2`,
        [page.limit, page.offset]
      );
      return { records: rows.map(rowToResourceGroup), total: toNumber(counted.rows[0].count) };
    });
  }

  async update(id: number, input: UpdateResourceGroupInput): Promise<ResourceGroup> {
    const statement = buildUpdate(
      'resource_group',
      id,
      [
        ['name', input.name],
        ['subscription_id', input.subscriptionId],
      ],
      COLUMNS
    );
    if (!statement) {
      const current = await this.findById(id);
      if (!current) throw new DatabaseError(`resource group ${id} does not exist`);
      return current;
    }
    return withDatabaseErrors('update resource group', async () => {
      const { rows } = await this.pool.query<ResourceGroupRow>(statement.text, statement.values);
      if (rows.length === 0) throw new DatabaseError(`resource group ${id} does not exist`);
      return rowToResourceGroup(rows[0]);
    });
  }

  async delete(id: number): Promise<void> {
    await withDatabaseErrors('delete resource group', () =>
      this.pool.query('DELETE FROM resource_group WHERE id = $1', [id])
    );
  }

  async countAll(): Promise<number> {
    return withDatabaseErrors('count resource groups', async () => {
      const { rows } = await this.pool.query<{ count: string }>(
        'SELECT COUNT(*) AS count FROM resource_group'
      );
      return toNumber(rows[0].count);
    });
  }

  async countBySubscription(subscriptionId: number): Promise<number> {
    return withDatabaseErrors('count resource groups by subscription', async () => {
      const { rows } = await this.pool.query<{ count: string }>(
        'SELECT COUNT(*) AS count FROM resource_group WHERE subscription_id = $1',
        [subscriptionId]
      );
      return toNumber(rows[0].count);
    });
  }
}
