// =============================================================================
// Postgres Subscription Store
// =============================================================================

import { Pool } from 'pg';
import {
  CreateSubscriptionInput,
  Page,
  Subscription,
  UpdateSubscriptionInput,
} from '../../../types/catalog';
import { OffsetPage, SubscriptionStore } from '../../../types/stores';
import { DatabaseError, withDatabaseErrors } from '../../../lib/errors';
import { buildUpdate, toNumber } from './helpers';

type SubscriptionRow = {
  id: string;
  name: string;
  tenant_id: string | null;
};

function rowToSubscription(row: SubscriptionRow): Subscription {
  return { id: toNumber(row.id), name: row.name, tenantId: row.tenant_id };
}

const COLUMNS = 'id, name, tenant_id';

export class PostgresSubscriptionStore implements SubscriptionStore {
  constructor(private readonly pool: Pool) {}

  async create(input: CreateSubscriptionInput): Promise<Subscription> {
    return withDatabaseErrors('create subscription', async () => {
      const { rows } = await this.pool.query<SubscriptionRow>(
        `INSERT INTO subscription (name, tenant_id) VALUES ($1, $2) RETURNING ${COLUMNS}`,
        [input.name, input.tenantId ?? null]
      );
      return rowToSubscription(rows[0]);
    });
  }

  async findById(id: number): Promise<Subscription | null> {
    return this.findOne('id = $1', id);
  }

  async findByName(name: string): Promise<Subscription | null> {
    return this.findOne('name = $1', name);
  }

  async findAll(page: OffsetPage): Promise<Page<Subscription>> {
    return withDatabaseErrors('list subscriptions', async () => {
      const counted = await this.pool.query<{ count: string }>(
        'SELECT COUNT(*) AS count FROM subscription'
      );
      const { rows } = await this.pool.query<SubscriptionRow>(
        `SELECT ${COLUMNS} FROM subscription ORDER BY name ASC, id ASC LIMIT $1 OFFSET $2`,
        [page.limit, page.offset]
      );
      return { records: rows.map(rowToSubscription), total: toNumber(counted.rows[0].count) };
    });
  }

  async update(id: number, input: UpdateSubscriptionInput): Promise<Subscription> {
    const statement = buildUpdate(
      'subscription',
      id,
      [
        ['name', input.name],
        ['tenant_id', input.tenantId],
      ],
      COLUMNS
    );
    if (!statement) {
      const current = await this.findById(id);
      if (!current) throw new DatabaseError(`subscription ${id} does not exist`);
      return current;
    }
    return withDatabaseErrors('update subscription', async () => {
      const { rows } = await this.pool.query<SubscriptionRow>(statement.text, statement.values);
      if (rows.length === 0) throw new DatabaseError(`subscription ${id} does not exist`);
      return rowToSubscription(rows[0]);
    });
  }

  async delete(id: number): Promise<void> {
    await withDatabaseErrors('delete subscription', () =>
      this.pool.query('DELETE FROM subscription WHERE id = $1', [id])
    );
  }

  async countAll(): Promise<number> {
    return withDatabaseErrors('count subscriptions', async () => {
      const { rows } = await this.pool.query<{ count: string }>(
        'SELECT COUNT(*) AS count FROM subscription'
      );
      return toNumber(rows[0].count);
    });
  }

  private async findOne(condition: string, value: string | number): Promise<Subscription | null> {
    return withDatabaseErrors('find subscription', async () => {
      const { rows } = await this.pool.query<SubscriptionRow>(
        `SELECT ${COLUMNS} FROM subscription WHERE ${condition}`,
        [value]
      );
      return rows.length === 0 ? null : rowToSubscription(rows[0]);
    });
  }
}
