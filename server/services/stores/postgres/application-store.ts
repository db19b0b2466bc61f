// =============================================================================
// Postgres Application Store
// Also owns the resource_application_map link table.
// =============================================================================

import { Pool } from 'pg';
import {
  Application,
  CreateApplicationInput,
  Page,
  ResourceApplicationLink,
  UpdateApplicationInput,
} from '../../../types/catalog';
import { ApplicationStore, OffsetPage } from '../../../types/stores';
import { DatabaseError, withDatabaseErrors } from '../../../lib/errors';
import { buildUpdate, toNumber } from './helpers';

type ApplicationRow = {
  id: string;
  code: string | null;
  name: string | null;
  owner_team: string | null;
  owner_email: string | null;
};

function rowToApplication(row: ApplicationRow): Application {
  return {
    id: toNumber(row.id),
    code: row.code,
    name: row.name,
    ownerTeam: row.owner_team,
    ownerEmail: row.owner_email,
  };
}

const COLUMNS = 'id, code, name, owner_team, owner_email';

export class PostgresApplicationStore implements ApplicationStore {
  constructor(private readonly pool: Pool) {}

  async create(input: CreateApplicationInput): Promise<Application> {
    return withDatabaseErrors('create application', async () => {
      const { rows } = await this.pool.query<ApplicationRow>(
        `INSERT INTO application (code, name, owner_team, owner_email)
         VALUES ($1, $2, $3, $4) RETURNING ${COLUMNS}`,
        [input.code ?? null, input.name ?? null, input.ownerTeam ?? null, input.ownerEmail ?? null]
      );
      return rowToApplication(rows[0]);
    });
  }

  async findById(id: number): Promise<Application | null> {
    return this.findOne('id = $1', id);
  }

  async findByCode(code: string): Promise<Application | null> {
    return this.findOne('code = $1', code);
  }

  async findByOwnerEmail(ownerEmail: string): Promise<Application[]> {
    return withDatabaseErrors('list applications by owner', async () => {
      const { rows } = await this.pool.query<ApplicationRow>(
        `SELECT ${COLUMNS} FROM application WHERE owner_email = $1
         ORDER BY COALESCE(name, code) ASC, id ASC`,
        [ownerEmail]
      );
      return rows.map(rowToApplication);
    });
  }

  async findAll(page: OffsetPage): Promise<Page<Application>> {
    return withDatabaseErrors('list applications', async () => {
      const counted = await this.pool.query<{ count: string }>(
        'SELECT COUNT(*) AS count FROM application'
      );
      const { rows } = await this.pool.query<ApplicationRow>(
        `SELECT ${COLUMNS} FROM application
         ORDER BY COALESCE(name, code) ASC, id ASC LIMIT $1 OFFSET $2`,
        [page.limit, page.offset]
      );
      return { records: rows.map(rowToApplication), total: toNumber(counted.rows[0].count) };
    });
  }

  async update(id: number, input: UpdateApplicationInput): Promise<Application> {
    const statement = buildUpdate(
      'application',
      id,
      [
        ['code', input.code],
        ['name', input.name],
        ['owner_team', input.ownerTeam],
        ['owner_email', input.ownerEmail],
      ],
      COLUMNS
    );
    if (!statement) {
      const current = await this.findById(id);
      if (!current) throw new DatabaseError(`application ${id} does not exist`);
      return current;
    }
    return withDatabaseErrors('update application', async () => {
      const { rows } = await this.pool.query<ApplicationRow>(statement.text, statement.values);
      if (rows.length === 0) throw new DatabaseError(`application ${id} does not exist`);
      return rowToApplication(rows[0]);
    });
  }

  async delete(id: number): Promise<void> {
    await withDatabaseErrors('delete application', () =>
      this.pool.query('DELETE FROM application WHERE id = $1', [id])
    );
  }

  async countAll(): Promise<number> {
    return withDatabaseErrors('count applications', async () => {
      const { rows } = await this.pool.query<{ count: string }>(
        'SELECT COUNT(*) AS count FROM application'
      );
      return toNumber(rows[0].count);
    });
  }

  async link(link: ResourceApplicationLink): Promise<void> {
    await withDatabaseErrors('link resource to application', () =>
      this.pool.query(
        `INSERT INTO resource_application_map (resource_id, application_id, relation_type)
         VALUES ($1, $2, $3)
         ON CONFLICT DO NOTHING`,
        [link.resourceId, link.applicationId, link.relationType]
      )
    );
  }

  async unlink(link: ResourceApplicationLink): Promise<boolean> {
    return withDatabaseErrors('unlink resource from application', async () => {
      const { rowCount } = await this.pool.query(
        `DELETE FROM resource_application_map
         WHERE resource_id = $1 AND application_id = $2 AND relation_type = $3`,
        [link.resourceId, link.applicationId, link.relationType]
      );
      return (rowCount ?? 0) > 0;
    });
  }

  async hasLink(link: ResourceApplicationLink): Promise<boolean> {
    return withDatabaseErrors('find resource link', async () => {
      const { rows } = await this.pool.query(
        `SELECT 1 FROM resource_application_map
         WHERE resource_id = $1 AND application_id = $2 AND relation_type = $3`,
        [link.resourceId, link.applicationId, link.relationType]
      );
      return rows.length > 0;
    });
  }

  private async findOne(condition: string, value: string | number): Promise<Application | null> {
    return withDatabaseErrors('find application', async () => {
      const { rows } = await this.pool.query<ApplicationRow>(
        `SELECT ${COLUMNS} FROM application WHERE ${condition}`,
        [value]
      );
      return rows.length === 0 ? null : rowToApplication(rows[0]);
    });
  }
}
