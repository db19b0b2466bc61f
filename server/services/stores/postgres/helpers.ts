// =============================================================================
// Shared Postgres Store Helpers
// =============================================================================

import { Pool, PoolClient } from 'pg';
import { SqlStatement } from '../../query/sql';

/** pg returns BIGINT and COUNT(*) as strings. */
export function toNumber(value: string | number): number {
  return typeof value === 'number' ? value : Number(value);
}

/**
 * Build `UPDATE <table> SET ... WHERE id = $1 RETURNING <returning>` from the
 * assignments whose value is present. `always` holds raw SQL assignments that
 * apply on every update (e.g. timestamps). Returns null when nothing would change.
 */
export function buildUpdate(
  table: string,
  id: number,
  assignments: Array<[column: string, value: unknown]>,
  returning: string,
  always: string[] = []
): SqlStatement | null {
  const values: unknown[] = [id];
  const sets: string[] = [];
  for (const [column, value] of assignments) {
    if (value === undefined) continue;
    values.push(value);
    sets.push(`${column} = $${values.length}`);
  }
  if (sets.length === 0 && always.length === 0) return null;
  return {
    text: `UPDATE ${table} SET ${[...sets, ...always].join(', ')} WHERE id = $1 RETURNING ${returning}`,
    values,
  };
}

/** Run `fn` inside BEGIN/COMMIT on a dedicated client, rolling back on failure. */
export async function inTransaction<T>(pool: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}
