import { Pool, PoolClient } from 'pg';
import * as path from 'path';
import * as fs from 'fs';
import { loadConfig } from './lib/config';

export function createPool(connectionString: string): Pool {
  const pool = new Pool({ connectionString });
  // Idle clients can error when the server drops them; log instead of crashing
  pool.on('error', (err) => {
    console.error('[Database] Idle client error:', err.message);
  });
  return pool;
}

interface Migration {
  up: (client: PoolClient) => Promise<void>;
  down: (client: PoolClient) => Promise<void>;
}

function isMigration(value: unknown): value is Migration {
  if (typeof value !== 'object' || value === null) return false;
  return (
    typeof Reflect.get(value, 'up') === 'function' && typeof Reflect.get(value, 'down') === 'function'
  );
}

export async function runMigrations(pool: Pool, migrationsDir = path.join(__dirname, 'migrations')): Promise<void> {
  const client = await pool.connect();

  try {
    // Ensure migrations tracking table exists
    await client.query(`
      CREATE TABLE IF NOT EXISTS _migrations (
        id serial PRIMARY KEY,
        name varchar(255) UNIQUE NOT NULL,
        applied_at timestamptz DEFAULT now()
      );
    `);

    // Timestamp prefix keeps alphabetical order == apply order
    const files = fs.readdirSync(migrationsDir)
      .filter((f) => (f.endsWith('.ts') || f.endsWith('.js')) && !f.endsWith('.d.ts') && !f.includes('.test.'))
      .sort();

    for (const file of files) {
      const name = path.basename(file, path.extname(file));

      const { rows } = await client.query(
        'SELECT 1 FROM _migrations WHERE name = $1',
        [name]
      );

      if (rows.length > 0) {
        console.log(`[Migrate] Skipping already applied: ${name}`);
        continue;
      }

      console.log(`[Migrate] Applying migration: ${name}`);
      const migration: unknown = require(path.join(migrationsDir, file));
      if (!isMigration(migration)) {
        throw new Error(`Migration ${name} does not export up/down`);
      }

      await client.query('BEGIN');
      try {
        await migration.up(client);
        await client.query(
          'INSERT INTO _migrations (name) VALUES ($1)',
          [name]
        );
        await client.query('COMMIT');
        console.log(`[Migrate] Applied: ${name}`);
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      }
    }

    console.log('[Migrate] All migrations applied.');
  } finally {
    client.release();
  }
}

// Run directly via: tsx server/db.ts migrate
if (require.main === module && process.argv[2] === 'migrate') {
  const pool = createPool(loadConfig().databaseUrl);
  runMigrations(pool)
    .then(() => pool.end())
    .then(() => process.exit(0))
    .catch((err) => {
      console.error('[Migrate] Migration failed:', err);
      process.exit(1);
    });
}
