import { readdirSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { join } from 'node:path';
import { runMigrations } from 'graphile-worker';
import { env } from '../src/config/env.js';
import { createDatabase, createPool } from '../src/db/pool.js';

const migrationsDir = fileURLToPath(new URL('../migrations/', import.meta.url));

const main = async () => {
  const db = createDatabase(createPool(env.databaseUrl));
  try {
    await db.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        name TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    const applied = await db.query<{ name: string }>('SELECT name FROM schema_migrations');
    const done = new Set(applied.rows.map((row) => row.name));

    const files = readdirSync(migrationsDir)
      .filter((name) => name.endsWith('.sql'))
      .sort((left, right) => left.localeCompare(right));

    for (const file of files) {
      if (done.has(file)) {
        continue;
      }
      const sql = readFileSync(join(migrationsDir, file), 'utf8');
      await db.transaction(async (tx) => {
        await tx.query(sql);
        await tx.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
      });
      console.log(`Applied ${file}`);
    }
    await runMigrations({ connectionString: env.databaseUrl });
    console.log('Migrations complete (app schema and graphile_worker)');
  } finally {
    await db.end();
  }
};

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
