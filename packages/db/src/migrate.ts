import dotenv from 'dotenv';

dotenv.config({ path: '.env.local' });
dotenv.config({ path: '.env' });

import { readdir } from 'node:fs/promises';
import path from 'node:path';
import postgres from 'postgres';

const MIGRATIONS_DIR = path.resolve(__dirname, '../migrations');

async function runMigrations() {
  const connectionString = process.env.DATABASE_URL_ADMIN || process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL_ADMIN or DATABASE_URL environment variable is required');
  }

  const masked = connectionString.replace(/:[^:@]+@/, ':***@');
  console.log(`Connecting to database: ${masked}`);
  const client = postgres(connectionString, { max: 1, prepare: false });

  try {
    await client`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        name text PRIMARY KEY,
        applied_at timestamptz NOT NULL DEFAULT now()
      )
    `;
    const applied = new Set(
      (await client<{ name: string }[]>`SELECT name FROM schema_migrations`).map((r) => r.name),
    );

    const files = (await readdir(MIGRATIONS_DIR)).filter((f) => f.endsWith('.sql')).sort();
    for (const file of files) {
      if (applied.has(file)) continue;
      console.log(`Applying ${file}...`);
      await client.begin(async (tx) => {
        await tx.file(path.join(MIGRATIONS_DIR, file));
        await tx.unsafe('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
      });
    }
    console.log('Migrations complete.');
  } finally {
    await client.end();
  }
}

runMigrations().catch((err) => {
  console.error('Migration failed:', err);
  process.exit(1);
});
