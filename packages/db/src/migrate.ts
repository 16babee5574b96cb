// =============================================================================
// Calmpoint — Migration Runner
// Usage: npm run db:migrate
// =============================================================================

import { readdir, readFile } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createSql, closeDb, type Sql } from './client.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const MIGRATIONS_DIR = join(__dirname, '..', 'migrations');

async function ensureMigrationsTable(sql: Sql): Promise<void> {
  await sql`
    CREATE TABLE IF NOT EXISTS _migrations (
      id          SERIAL      PRIMARY KEY,
      filename    TEXT        NOT NULL UNIQUE,
      applied_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `;
}

async function getAppliedMigrations(sql: Sql): Promise<Set<string>> {
  const rows = await sql<{ filename: string }[]>`
    SELECT filename FROM _migrations ORDER BY id
  `;
  return new Set(rows.map((r) => r.filename));
}

async function applyMigration(sql: Sql, filename: string, sqlContent: string): Promise<void> {
  console.log(`Applying migration: ${filename}`);
  // Multi-statement DDL needs unsafe (no prepared statements)
  await sql.unsafe(sqlContent);
  await sql`INSERT INTO _migrations (filename) VALUES (${filename})`;
  console.log(`  ✓ Applied: ${filename}`);
}

async function migrate(): Promise<void> {
  console.log('Calmpoint — Database Migration Runner');
  console.log('=====================================');

  const databaseUrl = process.env['DATABASE_URL'];
  if (!databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }
  const sql = createSql(databaseUrl, { max: 1 });

  try {
    await ensureMigrationsTable(sql);
    const applied = await getAppliedMigrations(sql);

    const files = (await readdir(MIGRATIONS_DIR))
      .filter((f) => f.endsWith('.sql'))
      .sort(); // Numeric prefixes keep alphabetical order == apply order

    let count = 0;
    for (const filename of files) {
      if (applied.has(filename)) {
        console.log(`  — Skipping (already applied): ${filename}`);
        continue;
      }
      const content = await readFile(join(MIGRATIONS_DIR, filename), 'utf-8');
      await applyMigration(sql, filename, content);
      count++;
    }

    if (count === 0) {
      console.log('\nAll migrations are up to date.');
    } else {
      console.log(`\nApplied ${count} migration(s).`);
    }
  } finally {
    await closeDb(sql);
  }
}

migrate().catch((err: unknown) => {
  console.error('Migration failed:', err);
  process.exit(1);
});
