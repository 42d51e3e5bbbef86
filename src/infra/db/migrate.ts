import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { fileURLToPath } from 'url';
import type { Database } from './database.js';

// Beside this module, in src/ under tsx and in dist/ after `npm run build`.
export const MIGRATIONS_DIR = fileURLToPath(new URL('./migrations/', import.meta.url));

export interface Migration {
  filename: string;
  version: number;
}

/**
 * Numbered `NNN_name.sql` files in ascending version order.
 */
export function parseMigrationFilenames(files: string[]): Migration[] {
  return files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return {
        filename,
        version: parseInt(match[1], 10),
      };
    })
    .sort((a, b) => a.version - b.version);
}

async function ensureMigrationsTable(db: Database): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedVersions(db: Database): Promise<number[]> {
  const result = await db.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return result.rows.map((row) => row.version);
}

/**
 * Apply every pending migration, each in its own transaction.
 * Returns the versions applied by this call.
 */
export async function runMigrations(db: Database, migrationsDir = MIGRATIONS_DIR): Promise<number[]> {
  await ensureMigrationsTable(db);
  const migrations = parseMigrationFilenames(await readdir(migrationsDir));
  const applied = await getAppliedVersions(db);
  const pending = migrations.filter((m) => !applied.includes(m.version));

  for (const migration of pending) {
    const sql = await readFile(join(migrationsDir, migration.filename), 'utf-8');
    await db.transaction(async (tx) => {
      await tx.query(sql);
      await tx.query('INSERT INTO schema_migrations (version) VALUES ($1)', [migration.version]);
    });
    console.log(`✓ Applied migration ${migration.version}: ${migration.filename}`);
  }

  return pending.map((m) => m.version);
}
