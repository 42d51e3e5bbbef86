import dotenv from 'dotenv';
import { loadDbConfig } from '../infra/config.js';
import { Database } from '../infra/db/database.js';
import { runMigrations } from '../infra/db/migrate.js';

dotenv.config();

async function migrate(): Promise<void> {
  console.log('Starting migrations...');
  const db = await Database.connect(loadDbConfig());
  try {
    const applied = await runMigrations(db);
    console.log(
      applied.length === 0
        ? 'No pending migrations.'
        : `All ${applied.length} migration(s) applied successfully.`
    );
  } finally {
    await db.close();
  }
}

migrate().catch((error: unknown) => {
  console.error('Migration failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
