import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { hashPassword } from '../domain/auth/password.js';
import { generateCollection, shoeCatalogSchema } from '../domain/inventory/randomCollection.js';
import { loadDbConfig } from '../infra/config.js';
import { Database } from '../infra/db/database.js';
import { runMigrations } from '../infra/db/migrate.js';
import { ShoeRepo } from '../infra/db/shoeRepo.js';
import { UserRepo } from '../infra/db/userRepo.js';
import { formatPrice } from '../infra/cli/render.js';

dotenv.config();

const CATALOG_PATH = fileURLToPath(new URL('./shoeCatalog.json', import.meta.url));

/**
 * Recreate `username` with a random 20-pair collection (2 duplicated pairs),
 * for trying the selection menus against realistic data.
 */
export async function seedCollection(username: string, password: string): Promise<void> {
  const catalog = shoeCatalogSchema.parse(JSON.parse(await readFile(CATALOG_PATH, 'utf-8')));
  const db = await Database.connect(loadDbConfig());

  try {
    await runMigrations(db);
    const users = new UserRepo(db);
    const shoes = new ShoeRepo(db);

    console.log('[1] Cleaning up existing test data...');
    const existing = await users.findByUsername(username);
    if (existing) {
      await users.delete(existing.id);
    }

    console.log(`[2] Creating user '${username}'...`);
    const user = await users.create({
      username,
      email: `${username}@test.com`,
      passwordHash: await hashPassword(password),
    });
    console.log(`✓ User created with ID: ${user.id}`);

    console.log('[3] Adding 20 random shoes with at least 2 sets of duplicates...');
    const collection = generateCollection(catalog, Math.random);
    for (const [index, shoe] of collection.entries()) {
      await shoes.insert(user.id, shoe);
      console.log(
        `  [${index + 1}/${collection.length}] ${shoe.brand} ${shoe.model} - ${shoe.colorway} (Size ${shoe.size}, ${formatPrice(shoe.price)}, ${shoe.condition})`
      );
    }

    console.log('[4] Collection summary by brand:');
    for (const { brand, count } of await shoes.countBrands(user.id, collection.length)) {
      console.log(`  • ${brand}: ${count} ${count > 1 ? 'pairs' : 'pair'}`);
    }
    console.log('[5] Collection summary by model:');
    for (const { brand, model, count } of await shoes.summarize(user.id)) {
      console.log(`  • ${brand} ${model}: ${count} ${count > 1 ? 'pairs [DUPLICATE]' : 'pair'}`);
    }
    console.log(`✓ '${username}' can now log in.`);
  } finally {
    await db.close();
  }
}

if (import.meta.url === `file://${process.argv[1]}` || process.argv[1]?.endsWith('seedCollection.ts')) {
  const [username, password] = process.argv.slice(2);
  if (!username || !password) {
    console.error('Usage: npm run seed -- <username> <password>');
    process.exit(1);
  }
  seedCollection(username, password)
    .then(() => {
      process.exit(0);
    })
    .catch((error: unknown) => {
      console.error('Seeding failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    });
}
