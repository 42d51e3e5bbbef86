#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadDbConfig } from '../config.js';
import { Database } from '../db/database.js';
import { runMigrations } from '../db/migrate.js';
import { ShoeRepo } from '../db/shoeRepo.js';
import { UserRepo } from '../db/userRepo.js';
import { runSession } from './session.js';
import { ReadlineTerminal } from './terminal.js';

dotenv.config();

async function connect(): Promise<Database> {
  const db = await Database.connect(loadDbConfig());
  try {
    await runMigrations(db);
  } catch (error) {
    await db.close();
    throw error;
  }
  return db;
}

/**
 * Failing to reach or prepare the database is the only fatal error.
 */
async function main(): Promise<number> {
  let db: Database;
  try {
    db = await connect();
  } catch (error) {
    console.error(`❌ Cannot connect to database: ${error instanceof Error ? error.message : String(error)}`);
    console.error('\nPlease check:');
    console.error('  - Database server is running');
    console.error('  - Credentials in .env file are correct');
    console.error('  - Network connection is available');
    return 1;
  }

  const terminal = new ReadlineTerminal();
  try {
    await runSession({ users: new UserRepo(db), shoes: new ShoeRepo(db) }, terminal);
  } finally {
    terminal.close();
    await db.close();
    console.log('Database connection closed successfully.');
  }
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
