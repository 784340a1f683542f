import fs from 'fs';
import path from 'path';
import SQLite from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import { config } from '../config/index.js';
import type { Database } from './schema.js';
import { createSchema } from './schema.js';

export function createDatabase(filename: string): Kysely<Database> {
  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }

  const database = new SQLite(filename);
  database.pragma('journal_mode = WAL');

  return new Kysely<Database>({
    dialect: new SqliteDialect({ database }),
  });
}

let sharedDb: Kysely<Database> | null = null;

// Opened lazily so that importing this module never touches the filesystem
export function getDatabase(): Kysely<Database> {
  if (!sharedDb) {
    sharedDb = createDatabase(config.database.path);
  }
  return sharedDb;
}

const initialized = new WeakSet<Kysely<Database>>();

export async function initializeDatabase(db: Kysely<Database> = getDatabase()): Promise<void> {
  if (!initialized.has(db)) {
    await createSchema(db);
    initialized.add(db);
  }
}

export async function closeDatabase(): Promise<void> {
  if (sharedDb) {
    await sharedDb.destroy();
    sharedDb = null;
  }
}
