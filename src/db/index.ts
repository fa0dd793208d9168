import DatabaseConstructor from 'better-sqlite3';
import type { Database as BetterSqliteDatabase } from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { mkdirSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { APP_ENV } from '../config.js';
import { logger } from '../logger.js';
import * as schema from './schema.js';

export type DatabaseClient = ReturnType<typeof drizzle<typeof schema>>;

let dbClient: DatabaseClient | null = null;
let sqliteInstance: BetterSqliteDatabase | null = null;

// src/db (or dist/db) sits two levels below the project root
const SCHEMA_FILE = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..', 'drizzle', 'schema.sql');

/**
 * Create the ledger tables if they do not exist yet
 */
export const applySchema = (sqlite: BetterSqliteDatabase): void => {
  try {
    sqlite.exec(readFileSync(SCHEMA_FILE, 'utf-8'));
    logger.debug({ schemaFile: SCHEMA_FILE }, 'database schema applied');
  } catch (error) {
    logger.error({ err: error, schemaFile: SCHEMA_FILE }, 'applying database schema failed');
    throw error;
  }
};

export const getDb = (): DatabaseClient => {
  if (dbClient) {
    return dbClient;
  }

  const dbPath = APP_ENV.DATABASE_PATH;
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  sqliteInstance = new DatabaseConstructor(dbPath);
  sqliteInstance.pragma('journal_mode = WAL');
  sqliteInstance.pragma('foreign_keys = ON');
  applySchema(sqliteInstance);
  dbClient = drizzle(sqliteInstance, { schema });

  return dbClient;
};

export const closeDb = (): void => {
  if (!dbClient || !sqliteInstance) {
    return;
  }
  sqliteInstance.close();
  sqliteInstance = null;
  dbClient = null;
};
