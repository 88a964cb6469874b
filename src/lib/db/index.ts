/**
 * SQLite Database Connection
 *
 * Opens a sql.js (WebAssembly SQLite) database, applies schema.sql, and wraps
 * it in a drizzle instance. sql.js is synchronous, so a drizzle transaction
 * is one uninterrupted read-check-write unit on the connection.
 *
 * sql.js keeps the database in memory. A file-backed database is loaded from
 * `filename` when it exists and written back by `persist()` and `close()`.
 *
 * Usage:
 *   import { createDatabase } from './db';
 *   const { db, close } = await createDatabase();       // DATABASE_PATH
 *   const { db } = await createDatabase(':memory:');     // tests
 */

import * as fs from 'fs';
import path from 'path';
import initSqlJs, { type SqlJsStatic } from 'sql.js';
import { drizzle, type SQLJsDatabase } from 'drizzle-orm/sql-js';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import { loadConfig } from '../config';
import { createLogger } from '../logger';
import * as schema from './schema';

export type AppDatabase = SQLJsDatabase<typeof schema>;

/** The connection itself or an open transaction on it. */
export type SyncDatabase = BaseSQLiteDatabase<'sync', void, typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase;
  /** Writes a file-backed database to disk; a no-op for `:memory:`. */
  persist: () => void;
  /** Persists, then releases the connection. */
  close: () => void;
}

const MEMORY = ':memory:';
const SCHEMA_PATH = path.join(__dirname, 'schema.sql');
const CONNECTION_PRAGMAS = 'PRAGMA foreign_keys = ON;';

let sqlJs: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) {
    sqlJs = initSqlJs();
  }
  return sqlJs;
}

export async function createDatabase(filename: string = loadConfig().databasePath): Promise<DatabaseHandle> {
  const logger = createLogger('db');
  const SQL = await loadSqlJs();

  const inMemory = filename === MEMORY;
  const existing = !inMemory && fs.existsSync(filename) ? fs.readFileSync(filename) : undefined;
  const sqlite = new SQL.Database(existing);
  sqlite.exec(fs.readFileSync(SCHEMA_PATH, 'utf8'));

  logger.debug('Database opened', { filename, loaded: existing !== undefined });

  const persist = (): void => {
    if (inMemory) return;
    fs.mkdirSync(path.dirname(filename), { recursive: true });
    fs.writeFileSync(filename, sqlite.export());
    // export() reopens the connection, which drops connection pragmas
    sqlite.exec(CONNECTION_PRAGMAS);
    logger.debug('Database persisted', { filename });
  };

  return {
    db: drizzle(sqlite, { schema }),
    persist,
    close: () => {
      persist();
      sqlite.close();
    },
  };
}

export { schema };
