/**
 * Database Connection Factory
 *
 * Opens SQLite databases through better-sqlite3 and wraps them with Drizzle
 * ORM. Foreign key enforcement is switched on for every connection.
 *
 * Usage:
 *   import { openDatabase } from '@/storage/db';
 *   const { db, sqlite } = openDatabase(config.database.path);
 *
 *   // In-memory for tests
 *   const { db } = openDatabase(':memory:');
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';

/**
 * Type alias for the Drizzle database instance.
 */
export type AppDatabase = BetterSQLite3Database<typeof schema>;

/**
 * Raw better-sqlite3 connection, needed for transactions and DDL.
 */
export type SqliteConnection = Database.Database;

export interface DatabaseHandle {
  db: AppDatabase;
  sqlite: SqliteConnection;
}

/**
 * Opens (or creates) the SQLite database at `dbPath`.
 *
 * @param dbPath - File path, or ':memory:' for a throwaway database
 */
export function openDatabase(dbPath: string): DatabaseHandle {
  const sqlite = new Database(dbPath);

  // SQLite has this disabled by default; cascades from questions depend on it
  sqlite.pragma('foreign_keys = ON');

  return { db: drizzle(sqlite, { schema }), sqlite };
}
