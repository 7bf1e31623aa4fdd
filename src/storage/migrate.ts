/**
 * Schema Migration
 *
 * Applies schema.sql to a database. Every statement is idempotent, so this
 * runs safely on each start, from the `migrate` CLI command and from tests.
 *
 * Usage:
 *   npm run db:migrate                       # Uses DATABASE_PATH or the default
 *   DATABASE_PATH=/path/to/db npm run db:migrate
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { SqliteConnection } from './db';

const SCHEMA_PATH = fileURLToPath(new URL('./schema.sql', import.meta.url));

/**
 * Executes the schema DDL against an open connection.
 *
 * @returns Names of the application tables now present
 */
export function applySchema(sqlite: SqliteConnection): string[] {
  sqlite.exec(readFileSync(SCHEMA_PATH, 'utf-8'));

  return sqlite
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .all()
    .map((row) => row.name);
}
