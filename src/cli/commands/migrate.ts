/**
 * CLI Migrate Command
 *
 * Creates any missing tables and indexes. Safe to run repeatedly.
 *
 * ```bash
 * npm run db:migrate
 * ```
 */

import { openDatabase, applySchema } from '@/storage';
import { bold, green, formatField } from '../utils/terminal';

export function runMigrateCommand(databasePath: string): void {
  const { sqlite } = openDatabase(databasePath);

  try {
    const tables = applySchema(sqlite);
    console.log(green(bold('Schema applied')));
    console.log(formatField('Database', databasePath));
    console.log(formatField('Tables', tables.join(', ')));
  } finally {
    sqlite.close();
  }
}
