/**
 * Unit of Work
 *
 * Runs asynchronous work inside one SQLite transaction. Drizzle's
 * better-sqlite3 driver only accepts synchronous transaction callbacks, so
 * the transaction is opened and closed on the raw connection instead.
 *
 * Units share the single connection, so they are run one at a time: a unit
 * that starts while another is open waits for it to finish. Units must not
 * be nested.
 *
 * @example
 * ```typescript
 * const unitOfWork = new UnitOfWork(sqlite);
 * await unitOfWork.run(async () => {
 *   await recordRepo.create(record);
 *   await recordRepo.create(other);
 * });
 * ```
 */

import type { SqliteConnection } from './db';

/**
 * Anything that can run work transactionally. The core depends on this so
 * tests can substitute a pass-through.
 */
export interface TransactionRunner {
  run<T>(work: () => Promise<T>): Promise<T>;
}

export class UnitOfWork implements TransactionRunner {
  /** Settles when the most recently queued unit has finished */
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly sqlite: SqliteConnection) {}

  /**
   * Runs `work` in a transaction. Commits when it resolves and rolls back
   * when it rejects; the rejection is passed on to the caller.
   */
  run<T>(work: () => Promise<T>): Promise<T> {
    const result = this.tail.then(() => this.runInTransaction(work));
    // Keep the chain going whatever this unit's outcome
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async runInTransaction<T>(work: () => Promise<T>): Promise<T> {
    this.sqlite.exec('BEGIN IMMEDIATE');
    try {
      const value = await work();
      this.sqlite.exec('COMMIT');
      return value;
    } catch (error) {
      if (this.sqlite.inTransaction) {
        this.sqlite.exec('ROLLBACK');
      }
      throw error;
    }
  }
}
