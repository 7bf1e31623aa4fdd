/**
 * Storage Module - Barrel Export
 *
 * Usage:
 *   import { openDatabase, applySchema, UnitOfWork, RecordRepository } from '@/storage';
 *
 *   const { db, sqlite } = openDatabase(config.database.path);
 *   applySchema(sqlite);
 *   const unitOfWork = new UnitOfWork(sqlite);
 */

export { openDatabase } from './db';
export type { AppDatabase, DatabaseHandle, SqliteConnection } from './db';

export { applySchema } from './migrate';
export { UnitOfWork, type TransactionRunner } from './unit-of-work';
export { createSchedulingStore } from './scheduling-store';

export { questions, questionGroups, records } from './schema';
export type { QuestionRow, NewQuestionRow, QuestionGroupRow, RecordRow, NewRecordRow } from './schema';

export * from './repositories';
