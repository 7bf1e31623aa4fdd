/**
 * Record Repository Implementation
 *
 * Data access for answer records. Every record returned carries its
 * question, loaded through QuestionRepository, so callers can render and
 * score it without another lookup.
 *
 * Besides CRUD this repository answers the queries of the scheduler and
 * the dispatcher: due records, lookups by message handle, per-question
 * history and questions held by other people.
 */

import { and, asc, eq, inArray, isNotNull, lte, ne, sql } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { records, type RecordRow } from '../schema';
import type { AnswerRecord, AnswerState, Question } from '@/core/models';
import type { QuestionHistory } from '@/core/scheduling/types';
import { ConsistencyError, NotFoundError } from '@/core/errors';
import type { Repository } from './base';
import { QuestionRepository } from './question.repository';

/**
 * Fields of a record that change over its lifecycle.
 */
export interface UpdateRecordInput {
  personAnswer?: string | null;
  messageHandle?: string | null;
  answerTime?: Date | null;
  state?: AnswerState;
  points?: number;
}

/**
 * Combines a row with its question into the record variant of the same kind.
 *
 * @throws ConsistencyError if the row points at a different question
 */
function mapToDomain(row: RecordRow, question: Question): AnswerRecord {
  if (row.questionId !== question.id) {
    throw new ConsistencyError(`Record '${row.id}' does not belong to question '${question.id}'`);
  }

  const base = {
    id: row.id,
    questionId: row.questionId,
    personId: row.personId,
    personAnswer: row.personAnswer,
    messageHandle: row.messageHandle,
    // Drizzle's timestamp_ms mode already returns Date objects
    askTime: row.askTime,
    answerTime: row.answerTime,
    state: row.state,
    points: row.points,
  };

  switch (question.kind) {
    case 'test':
      return { ...base, kind: 'test', question };
    case 'open':
      return { ...base, kind: 'open', question };
  }
}

/**
 * Repository for answer records.
 *
 * @example
 * ```typescript
 * const repo = new RecordRepository(db);
 *
 * const record = initRecord(question, 'person-1');
 * await repo.create(record);
 *
 * // Later, when the gateway reports an answer
 * const [found] = await repo.findByMessageHandle('123');
 * ```
 */
export class RecordRepository
  implements Repository<AnswerRecord, AnswerRecord, UpdateRecordInput>
{
  private readonly questions: QuestionRepository;

  constructor(private readonly db: AppDatabase) {
    this.questions = new QuestionRepository(db);
  }

  async findById(id: string): Promise<AnswerRecord | null> {
    const result = await this.db.select().from(records).where(eq(records.id, id)).limit(1);

    if (result.length === 0) {
      return null;
    }

    const [record] = await this.hydrate(result);
    return record ?? null;
  }

  async findAll(): Promise<AnswerRecord[]> {
    const rows = await this.db.select().from(records).orderBy(asc(records.askTime), asc(records.id));
    return this.hydrate(rows);
  }

  /**
   * Retrieves all records of one person, oldest ask time first.
   */
  async findByPerson(personId: string): Promise<AnswerRecord[]> {
    const rows = await this.db
      .select()
      .from(records)
      .where(eq(records.personId, personId))
      .orderBy(asc(records.askTime), asc(records.id));
    return this.hydrate(rows);
  }

  /**
   * Retrieves every record delivered under `messageHandle`. A healthy store
   * has at most one; the caller decides what more than one means.
   */
  async findByMessageHandle(messageHandle: string): Promise<AnswerRecord[]> {
    const rows = await this.db
      .select()
      .from(records)
      .where(eq(records.messageHandle, messageHandle));
    return this.hydrate(rows);
  }

  /**
   * Retrieves the person's records that are due but were never delivered,
   * oldest ask time first.
   */
  async findPlanned(personId: string, now: Date): Promise<AnswerRecord[]> {
    const rows = await this.db
      .select()
      .from(records)
      .where(
        and(
          eq(records.personId, personId),
          eq(records.state, 'not_answered'),
          lte(records.askTime, now)
        )
      )
      .orderBy(asc(records.askTime), asc(records.id));
    return this.hydrate(rows);
  }

  /**
   * Retrieves the oldest record delivered to the person and still waiting
   * for a reply, or null.
   */
  async findTransferred(personId: string): Promise<AnswerRecord | null> {
    const rows = await this.db
      .select()
      .from(records)
      .where(and(eq(records.personId, personId), eq(records.state, 'transferred')))
      .orderBy(asc(records.askTime), asc(records.id))
      .limit(1);

    const [record] = await this.hydrate(rows);
    return record ?? null;
  }

  /**
   * Aggregates the person's records per question.
   */
  async findHistory(personId: string, questionIds: string[]): Promise<QuestionHistory[]> {
    if (questionIds.length === 0) {
      return [];
    }

    const rows = await this.db
      .select({
        questionId: records.questionId,
        pointsSum: sql<number | null>`sum(${records.points})`,
        firstAskTime: sql<number>`min(${records.askTime})`,
        lastAskTime: sql<number>`max(${records.askTime})`,
      })
      .from(records)
      .where(and(eq(records.personId, personId), inArray(records.questionId, questionIds)))
      .groupBy(records.questionId);

    return rows.map((row) => ({
      questionId: row.questionId,
      pointsSum: row.pointsSum,
      firstAskTime: new Date(row.firstAskTime),
      lastAskTime: new Date(row.lastAskTime),
    }));
  }

  /**
   * Returns the ids among `questionIds` for which a person other than
   * `personId` holds a record that is not 'answered'.
   */
  async findQuestionsHeldByOthers(personId: string, questionIds: string[]): Promise<string[]> {
    if (questionIds.length === 0) {
      return [];
    }

    const rows = await this.db
      .selectDistinct({ questionId: records.questionId })
      .from(records)
      .where(
        and(
          inArray(records.questionId, questionIds),
          ne(records.personId, personId),
          ne(records.state, 'answered')
        )
      );
    return rows.map((row) => row.questionId);
  }

  /**
   * Retrieves the person's most recently answered record for each question
   * they have answered.
   */
  async findLatestAnswers(personId: string): Promise<AnswerRecord[]> {
    const rows = await this.db
      .select()
      .from(records)
      .where(and(eq(records.personId, personId), isNotNull(records.answerTime)))
      .orderBy(asc(records.answerTime), asc(records.id));

    const latest = new Map<string, RecordRow>();
    for (const row of rows) {
      latest.set(row.questionId, row);
    }
    return this.hydrate([...latest.values()]);
  }

  /**
   * Inserts a new record as it is.
   */
  async create(record: AnswerRecord): Promise<AnswerRecord> {
    const result = await this.db
      .insert(records)
      .values({
        id: record.id,
        questionId: record.questionId,
        personId: record.personId,
        personAnswer: record.personAnswer,
        messageHandle: record.messageHandle,
        askTime: record.askTime,
        answerTime: record.answerTime,
        state: record.state,
        points: record.points,
      })
      .returning();

    return mapToDomain(result[0], record.question);
  }

  /**
   * @throws NotFoundError if the record does not exist
   */
  async update(id: string, input: UpdateRecordInput): Promise<AnswerRecord> {
    if (Object.keys(input).length > 0) {
      await this.db.update(records).set(input).where(eq(records.id, id));
    }

    const updated = await this.findById(id);
    if (!updated) {
      throw new NotFoundError('Record', id);
    }
    return updated;
  }

  /**
   * Writes all mutable fields of the record.
   *
   * @throws NotFoundError if the record does not exist
   */
  async save(record: AnswerRecord): Promise<void> {
    const result = this.db
      .update(records)
      .set({
        personAnswer: record.personAnswer,
        messageHandle: record.messageHandle,
        answerTime: record.answerTime,
        state: record.state,
        points: record.points,
      })
      .where(eq(records.id, record.id))
      .run();

    if (result.changes === 0) {
      throw new NotFoundError('Record', record.id);
    }
  }

  /**
   * Stores the delivery of a record, but only if it is still
   * 'not_answered' in the database.
   *
   * @returns false when the record is missing or already past that state
   */
  async markTransferred(id: string, messageHandle: string): Promise<boolean> {
    const result = this.db
      .update(records)
      .set({ state: 'transferred', messageHandle })
      .where(and(eq(records.id, id), eq(records.state, 'not_answered')))
      .run();

    return result.changes > 0;
  }

  /**
   * @throws NotFoundError if the record does not exist
   */
  async delete(id: string): Promise<void> {
    const result = await this.db.delete(records).where(eq(records.id, id)).returning();

    if (result.length === 0) {
      throw new NotFoundError('Record', id);
    }
  }

  private async hydrate(rows: RecordRow[]): Promise<AnswerRecord[]> {
    const questionIds = [...new Set(rows.map((row) => row.questionId))];
    const questions = new Map(
      (await this.questions.findByIds(questionIds)).map((question) => [question.id, question])
    );

    return rows.map((row) => {
      const question = questions.get(row.questionId);
      if (!question) {
        throw new NotFoundError('Question', row.questionId);
      }
      return mapToDomain(row, question);
    });
  }
}
