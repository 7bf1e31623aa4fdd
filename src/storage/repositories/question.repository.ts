/**
 * Question Repository Implementation
 *
 * Data access for questions and their group links. Questions are stored in
 * one table for both kinds; the group links live in `question_groups` and
 * are read back into `groupIds`.
 */

import { randomUUID } from 'node:crypto';
import { and, asc, eq, inArray, notInArray } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { questionGroups, questions, type QuestionRow } from '../schema';
import type { OpenQuestion, Question, TestQuestion } from '@/core/models';
import { NotFoundError } from '@/core/errors';
import type { Repository } from './base';

/**
 * Input for creating a question. The id is generated when omitted.
 */
export type CreateQuestionInput =
  | (Omit<TestQuestion, 'id'> & { id?: string })
  | (Omit<OpenQuestion, 'id'> & { id?: string });

/**
 * Input for updating a question. The kind of a question never changes;
 * `options` is ignored for open questions.
 */
export interface UpdateQuestionInput {
  text?: string;
  subject?: string | null;
  level?: number;
  articleUrl?: string | null;
  answer?: string;
  options?: string[];
  /** Replaces the full set of group links */
  groupIds?: string[];
}

/**
 * Generates a unique question id.
 */
export function generateQuestionId(): string {
  return `q_${randomUUID()}`;
}

/**
 * Maps a question row and its group ids to the domain model.
 */
function mapToDomain(row: QuestionRow, groupIds: string[]): Question {
  const base = {
    id: row.id,
    text: row.text,
    subject: row.subject,
    level: row.level,
    articleUrl: row.articleUrl,
    answer: row.answer,
    groupIds,
  };

  switch (row.kind) {
    case 'test':
      return { ...base, kind: 'test', options: row.options ?? [] };
    case 'open':
      return { ...base, kind: 'open' };
  }
}

/**
 * Repository for Question entity data access operations.
 *
 * @example
 * ```typescript
 * const repo = new QuestionRepository(db);
 *
 * await repo.create({
 *   kind: 'test',
 *   text: 'Which planet is closest to the sun?',
 *   subject: 'Astronomy',
 *   level: 1,
 *   articleUrl: null,
 *   answer: '2',
 *   options: ['Venus', 'Mercury', 'Mars'],
 *   groupIds: ['astronomy-101'],
 * });
 *
 * // Questions a person in 'astronomy-101' may be asked
 * const eligible = await repo.findByGroups(['astronomy-101']);
 * ```
 */
export class QuestionRepository
  implements Repository<Question, CreateQuestionInput, UpdateQuestionInput>
{
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<Question | null> {
    const result = await this.db.select().from(questions).where(eq(questions.id, id)).limit(1);

    if (result.length === 0) {
      return null;
    }

    const groups = await this.loadGroupIds([id]);
    return mapToDomain(result[0], groups.get(id) ?? []);
  }

  async findAll(): Promise<Question[]> {
    const rows = await this.db.select().from(questions).orderBy(asc(questions.id));
    return this.withGroups(rows);
  }

  /**
   * Retrieves the questions with the given ids, ordered by id.
   * Unknown ids are skipped.
   */
  async findByIds(ids: string[]): Promise<Question[]> {
    if (ids.length === 0) {
      return [];
    }

    const rows = await this.db
      .select()
      .from(questions)
      .where(inArray(questions.id, ids))
      .orderBy(asc(questions.id));
    return this.withGroups(rows);
  }

  /**
   * Retrieves the questions linked to at least one of `groupIds`, leaving
   * out the ids in `excludeIds`. Each question appears once.
   */
  async findByGroups(groupIds: string[], excludeIds: string[] = []): Promise<Question[]> {
    if (groupIds.length === 0) {
      return [];
    }

    const conditions = [inArray(questionGroups.groupId, groupIds)];
    if (excludeIds.length > 0) {
      conditions.push(notInArray(questionGroups.questionId, excludeIds));
    }

    const links = await this.db
      .selectDistinct({ questionId: questionGroups.questionId })
      .from(questionGroups)
      .where(and(...conditions));

    return this.findByIds(links.map((link) => link.questionId));
  }

  /**
   * Counts the distinct questions linked to at least one of `groupIds`.
   */
  async countByGroups(groupIds: string[]): Promise<number> {
    if (groupIds.length === 0) {
      return 0;
    }

    const links = await this.db
      .selectDistinct({ questionId: questionGroups.questionId })
      .from(questionGroups)
      .where(inArray(questionGroups.groupId, groupIds));

    return links.length;
  }

  async create(input: CreateQuestionInput): Promise<Question> {
    const id = input.id ?? generateQuestionId();

    const result = await this.db
      .insert(questions)
      .values({
        id,
        kind: input.kind,
        text: input.text,
        subject: input.subject,
        level: input.level,
        articleUrl: input.articleUrl,
        answer: input.answer,
        options: input.kind === 'test' ? input.options : null,
        createdAt: new Date(),
      })
      .returning();

    await this.replaceGroups(id, input.groupIds);

    return mapToDomain(result[0], uniqueIds(input.groupIds));
  }

  /**
   * @throws NotFoundError if the question does not exist
   */
  async update(id: string, input: UpdateQuestionInput): Promise<Question> {
    const existing = await this.findById(id);
    if (!existing) {
      throw new NotFoundError('Question', id);
    }

    const { groupIds, options, ...fields } = input;
    const updates = existing.kind === 'test' && options !== undefined ? { ...fields, options } : fields;

    if (Object.keys(updates).length > 0) {
      await this.db.update(questions).set(updates).where(eq(questions.id, id));
    }
    if (groupIds !== undefined) {
      await this.replaceGroups(id, groupIds);
    }

    const updated = await this.findById(id);
    if (!updated) {
      throw new NotFoundError('Question', id);
    }
    return updated;
  }

  /**
   * Deletes the question. Its records and group links go with it.
   *
   * @throws NotFoundError if the question does not exist
   */
  async delete(id: string): Promise<void> {
    const result = await this.db.delete(questions).where(eq(questions.id, id)).returning();

    if (result.length === 0) {
      throw new NotFoundError('Question', id);
    }
  }

  private async replaceGroups(questionId: string, groupIds: string[]): Promise<void> {
    await this.db.delete(questionGroups).where(eq(questionGroups.questionId, questionId));

    const unique = uniqueIds(groupIds);
    if (unique.length > 0) {
      await this.db
        .insert(questionGroups)
        .values(unique.map((groupId) => ({ questionId, groupId })));
    }
  }

  private async withGroups(rows: QuestionRow[]): Promise<Question[]> {
    const groups = await this.loadGroupIds(rows.map((row) => row.id));
    return rows.map((row) => mapToDomain(row, groups.get(row.id) ?? []));
  }

  private async loadGroupIds(questionIds: string[]): Promise<Map<string, string[]>> {
    const byQuestion = new Map<string, string[]>();
    if (questionIds.length === 0) {
      return byQuestion;
    }

    const links = await this.db
      .select()
      .from(questionGroups)
      .where(inArray(questionGroups.questionId, questionIds));

    for (const link of links) {
      const list = byQuestion.get(link.questionId) ?? [];
      list.push(link.groupId);
      byQuestion.set(link.questionId, list);
    }
    return byQuestion;
  }
}

function uniqueIds(ids: string[]): string[] {
  return [...new Set(ids)];
}
