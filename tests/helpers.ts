/**
 * Test Helpers Module
 *
 * Builders for questions, people and stored records.
 */

import type { AnswerRecord, OpenQuestion, Person, Question, TestQuestion } from '../src/core/models';
import { initRecord } from '../src/core/records/record-lifecycle';
import type { RecordRepository } from '../src/storage';

export type TestQuestionInput = Omit<TestQuestion, 'id'> & { id?: string };
export type OpenQuestionInput = Omit<OpenQuestion, 'id'> & { id?: string };

/**
 * A two-option test question in group 'g1' whose right answer is button 2 ('b').
 */
export function testQuestionInput(overrides: Partial<TestQuestionInput> = {}): TestQuestionInput {
  return {
    kind: 'test',
    text: 'Pick the second letter',
    subject: null,
    level: 0,
    articleUrl: null,
    answer: '2',
    options: ['a', 'b'],
    groupIds: ['g1'],
    ...overrides,
  };
}

export function openQuestionInput(overrides: Partial<OpenQuestionInput> = {}): OpenQuestionInput {
  return {
    kind: 'open',
    text: 'Describe the water cycle',
    subject: null,
    level: 0,
    articleUrl: null,
    answer: 'Evaporation, condensation, precipitation',
    groupIds: ['g1'],
    ...overrides,
  };
}

/**
 * An in-memory test question with an explicit id, for code that never
 * touches the database.
 */
export function testQuestion(id: string, overrides: Partial<TestQuestionInput> = {}): TestQuestion {
  return { ...testQuestionInput(overrides), id };
}

export function openQuestion(id: string, overrides: Partial<OpenQuestionInput> = {}): OpenQuestion {
  return { ...openQuestionInput(overrides), id };
}

export function person(id: string, groups: Array<[string, number]> = [['g1', 0]]): Person {
  return {
    id,
    fullName: `Person ${id}`,
    groups: groups.map(([groupId, level]) => ({ groupId, level })),
  };
}

/**
 * Stores a record for `question` with the given fields applied.
 */
export async function storeRecord(
  records: RecordRepository,
  question: Question,
  personId: string,
  fields: Partial<Pick<AnswerRecord, 'state' | 'points' | 'messageHandle' | 'personAnswer' | 'answerTime'>> & {
    askTime?: Date;
  } = {}
): Promise<AnswerRecord> {
  const record = initRecord(question, personId, fields.askTime ?? new Date('2024-03-01T09:00:00Z'));
  Object.assign(record, fields);
  return records.create(record);
}

export const DAY_MS = 24 * 60 * 60 * 1000;
