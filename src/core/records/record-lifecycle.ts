/**
 * Answer Record Lifecycle
 *
 * Every state change an answer record goes through lives in this module:
 *
 * 1. `initRecord` creates a record of the kind matching its question
 * 2. `transferRecord` marks it delivered under a gateway message handle
 * 3. `setAnswer` stores the raw reply
 * 4. `scoreRecord` grades the reply and moves it to a final or review state
 *
 * `dispatchRecord` is the single place where behavior is selected by record
 * kind, so the rest of the code can hand records around without branching.
 *
 * Records are plain objects and are mutated in place; persisting them is the
 * caller's job.
 */

import { randomUUID } from 'node:crypto';
import { ConsistencyError } from '../errors';
import type { AnswerRecord, Question } from '../models';
import type { MessageFactory } from '../dispatch/types';
import type { PointsCalculator } from '../scoring/types';

/**
 * Generates a unique record id.
 */
export function generateRecordId(): string {
  return `rec_${randomUUID()}`;
}

/**
 * Creates a new record asking `question` of `personId`.
 *
 * The record kind always matches the question kind, starts in
 * 'not_answered' with zero points and has no message handle.
 *
 * @param askTime - When the question is due to be asked (defaults to now)
 */
export function initRecord(
  question: Question,
  personId: string,
  askTime: Date = new Date()
): AnswerRecord {
  const base = {
    id: generateRecordId(),
    questionId: question.id,
    personId,
    personAnswer: null,
    messageHandle: null,
    askTime,
    answerTime: null,
    state: 'not_answered' as const,
    points: 0,
  };

  switch (question.kind) {
    case 'test':
      return { ...base, kind: 'test', question };
    case 'open':
      return { ...base, kind: 'open', question };
  }
}

/**
 * Marks a record as delivered under the gateway's message handle.
 *
 * @throws ConsistencyError if the record has already been sent or answered
 */
export function transferRecord(record: AnswerRecord, messageHandle: string): void {
  if (record.state !== 'not_answered') {
    throw new ConsistencyError(
      `Record '${record.id}' cannot be transferred from state '${record.state}'`,
      { recordId: record.id, state: record.state, messageHandle }
    );
  }

  record.state = 'transferred';
  record.messageHandle = messageHandle;
}

/**
 * Stores the person's raw answer. Does not change the record state.
 */
export function setAnswer(record: AnswerRecord, answer: string, at: Date = new Date()): void {
  record.personAnswer = answer;
  record.answerTime = at;
}

/**
 * Scores the record with the given calculator.
 *
 * Test records end in 'answered'. Open records always end in 'pending'
 * whatever the score, because free-text answers need a human to confirm
 * the grade.
 *
 * @returns The points applied to the record
 * @throws ConsistencyError if the record is not waiting for a reply
 */
export async function scoreRecord(
  record: AnswerRecord,
  calculator: PointsCalculator
): Promise<number> {
  if (record.state !== 'transferred') {
    throw new ConsistencyError(
      `Record '${record.id}' cannot be scored in state '${record.state}'`,
      { recordId: record.id, state: record.state }
    );
  }

  switch (record.kind) {
    case 'test':
      record.points = await calculator.scoreTest(record);
      record.state = 'answered';
      break;
    case 'open':
      record.points = await calculator.scoreOpen(record);
      record.state = 'pending';
      break;
  }

  return record.points;
}

/**
 * Hands the record to the factory method matching its kind.
 *
 * @example
 * ```typescript
 * const message = dispatchRecord(record, detachedMessageFactory);
 * ```
 */
export function dispatchRecord<T>(record: AnswerRecord, factory: MessageFactory<T>): T {
  switch (record.kind) {
    case 'test':
      return factory.createTest(record);
    case 'open':
      return factory.createOpen(record);
  }
}
