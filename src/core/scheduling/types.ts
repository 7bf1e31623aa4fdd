/**
 * Scheduling Types
 *
 * A Generator decides what a person is asked next. It returns a mix of
 * planned records (already created, due, never delivered) and fresh
 * questions for which the router still has to create records.
 */

import type { AnswerRecord, Person, Question } from '../models';

/**
 * One item of a batch: a due record, or a question to create a record for.
 */
export type ScheduledItem = AnswerRecord | Question;

/**
 * Picks the next questions for a person.
 */
export interface Generator {
  /**
   * Returns at most `count` items. Planned records come first (oldest ask
   * time first); fresh questions fill the remaining places.
   */
  nextBunch(person: Person, count?: number): Promise<ScheduledItem[]>;
}

/**
 * A person's history with one question, aggregated over all of their
 * records for it.
 */
export interface QuestionHistory {
  questionId: string;
  /** Sum of points over the records, or null when there are none */
  pointsSum: number | null;
  /** Earliest ask time */
  firstAskTime: Date;
  /** Latest ask time */
  lastAskTime: Date;
}

/**
 * Read access the generators need. Implemented over the repositories in
 * storage; tests may pass an in-memory version.
 */
export interface SchedulingStore {
  /** Not answered records of the person with ask time <= now, oldest first */
  findPlannedRecords(personId: string, now: Date): Promise<AnswerRecord[]>;

  /** Questions sharing a group with `groupIds`, minus `excludeIds` */
  findCandidateQuestions(groupIds: string[], excludeIds: string[]): Promise<Question[]>;

  /** History for each of `questionIds` the person has records for */
  findHistory(personId: string, questionIds: string[]): Promise<QuestionHistory[]>;

  /**
   * Ids among `questionIds` that some other person holds a record for in
   * any state but 'answered'
   */
  findQuestionsHeldByOthers(personId: string, questionIds: string[]): Promise<string[]>;
}

/**
 * Source of uniform random numbers in [0, 1).
 */
export type RandomSource = () => number;

/**
 * Source of the current time.
 */
export type Clock = () => Date;

/**
 * Options shared by every generator.
 */
export interface GeneratorOptions {
  /** Random source for sampling (default: Math.random) */
  random?: RandomSource;
  /** Clock used for due dates and elapsed time (default: new Date()) */
  now?: Clock;
}

/**
 * Returns true if the item is a record rather than a question.
 */
export function isRecord(item: ScheduledItem): item is AnswerRecord {
  return 'questionId' in item;
}
