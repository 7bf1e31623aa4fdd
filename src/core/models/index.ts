/**
 * Core Domain Models - Barrel Export
 *
 * These types form the contract between the scheduler, router, dispatcher
 * and storage layers, and have no runtime dependencies apart from the
 * answer state list.
 *
 * @example
 * ```typescript
 * import type { Question, AnswerRecord, Person } from '@/core/models';
 * ```
 */

export type {
  QuestionKind,
  TestQuestion,
  OpenQuestion,
  Question,
} from './question';

export {
  ANSWER_STATES,
  type AnswerState,
  type TestRecord,
  type OpenRecord,
  type AnswerRecord,
} from './record';

export type { GroupLevel, Person } from './person';
