/**
 * Answer Record Domain Types
 *
 * An AnswerRecord is one instance of a question asked of one person. It tracks
 * the delivery and answer lifecycle together with the points scored:
 *
 * ```
 * not_answered ──transfer──▶ transferred ──score──▶ answered   (test)
 *                                         └─score──▶ pending    (open)
 * ```
 *
 * The record holds a non-owning reference to its question so that messages
 * can be rendered and answers scored without another lookup.
 */

import type { OpenQuestion, TestQuestion } from './question';

/**
 * Lifecycle state of an answer record.
 *
 * - 'not_answered': Created (possibly planned for later) but not delivered yet
 * - 'transferred': Delivered through the gateway, waiting for a reply
 * - 'pending': Reply received and scored provisionally, awaiting human review
 * - 'answered': Reply received and scored, final
 */
export type AnswerState = 'not_answered' | 'transferred' | 'pending' | 'answered';

/**
 * All answer states, in lifecycle order.
 */
export const ANSWER_STATES = [
  'not_answered',
  'transferred',
  'pending',
  'answered',
] as const satisfies readonly AnswerState[];

interface RecordBase {
  /** Unique identifier - a prefixed UUID (e.g., 'rec_abc123') */
  id: string;

  /** Id of the owning question */
  questionId: string;

  /** Identifier of the person the question is asked of */
  personId: string;

  /** Raw answer given by the person, or null before a reply arrives */
  personAnswer: string | null;

  /**
   * Gateway-assigned handle of the outbound message. Null until the record
   * has been transferred.
   */
  messageHandle: string | null;

  /** When the question is (or was) due to be asked */
  askTime: Date;

  /** When the person answered, or null */
  answerTime: Date | null;

  state: AnswerState;

  /** Points scored, conventionally in [0, 1]. Only mutated by scoring. */
  points: number;
}

export interface TestRecord extends RecordBase {
  kind: 'test';
  question: TestQuestion;
}

export interface OpenRecord extends RecordBase {
  kind: 'open';
  question: OpenQuestion;
}

/**
 * Any answer record. The record kind always matches its question kind.
 */
export type AnswerRecord = TestRecord | OpenRecord;
