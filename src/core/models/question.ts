/**
 * Question Domain Types
 *
 * A Question is a single item of study material that can be asked of a person.
 * Two kinds exist:
 *
 * 1. Test questions carry an ordered list of options; the person answers by
 *    pressing a button and the answer is graded automatically.
 * 2. Open questions expect a free-text answer that is scored provisionally and
 *    then confirmed by a human reviewer.
 *
 * Questions are linked to groups (many-to-many). A question is only ever
 * offered to people who belong to at least one of its groups.
 *
 * This module contains only pure TypeScript types with no runtime dependencies.
 */

/**
 * Discriminator shared by questions and the records created from them.
 */
export type QuestionKind = 'test' | 'open';

/**
 * Fields common to every question kind.
 */
interface QuestionBase {
  /** Unique identifier - a prefixed UUID (e.g., 'q_abc123') */
  id: string;

  /** The prompt shown to the person */
  text: string;

  /** Optional subject area, used for reporting only */
  subject: string | null;

  /**
   * Difficulty level on the same integer scale as a person's per-group
   * proficiency level. The smart generator prefers questions whose level is
   * close to the person's level.
   */
  level: number;

  /** Optional link to reading material about the question */
  articleUrl: string | null;

  /**
   * Canonical answer. For test questions this is the 1-based index of the
   * correct option rendered as a string ('1' is the first option).
   */
  answer: string;

  /** Ids of the groups this question is associated with */
  groupIds: string[];
}

/**
 * A multiple-choice question answered with a button press.
 */
export interface TestQuestion extends QuestionBase {
  kind: 'test';

  /** Ordered answer options shown as buttons */
  options: string[];
}

/**
 * A question answered with free text.
 */
export interface OpenQuestion extends QuestionBase {
  kind: 'open';
}

/**
 * Any question. Narrow on `kind` to reach kind-specific fields.
 *
 * @example
 * ```typescript
 * const question: Question = {
 *   id: 'q_abc123',
 *   kind: 'test',
 *   text: 'Which planet is closest to the sun?',
 *   subject: 'Astronomy',
 *   level: 1,
 *   articleUrl: null,
 *   answer: '2',
 *   groupIds: ['astronomy-101'],
 *   options: ['Venus', 'Mercury', 'Mars'],
 * };
 * ```
 */
export type Question = TestQuestion | OpenQuestion;
