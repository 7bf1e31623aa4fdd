/**
 * Database Schema Definitions
 *
 * Drizzle ORM schema definitions for SQLite. The matching DDL lives in
 * schema.sql and is applied by `applySchema()`; keep the two in step.
 *
 * - Questions: the question bank, test and open questions in one table
 * - Question Groups: many-to-many link between questions and person groups
 * - Records: one row per question asked of one person
 *
 * All timestamps are stored as milliseconds since epoch (integer).
 */

import {
  sqliteTable,
  text,
  integer,
  real,
  index,
  primaryKey,
} from 'drizzle-orm/sqlite-core';

/**
 * Questions Table
 *
 * Kind values:
 * - 'test': answered by pressing one of the `options` buttons
 * - 'open': answered with free text
 */
export const questions = sqliteTable('questions', {
  // Unique identifier (e.g., 'q_abc123')
  id: text('id').primaryKey(),

  kind: text('kind', { enum: ['test', 'open'] }).notNull(),

  // Prompt shown to the person
  text: text('text').notNull(),

  subject: text('subject'),

  // Difficulty, compared against a person's proficiency level in a group
  level: integer('level').notNull().default(0),

  articleUrl: text('article_url'),

  // Canonical answer. For test questions the 1-based option number as text
  answer: text('answer').notNull(),

  // JSON array of button labels; null for open questions
  options: text('options', { mode: 'json' }).$type<string[]>(),

  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Question Groups Table
 *
 * A question is eligible for every person in one of its groups.
 */
export const questionGroups = sqliteTable(
  'question_groups',
  {
    questionId: text('question_id')
      .notNull()
      .references(() => questions.id, { onDelete: 'cascade' }),

    groupId: text('group_id').notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.questionId, table.groupId] }),
    index('question_groups_group_id_idx').on(table.groupId),
  ]
);

/**
 * Records Table
 *
 * State values:
 * - 'not_answered': created, not yet delivered
 * - 'transferred': delivered, waiting for a reply
 * - 'pending': open answer scored, waiting for review
 * - 'answered': final
 */
export const records = sqliteTable(
  'records',
  {
    // Unique identifier (e.g., 'rec_abc123')
    id: text('id').primaryKey(),

    questionId: text('question_id')
      .notNull()
      .references(() => questions.id, { onDelete: 'cascade' }),

    // Person id from the directory
    personId: text('person_id').notNull(),

    personAnswer: text('person_answer'),

    // Gateway message id, set when the question is delivered
    messageHandle: text('message_handle'),

    askTime: integer('ask_time', { mode: 'timestamp_ms' }).notNull(),

    answerTime: integer('answer_time', { mode: 'timestamp_ms' }),

    state: text('state', {
      enum: ['not_answered', 'transferred', 'pending', 'answered'],
    })
      .notNull()
      .default('not_answered'),

    points: real('points').notNull().default(0),
  },
  (table) => [
    index('records_person_state_idx').on(table.personId, table.state),
    index('records_question_id_idx').on(table.questionId),
    index('records_message_handle_idx').on(table.messageHandle),
  ]
);

export type QuestionRow = typeof questions.$inferSelect;
export type NewQuestionRow = typeof questions.$inferInsert;
export type QuestionGroupRow = typeof questionGroups.$inferSelect;
export type RecordRow = typeof records.$inferSelect;
export type NewRecordRow = typeof records.$inferInsert;
