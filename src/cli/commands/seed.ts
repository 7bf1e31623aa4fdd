/**
 * CLI Seed Command
 *
 * Loads questions from a JSON file into the question bank. The file holds an
 * array of questions:
 *
 * ```json
 * [
 *   {
 *     "kind": "test",
 *     "text": "Which planet is closest to the sun?",
 *     "options": ["Venus", "Mercury", "Mars"],
 *     "answer": "2",
 *     "groupIds": ["astronomy"]
 *   },
 *   {
 *     "kind": "open",
 *     "text": "Why is the sky blue?",
 *     "answer": "Rayleigh scattering",
 *     "groupIds": ["physics"]
 *   }
 * ]
 * ```
 *
 * A test question's answer is the number of the correct button. Button 0 is
 * always the "I don't know" option, so the options are numbered from 1.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ValidationError } from '@/core/errors';
import { openDatabase, applySchema, UnitOfWork, type TransactionRunner } from '@/storage';
import { QuestionRepository, type CreateQuestionInput } from '@/storage/repositories';
import { bold, green, formatField } from '../utils/terminal';

const baseQuestionSchema = z.object({
  id: z.string().min(1).optional(),
  text: z.string().min(1, 'Question text is required'),
  subject: z.string().nullable().default(null),
  level: z.number().int().min(0).default(0),
  articleUrl: z.string().url().nullable().default(null),
  answer: z.string().min(1, 'Answer is required'),
  groupIds: z.array(z.string().min(1)).default([]),
});

const testQuestionSchema = baseQuestionSchema
  .extend({
    kind: z.literal('test'),
    options: z.array(z.string().min(1)).min(1, 'Test questions need at least one option'),
  })
  .refine(
    (question) =>
      /^\d+$/.test(question.answer) &&
      Number(question.answer) >= 1 &&
      Number(question.answer) <= question.options.length,
    { message: 'Answer must be the number of one of the options (1-based)', path: ['answer'] }
  );

const openQuestionSchema = baseQuestionSchema.extend({
  kind: z.literal('open'),
});

export const questionFileSchema = z.array(z.union([testQuestionSchema, openQuestionSchema]));

/**
 * Parses and validates the contents of a question file.
 *
 * @throws ValidationError if the JSON is malformed or a question is invalid
 */
export function parseQuestionFile(raw: string): CreateQuestionInput[] {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ValidationError('Question file is not valid JSON', {
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  const result = questionFileSchema.safeParse(data);
  if (!result.success) {
    throw new ValidationError('Question file is invalid', result.error.issues);
  }

  return result.data;
}

/**
 * Inserts every question of the file in one unit of work.
 *
 * @returns The number of questions created
 */
export async function seedQuestions(
  questions: QuestionRepository,
  unitOfWork: TransactionRunner,
  inputs: CreateQuestionInput[]
): Promise<number> {
  return unitOfWork.run(async () => {
    for (const input of inputs) {
      await questions.create(input);
    }
    return inputs.length;
  });
}

export async function runSeedCommand(databasePath: string, file: string): Promise<void> {
  const inputs = parseQuestionFile(await readFile(file, 'utf-8'));

  const { db, sqlite } = openDatabase(databasePath);
  try {
    applySchema(sqlite);
    const created = await seedQuestions(new QuestionRepository(db), new UnitOfWork(sqlite), inputs);

    console.log(green(bold('Questions loaded')));
    console.log(formatField('File', file));
    console.log(formatField('Created', created));
  } finally {
    sqlite.close();
  }
}
