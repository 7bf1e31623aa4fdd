/**
 * Question generator tests
 *
 * Run against an in-memory SchedulingStore so only selection logic is
 * exercised; the database-backed store is covered by the integration tests.
 */

import { describe, it, expect, vi } from 'vitest';
import type { AnswerRecord, Question } from '../models';
import { initRecord } from '../records/record-lifecycle';
import { DAY_MS, person, testQuestion } from '../../../tests/helpers';
import { createSeededRandom } from './random';
import { SimpleGenerator } from './simple-generator';
import { SmartGenerator } from './smart-generator';
import type { Generator, QuestionHistory, SchedulingStore } from './types';

const now = new Date('2024-03-11T09:00:00Z');
const clock = () => now;

interface FakeStoreData {
  planned?: AnswerRecord[];
  questions?: Question[];
  history?: QuestionHistory[];
  heldByOthers?: string[];
}

function fakeStore(data: FakeStoreData): SchedulingStore {
  return {
    findPlannedRecords: vi.fn(async () => data.planned ?? []),
    findCandidateQuestions: vi.fn(async (groupIds: string[], excludeIds: string[]) =>
      (data.questions ?? []).filter(
        (question) =>
          question.groupIds.some((groupId) => groupIds.includes(groupId)) &&
          !excludeIds.includes(question.id)
      )
    ),
    findHistory: vi.fn(async (_personId: string, questionIds: string[]) =>
      (data.history ?? []).filter((entry) => questionIds.includes(entry.questionId))
    ),
    findQuestionsHeldByOthers: vi.fn(async (_personId: string, questionIds: string[]) =>
      (data.heldByOthers ?? []).filter((id) => questionIds.includes(id))
    ),
  };
}

function plannedRecord(questionId: string, minutesAgo: number): AnswerRecord {
  return initRecord(testQuestion(questionId), 'p1', new Date(now.getTime() - minutesAgo * 60_000));
}

function askedDaysAgo(questionId: string, pointsSum: number, days: number): QuestionHistory {
  const askedAt = new Date(now.getTime() - days * DAY_MS);
  return { questionId, pointsSum, firstAskTime: askedAt, lastAskTime: askedAt };
}

const ids = (items: Array<{ id: string }>) => items.map((item) => item.id);

const generators: Array<[string, (store: SchedulingStore) => Generator]> = [
  ['SimpleGenerator', (store) => new SimpleGenerator(store, { now: clock, random: createSeededRandom(1) })],
  ['SmartGenerator', (store) => new SmartGenerator(store, { now: clock, random: createSeededRandom(1) })],
];

describe.each(generators)('%s', (_name, build) => {
  it('returns planned records first, truncated to the count', async () => {
    const planned = [plannedRecord('q1', 30), plannedRecord('q2', 20), plannedRecord('q3', 10)];
    const store = fakeStore({ planned, questions: [testQuestion('q4')] });

    const batch = await build(store).nextBunch(person('p1'), 2);

    expect(batch).toEqual([planned[0], planned[1]]);
    expect(store.findCandidateQuestions).not.toHaveBeenCalled();
  });

  it('fills the rest with candidates, skipping questions already planned', async () => {
    const planned = [plannedRecord('q1', 5)];
    const store = fakeStore({ planned, questions: [testQuestion('q1'), testQuestion('q2')] });

    const batch = await build(store).nextBunch(person('p1'), 2);

    expect(batch[0]).toBe(planned[0]);
    expect(ids(batch.slice(1))).toEqual(['q2']);
    expect(store.findCandidateQuestions).toHaveBeenCalledWith(['g1'], ['q1']);
  });

  it('returns only planned records for a person without groups', async () => {
    const planned = [plannedRecord('q1', 5)];
    const store = fakeStore({ planned, questions: [testQuestion('q2')] });

    expect(await build(store).nextBunch(person('p1', []), 3)).toEqual(planned);
    expect(await build(fakeStore({ questions: [testQuestion('q2')] })).nextBunch(person('p1', []), 3)).toEqual([]);
  });

  it('only offers questions from the person groups', async () => {
    const store = fakeStore({
      questions: [testQuestion('q1', { groupIds: ['g1'] }), testQuestion('q2', { groupIds: ['g2'] })],
    });

    expect(ids(await build(store).nextBunch(person('p1', [['g2', 0]]), 5))).toEqual(['q2']);
  });

  it('never returns more than the candidates or repeats one', async () => {
    const store = fakeStore({ questions: [testQuestion('q1'), testQuestion('q2')] });

    const batch = await build(store).nextBunch(person('p1'), 5);

    expect(batch).toHaveLength(2);
    expect(new Set(ids(batch))).toEqual(new Set(['q1', 'q2']));
  });

  it('returns nothing for a non-positive count', async () => {
    const store = fakeStore({ questions: [testQuestion('q1')] });
    expect(await build(store).nextBunch(person('p1'), 0)).toEqual([]);
  });

  it('defaults to one item', async () => {
    const store = fakeStore({ questions: [testQuestion('q1'), testQuestion('q2')] });
    expect(await build(store).nextBunch(person('p1'))).toHaveLength(1);
  });
});

describe('SmartGenerator weighting', () => {
  it('prefers the question with fewer points asked at the same time', async () => {
    const store = fakeStore({
      questions: [testQuestion('q1'), testQuestion('q2')],
      history: [askedDaysAgo('q1', 1, 10), askedDaysAgo('q2', 0.2, 10)],
    });
    const generator = new SmartGenerator(store, { now: clock, random: createSeededRandom(2024) });

    const probabilities = await generator.probabilities(person('p1'), [testQuestion('q1'), testQuestion('q2')]);
    expect(probabilities.get('q1')).toBeCloseTo(1 / 6, 10);
    expect(probabilities.get('q2')).toBeCloseTo(5 / 6, 10);

    let q2Picked = 0;
    for (let i = 0; i < 500; i++) {
      const [picked] = await generator.nextBunch(person('p1'), 1);
      if (picked.id === 'q2') {
        q2Picked++;
      }
    }
    expect(q2Picked).toBeGreaterThan(350);
  });

  it('gives never-scored questions ten times the largest known weight', async () => {
    const store = fakeStore({
      questions: [testQuestion('q1'), testQuestion('q2')],
      history: [askedDaysAgo('q1', 1, 3)],
    });
    const generator = new SmartGenerator(store, { now: clock });

    const probabilities = await generator.probabilities(person('p1'), [testQuestion('q1'), testQuestion('q2')]);

    expect(probabilities.get('q1')).toBeCloseTo(1 / 11, 10);
    expect(probabilities.get('q2')).toBeCloseTo(10 / 11, 10);
  });

  it('prefers questions at the person level', async () => {
    const questions = [testQuestion('q1', { level: 2 }), testQuestion('q2', { level: 0 })];
    const store = fakeStore({
      questions,
      history: [askedDaysAgo('q1', 1, 10), askedDaysAgo('q2', 1, 10)],
    });
    const generator = new SmartGenerator(store, { now: clock });

    const probabilities = await generator.probabilities(person('p1', [['g1', 2]]), questions);

    expect(probabilities.get('q1')).toBeCloseTo(1 / (1 + Math.exp(-2)), 10);
  });

  it('never picks a question another person still holds', async () => {
    const store = fakeStore({
      questions: [testQuestion('q1'), testQuestion('q2')],
      heldByOthers: ['q1'],
    });
    const generator = new SmartGenerator(store, { now: clock, random: createSeededRandom(5) });

    expect(ids(await generator.nextBunch(person('p1'), 2))).toEqual(['q2']);

    const probabilities = await generator.probabilities(person('p1'), [testQuestion('q1'), testQuestion('q2')]);
    expect(probabilities.has('q1')).toBe(false);
    expect(probabilities.get('q2')).toBe(1);
  });

  it('returns nothing new when every candidate is held by someone else', async () => {
    const store = fakeStore({ questions: [testQuestion('q1')], heldByOthers: ['q1'] });
    const generator = new SmartGenerator(store, { now: clock });

    expect(await generator.nextBunch(person('p1'), 1)).toEqual([]);
  });
});
