/**
 * Answer record lifecycle tests
 */

import { describe, it, expect } from 'vitest';
import { ConsistencyError } from '../errors';
import type { MessageFactory } from '../dispatch/types';
import { ExactMatchCalculator } from '../scoring';
import { openQuestion, testQuestion } from '../../../tests/helpers';
import { dispatchRecord, initRecord, scoreRecord, setAnswer, transferRecord } from './record-lifecycle';

const askTime = new Date('2024-03-01T09:00:00Z');

describe('initRecord', () => {
  it('creates a test record for a test question', () => {
    const record = initRecord(testQuestion('q1'), 'p1', askTime);

    expect(record.kind).toBe('test');
    expect(record.questionId).toBe('q1');
    expect(record.personId).toBe('p1');
    expect(record.state).toBe('not_answered');
    expect(record.points).toBe(0);
    expect(record.messageHandle).toBeNull();
    expect(record.personAnswer).toBeNull();
    expect(record.answerTime).toBeNull();
    expect(record.askTime).toEqual(askTime);
    expect(record.id).toMatch(/^rec_/);
  });

  it('creates an open record for an open question', () => {
    expect(initRecord(openQuestion('q2'), 'p1', askTime).kind).toBe('open');
  });
});

describe('transferRecord', () => {
  it('stores the handle and moves to transferred', () => {
    const record = initRecord(testQuestion('q1'), 'p1', askTime);

    transferRecord(record, '123');

    expect(record.state).toBe('transferred');
    expect(record.messageHandle).toBe('123');
  });

  it('refuses a second transfer and keeps the first handle', () => {
    const record = initRecord(testQuestion('q1'), 'p1', askTime);
    transferRecord(record, '123');

    expect(() => transferRecord(record, '456')).toThrow(ConsistencyError);
    expect(record.messageHandle).toBe('123');
  });
});

describe('setAnswer', () => {
  it('stores the answer and time without changing state', () => {
    const record = initRecord(testQuestion('q1'), 'p1', askTime);
    transferRecord(record, '1');
    const at = new Date('2024-03-01T10:00:00Z');

    setAnswer(record, '2', at);

    expect(record.personAnswer).toBe('2');
    expect(record.answerTime).toEqual(at);
    expect(record.state).toBe('transferred');
  });
});

describe('scoreRecord', () => {
  const calculator = new ExactMatchCalculator({ openScore: 0.4 });

  it('finalizes a correct test answer with one point', async () => {
    const record = initRecord(testQuestion('q1'), 'p1', askTime);
    transferRecord(record, '1');
    setAnswer(record, '2');

    const points = await scoreRecord(record, calculator);

    expect(points).toBe(1);
    expect(record.points).toBe(1);
    expect(record.state).toBe('answered');
  });

  it('gives a wrong test answer zero points', async () => {
    const record = initRecord(testQuestion('q1'), 'p1', askTime);
    transferRecord(record, '1');
    setAnswer(record, '0');

    expect(await scoreRecord(record, calculator)).toBe(0);
    expect(record.state).toBe('answered');
  });

  it('leaves open answers pending review', async () => {
    const record = initRecord(openQuestion('q2'), 'p1', askTime);
    transferRecord(record, '1');
    setAnswer(record, 'rain');

    expect(await scoreRecord(record, calculator)).toBe(0.4);
    expect(record.state).toBe('pending');
  });

  it('refuses a record that was never delivered', async () => {
    const record = initRecord(testQuestion('q1'), 'p1', askTime);

    await expect(scoreRecord(record, calculator)).rejects.toThrow(ConsistencyError);
  });

  it('refuses a record that was already scored', async () => {
    const record = initRecord(testQuestion('q1'), 'p1', askTime);
    transferRecord(record, '1');
    setAnswer(record, '2');
    await scoreRecord(record, calculator);

    await expect(scoreRecord(record, calculator)).rejects.toThrow(ConsistencyError);
  });
});

describe('dispatchRecord', () => {
  const factory: MessageFactory<string> = {
    createTest: (record) => `test:${record.id}`,
    createOpen: (record) => `open:${record.id}`,
  };

  it('calls the factory method matching the record kind', () => {
    const test = initRecord(testQuestion('q1'), 'p1', askTime);
    const open = initRecord(openQuestion('q2'), 'p1', askTime);

    expect(dispatchRecord(test, factory)).toBe(`test:${test.id}`);
    expect(dispatchRecord(open, factory)).toBe(`open:${open.id}`);
  });
});
