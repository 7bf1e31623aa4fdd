/**
 * Exact Match Calculator
 *
 * The deterministic calculator. Test answers score 1 when the pressed button
 * matches the canonical answer and 0 otherwise. Open answers cannot be
 * graded mechanically, so they receive a fixed provisional score that a
 * reviewer later replaces.
 */

import type { OpenRecord, TestRecord } from '../models';
import type { PointsCalculator } from './types';

/**
 * Provisional score given to every open answer.
 */
const DEFAULT_OPEN_SCORE = 0.5;

export interface ExactMatchCalculatorConfig {
  /** Score given to open answers before review (default: 0.5) */
  openScore: number;
}

/**
 * Scores test answers by comparing with the canonical answer.
 *
 * @example
 * ```typescript
 * const calculator = new ExactMatchCalculator();
 * const points = await scoreRecord(record, calculator);
 * ```
 */
export class ExactMatchCalculator implements PointsCalculator {
  private readonly openScore: number;

  constructor(config: Partial<ExactMatchCalculatorConfig> = {}) {
    this.openScore = config.openScore ?? DEFAULT_OPEN_SCORE;
  }

  async scoreTest(record: TestRecord): Promise<number> {
    return scoreExactMatch(record);
  }

  async scoreOpen(_record: OpenRecord): Promise<number> {
    return this.openScore;
  }
}

/**
 * 1 if the person's answer equals the canonical answer, else 0.
 * A missing answer never matches.
 */
export function scoreExactMatch(record: TestRecord): number {
  if (record.personAnswer === null) {
    return 0;
  }
  return record.personAnswer === record.question.answer ? 1 : 0;
}
