/**
 * Scoring Types
 *
 * A PointsCalculator turns an answered record into points. The record kind
 * decides which method is called (see `scoreRecord`), so a calculator never
 * needs to inspect the record type itself.
 *
 * Points are conventionally in [0, 1]:
 * - test answers score exactly 0 or 1
 * - open answers score anywhere in [0, 1] and stay provisional until reviewed
 */

import type { OpenRecord, TestRecord } from '../models';

export interface PointsCalculator {
  /** Scores a button answer against the canonical option index */
  scoreTest(record: TestRecord): Promise<number>;

  /** Scores a free-text answer against the canonical answer */
  scoreOpen(record: OpenRecord): Promise<number>;
}

/**
 * Measures how close a free-text answer is to the expected answer.
 * Implementations return a value in [0, 1].
 */
export interface SimilarityScorer {
  similarity(expected: string, actual: string): Promise<number>;
}
