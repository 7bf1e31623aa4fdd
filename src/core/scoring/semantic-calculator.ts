/**
 * Semantic Calculator
 *
 * Grades open answers by meaning rather than wording. The similarity
 * measurement itself is pluggable (see SimilarityScorer); the default
 * implementation asks an LLM. Test answers are still graded by exact match.
 */

import type { OpenRecord, TestRecord } from '../models';
import { scoreExactMatch } from './exact-match-calculator';
import type { PointsCalculator, SimilarityScorer } from './types';

export class SemanticCalculator implements PointsCalculator {
  constructor(private readonly scorer: SimilarityScorer) {}

  async scoreTest(record: TestRecord): Promise<number> {
    return scoreExactMatch(record);
  }

  /**
   * Scores the open answer by its similarity to the canonical answer.
   * An empty answer scores 0 without consulting the scorer.
   */
  async scoreOpen(record: OpenRecord): Promise<number> {
    const answer = record.personAnswer?.trim() ?? '';
    if (answer === '') {
      return 0;
    }

    const similarity = await this.scorer.similarity(record.question.answer, answer);
    return clampScore(similarity);
  }
}

/**
 * Clamps a score into [0, 1]. Non-finite values become 0.
 */
export function clampScore(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}
