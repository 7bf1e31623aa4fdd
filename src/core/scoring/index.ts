/**
 * Scoring Module - Barrel Export
 *
 * Points calculators consumed by `scoreRecord`:
 * - ExactMatchCalculator: exact match for tests, provisional constant for open answers
 * - SemanticCalculator: exact match for tests, similarity for open answers
 */

export type { PointsCalculator, SimilarityScorer } from './types';
export { ExactMatchCalculator, scoreExactMatch, type ExactMatchCalculatorConfig } from './exact-match-calculator';
export { SemanticCalculator, clampScore } from './semantic-calculator';
export { LlmSimilarityScorer } from './llm-similarity-scorer';
