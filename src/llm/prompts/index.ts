/**
 * LLM Prompts Module - Barrel Export
 */

export {
  buildAnswerSimilarityPrompt,
  parseSimilarityResponse,
  type AnswerSimilarityResult,
} from './answer-similarity';
