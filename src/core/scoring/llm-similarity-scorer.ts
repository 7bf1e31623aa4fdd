/**
 * LLM Similarity Scorer
 *
 * SimilarityScorer backed by a completion model. Each call sends one grading
 * prompt and reads back the `similarity` field of the JSON verdict.
 */

import type { CompletionClient } from '@/llm/types';
import { buildAnswerSimilarityPrompt, parseSimilarityResponse } from '@/llm/prompts';
import type { SimilarityScorer } from './types';

export class LlmSimilarityScorer implements SimilarityScorer {
  constructor(private readonly client: CompletionClient) {}

  /**
   * @throws LLMError if the call fails or the verdict cannot be parsed
   */
  async similarity(expected: string, actual: string): Promise<number> {
    const response = await this.client.complete(buildAnswerSimilarityPrompt(expected, actual));
    const result = parseSimilarityResponse(response.text);

    console.log(
      `[Scoring] Open answer similarity ${result.similarity.toFixed(2)}` +
        (result.reasoning ? ` (${result.reasoning})` : '')
    );

    return result.similarity;
  }
}
