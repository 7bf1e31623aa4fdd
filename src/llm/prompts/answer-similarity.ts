/**
 * Answer Similarity Prompt
 *
 * Builds the prompt used to grade a free-text answer against the canonical
 * answer of an open question, and parses the model's verdict.
 *
 * The model is told to reply with a single JSON object:
 *
 * ```json
 * { "similarity": 0.8, "reasoning": "Names the right mechanism, misses the edge case" }
 * ```
 *
 * Only `similarity` is used for scoring. `reasoning` is optional and is kept
 * for logs.
 */

import { z } from 'zod';
import { LLMError } from '../types';

export interface AnswerSimilarityResult {
  /** Similarity between 0 (unrelated) and 1 (same meaning) */
  similarity: number;
  reasoning: string | null;
}

const similarityResponseSchema = z.object({
  similarity: z.number().min(0).max(1),
  reasoning: z.string().optional(),
});

/**
 * Builds the grading prompt for one answer.
 *
 * @param expected - The canonical answer stored on the question
 * @param actual - The person's free-text reply
 */
export function buildAnswerSimilarityPrompt(expected: string, actual: string): string {
  return `You are grading a short answer to a study question.

Compare the learner's answer with the reference answer and judge how closely
their MEANING matches. Ignore spelling, word order and phrasing. An answer that
states the same fact in other words is a full match; an answer that is partly
right gets a partial score; an unrelated or contradictory answer scores 0.

<reference_answer>
${sanitize(expected)}
</reference_answer>

<learner_answer>
${sanitize(actual)}
</learner_answer>

You MUST respond with ONLY a valid JSON object in this exact format:

{
  "similarity": <number between 0.0 and 1.0>,
  "reasoning": "<one short sentence>"
}

Return ONLY the JSON object. Do not include markdown formatting or any other text.`;
}

/**
 * Parses the model output into an AnswerSimilarityResult.
 *
 * Accepts the JSON object on its own, inside a markdown code block, or
 * surrounded by stray text.
 *
 * @throws LLMError ('invalid_request') if no valid verdict can be found
 */
export function parseSimilarityResponse(response: string): AnswerSimilarityResult {
  const jsonString = extractJson(response);

  let raw: unknown;
  try {
    raw = JSON.parse(jsonString);
  } catch (error) {
    throw new LLMError(
      `Similarity response is not valid JSON: ${response.substring(0, 100)}`,
      'invalid_request',
      error instanceof Error ? error : undefined
    );
  }

  const parsed = similarityResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new LLMError(
      `Similarity response has the wrong shape: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
      'invalid_request'
    );
  }

  return {
    similarity: parsed.data.similarity,
    reasoning: parsed.data.reasoning ?? null,
  };
}

function extractJson(response: string): string {
  const codeBlockMatch = response.match(/```(?:json)?\s*([\s\S]*?)```/);
  const candidate = codeBlockMatch ? codeBlockMatch[1].trim() : response.trim();

  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start !== -1 && end > start) {
    return candidate.substring(start, end + 1);
  }
  return candidate;
}

/**
 * Keeps user text from closing the surrounding tags.
 */
function sanitize(text: string): string {
  return text.replace(/<\/?(reference_answer|learner_answer)>/gi, '');
}
