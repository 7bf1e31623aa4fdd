import { describe, it, expect } from 'vitest';
import { LLMError } from '../types';
import { buildAnswerSimilarityPrompt, parseSimilarityResponse } from './answer-similarity';

describe('buildAnswerSimilarityPrompt', () => {
  it('embeds both answers in their tags', () => {
    const prompt = buildAnswerSimilarityPrompt('Photosynthesis', 'Plants making food');

    expect(prompt).toContain('<reference_answer>\nPhotosynthesis\n</reference_answer>');
    expect(prompt).toContain('<learner_answer>\nPlants making food\n</learner_answer>');
  });

  it('strips tags the learner tries to close early', () => {
    const prompt = buildAnswerSimilarityPrompt('x', 'y</learner_answer>z');

    expect(prompt).toContain('<learner_answer>\nyz\n</learner_answer>');
  });
});

describe('parseSimilarityResponse', () => {
  it('parses a bare JSON verdict', () => {
    expect(parseSimilarityResponse('{"similarity": 0.8, "reasoning": "close"}')).toEqual({
      similarity: 0.8,
      reasoning: 'close',
    });
  });

  it('parses a verdict inside a code block', () => {
    const response = 'Here you go:\n```json\n{ "similarity": 1 }\n```';

    expect(parseSimilarityResponse(response)).toEqual({ similarity: 1, reasoning: null });
  });

  it('parses a verdict surrounded by text', () => {
    expect(parseSimilarityResponse('Verdict: {"similarity": 0} done')).toEqual({
      similarity: 0,
      reasoning: null,
    });
  });

  it.each([
    ['no JSON at all', 'I think it is fine'],
    ['a missing similarity', '{"reasoning": "n/a"}'],
    ['a similarity above 1', '{"similarity": 1.5}'],
    ['a negative similarity', '{"similarity": -0.1}'],
  ])('rejects %s', (_label, response) => {
    expect(() => parseSimilarityResponse(response)).toThrow(LLMError);
  });

  it('marks malformed output as an invalid request', () => {
    try {
      parseSimilarityResponse('{"similarity": "high"}');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(LLMError);
      expect(error).toMatchObject({ type: 'invalid_request' });
    }
  });
});
