/**
 * LLM Module - Barrel Export
 *
 * Abstraction layer over the Anthropic SDK, used to grade open answers.
 *
 * @example
 * ```typescript
 * import { AnthropicClient, buildAnswerSimilarityPrompt, parseSimilarityResponse } from '@/llm';
 *
 * const client = new AnthropicClient({ apiKey: config.anthropic.apiKey });
 * const response = await client.complete(buildAnswerSimilarityPrompt('Paris', 'paris, France'));
 * const { similarity } = parseSimilarityResponse(response.text);
 * ```
 */

export { AnthropicClient, type AnthropicClientOptions } from './client';

export {
  LLMError,
  type CompletionClient,
  type LLMConfig,
  type LLMErrorType,
  type LLMMessage,
  type LLMResponse,
} from './types';

export * from './prompts';
