/**
 * Anthropic Client Wrapper
 *
 * Wraps the Anthropic SDK for the single use this service has for it:
 * non-streaming completions used to judge free-text answers. It handles
 * API key checks, default model settings, and maps SDK errors to LLMError.
 *
 * Usage:
 * ```typescript
 * const client = new AnthropicClient({ apiKey: config.anthropic.apiKey });
 * const response = await client.complete('Hello!');
 * console.log(response.text);
 * ```
 */

import Anthropic, {
  APIError,
  APIConnectionError,
  APIConnectionTimeoutError,
  AuthenticationError,
  RateLimitError,
  BadRequestError,
  InternalServerError,
} from '@anthropic-ai/sdk';
import type { MessageParam } from '@anthropic-ai/sdk/resources/messages';
import { LLMError, type CompletionClient, type LLMConfig, type LLMErrorType, type LLMMessage, type LLMResponse } from './types';

const DEFAULT_MODEL = 'claude-3-5-haiku-latest';

const DEFAULT_MAX_TOKENS = 256;

// Answer grading should be reproducible
const DEFAULT_TEMPERATURE = 0;

export interface AnthropicClientOptions extends LLMConfig {
  /** API key; the client refuses to start without one */
  apiKey?: string;
}

export class AnthropicClient implements CompletionClient {
  private client: Anthropic;

  private defaultConfig: Required<LLMConfig>;

  /**
   * @throws LLMError if no API key is given
   */
  constructor(options: AnthropicClientOptions = {}) {
    if (!options.apiKey) {
      throw new LLMError(
        'ANTHROPIC_API_KEY environment variable is required for the llm scorer.\n' +
          'Set it, or switch OPEN_SCORER back to "constant".',
        'authentication'
      );
    }

    this.client = new Anthropic({ apiKey: options.apiKey });

    this.defaultConfig = {
      model: options.model ?? DEFAULT_MODEL,
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
    };
  }

  /**
   * Makes a non-streaming API call and returns the complete response.
   *
   * @param messages - A single user message or a full message array
   * @param config - Overrides for this request
   * @throws LLMError on API errors
   */
  async complete(
    messages: string | LLMMessage[],
    config: LLMConfig = {}
  ): Promise<LLMResponse> {
    const formattedMessages = this.formatMessages(
      typeof messages === 'string' ? [{ role: 'user', content: messages }] : messages
    );
    const mergedConfig = this.mergeConfig(config);

    try {
      const response = await this.client.messages.create({
        model: mergedConfig.model,
        max_tokens: mergedConfig.maxTokens,
        temperature: mergedConfig.temperature,
        messages: formattedMessages,
      });

      return {
        text: this.extractText(response.content),
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
        stopReason: response.stop_reason,
      };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  private formatMessages(messages: LLMMessage[]): MessageParam[] {
    return messages.map((msg) => ({
      role: msg.role,
      content: msg.content,
    }));
  }

  private mergeConfig(config: LLMConfig): Required<LLMConfig> {
    return {
      model: config.model ?? this.defaultConfig.model,
      maxTokens: config.maxTokens ?? this.defaultConfig.maxTokens,
      temperature: config.temperature ?? this.defaultConfig.temperature,
    };
  }

  /**
   * Concatenates the text blocks of a response.
   */
  private extractText(content: Anthropic.Messages.ContentBlock[]): string {
    return content
      .filter((block): block is Anthropic.Messages.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');
  }

  /**
   * Converts an API error to a typed LLMError.
   */
  private handleError(error: unknown): LLMError {
    // Timeout extends APIConnectionError, so check it first
    if (error instanceof APIConnectionTimeoutError) {
      return new LLMError('Request to Anthropic API timed out.', 'timeout', error);
    }

    if (error instanceof APIConnectionError) {
      return new LLMError(
        'Failed to connect to Anthropic API. Please check your network connection.',
        'network',
        error
      );
    }

    if (error instanceof APIError) {
      return new LLMError(error.message, this.mapErrorType(error), error);
    }

    const message = error instanceof Error ? error.message : 'Unknown error occurred';
    return new LLMError(message, 'unknown', error instanceof Error ? error : undefined);
  }

  private mapErrorType(error: APIError): LLMErrorType {
    if (error instanceof AuthenticationError) {
      return 'authentication';
    }
    if (error instanceof RateLimitError) {
      return 'rate_limit';
    }
    if (error instanceof BadRequestError) {
      return 'invalid_request';
    }
    if (error instanceof InternalServerError) {
      return 'server_error';
    }
    return 'unknown';
  }
}
