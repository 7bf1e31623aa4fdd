/**
 * LLM Types and Interfaces
 *
 * A thin abstraction over the Anthropic SDK types, so that the scoring code
 * depends on these shapes rather than on the SDK directly.
 */

/**
 * A single message in a conversation.
 */
export interface LLMMessage {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Per-request options. All fields fall back to the client defaults.
 */
export interface LLMConfig {
  /** Model identifier */
  model?: string;

  /** Maximum number of tokens to generate */
  maxTokens?: number;

  /** Sampling temperature (0.0 to 1.0) */
  temperature?: number;
}

/**
 * Result of a completed (non-streaming) call.
 */
export interface LLMResponse {
  /** The generated response text */
  text: string;

  /** Token usage, or null if the API did not report it */
  usage: {
    inputTokens: number;
    outputTokens: number;
  } | null;

  /** The reason the model stopped generating */
  stopReason: 'end_turn' | 'max_tokens' | 'stop_sequence' | 'tool_use' | null;
}

/**
 * Minimal completion interface. The scoring code depends on this rather
 * than on AnthropicClient so it can be given a fake in tests.
 */
export interface CompletionClient {
  complete(messages: string | LLMMessage[], config?: LLMConfig): Promise<LLMResponse>;
}

/**
 * Error types that can occur when calling the LLM API.
 */
export type LLMErrorType =
  | 'authentication'   // Invalid or missing API key
  | 'rate_limit'       // Too many requests
  | 'invalid_request'  // Bad request parameters or unusable output
  | 'server_error'     // Anthropic server error
  | 'network'          // Network/connection error
  | 'timeout'          // Request took too long
  | 'unknown';

/**
 * Custom error class for LLM-related errors.
 */
export class LLMError extends Error {
  /** The type of error that occurred */
  type: LLMErrorType;
  /** The original error that was caught, if any */
  cause?: Error;

  constructor(message: string, type: LLMErrorType, cause?: Error) {
    super(message);
    this.name = 'LLMError';
    this.type = type;
    this.cause = cause;
  }
}
