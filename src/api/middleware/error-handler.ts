/**
 * Error Handler for the quiz-dispatch API
 *
 * Registered through `app.onError`, it turns anything thrown by a route into
 * the standard error envelope. Domain errors are mapped by kind:
 *
 * | Source                         | Status | Code                |
 * |--------------------------------|--------|---------------------|
 * | AppError                       | own    | own                 |
 * | QuizError 'validation'         | 400    | VALIDATION_ERROR    |
 * | QuizError 'not_found'          | 404    | NOT_FOUND           |
 * | QuizError 'consistency'        | 409    | CONFLICT            |
 * | QuizError 'gateway'            | 502    | GATEWAY_ERROR       |
 * | LLMError                       | 502    | LLM_ERROR           |
 * | DirectoryError                 | 502    | DIRECTORY_ERROR     |
 * | anything else                  | 500    | INTERNAL_ERROR      |
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.onError(errorHandler());
 * ```
 */

import type { ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { QuizError, type QuizErrorKind } from '@/core/errors';
import { LLMError } from '@/llm/types';
import { DirectoryError } from '@/directory/types';
import type { ApiErrorResponse } from '../types';

export const ErrorCodes = {
  BAD_REQUEST: 'BAD_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  CONFLICT: 'CONFLICT',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
  GATEWAY_ERROR: 'GATEWAY_ERROR',
  LLM_ERROR: 'LLM_ERROR',
  DIRECTORY_ERROR: 'DIRECTORY_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * An error raised by the HTTP layer itself, carrying its own status and code.
 */
export class AppError extends Error {
  public readonly code: ErrorCode | string;
  public readonly statusCode: ContentfulStatusCode;
  public readonly details?: unknown;

  constructor(
    code: ErrorCode | string,
    message: string,
    statusCode: ContentfulStatusCode = 500,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

const KIND_MAPPING: Record<QuizErrorKind, { code: ErrorCode; status: ContentfulStatusCode }> = {
  validation: { code: ErrorCodes.VALIDATION_ERROR, status: 400 },
  not_found: { code: ErrorCodes.NOT_FOUND, status: 404 },
  consistency: { code: ErrorCodes.CONFLICT, status: 409 },
  gateway: { code: ErrorCodes.GATEWAY_ERROR, status: 502 },
};

function errorResponse(
  code: string,
  message: string,
  details?: unknown
): ApiErrorResponse {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details !== undefined && { details }),
    },
  };
}

/**
 * Maps a thrown value to its response body and status code.
 */
export function formatErrorResponse(error: unknown): {
  response: ApiErrorResponse;
  statusCode: ContentfulStatusCode;
} {
  if (error instanceof AppError) {
    return {
      response: errorResponse(error.code, error.message, error.details),
      statusCode: error.statusCode,
    };
  }

  if (error instanceof QuizError) {
    const { code, status } = KIND_MAPPING[error.kind];
    return {
      response: errorResponse(code, error.message, error.details),
      statusCode: status,
    };
  }

  if (error instanceof LLMError) {
    return {
      response: errorResponse(ErrorCodes.LLM_ERROR, error.message, { type: error.type }),
      statusCode: 502,
    };
  }

  if (error instanceof DirectoryError) {
    return {
      response: errorResponse(ErrorCodes.DIRECTORY_ERROR, error.message, { status: error.status }),
      statusCode: 502,
    };
  }

  const isDev = process.env.NODE_ENV !== 'production';
  const message = error instanceof Error ? error.message : String(error);

  return {
    response: errorResponse(
      ErrorCodes.INTERNAL_ERROR,
      isDev ? message : 'An unexpected error occurred. Please try again.'
    ),
    statusCode: 500,
  };
}

/**
 * Creates the `app.onError` handler.
 */
export function errorHandler(): ErrorHandler {
  return (error, c) => {
    const { response, statusCode } = formatErrorResponse(error);

    if (statusCode >= 500) {
      console.error('[API] Request failed:', error);
    } else {
      console.warn(`[API] ${c.req.method} ${c.req.path} -> ${statusCode}: ${response.error.message}`);
    }

    return c.json(response, statusCode);
  };
}
