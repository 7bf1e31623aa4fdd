/**
 * API Response Utilities
 *
 * Helpers that wrap payloads in the envelopes defined in `../types`.
 *
 * @example
 * ```typescript
 * import { success } from '@/api/utils/response';
 *
 * app.get('/health', (c) => success(c, { status: 'ok' }));
 * ```
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiResponse, ApiErrorResponse } from '../types';

/**
 * Creates a standardized success response.
 *
 * @param statusCode - HTTP status code (default: 200)
 */
export function success<T>(
  c: Context,
  data: T,
  statusCode: ContentfulStatusCode = 200
): Response {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };

  return c.json(response, statusCode);
}

/**
 * Creates a standardized error response.
 *
 * @param code - Machine-readable error code (e.g. 'NOT_FOUND')
 * @param statusCode - HTTP status code (default: 400)
 * @param details - Optional additional error context
 */
export function error(
  c: Context,
  code: string,
  message: string,
  statusCode: ContentfulStatusCode = 400,
  details?: unknown
): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
      ...(details !== undefined && { details }),
    },
  };

  return c.json(response, statusCode);
}
