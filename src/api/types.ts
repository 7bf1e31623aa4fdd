/**
 * API Response Types
 *
 * Every endpoint answers with one of two envelopes so that the gateway and
 * any dashboard reading statistics can branch on `success` alone:
 *
 * @example
 * ```typescript
 * const ok: ApiResponse<{ handled: boolean }> = {
 *   success: true,
 *   data: { handled: true },
 * };
 *
 * const failed: ApiErrorResponse = {
 *   success: false,
 *   error: { code: 'NOT_FOUND', message: "Message '42' not found" },
 * };
 * ```
 */

/**
 * Standard success response wrapper.
 *
 * @typeParam T - The type of data being returned
 */
export interface ApiResponse<T> {
  success: true;
  data: T;
}

/**
 * Structured error information returned to clients.
 */
export interface ApiError {
  /** Machine-readable code, e.g. 'VALIDATION_ERROR' */
  code: string;
  /** Human-readable description */
  message: string;
  /** Optional extra context such as zod issues */
  details?: unknown;
}

export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

export type ApiResult<T> = ApiResponse<T> | ApiErrorResponse;
