/**
 * Error Handler Tests
 */

import { describe, it, expect } from 'vitest';
import { AppError, formatErrorResponse } from '../../src/api/middleware/error-handler';
import { ConsistencyError, GatewayError, NotFoundError, ValidationError } from '../../src/core/errors';
import { DirectoryError } from '../../src/directory/types';
import { LLMError } from '../../src/llm/types';

describe('formatErrorResponse', () => {
  it('keeps the status and code of an AppError', () => {
    expect(formatErrorResponse(new AppError('BAD_REQUEST', 'Nope', 400, { field: 'x' }))).toEqual({
      statusCode: 400,
      response: { success: false, error: { code: 'BAD_REQUEST', message: 'Nope', details: { field: 'x' } } },
    });
  });

  it.each([
    [new ValidationError('bad'), 400, 'VALIDATION_ERROR'],
    [new NotFoundError('Person', 'p1'), 404, 'NOT_FOUND'],
    [new ConsistencyError('twice'), 409, 'CONFLICT'],
    [new GatewayError('down', 503), 502, 'GATEWAY_ERROR'],
  ])('maps %s by kind', (error, status, code) => {
    const { statusCode, response } = formatErrorResponse(error);

    expect(statusCode).toBe(status);
    expect(response.error.code).toBe(code);
    expect(response.error.message).toBe(error.message);
  });

  it('leaves details out when there are none', () => {
    expect(formatErrorResponse(new ValidationError('bad')).response).toEqual({
      success: false,
      error: { code: 'VALIDATION_ERROR', message: 'bad' },
    });
  });

  it('maps model failures to 502', () => {
    expect(formatErrorResponse(new LLMError('slow down', 'rate_limit'))).toEqual({
      statusCode: 502,
      response: {
        success: false,
        error: { code: 'LLM_ERROR', message: 'slow down', details: { type: 'rate_limit' } },
      },
    });
  });

  it('maps directory failures to 502', () => {
    expect(formatErrorResponse(new DirectoryError('Directory responded with HTTP 500', 500))).toEqual({
      statusCode: 502,
      response: {
        success: false,
        error: {
          code: 'DIRECTORY_ERROR',
          message: 'Directory responded with HTTP 500',
          details: { status: 500 },
        },
      },
    });
  });

  it('shows the message of an unexpected error outside production', () => {
    expect(formatErrorResponse(new Error('boom'))).toEqual({
      statusCode: 500,
      response: { success: false, error: { code: 'INTERNAL_ERROR', message: 'boom' } },
    });
  });
});
