import { describe, it, expect } from 'vitest';
import {
  createServiceError,
  describeError,
  errorResponse,
  httpStatusFor,
  invalid,
  isRetryable,
  notFound,
} from '../errors.js';

describe('createServiceError', () => {
  it('should mark only delivery failures as retryable', () => {
    expect(createServiceError('DELIVERY_FAILED', 'gone').retryable).toBe(true);
    expect(createServiceError('NOT_FOUND', 'missing').retryable).toBe(false);
    expect(isRetryable('VALIDATION_ERROR')).toBe(false);
  });

  it('should omit details when none are given', () => {
    expect(createServiceError('INTERNAL_ERROR', 'oops')).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'oops',
      retryable: false,
    });
  });
});

describe('result helpers', () => {
  it('should build NOT_FOUND results', () => {
    expect(notFound('Session', 's1')).toEqual({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: 'Session not found: s1',
        retryable: false,
        details: { id: 's1' },
      },
    });
  });

  it('should attach field errors to validation results', () => {
    const result = invalid('bad', [{ path: 'x', message: 'Expected number, got string' }]);
    expect(result).toEqual({
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'bad',
        retryable: false,
        details: { errors: [{ path: 'x', message: 'Expected number, got string' }] },
      },
    });
  });
});

describe('errorResponse', () => {
  it('should map error codes to HTTP statuses', () => {
    expect(httpStatusFor('VALIDATION_ERROR')).toBe(400);
    expect(httpStatusFor('NOT_FOUND')).toBe(404);
    expect(httpStatusFor('ALREADY_EXISTS')).toBe(409);
    expect(httpStatusFor('DUPLICATE_SESSION')).toBe(409);
    expect(httpStatusFor('DELIVERY_FAILED')).toBe(500);
    expect(httpStatusFor('INTERNAL_ERROR')).toBe(500);
  });

  it('should serialize the error body', async () => {
    const response = errorResponse(createServiceError('DUPLICATE_SESSION', 'taken'));
    expect(response.status).toBe(409);
    expect(response.headers.get('Content-Type')).toBe('application/json');
    expect(await response.json()).toEqual({
      success: false,
      error: { code: 'DUPLICATE_SESSION', message: 'taken', retryable: false },
    });
  });
});

describe('describeError', () => {
  it('should use the message of Error instances', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
  });
});
