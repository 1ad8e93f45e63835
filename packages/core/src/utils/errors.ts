/**
 * Error utilities
 * @internal
 */

import type {
  ErrorCode,
  OperationResult,
  ServiceError,
  ValidationError,
} from '../types/public-api.js';

/**
 * Create a structured service error
 */
export function createServiceError(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): ServiceError {
  return {
    code,
    message,
    retryable: isRetryable(code),
    ...(details && { details }),
  };
}

/**
 * Wrap a value in a successful result
 */
export function ok<T>(value: T): OperationResult<T> {
  return { success: true, value };
}

/**
 * Wrap an error in a failed result
 */
export function fail<T = never>(error: ServiceError): OperationResult<T> {
  return { success: false, error };
}

export function notFound<T = never>(entity: string, id: string): OperationResult<T> {
  return fail(createServiceError('NOT_FOUND', `${entity} not found: ${id}`, { id }));
}

export function invalid<T = never>(
  message: string,
  errors?: ValidationError[]
): OperationResult<T> {
  return fail(createServiceError('VALIDATION_ERROR', message, errors ? { errors } : undefined));
}

/**
 * Check if an error code is retryable
 */
export function isRetryable(code: ErrorCode): boolean {
  return code === 'DELIVERY_FAILED';
}

/**
 * HTTP status for an error code
 */
export function httpStatusFor(code: ErrorCode): number {
  switch (code) {
    case 'VALIDATION_ERROR': return 400;
    case 'NOT_FOUND': return 404;
    case 'ALREADY_EXISTS':
    case 'DUPLICATE_SESSION': return 409;
    default: return 500;
  }
}

/**
 * Create HTTP Response for a service error
 */
export function errorResponse(error: ServiceError): Response {
  return new Response(JSON.stringify({ success: false, error }), {
    status: httpStatusFor(error.code),
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * Describe an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
