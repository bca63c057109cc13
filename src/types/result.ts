/**
 * Result Pattern Implementation
 *
 * Service operations return Result<T> instead of throwing. Lower layers
 * throw EntitlementError subclasses; the subscription service converts
 * them with fromError().
 */

import { EntitlementError } from './errors.js';

export type ErrorCode =
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'CONFLICT'
  | 'INVALID_STATE'
  | 'PERMISSION_DENIED'
  | 'UNAUTHORIZED'
  | 'INTERNAL_ERROR';

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

export type Result<T> = Success<T> | Failure;

export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

export function failure(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): Failure {
  const error: Failure['error'] = { code, message };
  if (details !== undefined) {
    error.details = details;
  }
  return {
    success: false,
    error,
  };
}

/**
 * Convert a thrown value into a Failure. Only EntitlementError keeps its
 * code and message; anything else is reported as INTERNAL_ERROR.
 */
export function fromError(error: unknown): Failure {
  if (error instanceof EntitlementError) {
    return failure(error.code, error.message, error.details);
  }
  return failure('INTERNAL_ERROR', 'An unexpected error occurred');
}

export function isSuccess<T>(result: Result<T>): result is Success<T> {
  return result.success === true;
}

export function isFailure<T>(result: Result<T>): result is Failure {
  return result.success === false;
}
