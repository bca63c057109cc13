/**
 * Engine error hierarchy
 *
 * Thrown by the codec, state machine, metering, validator, repositories
 * and locks. Only the subscription service catches these.
 */

import type { ErrorCode } from './result.js';

export class EntitlementError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EntitlementError';
  }
}

export class ValidationError extends EntitlementError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, details);
    this.name = 'ValidationError';
  }
}

export class InvalidStateError extends EntitlementError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_STATE', message, details);
    this.name = 'InvalidStateError';
  }
}

export class NotFoundError extends EntitlementError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NOT_FOUND', message, details);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends EntitlementError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFLICT', message, details);
    this.name = 'ConflictError';
  }
}

/**
 * A version-checked update found the row changed underneath it
 */
export class ConcurrencyError extends EntitlementError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFLICT', message, details);
    this.name = 'ConcurrencyError';
  }
}

export class LockTimeoutError extends EntitlementError {
  constructor(key: string, waitedMs: number) {
    super('CONFLICT', 'Another operation is in progress for this subscriber', {
      key,
      waitedMs,
    });
    this.name = 'LockTimeoutError';
  }
}
