/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { SubscriptionService } from '@/services/subscription.service.js';
import type { ActorContext, ErrorCode } from '@/types/index.js';
import type { LifecycleJobs } from '@/workers/lifecycle-jobs.js';

/**
 * Extended Hono context with actor
 */
declare module 'hono' {
  interface ContextVariableMap {
    actor: ActorContext;
    requestId: string;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 500;

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<ErrorCode, ErrorStatus> = {
  UNAUTHORIZED: 401,
  PERMISSION_DENIED: 403,
  NOT_FOUND: 404,
  VALIDATION_ERROR: 400,
  CONFLICT: 409,
  INVALID_STATE: 400,
  INTERNAL_ERROR: 500,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: ErrorCode): ErrorStatus {
  return ERROR_STATUS_MAP[code];
}

/**
 * Service context for dependency injection
 */
export interface ApiServices {
  subscriptionService: SubscriptionService;
  jobs: LifecycleJobs;
}
