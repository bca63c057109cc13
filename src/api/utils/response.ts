/**
 * API Response Helpers
 * Standardized response formatting and body parsing
 */

import type { Context } from 'hono';
import type { z } from 'zod';

import type { ActorContext, ErrorCode } from '@/types/index.js';

import { getErrorStatus } from '../types.js';

/**
 * Service error shape (matches Result pattern)
 */
interface ServiceError {
  code: ErrorCode;
  message: string;
  details?: unknown;
}

/**
 * Helper to get actor from context
 */
export function getActor(c: Context): ActorContext {
  return c.get('actor');
}

/**
 * Helper to get request ID from context
 */
export function getRequestId(c: Context): string {
  return c.get('requestId');
}

/**
 * Create error response from service error
 */
export function errorResponse(
  c: Context,
  error: ServiceError,
  requestId: string
): Response {
  return c.json(
    {
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
        requestId,
      },
    },
    getErrorStatus(error.code)
  );
}

/**
 * Create success response with data
 */
export function successResponse<T>(
  c: Context,
  data: T,
  requestId: string,
  status: 200 | 201 = 200
): Response {
  return c.json(
    {
      data,
      meta: { requestId },
    },
    status
  );
}

export type ParsedBody<T> =
  | { success: true; data: T }
  | { success: false; response: Response };

/**
 * Read and validate a JSON body. An empty or malformed body is treated
 * as `{}` so schemas with only optional fields still pass.
 */
export async function parseBody<S extends z.ZodTypeAny>(
  c: Context,
  schema: S
): Promise<ParsedBody<z.infer<S>>> {
  let rawBody: unknown;
  try {
    rawBody = await c.req.json();
  } catch {
    rawBody = {};
  }

  const validation = schema.safeParse(rawBody);
  if (!validation.success) {
    const issue = validation.error.issues[0];
    return {
      success: false,
      response: errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message:
            issue === undefined
              ? 'Invalid request body'
              : `${issue.path.join('.') || 'body'}: ${issue.message}`,
        },
        getRequestId(c)
      ),
    };
  }

  return { success: true, data: validation.data };
}
