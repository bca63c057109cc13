/**
 * Auth Middleware
 * Constructs ActorContext from a shared API key
 *
 * The engine sits behind the host application, which authenticates end
 * users itself and calls this API with `Authorization: Bearer <key>`.
 */

import { timingSafeEqual } from 'node:crypto';

import type { Context, Next } from 'hono';

import type { ActorContext } from '@/types/index.js';

/**
 * Auth middleware dependencies
 */
interface AuthMiddlewareDeps {
  apiKey: string;
}

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

function unauthorized(c: Context, requestId: string, message: string): Response {
  return c.json(
    {
      error: {
        code: 'UNAUTHORIZED',
        message,
        requestId,
      },
    },
    401
  );
}

/**
 * Create auth middleware for protected routes
 */
export function createAuthMiddleware(deps: AuthMiddlewareDeps) {
  const { apiKey } = deps;

  return async function authMiddleware(c: Context, next: Next) {
    const requestId = c.get('requestId');

    // 1. Extract key from Authorization header
    const authHeader = c.req.header('Authorization');
    if (authHeader === undefined || !authHeader.startsWith('Bearer ')) {
      return unauthorized(c, requestId, 'Missing or invalid authorization header');
    }

    const token = authHeader.slice(7).trim();
    if (token === '' || !keysMatch(token, apiKey)) {
      return unauthorized(c, requestId, 'Invalid API key');
    }

    // 2. Construct ActorContext
    const clientId = c.req.header('X-Client-ID');
    const actor: ActorContext = {
      type: 'service',
      requestId,
      ...(clientId !== undefined && clientId !== '' && { clientId }),
    };

    c.set('actor', actor);
    return next();
  };
}
