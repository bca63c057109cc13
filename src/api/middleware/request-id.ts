/**
 * Request ID Middleware
 * Honours an incoming X-Request-ID, otherwise generates one
 */

import { createMiddleware } from 'hono/factory';
import { nanoid } from 'nanoid';

export const REQUEST_ID_HEADER = 'X-Request-ID';

const MAX_REQUEST_ID_LENGTH = 128;

export function createRequestIdMiddleware() {
  return createMiddleware(async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER)?.trim();
    const requestId =
      incoming !== undefined && incoming !== '' && incoming.length <= MAX_REQUEST_ID_LENGTH
        ? incoming
        : nanoid();

    c.set('requestId', requestId);
    c.header(REQUEST_ID_HEADER, requestId);

    await next();
  });
}
