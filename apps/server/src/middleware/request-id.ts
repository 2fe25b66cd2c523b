/**
 * Request ID Middleware
 *
 * Generates a unique ID for each request and attaches it to the context,
 * together with a request-scoped logger carrying that ID.
 */

import type { Context, Next } from 'hono';
import { randomUUID } from 'crypto';
import type winston from 'winston';
import { createChildLogger } from '../logger';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    logger: winston.Logger;
  }
}

/**
 * @example
 * ```typescript
 * app.use('*', requestIdMiddleware);
 *
 * // Later in a handler:
 * c.get('logger').info('Serving file'); // includes requestId
 * ```
 */
export const requestIdMiddleware = async (c: Context, next: Next) => {
  const requestId = randomUUID();

  c.set('requestId', requestId);
  c.set('logger', createChildLogger({ requestId }));

  c.header('X-Request-ID', requestId);

  await next();
};
