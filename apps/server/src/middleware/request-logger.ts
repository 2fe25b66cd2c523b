/**
 * Request Logger Middleware
 *
 * Logs incoming requests and outgoing responses with timing information.
 * Uses the request-scoped logger set by requestIdMiddleware, so it must be
 * installed after it.
 */

import type { Context, Next } from 'hono';

export const requestLoggerMiddleware = async (c: Context, next: Next) => {
  const logger = c.get('logger');
  const startTime = Date.now();

  const method = c.req.method;
  const path = c.req.path;

  logger.http('Incoming request', {
    type: 'request_incoming',
    method,
    path,
    userAgent: c.req.header('User-Agent') || 'unknown'
  });

  await next();

  const duration = Date.now() - startTime;

  logger.http('Outgoing response', {
    type: 'request_outgoing',
    method,
    path,
    status: c.res.status,
    contentType: c.res.headers.get('Content-Type') ?? undefined,
    durationMs: duration
  });
};
