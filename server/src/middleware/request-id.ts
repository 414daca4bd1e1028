import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import logger from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

/**
 * Honors a well-formed inbound X-Request-ID, otherwise mints one, and logs
 * each request once it has been answered.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const candidate = c.req.header('X-Request-ID')?.trim().slice(0, 64);
  const requestId = candidate && REQUEST_ID_PATTERN.test(candidate) ? candidate : randomUUID();
  c.set('requestId', requestId);
  c.header('X-Request-ID', requestId);

  const startedAt = Date.now();
  await next();
  logger.debug(
    { requestId, method: c.req.method, path: c.req.path, status: c.res.status, durationMs: Date.now() - startedAt },
    'Request handled',
  );
}
