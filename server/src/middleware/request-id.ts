import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import logger, { type Logger } from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    log: Logger;
  }
}

/**
 * Accepts a caller-supplied X-Request-ID when it is short and safe,
 * otherwise mints one, and exposes a request-scoped logger as `log`.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const raw = c.req.header('X-Request-ID')?.trim().slice(0, 64);
  const requestId = raw && /^[A-Za-z0-9._:-]+$/.test(raw) ? raw : randomUUID();
  c.set('requestId', requestId);
  c.set('log', logger.child({ requestId }));
  c.header('X-Request-ID', requestId);
  await next();
}
