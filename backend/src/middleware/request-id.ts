/**
 * Request ID Middleware
 *
 * Attaches a request ID to every incoming request for tracing. A client
 * supplied `X-Request-Id` is reused; otherwise a ULID is generated. The ID
 * is exposed as `c.get('requestId')` and echoed in the response header.
 */

import type { Context, Next } from 'hono';
import { ulid } from 'ulidx';

export type RequestIdVariables = {
  requestId: string;
};

export async function requestIdMiddleware(
  c: Context<{ Variables: RequestIdVariables }>,
  next: Next
): Promise<void> {
  const requestId = c.req.header('x-request-id') || `req_${ulid()}`;

  c.set('requestId', requestId);
  c.header('X-Request-Id', requestId);

  await next();
}

/**
 * Response time middleware: adds a Server-Timing header
 */
export async function serverTimingMiddleware(c: Context, next: Next): Promise<void> {
  const start = performance.now();

  await next();

  const duration = (performance.now() - start).toFixed(1);
  c.header('Server-Timing', `total;dur=${duration}`);
}
