/**
 * Security headers for a JSON-only API.
 */

import type { Context, Next } from 'hono';
import { config } from '../config';

export async function securityHeaders(c: Context, next: Next): Promise<void> {
  await next();

  // Prevent clickjacking
  c.header('X-Frame-Options', 'DENY');
  // Block MIME sniffing
  c.header('X-Content-Type-Options', 'nosniff');
  c.header('Referrer-Policy', 'no-referrer');

  if (config.app.isProduction) {
    c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
  }

  c.header(
    'Content-Security-Policy',
    "default-src 'none'; frame-ancestors 'none'; base-uri 'none'; form-action 'none'"
  );
  c.header('Cross-Origin-Resource-Policy', 'same-origin');
}
