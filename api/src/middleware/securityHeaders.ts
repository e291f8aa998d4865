/**
 * Security Headers Middleware
 *
 * JSON-only API: no framing, no sniffing, no content sources.
 */

import type { Context, Next } from 'hono';

const SECURITY_HEADERS: Record<string, string> = {
  'X-Frame-Options': 'DENY',
  'X-Content-Type-Options': 'nosniff',
  'Strict-Transport-Security': 'max-age=31536000; includeSubDomains',
  'Content-Security-Policy': "default-src 'none'; frame-ancestors 'none'",
  'Referrer-Policy': 'no-referrer',
};

export async function securityHeaders(c: Context, next: Next) {
  for (const [name, value] of Object.entries(SECURITY_HEADERS)) {
    c.header(name, value);
  }
  return next();
}
