/**
 * CORS Middleware
 *
 * The API is token authenticated and sends no cookies. Loggers and scripts
 * send no Origin and get a wildcard; browser origins are echoed back, and
 * only configured origins may send credentials.
 */

import type { MiddlewareHandler } from 'hono';
import { cors } from 'hono/cors';

const DEV_ORIGINS = ['http://localhost:5173', 'http://localhost:3000'];

const sharedPolicy = {
  allowMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
  allowHeaders: ['Content-Type', 'Authorization', 'X-API-Key'],
  exposeHeaders: ['Content-Length'],
  maxAge: 86400,
};

export function createCorsMiddleware(corsOrigin?: string): MiddlewareHandler {
  const trustedOrigins = new Set([...DEV_ORIGINS, ...(corsOrigin ? [corsOrigin] : [])]);

  const trustedPolicy = cors({
    ...sharedPolicy,
    origin: (origin) => origin,
    credentials: true,
  });

  const openPolicy = cors({
    ...sharedPolicy,
    origin: (origin) => origin || '*',
  });

  return async (c, next) => {
    const origin = c.req.header('Origin');
    if (origin && trustedOrigins.has(origin)) {
      return trustedPolicy(c, next);
    }
    return openPolicy(c, next);
  };
}
