/**
 * Error Handler
 *
 * Installed with app.onError. Translates thrown errors into the
 * `{ error: { code, message, details? } }` envelope.
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import postgres from 'postgres';
import { ZodError } from 'zod';
import { ApiError } from '@/errors/apiErrors';
import { logger } from '@/utils/logger';

/**
 * Error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

// Only show verbose errors in development and test, never in production
function isVerboseErrors(): boolean {
  const env = process.env.NODE_ENV;
  return env === 'development' || env === 'test';
}

/**
 * SQLSTATE class 23: integrity constraint violation
 */
function isConstraintViolation(error: unknown): error is postgres.PostgresError {
  return error instanceof postgres.PostgresError && error.code.startsWith('23');
}

export function handleError(error: Error, c: Context): Response {
  const log = logger.child({ path: c.req.path, method: c.req.method });

  if (error instanceof ZodError) {
    return c.json<ErrorResponse>(
      {
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request data',
          details: error.issues,
        },
      },
      400
    );
  }

  // Raised by the body validators for JSON that does not parse
  if (error instanceof HTTPException && error.status < 500) {
    return c.json<ErrorResponse>(
      {
        error: {
          code: error.status === 400 ? 'VALIDATION_ERROR' : `HTTP_${error.status}`,
          message: error.message,
        },
      },
      error.status
    );
  }

  if (error instanceof ApiError) {
    if (error.status >= 500) {
      log.error('API error', { code: error.code, message: error.message });
    }
    return c.json<ErrorResponse>(
      {
        error: {
          code: error.code,
          message: error.message,
          ...(error.details !== undefined ? { details: error.details } : {}),
        },
      },
      error.status
    );
  }

  if (isConstraintViolation(error)) {
    log.warn('Constraint violation', {
      constraint: error.constraint_name,
      sqlState: error.code,
    });
    return c.json<ErrorResponse>(
      {
        error: {
          code: 'CONSTRAINT_VIOLATION',
          message: isVerboseErrors() ? error.message : 'Request conflicts with stored data',
          ...(error.constraint_name ? { details: { constraint: error.constraint_name } } : {}),
        },
      },
      400
    );
  }

  log.error('Unhandled error', {
    message: error.message,
    stack: error.stack,
    cause: error.cause ? String(error.cause) : undefined,
  });

  return c.json<ErrorResponse>(
    {
      error: {
        code: 'INTERNAL_ERROR',
        message: isVerboseErrors() ? error.message : 'An internal error occurred',
      },
    },
    500
  );
}
