/**
 * Error handling middleware
 */

import type { Context, Next } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { v4 as uuidv4 } from 'uuid';
import { ZodError } from 'zod';
import { ConfigurationError, PipelineCancelledError } from '../../../src/utils/errors.js';
import { sanitizeError } from '../../../src/utils/security.js';
import { createLogger } from '../../../src/utils/logger.js';

const log = createLogger('api');

export type AppEnv = {
  Variables: {
    requestId: string;
  };
};

export interface ApiError {
  error: string;
  message: string;
  details?: unknown;
  requestId?: string;
}

/**
 * Map an error to a status code and a client-safe body
 */
export function toErrorResponse(err: unknown, requestId?: string): { status: ContentfulStatusCode; body: ApiError } {
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: 'Validation Error',
        message: 'Invalid request parameters',
        details: err.errors.map(e => ({
          path: e.path.join('.'),
          message: e.message,
        })),
        requestId,
      },
    };
  }

  if (err instanceof ConfigurationError) {
    return {
      status: 400,
      body: { error: 'Invalid Configuration', message: err.message, requestId },
    };
  }

  if (err instanceof PipelineCancelledError) {
    return {
      status: 504,
      body: { error: 'Gateway Timeout', message: err.message, requestId },
    };
  }

  if (err instanceof HTTPException) {
    return {
      status: err.status,
      body: { error: err.message, message: err.message, requestId },
    };
  }

  return {
    status: 500,
    body: {
      error: 'Internal Server Error',
      message: process.env.NODE_ENV === 'production'
        ? 'An unexpected error occurred'
        : sanitizeError(err),
      requestId,
    },
  };
}

/**
 * Tag every request with an id, echoed in the X-Request-Id header
 */
export async function requestIdMiddleware(c: Context<AppEnv>, next: Next) {
  const requestId = uuidv4();
  c.header('X-Request-Id', requestId);
  c.set('requestId', requestId);
  await next();
}

/**
 * App-level error handler
 */
export function errorHandler(err: Error, c: Context<AppEnv>) {
  const requestId = c.get('requestId');
  const { status, body } = toErrorResponse(err, requestId);
  if (status >= 500) {
    log.error({ err, requestId }, 'Request failed');
  } else {
    log.warn({ requestId, status, message: body.message }, 'Request rejected');
  }
  return c.json(body, status);
}

/**
 * Not found handler
 */
export function notFoundHandler(c: Context<AppEnv>) {
  const response: ApiError = {
    error: 'Not Found',
    message: `Route ${c.req.method} ${c.req.path} not found`,
    requestId: c.get('requestId'),
  };
  return c.json(response, 404);
}
