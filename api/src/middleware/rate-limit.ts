/**
 * Per-client request budget for the /api routes
 *
 * Fixed window keyed by client address and path. Every pipeline run costs
 * several model calls, so over-budget clients get a 429 with Retry-After
 * instead of queueing work.
 */

import type { Context, MiddlewareHandler } from 'hono';
import { createLogger } from '../../../src/utils/logger.js';
import type { ApiError, AppEnv } from './error-handler.js';

const log = createLogger('rate-limit');

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
}

interface Window {
  count: number;
  resetAt: number;
}

export const DEFAULT_RATE_LIMIT: RateLimitOptions = {
  windowMs: 60_000,
  maxRequests: 100,
};

function clientKey(c: Context<AppEnv>): string {
  const client = c.req.header('x-forwarded-for')?.split(',')[0]?.trim() || c.req.header('x-real-ip') || 'unknown';
  return `${client}:${c.req.path}`;
}

export function rateLimitMiddleware(options: Partial<RateLimitOptions> = {}): MiddlewareHandler<AppEnv> {
  const { windowMs, maxRequests } = { ...DEFAULT_RATE_LIMIT, ...options };
  const windows = new Map<string, Window>();

  const sweep = setInterval(() => {
    const now = Date.now();
    for (const [key, window] of windows) {
      if (now >= window.resetAt) windows.delete(key);
    }
  }, windowMs);
  sweep.unref();

  return async (c, next) => {
    const key = clientKey(c);
    const now = Date.now();

    let window = windows.get(key);
    if (!window || now >= window.resetAt) {
      window = { count: 0, resetAt: now + windowMs };
      windows.set(key, window);
    }
    window.count++;

    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(Math.max(0, maxRequests - window.count)));
    c.header('X-RateLimit-Reset', String(Math.ceil(window.resetAt / 1000)));

    if (window.count > maxRequests) {
      const retryAfter = Math.max(1, Math.ceil((window.resetAt - now) / 1000));
      log.warn({ key, limit: maxRequests, windowMs }, 'Request budget exceeded');

      c.header('Retry-After', String(retryAfter));
      const body: ApiError = {
        error: 'Too Many Requests',
        message: `Request budget of ${maxRequests} per ${windowMs}ms spent, retry in ${retryAfter}s`,
        requestId: c.get('requestId'),
      };
      return c.json(body, 429);
    }

    await next();
  };
}
