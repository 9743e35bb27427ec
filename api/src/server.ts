/**
 * Hono REST API Server
 */

import { Hono } from 'hono';
import { logger } from 'hono/logger';
import { secureHeaders } from 'hono/secure-headers';
import { timing } from 'hono/timing';

import { createLogger } from '../../src/utils/logger.js';
import { corsMiddleware } from './middleware/cors.js';
import { rateLimitMiddleware, type RateLimitOptions } from './middleware/rate-limit.js';
import { errorHandler, notFoundHandler, requestIdMiddleware, type AppEnv } from './middleware/error-handler.js';

import health from './routes/health.js';
import ask from './routes/ask.js';
import metrics from './routes/metrics.js';

const log = createLogger('http');

export interface AppOptions {
  rateLimit?: Partial<RateLimitOptions>;
}

export function createApp(options: AppOptions = {}) {
  const app = new Hono<AppEnv>();

  // Global middleware
  app.use('*', timing());
  app.use('*', logger((message) => log.info(message)));
  app.use('*', secureHeaders());
  app.use('*', corsMiddleware);
  app.use('*', requestIdMiddleware);

  app.use('/api/*', rateLimitMiddleware(options.rateLimit));

  app.route('/api/health', health);
  app.route('/api/ask', ask);
  app.route('/api/metrics', metrics);

  app.get('/', (c) => {
    return c.json({
      name: 'Self-correcting RAG API',
      version: '1.0.0',
      endpoints: {
        health: '/api/health',
        ask: '/api/ask',
        metrics: '/api/metrics',
      },
    });
  });

  app.notFound(notFoundHandler);
  app.onError(errorHandler);

  return app;
}

export type App = ReturnType<typeof createApp>;
