/**
 * Self-correcting RAG - REST API Entry Point
 */

import { serve } from '@hono/node-server';
import { createApp } from './server.js';
import { getMetricsRecorder, getPipeline } from '../../src/core/pipeline/index.js';
import { createLogger } from '../../src/utils/logger.js';

const log = createLogger('api');

const PORT = parseInt(process.env.API_PORT || '3001', 10);
const HOST = process.env.API_HOST || '0.0.0.0';

async function start(): Promise<void> {
  // Fail fast on invalid pipeline configuration
  getPipeline();
  const loaded = await getMetricsRecorder().load();
  log.info({ queries: loaded }, 'Loaded saved query metrics');

  const app = createApp();

  serve(
    {
      fetch: app.fetch,
      port: PORT,
      hostname: HOST,
    },
    (info) => {
      log.info(
        { host: HOST, port: info.port, endpoints: ['GET /api/health', 'POST /api/ask', 'GET /api/metrics', 'POST /api/metrics/reset'] },
        'REST API listening'
      );
    }
  );
}

start().catch((error: unknown) => {
  log.fatal({ err: error }, 'Failed to start REST API');
  process.exit(1);
});
